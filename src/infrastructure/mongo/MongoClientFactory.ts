import { MongoClient, type Db } from "mongodb";

export type MongoConnection = {
  getDb(): Promise<Db>;
  close(): Promise<void>;
};

/**
 * One lazily connected client shared by every repository of the process.
 */
export const createMongoConnection = (mongoUri: string, dbName: string): MongoConnection => {
  let client: MongoClient | undefined;
  let connecting: Promise<Db> | undefined;

  return {
    getDb: () => {
      if (!connecting) {
        const fresh = new MongoClient(mongoUri);
        client = fresh;
        connecting = fresh.connect().then(
          (connected) => connected.db(dbName),
          (err: unknown) => {
            // Allow the next poll to try again after a failed connect.
            client = undefined;
            connecting = undefined;
            throw err;
          }
        );
      }
      return connecting;
    },
    close: async () => {
      const current = client;
      client = undefined;
      connecting = undefined;
      await current?.close();
    }
  };
};
