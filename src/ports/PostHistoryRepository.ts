export type PostHistoryEntry = {
  _id: string;
  jobId: string;
  listingRef: string;
  profileRef: string;
  profileDisplayName: string;
  status: "completed";
  recordedAt: Date;
};

export interface PostHistoryRepository {
  record(entry: PostHistoryEntry): Promise<void>;
}
