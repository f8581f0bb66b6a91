export type Env = {
  MONGO_URI: string;
  MONGO_DB_NAME: string;
  AGENT_BASE_URL: string;
  AGENT_API_KEY: string;
  SCHEDULER_LOG_FILE: string;
  SCHEDULER_STOP_FILE: string;
  PORT: number;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const validatePort = (raw: string): number => {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || value > 65535) {
    throw new Error(`PORT=${raw} is out of allowed range [0..65535]`);
  }
  return value;
};

const nonEmpty = (value: string | undefined, fallback: string): string =>
  value != null && value.trim() !== "" ? value.trim() : fallback;

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = nonEmpty(env.MONGO_URI, "mongodb://localhost:27017/marketplace_scheduler");
  const MONGO_DB_NAME = nonEmpty(env.MONGO_DB_NAME, "marketplace_scheduler");
  const AGENT_BASE_URL = validateHttpUrl("AGENT_BASE_URL", nonEmpty(env.AGENT_BASE_URL, "http://localhost:4010"));
  const AGENT_API_KEY = env.AGENT_API_KEY ?? "";
  const SCHEDULER_LOG_FILE = nonEmpty(env.SCHEDULER_LOG_FILE, "scheduler.log");
  const SCHEDULER_STOP_FILE = nonEmpty(env.SCHEDULER_STOP_FILE, "scheduler_stop_signal.txt");
  const PORT = validatePort(nonEmpty(env.PORT, "3000"));

  return { MONGO_URI, MONGO_DB_NAME, AGENT_BASE_URL, AGENT_API_KEY, SCHEDULER_LOG_FILE, SCHEDULER_STOP_FILE, PORT };
};
