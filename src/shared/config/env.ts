export type Env = {
  MONGO_URI: string;
  MONGO_DB_NAME: string;
  COMMENTS_API_BASE_URL: string;
  COMMENTS_API_USER_AGENT: string;
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

const nonEmpty = (value: string | undefined): string | undefined =>
  value != null && value.trim() !== "" ? value.trim() : undefined;

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = nonEmpty(env.MONGO_URI) ?? "mongodb://localhost:27017/comment_archive";
  const MONGO_DB_NAME = nonEmpty(env.MONGO_DB_NAME) ?? "comment_archive";
  const COMMENTS_API_BASE_URL = validateHttpUrl(
    "COMMENTS_API_BASE_URL",
    nonEmpty(env.COMMENTS_API_BASE_URL) ?? "https://arctic-shift.photon-reddit.com/api"
  );
  const COMMENTS_API_USER_AGENT = nonEmpty(env.COMMENTS_API_USER_AGENT) ?? "comment-archive-ingest/1.0 (research)";

  return { MONGO_URI, MONGO_DB_NAME, COMMENTS_API_BASE_URL, COMMENTS_API_USER_AGENT };
};
