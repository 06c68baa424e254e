import { loadEnv } from "../../src/shared/config/env";

describe("loadEnv", () => {
  it("uses defaults and validates the default archive base URL", () => {
    expect(loadEnv({})).toEqual({
      MONGO_URI: "mongodb://localhost:27017/comment_archive",
      MONGO_DB_NAME: "comment_archive",
      COMMENTS_API_BASE_URL: "https://arctic-shift.photon-reddit.com/api",
      COMMENTS_API_USER_AGENT: "comment-archive-ingest/1.0 (research)"
    });
  });

  it("trims provided values and treats blank ones as unset", () => {
    const env = loadEnv({
      MONGO_URI: "  mongodb://db:27017/archive  ",
      MONGO_DB_NAME: "   ",
      COMMENTS_API_BASE_URL: "http://localhost:3999/api",
      COMMENTS_API_USER_AGENT: "test-agent"
    });

    expect(env).toEqual({
      MONGO_URI: "mongodb://db:27017/archive",
      MONGO_DB_NAME: "comment_archive",
      COMMENTS_API_BASE_URL: "http://localhost:3999/api",
      COMMENTS_API_USER_AGENT: "test-agent"
    });
  });

  it("rejects a base URL that is not absolute", () => {
    expect(() => loadEnv({ COMMENTS_API_BASE_URL: "archive/api" })).toThrow(
      "COMMENTS_API_BASE_URL must be a valid absolute http/https URL. Received: archive/api"
    );
  });

  it("rejects a non-http scheme", () => {
    expect(() => loadEnv({ COMMENTS_API_BASE_URL: "ftp://archive.example.test" })).toThrow(
      "COMMENTS_API_BASE_URL must use http or https scheme. Received: ftp://archive.example.test"
    );
  });
});
