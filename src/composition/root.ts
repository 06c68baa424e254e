import {
  ingestComments,
  type IngestRunSummary
} from "../application/ingest-comments/ingestComments.usecase";
import { CommentArchiveHttpClient } from "../infrastructure/comment-archive/CommentArchiveHttpClient";
import { MongoCommentRepository } from "../infrastructure/mongo/MongoCommentRepository";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import { createJsonConsoleLogger } from "../shared/logging/logger";

export const runIngest = async (): Promise<IngestRunSummary> => {
  // Both loaders throw on bad input before any connection is opened.
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();
  const logger = createJsonConsoleLogger();

  const client = new CommentArchiveHttpClient(env.COMMENTS_API_BASE_URL, {
    userAgent: env.COMMENTS_API_USER_AGENT,
    timeoutMs: runtime.client.timeoutMs,
    requestDelayMs: runtime.client.requestDelayMs,
    maxRetries: runtime.client.maxRetries,
    logger
  });
  const repo = new MongoCommentRepository(env.MONGO_URI, env.MONGO_DB_NAME);

  try {
    return await ingestComments({ client, repo, config: runtime.ingestConfig, logger });
  } finally {
    await repo.close();
  }
};
