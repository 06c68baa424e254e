import type { CommentSourceClient, RawComment } from "../../ports/CommentSourceClient";
import type { CommentRepository, CommitResult } from "../../ports/CommentRepository";
import { epochToDate } from "../../core/comments/epoch";
import { decodeBatch, parseCreatedUtc, type DecodedBatch } from "../../core/comments/transformComment";
import { createIngestionStateMachine, type IngestionPhase } from "../../core/ingestion/ingestion.state";
import { TimeWindowCursor, type TimeWindow } from "../../core/pagination/timeWindowCursor";
import { createJsonConsoleLogger, type Logger } from "../../shared/logging/logger";
import type { IngestConfigInput } from "./ingest.config";
import { resolveIngestConfig } from "./ingest.config";
import { resolveResumePosition } from "./resume";
import {
  classifyDecodeFailure,
  createIngestRunTracker,
  type IngestErrorContext,
  type IngestOutcome,
  type IngestRunCounters,
  wrapRepositoryFailure
} from "./ingest.error-handler";

export type IngestRunSummary = IngestRunCounters & {
  outcome: IngestOutcome;
  phase: IngestionPhase;
  resumed: boolean;
  cursor: number;
  cursorDate: string;
  totalInStore: number;
  minDate: string | null;
  maxDate: string | null;
};

export type IngestCommentsDeps = {
  client: CommentSourceClient;
  repo: CommentRepository;
  config: IngestConfigInput;
  logger?: Logger;
};

/**
 * Walks the configured time range window by window, staging decoded comments
 * into the repository and committing every `checkpointInterval` batches.
 * Resumes from the newest committed comment; the store is the checkpoint.
 */
export const ingestComments = async (deps: IngestCommentsDeps): Promise<IngestRunSummary> => {
  const { client, repo } = deps;
  const config = resolveIngestConfig(deps.config);
  const logger = deps.logger ?? createJsonConsoleLogger();
  const state = createIngestionStateMachine();
  const tracker = createIngestRunTracker();

  const readStore = async <T>(read: () => Promise<T>, context: IngestErrorContext = {}): Promise<T> => {
    try {
      return await read();
    } catch (error) {
      throw wrapRepositoryFailure(error, "repository_read_failed", context);
    }
  };

  const latest = await readStore(() => repo.latestIngestedTime());
  const existing = await readStore(() => repo.count());
  const resume = resolveResumePosition(config.startEpoch, latest);
  const cursor = new TimeWindowCursor(resume.cursor, config.endEpoch);

  logger.info("ingest.started", {
    subreddit: config.subreddit,
    startDate: config.startDate,
    endDate: config.endDate,
    existing,
    resumed: resume.resumed,
    cursor: cursor.value,
    cursorDate: epochToDate(cursor.value)
  });

  const commit = async (context: IngestErrorContext, next: IngestionPhase): Promise<CommitResult> => {
    state.transition("CHECKPOINTING");
    let result: CommitResult;
    try {
      result = await repo.commit();
    } catch (error) {
      throw wrapRepositoryFailure(error, "repository_write_failed", context);
    }
    tracker.addCommit(result);
    state.transition(next);
    return result;
  };

  const stage = async (raw: RawComment[], batch: number, window: TimeWindow): Promise<void> => {
    let decoded: DecodedBatch;
    try {
      decoded = decodeBatch(raw, config.subreddit);
    } catch (reason) {
      const decision = classifyDecodeFailure(reason, { batch, ...window, size: raw.length });
      if (decision.action === "fail") throw decision.error;

      tracker.addRejected(raw.length);
      logger.warn("ingest.batch_rejected", { ...decision.log });
      return;
    }

    tracker.addExcluded(decoded.excluded);
    if (decoded.docs.length === 0) return;

    try {
      await repo.insertManyIfAbsent(decoded.docs);
    } catch (error) {
      throw wrapRepositoryFailure(error, "repository_write_failed", { batch, ...window });
    }
  };

  state.transition("RUNNING");
  let outcome: IngestOutcome = "end_boundary_reached";

  while (!cursor.isExhausted()) {
    const batch = tracker.nextBatchNumber();
    const window = cursor.window();
    const result = await client.fetchComments({
      subreddit: config.subreddit,
      after: window.after,
      before: window.before,
      limit: config.pageSize
    });

    if (result.status === "exhausted") {
      // Fail open: keep the cursor and ask for the same window again.
      const consecutiveGaps = tracker.addGap();
      logger.warn("ingest.window_gap", {
        batch,
        after: window.after,
        before: window.before,
        afterDate: epochToDate(window.after),
        attempts: result.attempts,
        reason: result.reason,
        consecutiveGaps,
        maxConsecutiveGaps: config.maxConsecutiveGaps
      });
      if (consecutiveGaps >= config.maxConsecutiveGaps) {
        outcome = "source_unavailable";
        break;
      }
    } else {
      tracker.addFetched(result.comments.length);
      if (result.comments.length === 0) {
        outcome = "source_exhausted";
        break;
      }

      await stage(result.comments, batch, window);

      const advance = cursor.advance(result.comments.map((comment) => parseCreatedUtc(comment.created_utc)));
      if (advance.forced) {
        tracker.addForcedAdvance();
        logger.warn("ingest.cursor_stalled", { batch, from: advance.from, to: advance.to });
      }
    }

    if (batch % config.checkpointInterval === 0) {
      await commit({ batch, after: cursor.value }, "RUNNING");
      const counters = tracker.counters();
      logger.info("ingest.progress", {
        batch,
        fetched: counters.fetched,
        inserted: counters.inserted,
        currentDate: epochToDate(cursor.value)
      });
    }
  }

  if (outcome === "source_unavailable") {
    logger.warn("ingest.stopped_early", {
      after: cursor.value,
      before: config.endEpoch,
      afterDate: epochToDate(cursor.value),
      endDate: config.endDate
    });
  }

  await commit({ after: cursor.value }, "COMPLETE");
  const stats = await readStore(() => repo.stats());

  const summary: IngestRunSummary = {
    outcome,
    phase: state.phase(),
    resumed: resume.resumed,
    cursor: cursor.value,
    cursorDate: epochToDate(cursor.value),
    totalInStore: stats.total,
    minDate: stats.minDate ?? null,
    maxDate: stats.maxDate ?? null,
    ...tracker.counters()
  };

  logger.info("ingest.completed", { ...summary });
  return summary;
};
