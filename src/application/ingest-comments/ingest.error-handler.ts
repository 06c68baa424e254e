import { InvalidCommentError } from "../../core/comments/transformComment";

export type IngestFailureCode = "decode_unexpected" | "repository_read_failed" | "repository_write_failed";

export type IngestErrorContext = {
  batch?: number;
  after?: number;
  before?: number;
  size?: number;
};

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

const causeOf = (reason: unknown): unknown =>
  reason instanceof Error ? reason.cause ?? reason : reason;

export class IngestFatalError extends Error {
  readonly code: IngestFailureCode;
  readonly context: IngestErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: IngestFailureCode; message: string; context: IngestErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "IngestFatalError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

type BatchRejectedLog = {
  reason: string;
  batch: number;
  after: number;
  before: number;
  size: number;
};

export type DecodeFailureDecision =
  | {
      action: "reject_batch";
      code: "batch_rejected";
      log: BatchRejectedLog;
    }
  | {
      action: "fail";
      error: IngestFatalError;
    };

export const classifyDecodeFailure = (
  reason: unknown,
  context: Required<IngestErrorContext>
): DecodeFailureDecision => {
  if (reason instanceof InvalidCommentError) {
    return {
      action: "reject_batch",
      code: "batch_rejected",
      log: {
        reason: reason.message,
        batch: context.batch,
        after: context.after,
        before: context.before,
        size: context.size
      }
    };
  }

  return {
    action: "fail",
    error: new IngestFatalError({
      code: "decode_unexpected",
      message: `Unexpected decode failure at batch=${context.batch}, after=${context.after}: ${toErrorMessage(reason)}`,
      context,
      cause: causeOf(reason)
    })
  };
};

export const wrapRepositoryFailure = (
  reason: unknown,
  code: "repository_read_failed" | "repository_write_failed",
  context: IngestErrorContext
) => {
  const where = context.batch != null ? ` at batch=${context.batch}` : "";
  const verb = code === "repository_read_failed" ? "read" : "write";
  return new IngestFatalError({
    code,
    message: `Repository ${verb} failed${where}: ${toErrorMessage(reason)}`,
    context,
    cause: causeOf(reason)
  });
};

export type IngestOutcome = "end_boundary_reached" | "source_exhausted" | "source_unavailable";

export type IngestRunCounters = {
  batches: number;
  fetched: number;
  inserted: number;
  duplicates: number;
  excluded: number;
  rejected: number;
  gaps: number;
  forcedAdvances: number;
  checkpoints: number;
};

export const createIngestRunTracker = () => {
  const counters: IngestRunCounters = {
    batches: 0,
    fetched: 0,
    inserted: 0,
    duplicates: 0,
    excluded: 0,
    rejected: 0,
    gaps: 0,
    forcedAdvances: 0,
    checkpoints: 0
  };
  let consecutiveGaps = 0;

  return {
    nextBatchNumber: () => {
      counters.batches += 1;
      return counters.batches;
    },
    addFetched: (count: number) => {
      counters.fetched += count;
      consecutiveGaps = 0;
    },
    addExcluded: (count: number) => {
      counters.excluded += count;
    },
    addRejected: (count: number) => {
      counters.rejected += count;
    },
    addGap: () => {
      counters.gaps += 1;
      consecutiveGaps += 1;
      return consecutiveGaps;
    },
    addForcedAdvance: () => {
      counters.forcedAdvances += 1;
    },
    addCommit: (result: { inserted: number; duplicates: number }) => {
      counters.inserted += result.inserted;
      counters.duplicates += result.duplicates;
      counters.checkpoints += 1;
    },
    counters: (): IngestRunCounters => ({ ...counters })
  };
};
