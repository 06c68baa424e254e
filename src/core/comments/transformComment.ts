import type { CommentDoc, RawComment } from "./comment.types";
import { DEFAULT_SCORE, DELETED_AUTHOR, EXCLUDED_BODIES } from "./comment.types";
import { epochToDate, MAX_EPOCH_SECONDS } from "./epoch";

export class InvalidCommentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidCommentError";
  }
}

const parseCommentId = (value: unknown): string => {
  if (value == null) {
    throw new InvalidCommentError("Invalid comment: missing id");
  }

  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }

  if (typeof value === "string") {
    const normalized = value.trim();
    if (normalized.length === 0) {
      throw new InvalidCommentError("Invalid comment: empty id");
    }
    return normalized;
  }

  throw new InvalidCommentError("Invalid comment: id is not a string");
};

/**
 * Epoch seconds from `created_utc`. Numeric strings are accepted, fractions
 * are floored. Negative values and values past the Date range count as 0.
 */
export const parseCreatedUtc = (value: unknown): number => {
  const numeric = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof numeric !== "number" || !Number.isFinite(numeric)) return 0;
  if (numeric < 0 || numeric > MAX_EPOCH_SECONDS) return 0;
  return Math.floor(numeric);
};

const optionalString = (value: unknown): string | undefined => {
  if (typeof value !== "string") return undefined;
  return value === "" ? undefined : value;
};

const parseScore = (value: unknown): number => {
  const numeric = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof numeric === "number" && Number.isFinite(numeric) ? numeric : DEFAULT_SCORE;
};

export const bodyOf = (raw: RawComment): string => (typeof raw.body === "string" ? raw.body : "");

export const isExcludedComment = (raw: RawComment): boolean => EXCLUDED_BODIES.has(bodyOf(raw));

export const transformComment = (raw: RawComment, defaultSubreddit: string): CommentDoc => {
  const commentId = parseCommentId(raw.id);
  const createdUtc = parseCreatedUtc(raw.created_utc);

  const doc: CommentDoc = {
    commentId,
    body: bodyOf(raw),
    author: optionalString(raw.author) ?? DELETED_AUTHOR,
    score: parseScore(raw.score),
    createdUtc,
    date: epochToDate(createdUtc),
    subreddit: optionalString(raw.subreddit) ?? defaultSubreddit
  };

  const parentId = optionalString(raw.parent_id);
  if (parentId != null) doc.parentId = parentId;
  const permalink = optionalString(raw.permalink);
  if (permalink != null) doc.permalink = permalink;

  return doc;
};

export type DecodedBatch = {
  docs: CommentDoc[];
  excluded: number;
};

/**
 * Drops excluded bodies, then decodes the rest. A single undecodable
 * record rejects the whole batch.
 */
export const decodeBatch = (raw: RawComment[], defaultSubreddit: string): DecodedBatch => {
  const kept = raw.filter((comment) => !isExcludedComment(comment));
  return {
    docs: kept.map((comment) => transformComment(comment, defaultSubreddit)),
    excluded: raw.length - kept.length
  };
};
