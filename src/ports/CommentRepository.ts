import type { CommentDoc } from "../core/comments/comment.types";

export type { CommentDoc };

export type CommitResult = {
  inserted: number;   // new ids written
  duplicates: number; // ids already present, left untouched
};

export type CommentStoreStats = {
  total: number;
  minDate?: string;
  maxDate?: string;
};

export interface CommentRepository {
  /** Highest `createdUtc` already committed, or undefined for an empty store. */
  latestIngestedTime(): Promise<number | undefined>;
  count(): Promise<number>;
  /** Stages docs for the next commit. Existing ids are never overwritten. */
  insertManyIfAbsent(docs: CommentDoc[]): Promise<void>;
  commit(): Promise<CommitResult>;
  stats(): Promise<CommentStoreStats>;
}
