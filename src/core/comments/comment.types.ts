export type RawComment = Record<string, unknown>;

export type CommentDoc = {
  commentId: string;
  body: string;
  author: string;
  score: number;
  createdUtc: number; // epoch seconds
  date: string;       // YYYY-MM-DD, UTC
  parentId?: string;
  permalink?: string;
  subreddit: string;
};

export const EXCLUDED_BODIES: ReadonlySet<string> = new Set(["[deleted]", "[removed]", ""]);

export const DELETED_AUTHOR = "[deleted]";
export const DEFAULT_SCORE = 1;
