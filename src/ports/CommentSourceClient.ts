import type { RawComment } from "../core/comments/comment.types";

export type { RawComment };

export type FetchCommentsParams = {
  subreddit: string;
  after: number;  // epoch seconds, exclusive
  before: number; // epoch seconds
  limit: number;
};

export type FetchCommentsResult =
  | { status: "ok"; comments: RawComment[] }
  | { status: "exhausted"; attempts: number; reason: string };

export interface CommentSourceClient {
  fetchComments(params: FetchCommentsParams): Promise<FetchCommentsResult>;
}
