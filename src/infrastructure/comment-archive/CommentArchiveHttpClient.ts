import type {
  CommentSourceClient,
  FetchCommentsParams,
  FetchCommentsResult,
  RawComment
} from "../../ports/CommentSourceClient";
import type { Logger } from "../../shared/logging/logger";
import { createJsonConsoleLogger } from "../../shared/logging/logger";
import { defaultBackoffPolicy, type BackoffPolicy } from "../../shared/retry/backoff";
import { retry, RetryExhaustedError } from "../../shared/retry/retry";
import { sleep as defaultSleep, type Sleep } from "../../shared/time/sleep";

export class ArchiveRequestError extends Error {
  status?: number;
  isTimeout?: boolean;
  retryDelayMs?: number;
  requestUrl?: string;

  constructor(message: string, details: Partial<Pick<ArchiveRequestError, "status" | "isTimeout" | "retryDelayMs" | "requestUrl">> = {}) {
    super(message);
    this.name = "ArchiveRequestError";
    Object.assign(this, details);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type CommentArchiveClientOptions = {
  userAgent: string;
  timeoutMs: number;
  requestDelayMs: number; // enforced after every successful call
  maxRetries: number;     // total tries for transient failures
  throttled?: BackoffPolicy["throttled"];
  transient?: BackoffPolicy["transient"];
  sleep?: Sleep;
  logger?: Logger;
};

export const defaultCommentArchiveClientOptions: CommentArchiveClientOptions = {
  userAgent: "comment-archive-ingest/1.0 (research)",
  timeoutMs: 30000,
  requestDelayMs: 1000,
  maxRetries: 5
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseRetryAfterMs = (header: string | null): number | undefined => {
  if (!header || !/^\d+$/.test(header)) return undefined;
  const seconds = Number(header);
  return Number.isSafeInteger(seconds) ? seconds * 1000 : undefined;
};

/**
 * Pushshift-style comment search over native fetch (Node 20).
 * Never rejects on transport trouble: exhausted retries resolve to
 * `{ status: "exhausted" }` so the caller decides what a gap means.
 */
export class CommentArchiveHttpClient implements CommentSourceClient {
  private readonly options: CommentArchiveClientOptions;
  private readonly policy: BackoffPolicy;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(private readonly baseUrl: string, options: Partial<CommentArchiveClientOptions> = {}) {
    this.options = { ...defaultCommentArchiveClientOptions, ...options };
    this.policy = {
      throttled: this.options.throttled ?? defaultBackoffPolicy.throttled,
      transient: this.options.transient ?? defaultBackoffPolicy.transient,
      maxTransientAttempts: this.options.maxRetries
    };
    this.sleep = this.options.sleep ?? defaultSleep;
    this.logger = this.options.logger ?? createJsonConsoleLogger();
  }

  buildSearchUrl(params: FetchCommentsParams): URL {
    const url = new URL(this.baseUrl);
    url.pathname = url.pathname.endsWith("/")
      ? `${url.pathname}comments/search`
      : `${url.pathname}/comments/search`;

    url.searchParams.set("subreddit", params.subreddit);
    url.searchParams.set("after", String(params.after));
    url.searchParams.set("before", String(params.before));
    url.searchParams.set("limit", String(params.limit));
    url.searchParams.set("sort", "asc");
    url.searchParams.set("sort_type", "created_utc");
    return url;
  }

  async fetchComments(params: FetchCommentsParams): Promise<FetchCommentsResult> {
    const url = this.buildSearchUrl(params);
    const safeRequestUrl = `${url.origin}${url.pathname}${url.search}`;

    const doFetch = async (): Promise<RawComment[]> => {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
      let res: Response;
      try {
        res = await fetch(url.toString(), {
          headers: {
            "User-Agent": this.options.userAgent,
            Accept: "application/json"
          },
          signal: controller.signal
        });
      } catch (err) {
        if (controller.signal.aborted) {
          throw new ArchiveRequestError(`Archive request timeout after ${this.options.timeoutMs}ms`, {
            isTimeout: true,
            requestUrl: safeRequestUrl
          });
        }
        throw err;
      } finally {
        clearTimeout(timeout);
      }

      if (!res.ok) {
        // drain so the socket can be reused; the body is never logged
        await res.text().catch(() => "");
        throw new ArchiveRequestError(`Archive request failed: ${res.status}`, {
          status: res.status,
          requestUrl: safeRequestUrl,
          retryDelayMs: res.status === 429 ? parseRetryAfterMs(res.headers.get("retry-after")) : undefined
        });
      }

      const json: unknown = await res.json();
      if (!isRecord(json) || !Array.isArray(json.data)) {
        throw new ArchiveRequestError("Archive response has no data array", { requestUrl: safeRequestUrl });
      }
      return json.data.filter(isRecord);
    };

    try {
      const comments = await retry(doFetch, {
        policy: this.policy,
        sleep: this.sleep,
        classify: (err) => {
          if (err instanceof ArchiveRequestError && err.status === 429) {
            return { kind: "throttled", delayMs: err.retryDelayMs };
          }
          return { kind: "transient" };
        },
        onRetry: ({ kind, attempt, delayMs, error }) => {
          this.logger.warn("http.retry", {
            kind,
            status: error instanceof ArchiveRequestError ? error.status ?? null : null,
            url: safeRequestUrl,
            attempt,
            delayMs
          });
        },
        onGiveUp: ({ kind, attempt, maxAttempts, error }) => {
          this.logger.warn("http.give_up", {
            kind,
            status: error instanceof ArchiveRequestError ? error.status ?? null : null,
            url: safeRequestUrl,
            attempt,
            maxAttempts
          });
        }
      });

      await this.sleep(this.options.requestDelayMs);
      return { status: "ok", comments };
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        const reason = err.cause instanceof Error ? err.cause.message : String(err.cause);
        return { status: "exhausted", attempts: err.attempts, reason };
      }
      throw err;
    }
  }
}
