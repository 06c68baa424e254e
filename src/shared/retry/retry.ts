import { sleep as defaultSleep, type Sleep } from "../time/sleep";
import { hintedDelayMs, backoffDelayMs, type BackoffPolicy } from "./backoff";

export type FailureKind = "throttled" | "transient" | "fatal";

export type FailureClassification = {
  kind: FailureKind;
  delayMs?: number; // server hint, only honored for throttled failures
};

export type RetryOptions = {
  policy: BackoffPolicy;
  classify: (err: unknown) => FailureClassification;
  sleep?: Sleep;
  onRetry?: (ctx: { kind: "throttled" | "transient"; attempt: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { kind: FailureKind; attempt: number; maxAttempts: number; error: unknown }) => void;
};

export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly cause?: unknown;

  constructor(attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Gave up after ${attempts} attempts: ${reason}`);
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Runs `fn` until it resolves.
 * - throttled failures back off on their own ladder and are never capped
 * - transient failures back off on theirs and stop after `maxTransientAttempts`
 *   total tries, rejecting with RetryExhaustedError
 * - fatal failures are rethrown as-is
 */
export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { policy, classify, onRetry, onGiveUp, sleep = defaultSleep } = opts;
  const maxAttempts = policy.maxTransientAttempts;

  let throttledCount = 0;
  let transientFailures = 0;
  let attempt = 0;

  while (true) {
    attempt += 1;
    try {
      return await fn();
    } catch (err) {
      const failure = classify(err);

      if (failure.kind === "fatal") {
        onGiveUp?.({ kind: "fatal", attempt, maxAttempts, error: err });
        throw err;
      }

      if (failure.kind === "throttled") {
        const delayMs = hintedDelayMs(policy.throttled, throttledCount, failure.delayMs);
        throttledCount += 1;
        onRetry?.({ kind: "throttled", attempt, delayMs, error: err });
        await sleep(delayMs);
        continue;
      }

      transientFailures += 1;
      if (transientFailures >= maxAttempts) {
        onGiveUp?.({ kind: "transient", attempt, maxAttempts, error: err });
        throw new RetryExhaustedError(attempt, err);
      }

      const delayMs = backoffDelayMs(policy.transient, transientFailures);
      onRetry?.({ kind: "transient", attempt, delayMs, error: err });
      await sleep(delayMs);
    }
  }
};
