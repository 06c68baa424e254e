export type BackoffLadder = {
  baseMs: number; // delay for step 0
  maxMs: number;  // cap
};

export type BackoffPolicy = {
  throttled: BackoffLadder;
  transient: BackoffLadder;
  maxTransientAttempts: number; // total tries, first one included
};

export const defaultBackoffPolicy: BackoffPolicy = {
  throttled: { baseMs: 5000, maxMs: 60000 },
  transient: { baseMs: 2000, maxMs: 30000 },
  maxTransientAttempts: 5
};

export const backoffDelayMs = (ladder: BackoffLadder, step: number): number => {
  if (!Number.isInteger(step) || step < 0) {
    throw new Error(`backoff step must be an integer >= 0. Received: ${String(step)}`);
  }
  // 2^31 already exceeds any sane cap; avoids Infinity for large steps.
  const factor = Math.pow(2, Math.min(step, 31));
  return Math.min(ladder.maxMs, ladder.baseMs * factor);
};

/**
 * A server-provided delay (e.g. Retry-After) replaces the ladder value,
 * but never exceeds the ladder cap.
 */
export const hintedDelayMs = (ladder: BackoffLadder, step: number, hintMs?: number): number => {
  if (typeof hintMs === "number" && Number.isFinite(hintMs) && hintMs >= 0) {
    return Math.min(ladder.maxMs, hintMs);
  }
  return backoffDelayMs(ladder, step);
};
