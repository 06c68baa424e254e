export type TimeWindow = {
  after: number;  // exclusive, epoch seconds
  before: number; // epoch seconds
};

export type CursorAdvance = {
  from: number;
  to: number;
  forced: boolean;
};

/**
 * Forward-only cursor over [start, end).
 *
 * The source returns each window sorted by creation time, so the newest
 * record of a batch is where the next window starts. A batch that does not
 * move past the cursor bumps it by one second instead.
 */
export class TimeWindowCursor {
  private position: number;

  constructor(start: number, readonly end: number) {
    if (!Number.isInteger(start) || !Number.isInteger(end)) {
      throw new Error(`cursor bounds must be integer epoch seconds. Received: ${start}..${end}`);
    }
    this.position = start;
  }

  get value(): number {
    return this.position;
  }

  isExhausted(): boolean {
    return this.position >= this.end;
  }

  window(): TimeWindow {
    return { after: this.position, before: this.end };
  }

  advance(createdTimes: number[]): CursorAdvance {
    const from = this.position;
    const lastSeen = createdTimes.reduce((max, t) => (t > max ? t : max), Number.NEGATIVE_INFINITY);

    if (lastSeen > from) {
      this.position = lastSeen;
      return { from, to: this.position, forced: false };
    }

    this.position = from + 1;
    return { from, to: this.position, forced: true };
  }
}
