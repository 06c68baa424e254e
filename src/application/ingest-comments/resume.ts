export type ResumePosition = {
  cursor: number;
  resumed: boolean;
};

/**
 * The store is the checkpoint: if it already holds comments newer than the
 * configured start, pick up from the newest one.
 */
export const resolveResumePosition = (startEpoch: number, latestIngested: number | undefined): ResumePosition =>
  latestIngested != null && latestIngested > startEpoch
    ? { cursor: latestIngested, resumed: true }
    : { cursor: startEpoch, resumed: false };
