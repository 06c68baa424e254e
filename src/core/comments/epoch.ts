const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

// Date covers +/-8.64e15 ms; anything later cannot be rendered as a date.
export const MAX_EPOCH_SECONDS = 8.64e12;

/**
 * Parses a calendar date (YYYY-MM-DD) as UTC midnight, in epoch seconds.
 * Rejects dates that do not exist (2021-02-30).
 */
export const dateToEpoch = (value: string): number => {
  const match = ISO_DATE.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid date "${value}": expected YYYY-MM-DD`);
  }

  const [, year, month, day] = match;
  const ms = Date.UTC(Number(year), Number(month) - 1, Number(day));
  if (epochToDate(ms / 1000) !== `${year}-${month}-${day}`) {
    throw new Error(`Invalid date "${value}": no such calendar day`);
  }

  return ms / 1000;
};

export const epochToDate = (epochSeconds: number): string =>
  new Date(epochSeconds * 1000).toISOString().slice(0, 10);
