export type LogFields = Record<string, unknown>;

export interface Logger {
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
}

/**
 * One JSON object per line, `event` first. Info goes to stdout,
 * warnings and errors to stderr.
 */
export const createJsonConsoleLogger = (): Logger => ({
  info: (event, fields = {}) => {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event, ...fields }));
  },
  warn: (event, fields = {}) => {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({ event, ...fields }));
  },
  error: (event, fields = {}) => {
    // eslint-disable-next-line no-console
    console.error(JSON.stringify({ event, ...fields }));
  }
});
