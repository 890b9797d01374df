export type LogFields = Record<string, unknown>;

/**
 * Structured event sink. Every line is one JSON object carrying an `event` name.
 */
export type EventLogger = {
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
};

const line = (event: string, fields: LogFields = {}) => JSON.stringify({ event, ...fields });

/* eslint-disable no-console */
export const consoleEventLogger: EventLogger = {
  info: (event, fields) => console.log(line(event, fields)),
  warn: (event, fields) => console.warn(line(event, fields)),
  error: (event, fields) => console.error(line(event, fields))
};
/* eslint-enable no-console */

export const silentEventLogger: EventLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
