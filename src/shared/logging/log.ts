export type LogEvent = { event: string } & Record<string, unknown>;

// One JSON object per line; keep payloads and response bodies out of `fields`.
/* eslint-disable no-console */
export const logInfo = (fields: LogEvent): void => {
  console.log(JSON.stringify(fields));
};

export const logWarn = (fields: LogEvent): void => {
  console.warn(JSON.stringify(fields));
};

export const logError = (fields: LogEvent): void => {
  console.error(JSON.stringify(fields));
};
/* eslint-enable no-console */

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
