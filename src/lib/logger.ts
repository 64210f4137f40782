/**
 * Event Logger
 * Writes upload lifecycle events as `key="value"` lines
 */

const PREFIX = '[depot]';

export type LogDetails = Record<string, string | number | boolean>;

function quote(value: string | number | boolean): string {
  return `"${String(value).replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Format an event line, e.g. `event="UploadCreated" id="abc" size="10"`
 */
export function formatEvent(event: string, details: LogDetails = {}): string {
  const pairs = Object.entries(details).map(
    ([key, value]) => `${key}=${quote(value)}`
  );
  return [`event=${quote(event)}`, ...pairs].join(' ');
}

/**
 * Log an event to stdout
 */
export function logEvent(event: string, details?: LogDetails): void {
  console.log(
    `${PREFIX} ${new Date().toISOString()} ${formatEvent(event, details)}`
  );
}

/**
 * Log an error event to stderr
 */
export function logError(event: string, details?: LogDetails): void {
  console.error(
    `${PREFIX} ${new Date().toISOString()} ${formatEvent(event, details)}`
  );
}

/**
 * Line printer for hono's request logger middleware
 */
export function printRequestLine(message: string, ...rest: string[]): void {
  console.log(PREFIX, message, ...rest);
}
