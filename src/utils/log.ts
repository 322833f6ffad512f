/**
 * Structured logging utilities for consistent log format.
 *
 * All logs are single-line JSON so CloudWatch Logs Insights can query them
 * by field. Debug lines are only written when LOG_LEVEL=debug.
 */

export interface LogData {
  [key: string]: unknown;
}

const SERVICE_NAME = 'tender-summary-pipeline';

function isDebugEnabled(): boolean {
  return (process.env.LOG_LEVEL ?? '').toLowerCase() === 'debug';
}

/**
 * Log a debug event. No-op unless LOG_LEVEL=debug.
 * @param event - Event name (e.g., 'enrichment.attempt')
 * @param data - Additional context data
 */
export function logDebug(event: string, data: LogData = {}): void {
  if (!isDebugEnabled()) return;
  console.debug(JSON.stringify({
    level: 'debug',
    service: SERVICE_NAME,
    event,
    ...data,
    timestamp: Date.now(),
  }));
}

/**
 * Log an informational event.
 * @param event - Event name (e.g., 'batch.commit.success')
 * @param data - Additional context data
 */
export function log(event: string, data: LogData = {}): void {
  console.log(JSON.stringify({
    level: 'info',
    service: SERVICE_NAME,
    event,
    ...data,
    timestamp: Date.now(),
  }));
}

/**
 * Log a warning event.
 * @param event - Event name
 * @param data - Additional context data
 */
export function logWarn(event: string, data: LogData = {}): void {
  console.warn(JSON.stringify({
    level: 'warn',
    service: SERVICE_NAME,
    event,
    ...data,
    timestamp: Date.now(),
  }));
}

/**
 * Log an error event.
 * @param event - Event name
 * @param error - Error object or message
 * @param data - Additional context data
 */
export function logError(
  event: string,
  error: unknown,
  data: LogData = {}
): void {
  console.error(JSON.stringify({
    level: 'error',
    service: SERVICE_NAME,
    event,
    error: describeError(error),
    ...data,
    timestamp: Date.now(),
  }));
}

/**
 * Serializable view of an unknown thrown value.
 */
export function describeError(error: unknown): { name: string; message: string; stack?: string } | string {
  return error instanceof Error
    ? { name: error.name, message: error.message, stack: error.stack }
    : String(error);
}

/**
 * Truncate a value for logging.
 * @param value - Value to truncate
 * @param maxLength - Maximum string length
 * @returns Truncated string representation
 */
export function truncateForLog(value: unknown, maxLength: number = 500): string {
  const str = typeof value === 'string' ? value : JSON.stringify(value);
  if (str.length <= maxLength) {
    return str;
  }
  return str.substring(0, maxLength) + `... [truncated, ${str.length - maxLength} chars]`;
}
