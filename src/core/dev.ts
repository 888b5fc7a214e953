export type LogLevel = 'info' | 'warn' | 'error';

export interface LogRecord {
  level: LogLevel;
  message: string;
  error?: Error;
}

let isDevMode = true;

/**
 * Optional global log handler.
 *
 * When unset, records go to the console with a `[fieldview]` prefix.
 */
let logHandler: ((record: LogRecord) => void) | null = null;

export function setDevMode(enabled: boolean): void {
  isDevMode = enabled;
}

export function isInDevMode(): boolean {
  return isDevMode;
}

/**
 * Routes every log record to `handler` instead of the console.
 * Pass `null` to restore console output.
 *
 * @example
 * setLogHandler((rec) => report(rec.message, { level: rec.level }));
 */
export function setLogHandler(handler: ((record: LogRecord) => void) | null): void {
  logHandler = handler;
}

function emit(record: LogRecord): void {
  if (logHandler) {
    logHandler(record);
    return;
  }
  const line = `[fieldview] ${record.message}`;
  if (record.level === 'error') console.error(line, record.error);
  else if (record.level === 'warn') console.warn(line);
  else console.info(line);
}

/** Dev mode warning helper. */
export function warn(message: string): void {
  if (isDevMode) emit({ level: 'warn', message });
}

export function info(message: string): void {
  emit({ level: 'info', message });
}

/** Normalizes unknown throws and routes them to the handler (or console). */
export function reportError(error: unknown, source: string): void {
  const err = error instanceof Error ? error : new Error(String(error));
  emit({ level: 'error', message: `Error in ${source}: ${err.message}`, error: err });
}
