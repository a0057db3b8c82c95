import { logDebug, logInfo, logWarning } from './console';

/** Structured context appended to a log line as `key=value` pairs. */
export type LogFields = Record<string, string | number | boolean | null | undefined>;

/**
 * Minimal logging surface the engine components depend on.
 * The CLI passes a {@link Logger}; tests pass a capturing stub.
 */
export interface EngineLogger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
}

/**
 * Renders structured fields as ` key=value` pairs, skipping undefined values.
 */
export function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  const parts = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`);
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

/**
 * Console-backed logger for the CLI. Debug lines are only written in verbose mode.
 */
export class Logger implements EngineLogger {
  constructor(private readonly verbose: boolean = false) {}

  debug(message: string, fields?: LogFields): void {
    if (this.verbose) {
      logDebug(`${message}${formatFields(fields)}`);
    }
  }

  info(message: string, fields?: LogFields): void {
    logInfo(`${message}${formatFields(fields)}`);
  }

  warn(message: string, fields?: LogFields): void {
    logWarning(`${message}${formatFields(fields)}`);
  }
}

/** Logger that discards everything; the default when no logger is injected. */
export const SILENT_LOGGER: EngineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};
