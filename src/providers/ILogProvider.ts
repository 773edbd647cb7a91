/**
 * Logging provider interface.
 * Handlers, services and middleware log through this; the container picks
 * the sink.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Least severe first. */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LogEvent {
  level: LogLevel;
  message: string;
  /** ISO-8601; the provider stamps events that lack one. */
  timestamp?: string;
  fields?: Record<string, unknown>;
}

/** One per HTTP request, written by the logging middleware. */
export interface RequestLogEvent extends LogEvent {
  method: string;
  path: string;
  status: number;
  durationMs: number;
  requestId?: string;
}

export interface ILogProvider {
  log(event: LogEvent): void;
  /** Resolves once buffered events are written. */
  flush(): Promise<void>;

  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}
