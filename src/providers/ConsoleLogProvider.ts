/**
 * Console log provider.
 * Keeps every accepted event in `events` and, when asked to, prints it as
 * one line: warn and error to stderr, the rest to stdout.
 */

import { LOG_LEVELS, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Print events as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Drop events below this level. Default: 'debug'. */
  minLevel?: LogLevel;
}

const rank = (level: LogLevel) => LOG_LEVELS.indexOf(level);

export function formatLogLine(event: LogEvent): string {
  const fields = event.fields ? ` ${JSON.stringify(event.fields)}` : '';
  return `[${event.level.toUpperCase()}] ${event.message}${fields}`;
}

export class ConsoleLogProvider implements ILogProvider {
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minLevel: LogLevel;

  constructor(options: ConsoleLogProviderOptions = {}) {
    this.outputToConsole = options.outputToConsole ?? false;
    this.minLevel = options.minLevel ?? 'debug';
  }

  log(event: LogEvent): void {
    if (rank(event.level) < rank(this.minLevel)) return;

    const stamped = { ...event, timestamp: event.timestamp ?? new Date().toISOString() };
    this.events.push(stamped);
    if (!this.outputToConsole) return;

    const line = formatLogLine(stamped);
    if (rank(stamped.level) >= rank('warn')) console.error(line);
    else console.log(line);
  }

  /** Printing is synchronous, so there is nothing to wait for. */
  async flush(): Promise<void> {}

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  /** Events at one level, in arrival order. */
  eventsAt(level: LogLevel): LogEvent[] {
    return this.events.filter((e) => e.level === level);
  }
}
