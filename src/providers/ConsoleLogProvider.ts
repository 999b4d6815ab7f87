/**
 * Console-based log provider.
 * Buffers events in memory for inspection (useful in tests).
 * Optionally writes them to stdout/stderr, filtered by a minimum level.
 */

import { BoundLogProvider } from './BoundLogProvider.js';
import { isLevelEnabled, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to the console as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Events below this level are dropped. Default: 'debug'. */
  minLevel?: LogLevel;
  /** Keep events in `events`. Default: true; turn off for long-running processes. */
  bufferEvents?: boolean;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Inspectable buffer of all logged events (most recent last). */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minLevel: LogLevel;
  private readonly bufferEvents: boolean;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minLevel = options?.minLevel ?? 'debug';
    this.bufferEvents = options?.bufferEvents ?? true;
  }

  log(event: LogEvent): void {
    if (!isLevelEnabled(event.level, this.minLevel)) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    if (this.bufferEvents) this.events.push(stamped);

    if (this.outputToConsole) {
      const line = `${stamped.timestamp} [${stamped.level.toUpperCase()}] ${stamped.message}`;
      const fieldsStr = stamped.fields ? ` ${JSON.stringify(stamped.fields)}` : '';
      if (stamped.level === 'error' || stamped.level === 'warn') {
        console.error(line + fieldsStr);
      } else {
        console.log(line + fieldsStr);
      }
    }
  }

  async flush(): Promise<void> {
    // Events are written synchronously.
  }

  child(fields: Record<string, unknown>): ILogProvider {
    return new BoundLogProvider(this, fields);
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

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  /** Events whose message contains `fragment`. */
  find(fragment: string): LogEvent[] {
    return this.events.filter((e) => e.message.includes(fragment));
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }
}
