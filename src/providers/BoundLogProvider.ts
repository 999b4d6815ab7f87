/**
 * Child logger: forwards to a parent provider with bound context fields.
 * Per-call fields win over bound ones.
 */

import type { ILogProvider, LogEvent } from './ILogProvider.js';

export class BoundLogProvider implements ILogProvider {
  constructor(
    private readonly parent: ILogProvider,
    private readonly bound: Record<string, unknown>
  ) {}

  log(event: LogEvent): void {
    this.parent.log({
      ...event,
      fields: { ...this.bound, ...event.fields },
    });
  }

  flush(): Promise<void> {
    return this.parent.flush();
  }

  child(fields: Record<string, unknown>): ILogProvider {
    return new BoundLogProvider(this.parent, { ...this.bound, ...fields });
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
}
