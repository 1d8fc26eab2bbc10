export { NoLogger, noLogger } from './no-logger';

export interface Logger {
  /**
   * General informational messages.
   */
  info(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
  createNested(prefix: string): Logger;
}

type LogLevel = 'info' | 'error' | 'warn' | 'debug';

export class ConsoleLogger implements Logger {
  constructor(
    private prefix?: string,
    private _console: Pick<Console, LogLevel> = console,
  ) {}

  info(message: string, data?: unknown) {
    this.write('info', message, data);
  }

  error(message: string, data?: unknown) {
    this.write('error', message, data);
  }

  warn(message: string, data?: unknown) {
    this.write('warn', message, data);
  }

  debug(message: string, data?: unknown) {
    this.write('debug', message, data);
  }

  createNested(prefix: string): ConsoleLogger {
    const combinedPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return new ConsoleLogger(combinedPrefix, this._console);
  }

  private write(level: LogLevel, message: string, data?: unknown) {
    if (this.prefix) {
      message = `[${this.prefix}] ${message}`;
    }
    if (data !== undefined) {
      this._console[level](message, data);
    } else {
      this._console[level](message);
    }
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  data?: unknown;
}

export class TestLogger implements Logger {
  constructor(
    private name: string = 'TestLogger',
    private logs: LogEntry[] = [],
  ) {}

  info(message: string, data?: unknown) {
    this.logs.push({ level: 'info', message, data });
  }

  warn(message: string, data?: unknown) {
    this.logs.push({ level: 'warn', message, data });
  }
  debug(message: string, data?: unknown) {
    this.logs.push({ level: 'debug', message, data });
  }
  error(message: string, data?: unknown) {
    this.logs.push({ level: 'error', message, data });
  }
  getLogs(): LogEntry[] {
    return this.logs;
  }
  clear() {
    this.logs.length = 0;
  }
  print() {
    const logs = this.logs.map(
      (log) =>
        `[${log.level.toUpperCase()}] [${this.name}] ${log.message}${log.data ? ' ' + JSON.stringify(log.data) : ''}`,
    );
    console.log(logs.join('\n'));
  }
  createNested(prefix: string): TestLogger {
    const nestedPrefix = this.name ? `${this.name}:${prefix}` : prefix;
    // Nested loggers write into the parent's entries
    return new TestLogger(nestedPrefix, this.logs);
  }
}

export const defaultLogger = new ConsoleLogger('Reflection');
