import { Logger } from './logger';

/**
 * A logger implementation that silently discards all logs.
 * This is the default for every component that accepts a logger.
 */
export class NoLogger implements Logger {
  private static instance: NoLogger | undefined;

  private constructor() {}

  static getInstance(): NoLogger {
    if (!NoLogger.instance) {
      NoLogger.instance = new NoLogger();
    }
    return NoLogger.instance;
  }

  info(_message: string, _data?: unknown): void {}
  error(_message: string, _data?: unknown): void {}
  warn(_message: string, _data?: unknown): void {}
  debug(_message: string, _data?: unknown): void {}

  createNested(_prefix: string): Logger {
    return this;
  }
}

/**
 * A singleton instance of NoLogger that can be reused.
 */
export const noLogger = NoLogger.getInstance();
