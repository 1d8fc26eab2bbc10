import { ErrorCode } from './codes';

/**
 * Base error class for all reflection errors
 */
export class ReflectionError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context: Record<string, unknown> = {},
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ReflectionError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    Object.setPrototypeOf(this, ReflectionError.prototype);
  }

  toString(options?: { includeStack?: boolean }): string {
    let str = `${this.name}: ${this.message} [code=${this.code}]`;
    for (const [key, value] of Object.entries(this.context)) {
      str += ` [${key}=${String(value)}]`;
    }
    if (this.cause) {
      str += ` [cause=${this.cause.message}]`;
    }
    if (options?.includeStack && this.stack) {
      str += `\n${this.stack}`;
    }
    return str;
  }
}

/**
 * Raised when an instantiation context is neither a concrete nor a parameterized type
 */
export class InvalidTypeContextError extends ReflectionError {
  constructor(message: string, context: Record<string, unknown>) {
    super(message, ErrorCode.INVALID_TYPE_CONTEXT, context);
    this.name = 'InvalidTypeContextError';
    Object.setPrototypeOf(this, InvalidTypeContextError.prototype);
  }
}

/**
 * Raised when a positional index falls outside a sequence
 */
export class IndexOutOfRangeError extends ReflectionError {
  constructor(
    message: string,
    public readonly index: string,
    public readonly length: number,
  ) {
    super(message, ErrorCode.INDEX_OUT_OF_RANGE, { index, length });
    this.name = 'IndexOutOfRangeError';
    Object.setPrototypeOf(this, IndexOutOfRangeError.prototype);
  }
}

/**
 * Raised when a wrapper is asked for an operation its storage shape cannot support
 */
export class UnsupportedOperationError extends ReflectionError {
  constructor(
    message: string,
    public readonly operation: string,
  ) {
    super(message, ErrorCode.UNSUPPORTED_OPERATION, { operation });
    this.name = 'UnsupportedOperationError';
    Object.setPrototypeOf(this, UnsupportedOperationError.prototype);
  }
}
