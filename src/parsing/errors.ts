/**
 * Base class for placeholder parsing errors
 */
export class TokenParserError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error thrown when a parser is configured with an unusable open or close token
 */
export class InvalidTokenError extends TokenParserError {
  constructor(
    message: string,
    public readonly token: string,
  ) {
    super(message);
  }
}
