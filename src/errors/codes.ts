/**
 * Error codes raised by the reflection layer
 */
export enum ErrorCode {
  // Programmer errors surfaced immediately
  INVALID_TYPE_CONTEXT = 'INVALID_TYPE_CONTEXT',
  UNSUPPORTED_OPERATION = 'UNSUPPORTED_OPERATION',
  INVALID_METHOD_NAME = 'INVALID_METHOD_NAME',

  // Navigation errors
  INDEX_OUT_OF_RANGE = 'INDEX_OUT_OF_RANGE',
  NOT_A_COLLECTION = 'NOT_A_COLLECTION',
  NO_SUCH_PROPERTY = 'NO_SUCH_PROPERTY',
  PROPERTY_ACCESS_FAILED = 'PROPERTY_ACCESS_FAILED',

  // Type model and construction
  UNKNOWN_TYPE = 'UNKNOWN_TYPE',
  DUPLICATE_TYPE = 'DUPLICATE_TYPE',
  INSTANTIATION_FAILED = 'INSTANTIATION_FAILED',
}
