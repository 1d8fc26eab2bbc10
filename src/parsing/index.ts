export { GenericTokenParser } from './token-parser';
export type { TokenHandler } from './token-parser';
export { PropertyParser } from './property-parser';
export type { PropertyParserOptions } from './property-parser';
export { TokenParserError, InvalidTokenError } from './errors';
