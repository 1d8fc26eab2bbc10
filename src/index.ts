/* istanbul ignore file */
export {
  TypeDescriptor,
  TypeRegistry,
  defaultTypeRegistry,
  Types,
  PRIMITIVE_TYPES,
  arrayOf,
  rawTypeOf,
  describeType,
  typeVariable,
  parameterized,
  wildcard,
  genericArray,
  sameTypeVariable,
  isGroundType,
  typeToString,
} from './type-model';
export type {
  Constructor,
  FieldDeclaration,
  MethodDeclaration,
  MemberDeclaration,
  TypeDefinition,
  TypeParameterDefinition,
  FieldDefinition,
  MethodDefinition,
  TypeExpression,
  TypeVariable,
  ParameterizedType,
  WildcardType,
  GenericArrayType,
  ClassOrParameterized,
} from './type-model';
export { TypeParameterResolver } from './type-resolver';
export { PropertyTokenizer, PropertyNamer, tokenize } from './property';
export {
  Reflector,
  DefaultReflectorFactory,
  MetaClass,
  GetFieldInvoker,
  SetFieldInvoker,
  MethodInvoker,
  elementTypeOf,
} from './reflection';
export type { Invoker, ReflectorFactory } from './reflection';
export { DefaultObjectFactory } from './factory';
export type { ObjectFactory } from './factory';
export {
  BaseWrapper,
  BeanWrapper,
  MapWrapper,
  CollectionWrapper,
  DefaultObjectWrapperFactory,
  isObjectWrapper,
} from './wrapper';
export type { ObjectWrapper, ObjectWrapperFactory, MapLike } from './wrapper';
export { MetaObject, SystemMetaObject } from './meta-object';
export type { ReflectionOptions } from './meta-object';
export { GenericTokenParser, PropertyParser, TokenParserError, InvalidTokenError } from './parsing';
export type { TokenHandler, PropertyParserOptions } from './parsing';
export {
  ReflectionError,
  InvalidTypeContextError,
  IndexOutOfRangeError,
  UnsupportedOperationError,
  ErrorCode,
} from './errors';
export { ConsoleLogger, TestLogger, defaultLogger, noLogger, NoLogger } from './util/logger';
export type { Logger, LogEntry } from './util/logger';
export * from './constants/defaults';
