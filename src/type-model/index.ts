export { TypeDescriptor } from './type-descriptor';
export type {
  Constructor,
  DescriptorParts,
  FieldDeclaration,
  MemberDeclaration,
  MethodDeclaration,
} from './type-descriptor';
export {
  typeVariable,
  parameterized,
  wildcard,
  genericArray,
  sameTypeVariable,
  isGroundType,
  typeToString,
} from './type-expression';
export type {
  TypeExpression,
  TypeVariable,
  ParameterizedType,
  WildcardType,
  GenericArrayType,
  ClassOrParameterized,
} from './type-expression';
export { describeType } from './definition';
export type {
  TypeDefinition,
  TypeParameterDefinition,
  FieldDefinition,
  MethodDefinition,
  FieldMap,
  MethodMap,
} from './definition';
export { Types, PRIMITIVE_TYPES, arrayOf, rawTypeOf } from './builtins';
export { TypeRegistry, defaultTypeRegistry } from './type-registry';
