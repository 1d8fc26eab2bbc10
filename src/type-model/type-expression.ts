import type { TypeDescriptor } from './type-descriptor';

/**
 * A named placeholder declared by a generic type, e.g. `K` in `Pair<K, V>`.
 * Identity is the pair (name, genericDeclaration).
 */
export interface TypeVariable {
  readonly kind: 'typeVariable';
  readonly name: string;
  readonly bounds: readonly TypeExpression[];
  /** The type declaring this variable. Unset until the variable is bound by a definition. */
  readonly genericDeclaration?: TypeDescriptor;
}

/**
 * A raw type applied to an ordered list of type arguments, e.g. `Map<K, V>`
 */
export interface ParameterizedType {
  readonly kind: 'parameterized';
  readonly rawType: TypeDescriptor;
  readonly typeArguments: readonly TypeExpression[];
  readonly ownerType?: TypeExpression;
}

/**
 * `?`, `? extends X` or `? super X`. Only ever appears nested in another type.
 */
export interface WildcardType {
  readonly kind: 'wildcard';
  readonly upperBounds: readonly TypeExpression[];
  readonly lowerBounds: readonly TypeExpression[];
}

/**
 * An array whose component still mentions a type variable, e.g. `T[]`
 */
export interface GenericArrayType {
  readonly kind: 'genericArray';
  readonly componentType: TypeExpression;
}

export type TypeExpression =
  | TypeDescriptor
  | TypeVariable
  | ParameterizedType
  | WildcardType
  | GenericArrayType;

/**
 * The shapes a type can take when used as an instantiation context or supertype edge
 */
export type ClassOrParameterized = TypeDescriptor | ParameterizedType;

export function typeVariable(name: string, bounds: readonly TypeExpression[] = []): TypeVariable {
  return { kind: 'typeVariable', name, bounds };
}

export function parameterized(
  rawType: TypeDescriptor,
  typeArguments: readonly TypeExpression[],
  ownerType?: TypeExpression,
): ParameterizedType {
  return ownerType === undefined
    ? { kind: 'parameterized', rawType, typeArguments }
    : { kind: 'parameterized', rawType, typeArguments, ownerType };
}

export function wildcard(
  bounds: { upper?: readonly TypeExpression[]; lower?: readonly TypeExpression[] } = {},
): WildcardType {
  return { kind: 'wildcard', upperBounds: bounds.upper ?? [], lowerBounds: bounds.lower ?? [] };
}

export function genericArray(componentType: TypeExpression): GenericArrayType {
  return { kind: 'genericArray', componentType };
}

export function sameTypeVariable(a: TypeVariable, b: TypeExpression): boolean {
  if (a === b) {
    return true;
  }
  return (
    b.kind === 'typeVariable' && a.name === b.name && a.genericDeclaration === b.genericDeclaration
  );
}

/**
 * True when the expression mentions no type variable anywhere
 */
export function isGroundType(type: TypeExpression): boolean {
  switch (type.kind) {
    case 'class':
      return true;
    case 'typeVariable':
      return false;
    case 'parameterized':
      return type.typeArguments.every(isGroundType);
    case 'wildcard':
      return type.upperBounds.every(isGroundType) && type.lowerBounds.every(isGroundType);
    case 'genericArray':
      return isGroundType(type.componentType);
  }
}

export function typeToString(type: TypeExpression): string {
  switch (type.kind) {
    case 'class':
      return type.name;
    case 'typeVariable':
      return type.name;
    case 'parameterized':
      return `${type.rawType.name}<${type.typeArguments.map(typeToString).join(', ')}>`;
    case 'wildcard':
      if (type.lowerBounds.length > 0) {
        return `? super ${type.lowerBounds.map(typeToString).join(' & ')}`;
      }
      if (type.upperBounds.length > 0) {
        return `? extends ${type.upperBounds.map(typeToString).join(' & ')}`;
      }
      return '?';
    case 'genericArray':
      return `${typeToString(type.componentType)}[]`;
  }
}
