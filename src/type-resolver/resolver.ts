import { DEFAULT_MAX_RESOLUTION_DEPTH } from '../constants/defaults';
import { InvalidTypeContextError } from '../errors';
import {
  arrayOf,
  ClassOrParameterized,
  FieldDeclaration,
  GenericArrayType,
  MethodDeclaration,
  parameterized,
  ParameterizedType,
  sameTypeVariable,
  TypeDescriptor,
  TypeExpression,
  typeToString,
  Types,
  TypeVariable,
  WildcardType,
} from '../type-model';

/**
 * Resolves the declared types of fields and methods against the type they are
 * used through. Given `class Sub<T> extends Base<T, T>` and a field `Map<K, V> map`
 * declared in `Base`, resolving `map` against `Sub<number>` yields `Map<number, number>`.
 *
 * Type variables that cannot be pinned down degrade silently to their first bound,
 * or to `Object` when unbounded.
 */
export class TypeParameterResolver {
  /**
   * @param srcType the type the field is accessed through
   */
  static resolveFieldType(field: FieldDeclaration, srcType: TypeExpression): TypeExpression {
    return this.resolveType(field.type, srcType, field.declaringType);
  }

  static resolveReturnType(method: MethodDeclaration, srcType: TypeExpression): TypeExpression {
    return this.resolveType(method.returnType, srcType, method.declaringType);
  }

  static resolveParamTypes(method: MethodDeclaration, srcType: TypeExpression): TypeExpression[] {
    return method.parameterTypes.map((parameterType) =>
      this.resolveType(parameterType, srcType, method.declaringType),
    );
  }

  /**
   * @throws {InvalidTypeContextError} If `srcType` is neither a concrete nor a parameterized type
   */
  static resolveType(
    type: TypeExpression,
    srcType: TypeExpression,
    declaringType: TypeDescriptor,
    maxDepth: number = DEFAULT_MAX_RESOLUTION_DEPTH,
  ): TypeExpression {
    return new ResolutionWalk(maxDepth).resolve(type, toContext(srcType), declaringType);
  }
}

/**
 * One resolution request, bounded by how many supertype edges a single
 * variable lookup may follow.
 */
class ResolutionWalk {
  constructor(private readonly maxDepth: number) {}

  resolve(
    type: TypeExpression,
    srcType: ClassOrParameterized,
    declaringType: TypeDescriptor,
  ): TypeExpression {
    switch (type.kind) {
      case 'class':
        return type;
      case 'typeVariable':
        return this.resolveTypeVar(type, srcType, declaringType, 0);
      case 'parameterized':
        return this.resolveParameterizedType(type, srcType, declaringType);
      case 'wildcard':
        return this.resolveWildcardType(type, srcType, declaringType);
      case 'genericArray':
        return this.resolveGenericArrayType(type, srcType, declaringType);
    }
  }

  private resolveGenericArrayType(
    arrayType: GenericArrayType,
    srcType: ClassOrParameterized,
    declaringType: TypeDescriptor,
  ): TypeExpression {
    const componentType = this.resolve(arrayType.componentType, srcType, declaringType);
    if (componentType.kind === 'class') {
      return arrayOf(componentType);
    }
    return { kind: 'genericArray', componentType };
  }

  private resolveParameterizedType(
    type: ParameterizedType,
    srcType: ClassOrParameterized,
    declaringType: TypeDescriptor,
  ): ParameterizedType {
    const args = type.typeArguments.map((arg) => this.resolve(arg, srcType, declaringType));
    return parameterized(type.rawType, args, type.ownerType);
  }

  private resolveWildcardType(
    type: WildcardType,
    srcType: ClassOrParameterized,
    declaringType: TypeDescriptor,
  ): WildcardType {
    return {
      kind: 'wildcard',
      lowerBounds: type.lowerBounds.map((bound) => this.resolve(bound, srcType, declaringType)),
      upperBounds: type.upperBounds.map((bound) => this.resolve(bound, srcType, declaringType)),
    };
  }

  private resolveTypeVar(
    typeVar: TypeVariable,
    srcType: ClassOrParameterized,
    declaringType: TypeDescriptor,
    depth: number,
  ): TypeExpression {
    const clazz = srcType.kind === 'class' ? srcType : srcType.rawType;

    if (clazz === declaringType) {
      if (srcType.kind === 'parameterized') {
        const index = clazz
          .getTypeParameters()
          .findIndex((param) => sameTypeVariable(param, typeVar));
        if (index >= 0 && index < srcType.typeArguments.length) {
          return srcType.typeArguments[index];
        }
      }
      // Nothing binds the variable at this level; erase to the first bound
      return typeVar.bounds[0] ?? Types.OBJECT;
    }

    if (depth >= this.maxDepth) {
      return Types.OBJECT;
    }

    const superclass = clazz.getGenericSuperclass();
    if (superclass) {
      const result = this.scanSuperTypes(typeVar, srcType, declaringType, clazz, superclass, depth);
      if (result) {
        return result;
      }
    }

    for (const superInterface of clazz.getGenericInterfaces()) {
      const result = this.scanSuperTypes(
        typeVar,
        srcType,
        declaringType,
        clazz,
        superInterface,
        depth,
      );
      if (result) {
        return result;
      }
    }

    return Types.OBJECT;
  }

  /**
   * Follows one supertype edge of `clazz` looking for the binding of `typeVar`
   */
  private scanSuperTypes(
    typeVar: TypeVariable,
    srcType: ClassOrParameterized,
    declaringType: TypeDescriptor,
    clazz: TypeDescriptor,
    superType: ClassOrParameterized,
    depth: number,
  ): TypeExpression | undefined {
    if (superType.kind === 'class') {
      // A bare edge carries no arguments, the binding can only come from further up
      return declaringType.isAssignableFrom(superType)
        ? this.resolveTypeVar(typeVar, superType, declaringType, depth + 1)
        : undefined;
    }

    const parentAsType = translateParentTypeVars(srcType, clazz, superType);
    const parentAsClass = parentAsType.rawType;

    if (parentAsClass === declaringType) {
      const index = declaringType
        .getTypeParameters()
        .findIndex((declared) => sameTypeVariable(declared, typeVar));
      const typeArgs = parentAsType.typeArguments;
      return index >= 0 && index < typeArgs.length ? typeArgs[index] : undefined;
    }

    if (declaringType.isAssignableFrom(parentAsClass)) {
      return this.resolveTypeVar(typeVar, parentAsType, declaringType, depth + 1);
    }
    return undefined;
  }
}

/**
 * Rewrites a supertype edge of `srcClass` in terms of the actual arguments of
 * `srcType`, so `Mid<X>` seen from `Leaf<String>` (with `Leaf<X> extends Mid<X>`)
 * becomes `Mid<String>`. Variables `srcType` leaves unbound (a raw context, or
 * missing arguments) are erased to their first bound.
 */
function translateParentTypeVars(
  srcType: ClassOrParameterized,
  srcClass: TypeDescriptor,
  parentType: ParameterizedType,
): ParameterizedType {
  const typeParams = srcClass.getTypeParameters();
  const actualArgs = srcType.kind === 'parameterized' ? srcType.typeArguments : [];
  const substitute = (type: TypeExpression): TypeExpression => {
    switch (type.kind) {
      case 'class':
        return type;
      case 'typeVariable': {
        const index = typeParams.findIndex((param) => sameTypeVariable(param, type));
        if (index < 0) {
          return type;
        }
        return index < actualArgs.length ? actualArgs[index] : type.bounds[0] ?? Types.OBJECT;
      }
      case 'parameterized':
        return parameterized(type.rawType, type.typeArguments.map(substitute), type.ownerType);
      case 'wildcard':
        return {
          kind: 'wildcard',
          upperBounds: type.upperBounds.map(substitute),
          lowerBounds: type.lowerBounds.map(substitute),
        };
      case 'genericArray': {
        const componentType = substitute(type.componentType);
        return componentType.kind === 'class'
          ? arrayOf(componentType)
          : { kind: 'genericArray', componentType };
      }
    }
  };
  return parameterized(parentType.rawType, parentType.typeArguments.map(substitute));
}

function toContext(srcType: TypeExpression): ClassOrParameterized {
  if (srcType.kind === 'class' || srcType.kind === 'parameterized') {
    return srcType;
  }
  throw new InvalidTypeContextError(
    `The instantiation context must be a concrete or parameterized type, but was: ${typeToString(srcType)}`,
    { kind: srcType.kind, type: typeToString(srcType) },
  );
}
