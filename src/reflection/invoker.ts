import { ReflectionError, ErrorCode } from '../errors';
import { TypeParameterResolver } from '../type-resolver';
import {
  FieldDeclaration,
  MethodDeclaration,
  TypeDescriptor,
  TypeExpression,
} from '../type-model';

/**
 * Reads or writes one property of a bean
 */
export interface Invoker {
  invoke(target: object, args: readonly unknown[]): unknown;
  /** Erased type of the property, as seen from the reflected type */
  getType(): TypeDescriptor;
  /** Declared type of the property resolved against `srcType` */
  resolveGenericType(srcType: TypeExpression): TypeExpression;
}

/**
 * Reads a data property or a JS getter. `field` carries the declared type when there is one.
 */
export class GetFieldInvoker implements Invoker {
  constructor(
    private readonly name: string,
    private readonly type: TypeDescriptor,
    private readonly field?: FieldDeclaration,
  ) {}

  invoke(target: object): unknown {
    return Reflect.get(target, this.name);
  }

  getType(): TypeDescriptor {
    return this.type;
  }

  resolveGenericType(srcType: TypeExpression): TypeExpression {
    return this.field ? TypeParameterResolver.resolveFieldType(this.field, srcType) : this.type;
  }
}

export class SetFieldInvoker implements Invoker {
  constructor(
    private readonly name: string,
    private readonly type: TypeDescriptor,
    private readonly field?: FieldDeclaration,
  ) {}

  invoke(target: object, args: readonly unknown[]): unknown {
    if (!Reflect.set(target, this.name, args[0])) {
      throw new ReflectionError(
        `Cannot assign property '${this.name}'`,
        ErrorCode.PROPERTY_ACCESS_FAILED,
        { property: this.name },
      );
    }
    return undefined;
  }

  getType(): TypeDescriptor {
    return this.type;
  }

  resolveGenericType(srcType: TypeExpression): TypeExpression {
    return this.field ? TypeParameterResolver.resolveFieldType(this.field, srcType) : this.type;
  }
}

/**
 * Calls a `getX()`, `isX()` or `setX(value)` method
 */
export class MethodInvoker implements Invoker {
  constructor(
    private readonly methodName: string,
    private readonly role: 'getter' | 'setter',
    private readonly type: TypeDescriptor,
    private readonly method?: MethodDeclaration,
  ) {}

  invoke(target: object, args: readonly unknown[]): unknown {
    const fn: unknown = Reflect.get(target, this.methodName);
    if (typeof fn !== 'function') {
      throw new ReflectionError(
        `'${this.methodName}' is not a method of ${describe(target)}`,
        ErrorCode.PROPERTY_ACCESS_FAILED,
        { method: this.methodName },
      );
    }
    return Reflect.apply(fn, target, args);
  }

  getType(): TypeDescriptor {
    return this.type;
  }

  resolveGenericType(srcType: TypeExpression): TypeExpression {
    if (!this.method) {
      return this.type;
    }
    if (this.role === 'getter') {
      return TypeParameterResolver.resolveReturnType(this.method, srcType);
    }
    return TypeParameterResolver.resolveParamTypes(this.method, srcType)[0] ?? this.type;
  }
}

function describe(target: object): string {
  const ctor: unknown = Object.getPrototypeOf(target)?.constructor;
  return typeof ctor === 'function' && ctor.name ? `class ${ctor.name}` : 'object';
}
