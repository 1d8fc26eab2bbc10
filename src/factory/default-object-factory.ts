import { ErrorCode, ReflectionError } from '../errors';
import { Constructor, TypeDescriptor, Types } from '../type-model';
import { Logger, noLogger } from '../util/logger';
import { ObjectFactory } from './object-factory';

/**
 * Instantiates types through their runtime constructor. Collection interfaces
 * are mapped to the JS structure that implements them.
 */
export class DefaultObjectFactory implements ObjectFactory {
  private readonly logger: Logger;

  constructor(logger: Logger = noLogger) {
    this.logger = logger.createNested('ObjectFactory');
  }

  create(
    type: TypeDescriptor,
    constructorArgTypes: readonly TypeDescriptor[] = [],
    constructorArgs: readonly unknown[] = [],
  ): unknown {
    const ctor = this.resolveImplementation(type);
    this.logger.debug('Instantiating', {
      type: type.name,
      implementation: ctor?.name,
      args: constructorArgs.length,
    });
    if (!ctor) {
      throw this.instantiationError(type, constructorArgTypes, constructorArgs);
    }
    try {
      return Reflect.construct(ctor, constructorArgs);
    } catch (error) {
      throw this.instantiationError(
        type,
        constructorArgTypes,
        constructorArgs,
        error instanceof Error ? error : new Error(String(error)),
      );
    }
  }

  isCollection(type: TypeDescriptor): boolean {
    return Types.COLLECTION.isAssignableFrom(type);
  }

  private resolveImplementation(type: TypeDescriptor): Constructor | undefined {
    if (
      type.isArray() ||
      type === Types.LIST ||
      type === Types.COLLECTION ||
      type === Types.ITERABLE
    ) {
      return Array;
    }
    if (type.isInterface) {
      return undefined;
    }
    return type.ctor;
  }

  private instantiationError(
    type: TypeDescriptor,
    argTypes: readonly TypeDescriptor[],
    args: readonly unknown[],
    cause?: Error,
  ): ReflectionError {
    const typeList = argTypes.map((argType) => argType.name).join(', ');
    const valueList = args.map((arg) => String(arg)).join(', ');
    const reason = cause
      ? `. Cause: ${cause.message}`
      : type.isInterface
        ? '. Interface has no known implementation'
        : '. Type has no constructor';
    return new ReflectionError(
      `Error instantiating ${type} with invalid types (${typeList}) or values (${valueList})${reason}`,
      ErrorCode.INSTANTIATION_FAILED,
      { type: type.name, argTypes: typeList, args: valueList },
      cause,
    );
  }
}
