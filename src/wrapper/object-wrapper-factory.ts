import { ErrorCode, ReflectionError } from '../errors';
import type { MetaObject } from '../meta-object/meta-object';
import { ObjectWrapper } from './object-wrapper';

/**
 * Lets callers supply their own wrapper for objects of a particular shape,
 * ahead of the built-in bean, map and array wrappers
 */
export interface ObjectWrapperFactory {
  hasWrapperFor(object: unknown): boolean;
  getWrapperFor(metaObject: MetaObject, object: unknown): ObjectWrapper;
}

export class DefaultObjectWrapperFactory implements ObjectWrapperFactory {
  hasWrapperFor(_object: unknown): boolean {
    return false;
  }

  getWrapperFor(): ObjectWrapper {
    throw new ReflectionError(
      'The DefaultObjectWrapperFactory should never be called to provide an ObjectWrapper',
      ErrorCode.UNSUPPORTED_OPERATION,
    );
  }
}
