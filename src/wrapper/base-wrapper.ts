import { ErrorCode, IndexOutOfRangeError, ReflectionError } from '../errors';
import type { ObjectFactory } from '../factory';
import type { MetaObject } from '../meta-object/meta-object';
import { PropertyTokenizer } from '../property';
import { TypeDescriptor, TypeExpression } from '../type-model';
import { ObjectWrapper } from './object-wrapper';

/**
 * Shared indexing logic. Subclasses wrap one object and keep a reference to the
 * navigator that owns them, which they use to reach nested values.
 */
export abstract class BaseWrapper implements ObjectWrapper {
  protected constructor(protected readonly metaObject: MetaObject) {}

  abstract get(prop: PropertyTokenizer): unknown;
  abstract set(prop: PropertyTokenizer, value: unknown): void;
  abstract findProperty(name: string, useCamelCaseMapping: boolean): string | undefined;
  abstract getGetterNames(): string[];
  abstract getSetterNames(): string[];
  abstract getSetterType(name: string): TypeDescriptor;
  abstract getGetterType(name: string): TypeDescriptor;
  abstract resolvePropertyType(name: string): TypeExpression | undefined;
  abstract hasSetter(name: string): boolean;
  abstract hasGetter(name: string): boolean;
  abstract instantiatePropertyValue(
    name: string,
    prop: PropertyTokenizer,
    objectFactory: ObjectFactory,
  ): MetaObject;
  abstract isCollection(): boolean;
  abstract add(element: unknown): void;
  abstract addAll(elements: readonly unknown[]): void;

  /**
   * The container an indexed segment points into: the named property, or the
   * wrapped object itself for a bare `[index]`
   */
  protected resolveCollection(prop: PropertyTokenizer, object: unknown): unknown {
    if (prop.name === '') {
      return object;
    }
    return this.metaObject.getValue(prop.name);
  }

  protected getCollectionValue(prop: PropertyTokenizer, collection: unknown): unknown {
    const key = prop.index ?? '';
    if (Array.isArray(collection)) {
      return collection[parseIndex(key, collection.length)];
    }
    if (collection instanceof Map) {
      return collection.get(key);
    }
    if (isPlainObject(collection)) {
      return collection[key];
    }
    if (collection === null || collection === undefined) {
      return undefined;
    }
    throw notACollection(prop, collection);
  }

  protected setCollectionValue(prop: PropertyTokenizer, collection: unknown, value: unknown) {
    const key = prop.index ?? '';
    if (Array.isArray(collection)) {
      collection[parseIndex(key, collection.length)] = value;
    } else if (collection instanceof Map) {
      collection.set(key, value);
    } else if (isPlainObject(collection)) {
      collection[key] = value;
    } else {
      throw notACollection(prop, collection);
    }
  }
}

/**
 * Objects created by `{}` or `Object.create(null)`, which are navigated as maps
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Position addressed by `index` in a sequence of `length` elements
 *
 * @throws {IndexOutOfRangeError} If the index is not a non-negative integer below `length`
 */
export function parseIndex(index: string, length: number): number {
  if (!/^\d+$/.test(index)) {
    throw new IndexOutOfRangeError(`Index '${index}' is not a valid position`, index, length);
  }
  const position = Number(index);
  if (position >= length) {
    throw new IndexOutOfRangeError(
      `Index ${position} out of bounds for length ${length}`,
      index,
      length,
    );
  }
  return position;
}

function notACollection(prop: PropertyTokenizer, value: unknown): ReflectionError {
  const found = value === null || value === undefined ? String(value) : typeof value;
  return new ReflectionError(
    `Cannot index '${prop.indexedName}': '${prop.name}' is not an array, Map or plain object (found ${found})`,
    ErrorCode.NOT_A_COLLECTION,
    { property: prop.name, index: prop.index, found },
  );
}
