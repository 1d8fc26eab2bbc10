import type { ObjectFactory } from '../factory';
import type { MetaObject } from '../meta-object/meta-object';
import { PropertyTokenizer } from '../property';
import { TypeDescriptor, TypeExpression } from '../type-model';

/**
 * Uniform read, write and introspection over one object, whatever its storage shape.
 *
 * Paths passed by name may span several segments; single-segment operations
 * take a tokenizer.
 */
export interface ObjectWrapper {
  get(prop: PropertyTokenizer): unknown;

  set(prop: PropertyTokenizer, value: unknown): void;

  findProperty(name: string, useCamelCaseMapping: boolean): string | undefined;

  getGetterNames(): string[];

  getSetterNames(): string[];

  getSetterType(name: string): TypeDescriptor;

  getGetterType(name: string): TypeDescriptor;

  /**
   * Static type of the value stored under a single segment, when the wrapper knows it.
   * Child navigators use it as their instantiation context.
   */
  resolvePropertyType(name: string): TypeExpression | undefined;

  hasSetter(name: string): boolean;

  hasGetter(name: string): boolean;

  /**
   * Creates and stores the value of an absent intermediate segment, returning its navigator
   */
  instantiatePropertyValue(
    name: string,
    prop: PropertyTokenizer,
    objectFactory: ObjectFactory,
  ): MetaObject;

  isCollection(): boolean;

  add(element: unknown): void;

  addAll(elements: readonly unknown[]): void;
}

const WRAPPER_METHODS = [
  'get',
  'set',
  'hasGetter',
  'hasSetter',
  'instantiatePropertyValue',
  'isCollection',
] as const;

/**
 * Whether `value` already implements the wrapper contract, whatever its class
 */
export function isObjectWrapper(value: unknown): value is ObjectWrapper {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return WRAPPER_METHODS.every((method) => typeof Reflect.get(value, method) === 'function');
}
