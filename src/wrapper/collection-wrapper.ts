import { UnsupportedOperationError } from '../errors';
import type { MetaObject } from '../meta-object/meta-object';
import { PropertyTokenizer } from '../property';
import { elementTypeOf } from '../reflection';
import { TypeDescriptor, TypeExpression, Types } from '../type-model';
import { BaseWrapper, parseIndex } from './base-wrapper';

/**
 * Navigates an array positionally. A segment addresses an element either as
 * `[2]` or as a bare `2`.
 */
export class CollectionWrapper extends BaseWrapper {
  constructor(
    metaObject: MetaObject,
    private readonly collection: unknown[],
  ) {
    super(metaObject);
  }

  get(prop: PropertyTokenizer): unknown {
    return this.collection[this.position(prop)];
  }

  set(prop: PropertyTokenizer, value: unknown): void {
    this.collection[this.position(prop)] = value;
  }

  findProperty(): string | undefined {
    throw new UnsupportedOperationError('Arrays have no named properties', 'findProperty');
  }

  getGetterNames(): string[] {
    throw new UnsupportedOperationError('Arrays have no named properties', 'getGetterNames');
  }

  getSetterNames(): string[] {
    throw new UnsupportedOperationError('Arrays have no named properties', 'getSetterNames');
  }

  getSetterType(name: string): TypeDescriptor {
    const prop = new PropertyTokenizer(name);
    if (prop.children !== undefined) {
      const metaValue = this.metaObject.metaObjectForProperty(prop.indexedName);
      return metaValue.isNull() ? Types.OBJECT : metaValue.getSetterType(prop.children);
    }
    return Types.OBJECT;
  }

  getGetterType(name: string): TypeDescriptor {
    const prop = new PropertyTokenizer(name);
    if (prop.children !== undefined) {
      const metaValue = this.metaObject.metaObjectForProperty(prop.indexedName);
      return metaValue.isNull() ? Types.OBJECT : metaValue.getGetterType(prop.children);
    }
    return Types.OBJECT;
  }

  resolvePropertyType(): TypeExpression | undefined {
    const context = this.metaObject.getType();
    return context ? elementTypeOf(context) : undefined;
  }

  hasSetter(name: string): boolean {
    return this.inRange(name, (metaValue, children) => metaValue.hasSetter(children));
  }

  hasGetter(name: string): boolean {
    return this.inRange(name, (metaValue, children) => metaValue.hasGetter(children));
  }

  instantiatePropertyValue(): MetaObject {
    throw new UnsupportedOperationError(
      'Array elements are not instantiated on the way through a path',
      'instantiatePropertyValue',
    );
  }

  isCollection(): boolean {
    return true;
  }

  add(element: unknown): void {
    this.collection.push(element);
  }

  addAll(elements: readonly unknown[]): void {
    this.collection.push(...elements);
  }

  private position(prop: PropertyTokenizer): number {
    return parseIndex(prop.index ?? prop.name, this.collection.length);
  }

  private inRange(name: string, rest: (metaValue: MetaObject, children: string) => boolean) {
    const prop = new PropertyTokenizer(name);
    const key = prop.index ?? prop.name;
    if (!/^\d+$/.test(key) || Number(key) >= this.collection.length) {
      return false;
    }
    if (prop.children === undefined) {
      return true;
    }
    const metaValue = this.metaObject.metaObjectForProperty(prop.indexedName);
    return metaValue.isNull() || rest(metaValue, prop.children);
  }
}
