import { UnsupportedOperationError } from '../errors';
import type { ObjectFactory } from '../factory';
import type { MetaObject } from '../meta-object/meta-object';
import { PropertyTokenizer } from '../property';
import { elementTypeOf } from '../reflection';
import { rawTypeOf, TypeDescriptor, TypeExpression, Types } from '../type-model';
import { BaseWrapper } from './base-wrapper';

export type MapLike = Map<unknown, unknown> | Record<string, unknown>;

/**
 * Navigates a `Map` or a plain object. A segment is looked up by its full
 * indexed name, so `a[0]` is the key `'a[0]'`, not element 0 of `a`.
 */
export class MapWrapper extends BaseWrapper {
  constructor(
    metaObject: MetaObject,
    private readonly map: MapLike,
  ) {
    super(metaObject);
  }

  get(prop: PropertyTokenizer): unknown {
    return this.read(prop.indexedName);
  }

  set(prop: PropertyTokenizer, value: unknown): void {
    if (this.map instanceof Map) {
      this.map.set(prop.indexedName, value);
    } else {
      this.map[prop.indexedName] = value;
    }
  }

  findProperty(name: string): string {
    return name;
  }

  getGetterNames(): string[] {
    return this.keys();
  }

  getSetterNames(): string[] {
    return this.keys();
  }

  getSetterType(name: string): TypeDescriptor {
    const prop = new PropertyTokenizer(name);
    if (prop.children !== undefined) {
      const metaValue = this.metaObject.metaObjectForProperty(prop.indexedName);
      return metaValue.isNull() ? Types.OBJECT : metaValue.getSetterType(prop.children);
    }
    return this.entryType(prop);
  }

  getGetterType(name: string): TypeDescriptor {
    const prop = new PropertyTokenizer(name);
    if (prop.children !== undefined) {
      const metaValue = this.metaObject.metaObjectForProperty(prop.indexedName);
      return metaValue.isNull() ? Types.OBJECT : metaValue.getGetterType(prop.children);
    }
    return this.entryType(prop);
  }

  resolvePropertyType(): TypeExpression | undefined {
    return this.valueType();
  }

  hasSetter(): boolean {
    return true;
  }

  hasGetter(name: string): boolean {
    const prop = new PropertyTokenizer(name);
    if (!this.has(prop.indexedName)) {
      return false;
    }
    if (prop.children === undefined) {
      return true;
    }
    const metaValue = this.metaObject.metaObjectForProperty(prop.indexedName);
    return metaValue.isNull() || metaValue.hasGetter(prop.children);
  }

  instantiatePropertyValue(
    name: string,
    prop: PropertyTokenizer,
    objectFactory: ObjectFactory,
  ): MetaObject {
    const valueType = this.valueType();
    const declared = valueType ? rawTypeOf(valueType) : Types.OBJECT;
    // Without a declared value type the new entry takes the container's own shape
    const type =
      declared !== Types.OBJECT ? declared : this.map instanceof Map ? Types.MAP : Types.OBJECT;
    const newObject = objectFactory.create(type);
    const metaValue = this.metaObject.forChild(newObject, valueType);
    this.set(prop, newObject);
    return metaValue;
  }

  isCollection(): boolean {
    return false;
  }

  add(): void {
    throw new UnsupportedOperationError('Cannot add elements to a map', 'add');
  }

  addAll(): void {
    throw new UnsupportedOperationError('Cannot add elements to a map', 'addAll');
  }

  private read(key: string): unknown {
    return this.map instanceof Map ? this.map.get(key) : this.map[key];
  }

  private has(key: string): boolean {
    return this.map instanceof Map
      ? this.map.has(key)
      : Object.prototype.hasOwnProperty.call(this.map, key);
  }

  private keys(): string[] {
    if (this.map instanceof Map) {
      return [...this.map.keys()].filter((key): key is string => typeof key === 'string');
    }
    return Object.keys(this.map);
  }

  /**
   * Indexed names have no static type; otherwise the stored value's runtime type wins
   */
  private entryType(prop: PropertyTokenizer): TypeDescriptor {
    if (prop.index !== undefined) {
      return Types.OBJECT;
    }
    const registry = this.metaObject.getReflectorFactory().getTypeRegistry();
    const runtimeType = registry.forValue(this.read(prop.name));
    if (runtimeType) {
      return runtimeType;
    }
    const valueType = this.valueType();
    return valueType ? rawTypeOf(valueType) : Types.OBJECT;
  }

  /**
   * `V` of a `Map<K, V>` context
   */
  private valueType(): TypeExpression | undefined {
    const context = this.metaObject.getType();
    if (!context || !Types.MAP.isAssignableFrom(rawTypeOf(context))) {
      return undefined;
    }
    return elementTypeOf(context);
  }
}
