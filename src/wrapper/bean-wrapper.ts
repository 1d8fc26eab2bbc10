import { ErrorCode, ReflectionError, UnsupportedOperationError } from '../errors';
import type { ObjectFactory } from '../factory';
import type { MetaObject } from '../meta-object/meta-object';
import { PropertyTokenizer } from '../property';
import { MetaClass } from '../reflection';
import { ClassOrParameterized, rawTypeOf, TypeDescriptor, TypeExpression, Types } from '../type-model';
import { BaseWrapper } from './base-wrapper';

/**
 * Navigates a class instance through the properties its reflector exposes
 */
export class BeanWrapper extends BaseWrapper {
  private readonly metaClass: MetaClass;

  constructor(
    metaObject: MetaObject,
    private readonly object: object,
  ) {
    super(metaObject);
    const runtimeType =
      metaObject.getReflectorFactory().getTypeRegistry().forValue(object) ?? Types.OBJECT;
    this.metaClass = MetaClass.forType(
      contextFor(runtimeType, metaObject.getType()),
      metaObject.getReflectorFactory(),
    );
  }

  get(prop: PropertyTokenizer): unknown {
    if (prop.index !== undefined) {
      const collection = this.resolveCollection(prop, this.object);
      return this.getCollectionValue(prop, collection);
    }
    return this.getBeanProperty(prop);
  }

  set(prop: PropertyTokenizer, value: unknown): void {
    if (prop.index !== undefined) {
      const collection = this.resolveCollection(prop, this.object);
      this.setCollectionValue(prop, collection, value);
    } else {
      this.setBeanProperty(prop, value);
    }
  }

  findProperty(name: string, useCamelCaseMapping: boolean): string | undefined {
    return this.metaClass.findProperty(name, useCamelCaseMapping);
  }

  getGetterNames(): string[] {
    return this.metaClass.getGetterNames();
  }

  getSetterNames(): string[] {
    return this.metaClass.getSetterNames();
  }

  getSetterType(name: string): TypeDescriptor {
    const prop = new PropertyTokenizer(name);
    if (prop.children === undefined) {
      return this.metaClass.getSetterType(name);
    }
    const metaValue = this.metaObject.metaObjectForProperty(prop.indexedName);
    return metaValue.isNull()
      ? this.metaClass.getSetterType(name)
      : metaValue.getSetterType(prop.children);
  }

  getGetterType(name: string): TypeDescriptor {
    const prop = new PropertyTokenizer(name);
    if (prop.children === undefined) {
      return this.metaClass.getGetterType(name);
    }
    const metaValue = this.metaObject.metaObjectForProperty(prop.indexedName);
    return metaValue.isNull()
      ? this.metaClass.getGetterType(name)
      : metaValue.getGetterType(prop.children);
  }

  resolvePropertyType(name: string): TypeExpression | undefined {
    return this.metaClass.hasGetter(name) ? this.metaClass.getGenericGetterType(name) : undefined;
  }

  hasSetter(name: string): boolean {
    const prop = new PropertyTokenizer(name);
    if (prop.children === undefined) {
      return this.metaClass.hasSetter(name);
    }
    if (!this.metaClass.hasSetter(prop.indexedName)) {
      return false;
    }
    const metaValue = this.metaObject.metaObjectForProperty(prop.indexedName);
    return metaValue.isNull()
      ? this.metaClass.hasSetter(name)
      : metaValue.hasSetter(prop.children);
  }

  hasGetter(name: string): boolean {
    const prop = new PropertyTokenizer(name);
    if (prop.children === undefined) {
      return this.metaClass.hasGetter(name);
    }
    if (!this.metaClass.hasGetter(prop.indexedName)) {
      return false;
    }
    const metaValue = this.metaObject.metaObjectForProperty(prop.indexedName);
    return metaValue.isNull()
      ? this.metaClass.hasGetter(name)
      : metaValue.hasGetter(prop.children);
  }

  instantiatePropertyValue(
    name: string,
    prop: PropertyTokenizer,
    objectFactory: ObjectFactory,
  ): MetaObject {
    const type = this.metaClass.getGenericSetterType(prop.indexedName);
    const newObject = objectFactory.create(rawTypeOf(type));
    const metaValue = this.metaObject.forChild(newObject, type);
    this.set(prop, newObject);
    return metaValue;
  }

  isCollection(): boolean {
    return false;
  }

  add(): void {
    throw new UnsupportedOperationError('Cannot add elements to a bean', 'add');
  }

  addAll(): void {
    throw new UnsupportedOperationError('Cannot add elements to a bean', 'addAll');
  }

  private getBeanProperty(prop: PropertyTokenizer): unknown {
    const invoker = this.metaClass.getGetInvoker(prop.name);
    try {
      return invoker.invoke(this.object, []);
    } catch (error) {
      throw this.accessError('get', prop, error);
    }
  }

  private setBeanProperty(prop: PropertyTokenizer, value: unknown) {
    const invoker = this.metaClass.getSetInvoker(prop.name);
    try {
      invoker.invoke(this.object, [value]);
    } catch (error) {
      throw this.accessError('set', prop, error);
    }
  }

  private accessError(
    operation: 'get' | 'set',
    prop: PropertyTokenizer,
    error: unknown,
  ): ReflectionError {
    if (error instanceof ReflectionError) {
      return error;
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    const type = this.metaClass.getType();
    const direction = operation === 'get' ? 'from' : 'of';
    return new ReflectionError(
      `Could not ${operation} property '${prop.name}' ${direction} ${rawTypeOf(type)}. Cause: ${cause.message}`,
      ErrorCode.PROPERTY_ACCESS_FAILED,
      { property: prop.name, operation },
      cause,
    );
  }
}

/**
 * The static context only applies while it still describes the runtime value
 */
function contextFor(
  runtimeType: TypeDescriptor,
  staticType: ClassOrParameterized | undefined,
): ClassOrParameterized {
  return staticType && rawTypeOf(staticType) === runtimeType ? staticType : runtimeType;
}
