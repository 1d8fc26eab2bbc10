import { DefaultObjectFactory, ObjectFactory } from '../factory';
import { PropertyTokenizer } from '../property';
import { DefaultReflectorFactory, ReflectorFactory } from '../reflection';
import {
  ClassOrParameterized,
  rawTypeOf,
  TypeDescriptor,
  TypeExpression,
} from '../type-model';
import { Logger, noLogger } from '../util/logger';
import {
  BeanWrapper,
  CollectionWrapper,
  DefaultObjectWrapperFactory,
  isObjectWrapper,
  isPlainObject,
  MapWrapper,
  ObjectWrapper,
  ObjectWrapperFactory,
} from '../wrapper';

/**
 * Instance returned for absent values, so the navigator can tell them apart
 */
class NullObject {}

/**
 * Reads, writes and introspects values of an object graph by property path,
 * e.g. `order.items[0].price`.
 *
 * Each navigator wraps one object; paths with several segments are walked by
 * creating a navigator per intermediate value.
 */
export class MetaObject {
  private static nullMetaObject: MetaObject | undefined;

  private readonly objectWrapper: ObjectWrapper;
  private readonly type: ClassOrParameterized | undefined;

  private constructor(
    private readonly originalObject: object,
    private readonly objectFactory: ObjectFactory,
    private readonly objectWrapperFactory: ObjectWrapperFactory,
    private readonly reflectorFactory: ReflectorFactory,
    type: TypeExpression | undefined,
    private readonly logger: Logger,
  ) {
    this.type =
      type === undefined || type.kind === 'class' || type.kind === 'parameterized'
        ? type
        : rawTypeOf(type);

    if (isObjectWrapper(originalObject)) {
      this.objectWrapper = originalObject;
    } else if (objectWrapperFactory.hasWrapperFor(originalObject)) {
      this.objectWrapper = objectWrapperFactory.getWrapperFor(this, originalObject);
    } else if (originalObject instanceof Map || isPlainObject(originalObject)) {
      this.objectWrapper = new MapWrapper(this, originalObject);
    } else if (Array.isArray(originalObject)) {
      this.objectWrapper = new CollectionWrapper(this, originalObject);
    } else {
      this.objectWrapper = new BeanWrapper(this, originalObject);
    }
  }

  /**
   * @param type static type of `object`, used to resolve generic members (e.g. `Box<String>`)
   * @returns the shared null navigator when `object` is null or undefined
   */
  static forObject(
    object: unknown,
    objectFactory: ObjectFactory,
    objectWrapperFactory: ObjectWrapperFactory,
    reflectorFactory: ReflectorFactory,
    type?: TypeExpression,
    logger: Logger = noLogger,
  ): MetaObject {
    return MetaObject.create(
      object,
      objectFactory,
      objectWrapperFactory,
      reflectorFactory,
      type,
      logger.createNested('MetaObject'),
    );
  }

  private static create(
    object: unknown,
    objectFactory: ObjectFactory,
    objectWrapperFactory: ObjectWrapperFactory,
    reflectorFactory: ReflectorFactory,
    type: TypeExpression | undefined,
    logger: Logger,
  ): MetaObject {
    if (object === null || object === undefined) {
      return MetaObject.NULL_META_OBJECT;
    }
    // Primitives are navigated through their wrapper objects
    const target: object =
      typeof object === 'object' || typeof object === 'function' ? object : Object(object);
    return new MetaObject(
      target,
      objectFactory,
      objectWrapperFactory,
      reflectorFactory,
      type,
      logger,
    );
  }

  static get NULL_META_OBJECT(): MetaObject {
    if (!MetaObject.nullMetaObject) {
      MetaObject.nullMetaObject = new MetaObject(
        new NullObject(),
        new DefaultObjectFactory(),
        new DefaultObjectWrapperFactory(),
        new DefaultReflectorFactory(),
        undefined,
        noLogger,
      );
    }
    return MetaObject.nullMetaObject;
  }

  isNull(): boolean {
    return this === MetaObject.nullMetaObject;
  }

  getObjectFactory(): ObjectFactory {
    return this.objectFactory;
  }

  getObjectWrapperFactory(): ObjectWrapperFactory {
    return this.objectWrapperFactory;
  }

  getReflectorFactory(): ReflectorFactory {
    return this.reflectorFactory;
  }

  getOriginalObject(): unknown {
    return this.originalObject;
  }

  getObjectWrapper(): ObjectWrapper {
    return this.objectWrapper;
  }

  /**
   * Static type the navigator was created with, if any
   */
  getType(): ClassOrParameterized | undefined {
    return this.type;
  }

  findProperty(propName: string, useCamelCaseMapping = false): string | undefined {
    return this.objectWrapper.findProperty(propName, useCamelCaseMapping);
  }

  getGetterNames(): string[] {
    return this.objectWrapper.getGetterNames();
  }

  getSetterNames(): string[] {
    return this.objectWrapper.getSetterNames();
  }

  getSetterType(name: string): TypeDescriptor {
    return this.objectWrapper.getSetterType(name);
  }

  getGetterType(name: string): TypeDescriptor {
    return this.objectWrapper.getGetterType(name);
  }

  hasSetter(name: string): boolean {
    return this.objectWrapper.hasSetter(name);
  }

  hasGetter(name: string): boolean {
    return this.objectWrapper.hasGetter(name);
  }

  /**
   * Absent intermediates make the whole path absent
   */
  getValue(name: string): unknown {
    const prop = new PropertyTokenizer(name);
    if (prop.children === undefined) {
      return this.objectWrapper.get(prop);
    }
    const metaValue = this.metaObjectForProperty(prop.indexedName);
    return metaValue.isNull() ? undefined : metaValue.getValue(prop.children);
  }

  /**
   * Absent intermediates are created with the object factory, unless the value
   * being set is itself absent, in which case nothing happens
   */
  setValue(name: string, value: unknown): void {
    const prop = new PropertyTokenizer(name);
    if (prop.children === undefined) {
      this.objectWrapper.set(prop, value);
      return;
    }
    let metaValue = this.metaObjectForProperty(prop.indexedName);
    if (metaValue.isNull()) {
      if (value === null || value === undefined) {
        return;
      }
      this.logger.debug('Instantiating absent property', {
        property: prop.indexedName,
        path: name,
      });
      metaValue = this.objectWrapper.instantiatePropertyValue(name, prop, this.objectFactory);
    }
    metaValue.setValue(prop.children, value);
  }

  metaObjectForProperty(name: string): MetaObject {
    const prop = new PropertyTokenizer(name);
    if (prop.children !== undefined) {
      const parent = this.metaObjectForProperty(prop.indexedName);
      return parent.isNull() ? parent : parent.metaObjectForProperty(prop.children);
    }
    const value = this.objectWrapper.get(prop);
    if (value === null || value === undefined) {
      return MetaObject.NULL_META_OBJECT;
    }
    return this.forChild(value, this.objectWrapper.resolvePropertyType(name));
  }

  /**
   * A navigator over `value` sharing this navigator's factories
   */
  forChild(value: unknown, type?: TypeExpression): MetaObject {
    return MetaObject.create(
      value,
      this.objectFactory,
      this.objectWrapperFactory,
      this.reflectorFactory,
      type,
      this.logger,
    );
  }

  isCollection(): boolean {
    return this.objectWrapper.isCollection();
  }

  add(element: unknown): void {
    this.objectWrapper.add(element);
  }

  addAll(elements: readonly unknown[]): void {
    this.objectWrapper.addAll(elements);
  }
}
