import { PropertyTokenizer } from '../property';
import { TypeParameterResolver } from '../type-resolver';
import {
  ClassOrParameterized,
  rawTypeOf,
  TypeDescriptor,
  TypeExpression,
  Types,
} from '../type-model';
import { Invoker } from './invoker';
import { Reflector } from './reflector';
import { ReflectorFactory } from './reflector-factory';

/**
 * Navigates property paths over a type rather than an object. The type may be
 * parameterized (`Box<String>`), in which case member types are resolved against it.
 */
export class MetaClass {
  private readonly reflector: Reflector;

  private constructor(
    private readonly type: ClassOrParameterized,
    private readonly reflectorFactory: ReflectorFactory,
  ) {
    this.reflector = reflectorFactory.findForType(rawTypeOf(type));
  }

  /**
   * Type variables and wildcards are erased before use
   */
  static forType(type: TypeExpression, reflectorFactory: ReflectorFactory): MetaClass {
    const context = type.kind === 'class' || type.kind === 'parameterized' ? type : rawTypeOf(type);
    return new MetaClass(context, reflectorFactory);
  }

  getType(): ClassOrParameterized {
    return this.type;
  }

  metaClassForProperty(name: string): MetaClass {
    return MetaClass.forType(this.getGenericGetterType(name), this.reflectorFactory);
  }

  /**
   * Canonical spelling of a property path, e.g. `ORDER.customerid` -> `order.customerId`
   *
   * @param useCamelCaseMapping strip underscores first, so `customer_id` matches `customerId`
   */
  findProperty(name: string, useCamelCaseMapping = false): string | undefined {
    const path = useCamelCaseMapping ? name.replace(/_/g, '') : name;
    return this.buildProperty(path);
  }

  getGetterNames(): string[] {
    return this.reflector.getGetablePropertyNames();
  }

  getSetterNames(): string[] {
    return this.reflector.getSetablePropertyNames();
  }

  getSetterType(name: string): TypeDescriptor {
    return rawTypeOf(this.getGenericSetterType(name));
  }

  getGetterType(name: string): TypeDescriptor {
    return rawTypeOf(this.getGenericGetterType(name));
  }

  /**
   * Resolved type of the value a path reads. An indexed segment on a collection,
   * array or map yields its element type.
   */
  getGenericGetterType(name: string): TypeExpression {
    const prop = new PropertyTokenizer(name);
    if (prop.children !== undefined) {
      return this.metaClassForSegment(prop).getGenericGetterType(prop.children);
    }
    return this.segmentType(prop, this.reflector.getGetInvoker(prop.name));
  }

  getGenericSetterType(name: string): TypeExpression {
    const prop = new PropertyTokenizer(name);
    if (prop.children !== undefined) {
      return this.metaClassForSegment(prop).getGenericSetterType(prop.children);
    }
    return this.segmentType(prop, this.reflector.getSetInvoker(prop.name));
  }

  hasSetter(name: string): boolean {
    const prop = new PropertyTokenizer(name);
    if (prop.children !== undefined) {
      if (this.reflector.hasSetter(prop.name)) {
        return this.metaClassForSegment(prop).hasSetter(prop.children);
      }
      return false;
    }
    return this.reflector.hasSetter(prop.name);
  }

  hasGetter(name: string): boolean {
    const prop = new PropertyTokenizer(name);
    if (prop.children !== undefined) {
      if (this.reflector.hasGetter(prop.name)) {
        return this.metaClassForSegment(prop).hasGetter(prop.children);
      }
      return false;
    }
    return this.reflector.hasGetter(prop.name);
  }

  getGetInvoker(name: string): Invoker {
    return this.reflector.getGetInvoker(name);
  }

  getSetInvoker(name: string): Invoker {
    return this.reflector.getSetInvoker(name);
  }

  hasDefaultConstructor(): boolean {
    return this.reflector.hasDefaultConstructor();
  }

  private metaClassForSegment(prop: PropertyTokenizer): MetaClass {
    const invoker = this.reflector.hasGetter(prop.name)
      ? this.reflector.getGetInvoker(prop.name)
      : this.reflector.getSetInvoker(prop.name);
    return MetaClass.forType(this.segmentType(prop, invoker), this.reflectorFactory);
  }

  private segmentType(prop: PropertyTokenizer, invoker: Invoker): TypeExpression {
    const type = invoker.resolveGenericType(this.type);
    return prop.index === undefined ? type : elementTypeOf(type);
  }

  private buildProperty(name: string): string | undefined {
    const prop = new PropertyTokenizer(name);
    const propertyName = this.reflector.findPropertyName(prop.name);
    if (propertyName === undefined) {
      return undefined;
    }
    if (prop.children === undefined) {
      return propertyName;
    }
    if (!this.reflector.hasGetter(propertyName)) {
      return undefined;
    }
    const rest = this.metaClassForProperty(propertyName).buildProperty(prop.children);
    return rest === undefined ? undefined : `${propertyName}.${rest}`;
  }
}

/**
 * What indexing into a value of `type` produces. Types that cannot be indexed are returned as is.
 */
export function elementTypeOf(type: TypeExpression): TypeExpression {
  if (type.kind === 'genericArray') {
    return type.componentType;
  }
  if (type.kind !== 'class' && type.kind !== 'parameterized') {
    return Types.OBJECT;
  }
  const raw = rawTypeOf(type);
  if (raw.componentType) {
    return raw.componentType;
  }
  if (Types.COLLECTION.isAssignableFrom(raw)) {
    const [element] = Types.COLLECTION.getTypeParameters();
    return upperBoundOf(TypeParameterResolver.resolveType(element, type, Types.COLLECTION));
  }
  if (Types.MAP.isAssignableFrom(raw)) {
    const [, value] = Types.MAP.getTypeParameters();
    return upperBoundOf(TypeParameterResolver.resolveType(value, type, Types.MAP));
  }
  return type;
}

function upperBoundOf(type: TypeExpression): TypeExpression {
  if (type.kind === 'wildcard') {
    return type.upperBounds[0] ?? Types.OBJECT;
  }
  return type;
}
