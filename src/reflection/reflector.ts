import { ReflectionError, ErrorCode } from '../errors';
import { PropertyNamer } from '../property';
import { TypeParameterResolver } from '../type-resolver';
import { FieldDeclaration, rawTypeOf, TypeDescriptor, Types } from '../type-model';
import { GetFieldInvoker, Invoker, MethodInvoker, SetFieldInvoker } from './invoker';

/**
 * Cached view of one type as a bean: which properties it can read and write,
 * how, and with what types.
 *
 * Properties come from, in order of precedence:
 * 1. declared `getX()` / `isX()` / `setX(value)` methods
 * 2. JS accessors (`get x()` / `set x(value)`) on the constructor's prototype chain
 * 3. undeclared `getX()` / `setX(value)` methods on that prototype chain
 * 4. declared fields
 * Subtypes shadow their supertypes within each source.
 */
export class Reflector {
  private readonly getMethods = new Map<string, Invoker>();
  private readonly setMethods = new Map<string, Invoker>();
  private readonly caseInsensitivePropertyMap = new Map<string, string>();
  private readonly hierarchy: TypeDescriptor[];
  private readonly accessorNames = new Set<string>();

  constructor(private readonly type: TypeDescriptor) {
    this.hierarchy = collectHierarchy(type);
    this.addDeclaredMethods();
    this.addPrototypeMembers();
    this.addFields();
    for (const name of [...this.getMethods.keys(), ...this.setMethods.keys()]) {
      this.caseInsensitivePropertyMap.set(name.toUpperCase(), name);
    }
  }

  getType(): TypeDescriptor {
    return this.type;
  }

  hasDefaultConstructor(): boolean {
    return this.type.defaultConstructible;
  }

  getSetInvoker(propertyName: string): Invoker {
    const invoker = this.setMethods.get(propertyName);
    if (!invoker) {
      throw this.noSuchProperty('setter', propertyName);
    }
    return invoker;
  }

  getGetInvoker(propertyName: string): Invoker {
    const invoker = this.getMethods.get(propertyName);
    if (!invoker) {
      throw this.noSuchProperty('getter', propertyName);
    }
    return invoker;
  }

  getSetterType(propertyName: string): TypeDescriptor {
    return this.getSetInvoker(propertyName).getType();
  }

  getGetterType(propertyName: string): TypeDescriptor {
    return this.getGetInvoker(propertyName).getType();
  }

  getGetablePropertyNames(): string[] {
    return [...this.getMethods.keys()];
  }

  getSetablePropertyNames(): string[] {
    return [...this.setMethods.keys()];
  }

  hasSetter(propertyName: string): boolean {
    return this.setMethods.has(propertyName);
  }

  hasGetter(propertyName: string): boolean {
    return this.getMethods.has(propertyName);
  }

  /**
   * Canonical spelling of a property name, matched case-insensitively
   */
  findPropertyName(name: string): string | undefined {
    return this.caseInsensitivePropertyMap.get(name.toUpperCase());
  }

  private addDeclaredMethods() {
    for (const owner of this.hierarchy) {
      for (const method of owner.getDeclaredMethods()) {
        const name = method.name;
        const params = method.parameterTypes.length;
        if (params === 0 && PropertyNamer.isGetter(name)) {
          const type = rawTypeOf(TypeParameterResolver.resolveReturnType(method, this.type));
          if (type === Types.VOID || (name.startsWith('is') && type !== Types.BOOLEAN)) {
            continue;
          }
          this.addGetter(
            PropertyNamer.methodToProperty(name),
            new MethodInvoker(name, 'getter', type, method),
          );
        } else if (params === 1 && PropertyNamer.isSetter(name)) {
          const [paramType] = TypeParameterResolver.resolveParamTypes(method, this.type);
          this.addSetter(
            PropertyNamer.methodToProperty(name),
            new MethodInvoker(name, 'setter', rawTypeOf(paramType), method),
          );
        }
      }
    }
  }

  private addPrototypeMembers() {
    const ctor = this.type.ctor;
    let prototype: unknown = ctor?.prototype;
    while (typeof prototype === 'object' && prototype !== null && prototype !== Object.prototype) {
      for (const [name, descriptor] of Object.entries(Object.getOwnPropertyDescriptors(prototype))) {
        if (name === 'constructor') {
          continue;
        }
        if (descriptor.get || descriptor.set) {
          this.accessorNames.add(name);
          const field = this.findField(name);
          const type = field
            ? rawTypeOf(TypeParameterResolver.resolveFieldType(field, this.type))
            : Types.OBJECT;
          if (descriptor.get) {
            this.addGetter(name, new GetFieldInvoker(name, type, field));
          }
          if (descriptor.set) {
            this.addSetter(name, new SetFieldInvoker(name, type, field));
          }
        } else if (typeof descriptor.value === 'function') {
          const arity = descriptor.value.length;
          if (arity === 0 && name.startsWith('get') && PropertyNamer.isGetter(name)) {
            this.addGetter(
              PropertyNamer.methodToProperty(name),
              new MethodInvoker(name, 'getter', Types.OBJECT),
            );
          } else if (arity === 1 && PropertyNamer.isSetter(name)) {
            this.addSetter(
              PropertyNamer.methodToProperty(name),
              new MethodInvoker(name, 'setter', Types.OBJECT),
            );
          }
        }
      }
      prototype = Object.getPrototypeOf(prototype);
    }
  }

  private addFields() {
    for (const owner of this.hierarchy) {
      for (const field of owner.getDeclaredFields()) {
        if (this.accessorNames.has(field.name)) {
          continue;
        }
        const type = rawTypeOf(TypeParameterResolver.resolveFieldType(field, this.type));
        this.addGetter(field.name, new GetFieldInvoker(field.name, type, field));
        if (!field.readonly) {
          this.addSetter(field.name, new SetFieldInvoker(field.name, type, field));
        }
      }
    }
  }

  private findField(name: string): FieldDeclaration | undefined {
    for (const owner of this.hierarchy) {
      const field = owner.getDeclaredField(name);
      if (field) {
        return field;
      }
    }
    return undefined;
  }

  private addGetter(name: string, invoker: Invoker) {
    if (!this.getMethods.has(name)) {
      this.getMethods.set(name, invoker);
    }
  }

  private addSetter(name: string, invoker: Invoker) {
    if (!this.setMethods.has(name)) {
      this.setMethods.set(name, invoker);
    }
  }

  private noSuchProperty(kind: 'getter' | 'setter', propertyName: string): ReflectionError {
    return new ReflectionError(
      `There is no ${kind} for property named '${propertyName}' in 'class ${this.type.name}'`,
      ErrorCode.NO_SUCH_PROPERTY,
      { property: propertyName, type: this.type.name },
    );
  }
}

function collectHierarchy(type: TypeDescriptor): TypeDescriptor[] {
  const hierarchy: TypeDescriptor[] = [];
  for (let current: TypeDescriptor | undefined = type; current; current = current.getSuperclass()) {
    hierarchy.push(current);
  }
  return hierarchy;
}
