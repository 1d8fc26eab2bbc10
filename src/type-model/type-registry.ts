import { ReflectionError, ErrorCode } from '../errors';
import { Types } from './builtins';
import { describeType, TypeDefinition } from './definition';
import { Constructor, TypeDescriptor } from './type-descriptor';

/**
 * Maps runtime values and constructors to type descriptors.
 *
 * Classes are described once with {@link TypeRegistry.define}. A class that was
 * never defined still gets a descriptor, derived from its prototype chain, with no
 * declared type parameters or fields.
 *
 * Define a class before any of its subclasses is looked up: a derived descriptor
 * links to the parent descriptor that existed at the time.
 */
export class TypeRegistry {
  private readonly byName = new Map<string, TypeDescriptor>();
  private readonly byConstructor = new Map<Function, TypeDescriptor>();
  /** Constructors whose derived descriptor is already the superclass of another descriptor */
  private readonly derivedParents = new Set<Function>();
  private readonly derived = new Set<TypeDescriptor>();

  constructor() {
    for (const type of Object.values(Types)) {
      this.register(type);
    }
  }

  define(definition: TypeDefinition): TypeDescriptor {
    if (this.byName.has(definition.name)) {
      throw new ReflectionError(
        `Type '${definition.name}' is already defined`,
        ErrorCode.DUPLICATE_TYPE,
        { type: definition.name },
      );
    }
    if (definition.ctor && this.derivedParents.has(definition.ctor)) {
      throw new ReflectionError(
        `Type '${definition.name}' was already derived as the superclass of a looked-up type; define it before its subclasses are looked up`,
        ErrorCode.DUPLICATE_TYPE,
        { type: definition.name },
      );
    }
    const defaultSuperclass = definition.isInterface
      ? undefined
      : definition.ctor
        ? this.derivedParentOf(definition.ctor)
        : Types.OBJECT;
    const type = describeType(definition, { voidType: Types.VOID, defaultSuperclass });
    this.register(type);
    return type;
  }

  forName(name: string): TypeDescriptor {
    const type = this.byName.get(name);
    if (!type) {
      throw new ReflectionError(`Unknown type '${name}'`, ErrorCode.UNKNOWN_TYPE, { type: name });
    }
    return type;
  }

  hasType(name: string): boolean {
    return this.byName.has(name);
  }

  forConstructor(ctor: Function): TypeDescriptor {
    const known = this.byConstructor.get(ctor);
    if (known) {
      return known;
    }
    const implicit = new TypeDescriptor(ctor.name || 'anonymous', () => ({
      ctor: isConstructor(ctor) ? ctor : undefined,
      superclass: this.derivedParentOf(ctor),
    }));
    // Implicit descriptors are keyed by constructor only; names of anonymous classes collide
    this.byConstructor.set(ctor, implicit);
    this.derived.add(implicit);
    return implicit;
  }

  /**
   * The runtime type of a value, or undefined for null and undefined
   */
  forValue(value: unknown): TypeDescriptor | undefined {
    switch (typeof value) {
      case 'undefined':
        return undefined;
      case 'string':
        return Types.STRING;
      case 'number':
        return Types.NUMBER;
      case 'boolean':
        return Types.BOOLEAN;
      case 'bigint':
        return Types.BIGINT;
      case 'symbol':
        return Types.SYMBOL;
      case 'function':
        return Types.FUNCTION;
    }
    if (value === null) {
      return undefined;
    }
    if (Array.isArray(value)) {
      return Types.ARRAY;
    }
    const prototype: unknown = Object.getPrototypeOf(value);
    const ctor = prototypeConstructor(prototype);
    return ctor ? this.forConstructor(ctor) : Types.OBJECT;
  }

  private register(type: TypeDescriptor) {
    this.byName.set(type.name, type);
    if (type.ctor && !type.isArray()) {
      this.byConstructor.set(type.ctor, type);
    }
  }

  private derivedParentOf(ctor: Function): TypeDescriptor {
    const parent = this.parentOf(ctor);
    if (parent.ctor && this.derived.has(parent)) {
      this.derivedParents.add(parent.ctor);
    }
    return parent;
  }

  private parentOf(ctor: Function): TypeDescriptor {
    const prototype: unknown = ctor.prototype;
    const parent =
      typeof prototype === 'object' && prototype !== null
        ? prototypeConstructor(Object.getPrototypeOf(prototype))
        : undefined;
    return parent ? this.forConstructor(parent) : Types.OBJECT;
  }
}

function prototypeConstructor(prototype: unknown): Function | undefined {
  if (typeof prototype !== 'object' || prototype === null) {
    return undefined;
  }
  const ctor: unknown = Object.getOwnPropertyDescriptor(prototype, 'constructor')?.value;
  return typeof ctor === 'function' ? ctor : undefined;
}

function isConstructor(fn: Function): fn is Constructor {
  return typeof fn.prototype === 'object' && fn.prototype !== null;
}

/**
 * Registry used when no other is configured
 */
export const defaultTypeRegistry = new TypeRegistry();
