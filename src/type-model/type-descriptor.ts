import type { ClassOrParameterized, TypeExpression, TypeVariable } from './type-expression';

/**
 * Any class that can be called with `new`
 */
export type Constructor = abstract new (...args: never[]) => unknown;

export interface FieldDeclaration {
  readonly kind: 'field';
  readonly name: string;
  readonly type: TypeExpression;
  readonly declaringType: TypeDescriptor;
  readonly readonly: boolean;
}

export interface MethodDeclaration {
  readonly kind: 'method';
  readonly name: string;
  readonly returnType: TypeExpression;
  readonly parameterTypes: readonly TypeExpression[];
  readonly declaringType: TypeDescriptor;
}

export type MemberDeclaration = FieldDeclaration | MethodDeclaration;

/**
 * Everything a descriptor is made of. Produced by a builder that receives the
 * descriptor under construction, so members and type variables can point back at it.
 */
export interface DescriptorParts {
  ctor?: Constructor;
  isInterface?: boolean;
  typeParameters?: readonly TypeVariable[];
  superclass?: ClassOrParameterized;
  interfaces?: readonly ClassOrParameterized[];
  componentType?: TypeDescriptor;
  fields?: readonly FieldDeclaration[];
  methods?: readonly MethodDeclaration[];
  defaultConstructible?: boolean;
  /** Marks the universal top type, which every type is assignable to */
  top?: boolean;
}

/**
 * A concrete (raw) type: the runtime class of a value, or a declared interface.
 */
export class TypeDescriptor {
  readonly kind = 'class' as const;
  readonly ctor: Constructor | undefined;
  readonly isInterface: boolean;
  readonly componentType: TypeDescriptor | undefined;
  readonly defaultConstructible: boolean;
  readonly isTopType: boolean;

  private readonly typeParameters: readonly TypeVariable[];
  private readonly superclass: ClassOrParameterized | undefined;
  private readonly interfaces: readonly ClassOrParameterized[];
  private readonly fields: readonly FieldDeclaration[];
  private readonly methods: readonly MethodDeclaration[];

  constructor(
    readonly name: string,
    build: (self: TypeDescriptor) => DescriptorParts,
  ) {
    const parts = build(this);
    this.ctor = parts.ctor;
    this.isInterface = parts.isInterface ?? false;
    this.componentType = parts.componentType;
    this.typeParameters = parts.typeParameters ?? [];
    this.superclass = parts.superclass;
    this.interfaces = parts.interfaces ?? [];
    this.fields = parts.fields ?? [];
    this.methods = parts.methods ?? [];
    this.isTopType = parts.top ?? false;
    this.defaultConstructible =
      parts.defaultConstructible ?? (parts.ctor !== undefined && parts.ctor.length === 0);
  }

  getTypeParameters(): readonly TypeVariable[] {
    return this.typeParameters;
  }

  /**
   * The superclass edge as declared, with its type arguments
   */
  getGenericSuperclass(): ClassOrParameterized | undefined {
    return this.superclass;
  }

  getGenericInterfaces(): readonly ClassOrParameterized[] {
    return this.interfaces;
  }

  getSuperclass(): TypeDescriptor | undefined {
    return this.superclass === undefined ? undefined : rawOf(this.superclass);
  }

  getInterfaces(): TypeDescriptor[] {
    return this.interfaces.map(rawOf);
  }

  getDeclaredFields(): readonly FieldDeclaration[] {
    return this.fields;
  }

  getDeclaredField(name: string): FieldDeclaration | undefined {
    return this.fields.find((field) => field.name === name);
  }

  getDeclaredMethods(): readonly MethodDeclaration[] {
    return this.methods;
  }

  isArray(): boolean {
    return this.componentType !== undefined;
  }

  /**
   * Whether a value of `other` can be used where this type is expected
   */
  isAssignableFrom(other: TypeDescriptor): boolean {
    if (other === this) {
      return true;
    }
    if (this.isTopType) {
      return true;
    }
    const parents = other.getInterfaces();
    const superclass = other.getSuperclass();
    if (superclass) {
      parents.unshift(superclass);
    }
    return parents.some((parent) => this.isAssignableFrom(parent));
  }

  toString(): string {
    return this.name;
  }
}

function rawOf(edge: ClassOrParameterized): TypeDescriptor {
  return edge.kind === 'class' ? edge : edge.rawType;
}
