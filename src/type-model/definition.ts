import { ReflectionError, ErrorCode } from '../errors';
import {
  Constructor,
  FieldDeclaration,
  MethodDeclaration,
  TypeDescriptor,
} from './type-descriptor';
import { ClassOrParameterized, TypeExpression, TypeVariable } from './type-expression';

export interface TypeParameterDefinition {
  name: string;
  bounds?: readonly TypeExpression[];
}

export interface FieldDefinition {
  type: TypeExpression;
  readonly?: boolean;
}

export interface MethodDefinition {
  returns?: TypeExpression;
  parameters?: readonly TypeExpression[];
}

export type FieldMap = Record<string, TypeExpression | FieldDefinition>;
export type MethodMap = Record<string, MethodDefinition>;

/**
 * Declarative description of a type. Type variables are written with
 * `typeVariable('T')` and are bound to the defined type by name.
 *
 * @example
 * registry.define({
 *   name: 'Box',
 *   ctor: Box,
 *   typeParameters: ['T'],
 *   fields: { items: parameterized(Types.LIST, [typeVariable('T')]) },
 * });
 */
export interface TypeDefinition {
  name: string;
  ctor?: Constructor;
  isInterface?: boolean;
  typeParameters?: ReadonlyArray<string | TypeParameterDefinition>;
  superclass?: ClassOrParameterized;
  interfaces?: readonly ClassOrParameterized[];
  /** A function form receives the descriptor being defined, for self-referencing members */
  fields?: FieldMap | ((self: TypeDescriptor) => FieldMap);
  methods?: MethodMap | ((self: TypeDescriptor) => MethodMap);
  defaultConstructible?: boolean;
}

export interface DescribeOptions {
  /** Return type of methods that declare none */
  voidType: TypeExpression;
  /** Superclass used when the definition names none */
  defaultSuperclass?: ClassOrParameterized;
  componentType?: TypeDescriptor;
  top?: boolean;
}

/**
 * Builds a descriptor from a definition, binding every type variable it
 * mentions to the variables the definition declares.
 */
export function describeType(definition: TypeDefinition, options: DescribeOptions): TypeDescriptor {
  return new TypeDescriptor(definition.name, (self) => {
    const variables: TypeVariable[] = [];
    const pendingBounds: Array<[TypeExpression[], readonly TypeExpression[]]> = [];

    for (const parameter of definition.typeParameters ?? []) {
      const declared = typeof parameter === 'string' ? { name: parameter } : parameter;
      const bounds: TypeExpression[] = [];
      variables.push({
        kind: 'typeVariable',
        name: declared.name,
        bounds,
        genericDeclaration: self,
      });
      pendingBounds.push([bounds, declared.bounds ?? []]);
    }

    const bind = (type: TypeExpression): TypeExpression =>
      bindTypeVariables(type, self, variables);

    // Bounds may mention the variables themselves (T extends Comparable<T>)
    for (const [target, declared] of pendingBounds) {
      target.push(...declared.map(bind));
    }

    const superclass = definition.superclass ?? options.defaultSuperclass;
    const fieldMap =
      typeof definition.fields === 'function' ? definition.fields(self) : definition.fields ?? {};
    const methodMap =
      typeof definition.methods === 'function'
        ? definition.methods(self)
        : definition.methods ?? {};

    const fields = Object.entries(fieldMap).map(([name, member]): FieldDeclaration => {
      const field: FieldDefinition = isFieldDefinition(member) ? member : { type: member };
      return {
        kind: 'field',
        name,
        type: bind(field.type),
        declaringType: self,
        readonly: field.readonly ?? false,
      };
    });

    const methods = Object.entries(methodMap).map(([name, member]): MethodDeclaration => ({
      kind: 'method',
      name,
      returnType: bind(member.returns ?? options.voidType),
      parameterTypes: (member.parameters ?? []).map((parameter) => bind(parameter)),
      declaringType: self,
    }));

    return {
      ctor: definition.ctor,
      isInterface: definition.isInterface,
      typeParameters: variables,
      superclass: superclass === undefined ? undefined : bindEdge(superclass, self, variables),
      interfaces: (definition.interfaces ?? []).map((edge) => bindEdge(edge, self, variables)),
      componentType: options.componentType,
      fields,
      methods,
      defaultConstructible: definition.defaultConstructible,
      top: options.top,
    };
  });
}

function isFieldDefinition(member: TypeExpression | FieldDefinition): member is FieldDefinition {
  return !('kind' in member);
}

function bindEdge(
  edge: ClassOrParameterized,
  owner: TypeDescriptor,
  variables: readonly TypeVariable[],
): ClassOrParameterized {
  if (edge.kind === 'class') {
    return edge;
  }
  return {
    ...edge,
    typeArguments: edge.typeArguments.map((arg) => bindTypeVariables(arg, owner, variables)),
  };
}

/**
 * Replaces unbound type variables with the owner's declared variables of the same name
 */
function bindTypeVariables(
  type: TypeExpression,
  owner: TypeDescriptor,
  variables: readonly TypeVariable[],
): TypeExpression {
  switch (type.kind) {
    case 'class':
      return type;
    case 'typeVariable': {
      if (type.genericDeclaration !== undefined) {
        return type;
      }
      const declared = variables.find((variable) => variable.name === type.name);
      if (!declared) {
        throw new ReflectionError(
          `Type variable '${type.name}' is not declared by '${owner.name}'`,
          ErrorCode.UNKNOWN_TYPE,
          { type: owner.name, variable: type.name },
        );
      }
      return declared;
    }
    case 'parameterized':
      return {
        ...type,
        typeArguments: type.typeArguments.map((arg) => bindTypeVariables(arg, owner, variables)),
      };
    case 'wildcard':
      return {
        kind: 'wildcard',
        upperBounds: type.upperBounds.map((bound) => bindTypeVariables(bound, owner, variables)),
        lowerBounds: type.lowerBounds.map((bound) => bindTypeVariables(bound, owner, variables)),
      };
    case 'genericArray':
      return {
        kind: 'genericArray',
        componentType: bindTypeVariables(type.componentType, owner, variables),
      };
  }
}
