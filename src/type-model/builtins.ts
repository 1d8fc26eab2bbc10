import { describeType, TypeDefinition } from './definition';
import { TypeDescriptor } from './type-descriptor';
import { parameterized, TypeExpression, typeVariable } from './type-expression';

const VOID = new TypeDescriptor('void', () => ({}));

const OBJECT = describeType(
  { name: 'Object', ctor: Object, defaultConstructible: true },
  { voidType: VOID, top: true },
);

function builtin(definition: TypeDefinition): TypeDescriptor {
  return describeType(definition, {
    voidType: VOID,
    defaultSuperclass: definition.isInterface ? undefined : OBJECT,
  });
}

const ITERABLE = builtin({ name: 'Iterable', isInterface: true, typeParameters: ['T'] });

const COLLECTION = builtin({
  name: 'Collection',
  isInterface: true,
  typeParameters: ['E'],
  interfaces: [parameterized(ITERABLE, [typeVariable('E')])],
});

const LIST = builtin({
  name: 'List',
  isInterface: true,
  typeParameters: ['E'],
  interfaces: [parameterized(COLLECTION, [typeVariable('E')])],
});

/**
 * Descriptors for the types every registry knows about
 */
export const Types = {
  VOID,
  OBJECT,
  STRING: builtin({ name: 'String', ctor: String, defaultConstructible: false }),
  NUMBER: builtin({ name: 'Number', ctor: Number, defaultConstructible: false }),
  BOOLEAN: builtin({ name: 'Boolean', ctor: Boolean, defaultConstructible: false }),
  BIGINT: builtin({ name: 'BigInt', defaultConstructible: false }),
  SYMBOL: builtin({ name: 'Symbol', defaultConstructible: false }),
  FUNCTION: builtin({ name: 'Function', ctor: Function, defaultConstructible: false }),
  DATE: builtin({ name: 'Date', ctor: Date, defaultConstructible: true }),
  ITERABLE,
  COLLECTION,
  LIST,
  ARRAY: builtin({
    name: 'Array',
    ctor: Array,
    typeParameters: ['E'],
    interfaces: [parameterized(LIST, [typeVariable('E')])],
    defaultConstructible: true,
  }),
  SET: builtin({
    name: 'Set',
    ctor: Set,
    typeParameters: ['E'],
    interfaces: [parameterized(COLLECTION, [typeVariable('E')])],
    defaultConstructible: true,
  }),
  MAP: builtin({
    name: 'Map',
    ctor: Map,
    typeParameters: ['K', 'V'],
    defaultConstructible: true,
  }),
} as const;

/**
 * Types that map onto JS primitives rather than objects
 */
export const PRIMITIVE_TYPES: ReadonlySet<TypeDescriptor> = new Set([
  Types.STRING,
  Types.NUMBER,
  Types.BOOLEAN,
  Types.BIGINT,
  Types.SYMBOL,
]);

const arrayTypes = new Map<TypeDescriptor, TypeDescriptor>();

/**
 * The concrete array type whose elements are `component`, e.g. `String[]`
 */
export function arrayOf(component: TypeDescriptor): TypeDescriptor {
  let arrayType = arrayTypes.get(component);
  if (!arrayType) {
    arrayType = describeType(
      {
        name: `${component.name}[]`,
        ctor: Array,
        superclass: parameterized(Types.ARRAY, [component]),
        defaultConstructible: true,
      },
      { voidType: VOID, componentType: component },
    );
    arrayTypes.set(component, arrayType);
  }
  return arrayType;
}

/**
 * Erases a type expression to the concrete type a value of it would have
 */
export function rawTypeOf(type: TypeExpression): TypeDescriptor {
  switch (type.kind) {
    case 'class':
      return type;
    case 'parameterized':
      return type.rawType;
    case 'genericArray':
      return arrayOf(rawTypeOf(type.componentType));
    default:
      return Types.OBJECT;
  }
}
