import { InvalidTypeContextError } from '../../errors';
import {
  arrayOf,
  FieldDeclaration,
  genericArray,
  MethodDeclaration,
  parameterized,
  TypeDescriptor,
  TypeExpression,
  TypeRegistry,
  Types,
  typeToString,
  typeVariable,
  wildcard,
} from '../../type-model';
import { TypeParameterResolver } from '../resolver';

function fieldOf(type: TypeDescriptor, name: string): FieldDeclaration {
  const field = type.getDeclaredField(name);
  if (!field) {
    throw new Error(`${type.name} declares no field ${name}`);
  }
  return field;
}

function methodOf(type: TypeDescriptor, name: string): MethodDeclaration {
  const method = type.getDeclaredMethods().find((candidate) => candidate.name === name);
  if (!method) {
    throw new Error(`${type.name} declares no method ${name}`);
  }
  return method;
}

describe('TypeParameterResolver', () => {
  let registry: TypeRegistry;

  beforeEach(() => {
    registry = new TypeRegistry();
  });

  describe('pairs', () => {
    let pair: TypeDescriptor;
    let intPair: TypeDescriptor;

    beforeEach(() => {
      pair = registry.define({
        name: 'Pair',
        typeParameters: ['K', 'V'],
        fields: { left: typeVariable('K'), right: typeVariable('V') },
      });
      intPair = registry.define({
        name: 'IntPair',
        superclass: parameterized(pair, [Types.NUMBER, Types.NUMBER]),
      });
    });

    it('resolves an inherited field against the subclass that fixes it', () => {
      expect(TypeParameterResolver.resolveFieldType(fieldOf(pair, 'left'), intPair)).toBe(
        Types.NUMBER,
      );
      expect(TypeParameterResolver.resolveFieldType(fieldOf(pair, 'right'), intPair)).toBe(
        Types.NUMBER,
      );
    });

    it('falls back to the top type against the bare declaring type', () => {
      expect(TypeParameterResolver.resolveFieldType(fieldOf(pair, 'left'), pair)).toBe(
        Types.OBJECT,
      );
    });

    it('reads arguments of a parameterized declaring type directly', () => {
      const context = parameterized(pair, [Types.STRING, Types.DATE]);
      expect(TypeParameterResolver.resolveFieldType(fieldOf(pair, 'left'), context)).toBe(
        Types.STRING,
      );
      expect(TypeParameterResolver.resolveFieldType(fieldOf(pair, 'right'), context)).toBe(
        Types.DATE,
      );
    });
  });

  describe('shared parameterization', () => {
    let base: TypeDescriptor;
    let sub: TypeDescriptor;

    beforeEach(() => {
      base = registry.define({
        name: 'Base',
        typeParameters: ['K', 'V'],
        fields: {
          key: typeVariable('K'),
          value: typeVariable('V'),
          map: parameterized(Types.MAP, [typeVariable('K'), typeVariable('V')]),
        },
      });
      sub = registry.define({
        name: 'Sub',
        typeParameters: [{ name: 'T', bounds: [Types.NUMBER] }],
        superclass: parameterized(base, [typeVariable('T'), typeVariable('T')]),
      });
    });

    it('resolves both variables to the single subclass argument', () => {
      const context = parameterized(sub, [Types.STRING]);
      expect(TypeParameterResolver.resolveFieldType(fieldOf(base, 'key'), context)).toBe(
        Types.STRING,
      );
      expect(TypeParameterResolver.resolveFieldType(fieldOf(base, 'value'), context)).toBe(
        Types.STRING,
      );
    });

    it('rebuilds parameterized member types with resolved arguments', () => {
      const resolved = TypeParameterResolver.resolveFieldType(
        fieldOf(base, 'map'),
        parameterized(sub, [Types.STRING]),
      );
      expect(typeToString(resolved)).toBe('Map<String, String>');
      expect(resolved.kind === 'parameterized' && resolved.rawType).toBe(Types.MAP);
    });

    it('erases variables a raw subclass context leaves unbound to their bound', () => {
      expect(TypeParameterResolver.resolveFieldType(fieldOf(base, 'key'), sub)).toBe(
        Types.NUMBER,
      );
    });
  });

  describe('inheritance chains', () => {
    let base: TypeDescriptor;

    beforeEach(() => {
      base = registry.define({
        name: 'Level0',
        typeParameters: ['T'],
        fields: { value: typeVariable('T') },
      });
    });

    function chain(length: number): TypeDescriptor {
      let current = base;
      for (let i = 1; i <= length; i++) {
        current = registry.define({
          name: `Level${i}`,
          typeParameters: ['T'],
          superclass: parameterized(current, [typeVariable('T')]),
        });
      }
      return current;
    }

    it.each([1, 2, 3, 5, 8])('resolves through %i re-parameterizing subclasses', (length) => {
      const leaf = chain(length);
      const resolved = TypeParameterResolver.resolveFieldType(
        fieldOf(base, 'value'),
        parameterized(leaf, [Types.STRING]),
      );
      expect(resolved).toBe(Types.STRING);
    });

    it('resolves a concrete leaf that fixes the variable', () => {
      const top = chain(3);
      const leaf = registry.define({
        name: 'Leaf',
        superclass: parameterized(top, [Types.BOOLEAN]),
      });
      expect(TypeParameterResolver.resolveFieldType(fieldOf(base, 'value'), leaf)).toBe(
        Types.BOOLEAN,
      );
    });

    it('walks through a bare superclass edge', () => {
      const stringBase = registry.define({
        name: 'StringBase',
        superclass: parameterized(base, [Types.STRING]),
      });
      const leaf = registry.define({ name: 'Leaf', superclass: stringBase });
      expect(TypeParameterResolver.resolveFieldType(fieldOf(base, 'value'), leaf)).toBe(
        Types.STRING,
      );
    });

    it('falls back to the top type past the depth limit', () => {
      const leaf = chain(3);
      const field = fieldOf(base, 'value');
      expect(
        TypeParameterResolver.resolveType(field.type, parameterized(leaf, [Types.STRING]), base, 1),
      ).toBe(Types.OBJECT);
    });
  });

  describe('interfaces', () => {
    it('uses the first interface that binds the variable', () => {
      const supplier = registry.define({
        name: 'Supplier',
        isInterface: true,
        typeParameters: ['T'],
        methods: { getValue: { returns: typeVariable('T') } },
      });
      const first = registry.define({
        name: 'First',
        isInterface: true,
        typeParameters: ['T'],
        interfaces: [parameterized(supplier, [typeVariable('T')])],
      });
      const second = registry.define({
        name: 'Second',
        isInterface: true,
        typeParameters: ['T'],
        interfaces: [parameterized(supplier, [typeVariable('T')])],
      });
      const both = registry.define({
        name: 'Both',
        interfaces: [parameterized(first, [Types.STRING]), parameterized(second, [Types.NUMBER])],
      });

      const getValue = methodOf(supplier, 'getValue');
      expect(TypeParameterResolver.resolveReturnType(getValue, both)).toBe(Types.STRING);
    });

    it('resolves the element type of built-in collections', () => {
      const [element] = Types.COLLECTION.getTypeParameters();
      expect(
        TypeParameterResolver.resolveType(
          element,
          parameterized(Types.ARRAY, [Types.STRING]),
          Types.COLLECTION,
        ),
      ).toBe(Types.STRING);
      expect(TypeParameterResolver.resolveType(element, Types.ARRAY, Types.COLLECTION)).toBe(
        Types.OBJECT,
      );
    });
  });

  describe('nested expressions', () => {
    let holder: TypeDescriptor;

    beforeEach(() => {
      holder = registry.define({
        name: 'Holder',
        typeParameters: ['T'],
        fields: {
          producers: parameterized(Types.LIST, [wildcard({ upper: [typeVariable('T')] })]),
          consumers: parameterized(Types.LIST, [wildcard({ lower: [typeVariable('T')] })]),
          array: genericArray(typeVariable('T')),
        },
        methods: {
          setValue: { parameters: [typeVariable('T'), Types.NUMBER] },
        },
      });
    });

    it('resolves wildcard bounds in place', () => {
      const context = parameterized(holder, [Types.STRING]);
      expect(
        typeToString(TypeParameterResolver.resolveFieldType(fieldOf(holder, 'producers'), context)),
      ).toBe('List<? extends String>');
      expect(
        typeToString(TypeParameterResolver.resolveFieldType(fieldOf(holder, 'consumers'), context)),
      ).toBe('List<? super String>');
    });

    it('turns a generic array with a concrete component into a concrete array', () => {
      expect(
        TypeParameterResolver.resolveFieldType(
          fieldOf(holder, 'array'),
          parameterized(holder, [Types.STRING]),
        ),
      ).toBe(arrayOf(Types.STRING));
      expect(TypeParameterResolver.resolveFieldType(fieldOf(holder, 'array'), holder)).toBe(
        arrayOf(Types.OBJECT),
      );
    });

    it('resolves every method parameter', () => {
      const stringHolder = registry.define({
        name: 'StringHolder',
        superclass: parameterized(holder, [Types.STRING]),
      });
      expect(
        TypeParameterResolver.resolveParamTypes(methodOf(holder, 'setValue'), stringHolder),
      ).toEqual([Types.STRING, Types.NUMBER]);
    });
  });

  describe('ground types', () => {
    const grounds: Array<[string, TypeExpression]> = [
      ['a concrete type', Types.STRING],
      ['a parameterized type', parameterized(Types.MAP, [Types.STRING, Types.NUMBER])],
      ['a wildcard', parameterized(Types.LIST, [wildcard({ upper: [Types.NUMBER] })])],
      ['an array', arrayOf(Types.DATE)],
      ['a generic array of a ground type', genericArray(parameterized(Types.LIST, [Types.STRING]))],
    ];

    it.each(grounds)('leaves %s unchanged', (_label, type) => {
      const context = registry.define({ name: 'Context', typeParameters: ['T'] });
      expect(TypeParameterResolver.resolveType(type, context, Types.OBJECT)).toEqual(type);
      expect(
        TypeParameterResolver.resolveType(type, parameterized(context, [Types.BOOLEAN]), context),
      ).toEqual(type);
    });
  });

  describe('bounded variables', () => {
    it('falls back to the first of several bounds against the raw declaring type', () => {
      const holder = registry.define({
        name: 'Holder',
        typeParameters: [{ name: 'T', bounds: [Types.DATE, Types.ITERABLE] }],
        fields: { value: typeVariable('T') },
      });
      expect(TypeParameterResolver.resolveFieldType(fieldOf(holder, 'value'), holder)).toBe(
        Types.DATE,
      );
    });
  });

  describe('invalid contexts', () => {
    it('rejects a type variable as the instantiation context', () => {
      const box = registry.define({
        name: 'Box',
        typeParameters: ['T'],
        fields: { value: typeVariable('T') },
      });
      expect(() =>
        TypeParameterResolver.resolveFieldType(fieldOf(box, 'value'), typeVariable('T')),
      ).toThrow(InvalidTypeContextError);
      expect(() =>
        TypeParameterResolver.resolveFieldType(fieldOf(box, 'value'), wildcard()),
      ).toThrow('The instantiation context must be a concrete or parameterized type, but was: ?');
    });
  });
});
