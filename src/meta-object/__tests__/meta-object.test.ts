import {
  Address,
  Box,
  createNavigator,
  Customer,
  defineFixtureTypes,
  FixtureTypes,
  LineItem,
  Order,
} from '../../__tests__/test-utils';
import {
  ErrorCode,
  IndexOutOfRangeError,
  ReflectionError,
  UnsupportedOperationError,
} from '../../errors';
import { PropertyTokenizer } from '../../property';
import {
  parameterized,
  TypeDescriptor,
  TypeExpression,
  TypeRegistry,
  Types,
} from '../../type-model';
import { TestLogger } from '../../util/logger';
import { MapWrapper, ObjectWrapper, ObjectWrapperFactory } from '../../wrapper';
import { MetaObject } from '../meta-object';

class Volatile {
  get explode(): string {
    throw new Error('boom');
  }
}

class Settings {
  readonly values: Record<string, unknown> = { theme: 'light' };
}

/**
 * Wrapper written against the contract alone, exposing a single fixed entry
 */
class FixedEntryWrapper implements ObjectWrapper {
  value: unknown = 'fixed';

  get(prop: PropertyTokenizer): unknown {
    return prop.name === 'x' ? this.value : undefined;
  }

  set(prop: PropertyTokenizer, value: unknown): void {
    if (prop.name === 'x') {
      this.value = value;
    }
  }

  findProperty(name: string): string | undefined {
    return name === 'x' ? name : undefined;
  }

  getGetterNames(): string[] {
    return ['x'];
  }

  getSetterNames(): string[] {
    return ['x'];
  }

  getSetterType(): TypeDescriptor {
    return Types.STRING;
  }

  getGetterType(): TypeDescriptor {
    return Types.STRING;
  }

  resolvePropertyType(): TypeExpression | undefined {
    return undefined;
  }

  hasSetter(name: string): boolean {
    return name === 'x';
  }

  hasGetter(name: string): boolean {
    return name === 'x';
  }

  instantiatePropertyValue(): MetaObject {
    throw new UnsupportedOperationError('Fixed entries cannot be created', 'instantiate');
  }

  isCollection(): boolean {
    return false;
  }

  add(): void {}

  addAll(): void {}
}

function thrownBy(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the action to throw');
}

describe('MetaObject', () => {
  let registry: TypeRegistry;
  let types: FixtureTypes;
  let forObject: (object: unknown, type?: TypeExpression) => MetaObject;

  beforeEach(() => {
    registry = new TypeRegistry();
    types = defineFixtureTypes(registry);
    forObject = createNavigator(registry);
  });

  describe('beans', () => {
    it('reads and writes nested properties', () => {
      const order = new Order();
      order.customer = new Customer();
      const meta = forObject(order);

      meta.setValue('customer.name', 'Ada');

      expect(order.customer.name).toBe('Ada');
      expect(meta.getValue('customer.name')).toBe('Ada');
    });

    it('reads back what it wrote through beans, maps and arrays', () => {
      const order = new Order();
      order.items = [new LineItem()];
      const root = { order };
      const meta = forObject(root);

      meta.setValue('order.items[0].price', 12.5);
      meta.setValue('order.tags[color]', 'red');

      expect(meta.getValue('order.items[0].price')).toBe(12.5);
      expect(meta.getValue('order.tags[color]')).toBe('red');
      expect(order.tags.get('color')).toBe('red');
    });

    it('leaves absent intermediates alone when setting an absent value', () => {
      const order = new Order();
      const meta = forObject(order);

      meta.setValue('customer.address.city', null);
      meta.setValue('customer.name', undefined);

      expect(order.customer).toBeNull();
      expect(meta.getValue('customer.address.city')).toBeUndefined();
    });

    it('creates absent intermediates from their declared types', () => {
      const order = new Order();
      const logger = new TestLogger('Test');
      const meta = createNavigator(registry, { logger })(order);

      meta.setValue('customer.address.city', 'Paris');

      expect(order.customer).toBeInstanceOf(Customer);
      expect(order.customer?.address).toBeInstanceOf(Address);
      expect(order.customer?.address?.city).toBe('Paris');
      expect(logger.getLogs()).toEqual([
        {
          level: 'debug',
          message: 'Instantiating absent property',
          data: { property: 'customer', path: 'customer.address.city' },
        },
        {
          level: 'debug',
          message: 'Instantiating absent property',
          data: { property: 'address', path: 'address.city' },
        },
      ]);
    });

    it('creates absent elements from the element type', () => {
      const order = new Order();
      order.items = [];
      Reflect.set(order.items, 0, null);
      const meta = forObject(order);

      meta.setValue('items[0].sku', 'A-1');

      expect(order.items[0]).toBeInstanceOf(LineItem);
      expect(order.items[0].sku).toBe('A-1');
    });

    it('reports types through runtime values and declarations', () => {
      const order = new Order();
      const meta = forObject(order);

      expect(meta.getGetterType('customer.address.city')).toBe(Types.STRING);
      expect(meta.getSetterType('customer')).toBe(types.customer);
      expect(meta.getGetterType('items[0]')).toBe(types.lineItem);

      order.customer = new Customer();
      expect(meta.getGetterType('customer.name')).toBe(Types.STRING);
    });

    it('checks getters and setters along a path', () => {
      const order = new Order();
      const meta = forObject(order);

      expect(meta.hasGetter('customer.address.city')).toBe(true);
      expect(meta.hasSetter('customer.address.city')).toBe(true);
      expect(meta.hasGetter('customer.zip')).toBe(false);
      expect(meta.hasGetter('missing.name')).toBe(false);

      order.customer = new Customer();
      expect(meta.hasGetter('customer.name')).toBe(true);
      expect(meta.hasGetter('customer.zip')).toBe(false);
    });

    it('exposes names and canonical paths', () => {
      const meta = forObject(new Order());
      expect(meta.getGetterNames()).toEqual(['customer', 'customerId', 'items', 'scores', 'tags']);
      expect(meta.getSetterNames()).toEqual(['customer', 'customerId', 'items', 'scores', 'tags']);
      expect(meta.findProperty('CUSTOMER.NAME')).toBe('customer.name');
      expect(meta.findProperty('customer_id', true)).toBe('customerId');
      expect(meta.isCollection()).toBe(false);
    });

    it('fails for unknown properties', () => {
      const error = thrownBy(() => forObject(new Order()).getValue('missing'));
      expect(error).toBeInstanceOf(ReflectionError);
      expect(error).toMatchObject({ code: ErrorCode.NO_SUCH_PROPERTY });
    });

    it('wraps failures of the underlying accessor', () => {
      const error = thrownBy(() => forObject(new Volatile()).getValue('explode'));
      expect(error).toMatchObject({
        code: ErrorCode.PROPERTY_ACCESS_FAILED,
        message: "Could not get property 'explode' from Volatile. Cause: boom",
        cause: new Error('boom'),
      });
    });

    it('refuses to index into a value that is not a collection', () => {
      const customer = new Customer();
      customer.name = 'Ada';
      const error = thrownBy(() => forObject(customer).getValue('name[0]'));
      expect(error).toMatchObject({
        code: ErrorCode.NOT_A_COLLECTION,
        message: "Cannot index 'name[0]': 'name' is not an array, Map or plain object (found string)",
      });
    });

    it('refuses collection operations', () => {
      const meta = forObject(new Order());
      expect(() => meta.add(1)).toThrow(UnsupportedOperationError);
      expect(() => meta.addAll([1])).toThrow(UnsupportedOperationError);
    });
  });

  describe('generic containers', () => {
    it('resolves element types against the instantiation context', () => {
      const box = new Box<string>();
      box.items = ['x'];
      const meta = forObject(box, parameterized(types.box, [Types.STRING]));

      expect(meta.getValue('items[0]')).toBe('x');
      expect(meta.getGetterType('items[0]')).toBe(Types.STRING);
      expect(forObject(box).getGetterType('items[0]')).toBe(Types.OBJECT);
    });

    it('raises out of range for an empty backing list', () => {
      const meta = forObject(new Box<string>(), parameterized(types.box, [Types.STRING]));
      expect(() => meta.getValue('items[0]')).toThrow(IndexOutOfRangeError);
      expect(() => meta.getValue('items[0]')).toThrow('Index 0 out of bounds for length 0');
    });

    it('passes element types on to child navigators', () => {
      const box = new Box<LineItem>();
      box.items = [new LineItem()];
      const meta = forObject(box, parameterized(types.box, [types.lineItem]));

      const element = meta.metaObjectForProperty('items[0]');
      expect(element.getType()).toBe(types.lineItem);
      expect(meta.getGetterType('items[0].price')).toBe(Types.NUMBER);
    });

    it('ignores a context that does not describe the runtime value', () => {
      const meta = forObject(new Order(), parameterized(types.box, [Types.STRING]));
      expect(meta.getGetterType('customerId')).toBe(Types.NUMBER);
    });
  });

  describe('maps', () => {
    it('uses the indexed name as the key', () => {
      const map = new Map<string, unknown>([['a', 1]]);
      const meta = forObject(map);

      meta.setValue('b[0]', 2);

      expect(meta.getValue('a')).toBe(1);
      expect(map.get('b[0]')).toBe(2);
      expect(meta.getValue('b[0]')).toBe(2);
      expect(meta.getGetterNames()).toEqual(['a', 'b[0]']);
    });

    it('introspects entries by their values', () => {
      const meta = forObject(new Map<string, unknown>([['a', 1]]));

      expect(meta.getGetterType('a')).toBe(Types.NUMBER);
      expect(meta.getSetterType('b[0]')).toBe(Types.OBJECT);
      expect(meta.getGetterType('missing')).toBe(Types.OBJECT);
      expect(meta.hasGetter('a')).toBe(true);
      expect(meta.hasGetter('z')).toBe(false);
      expect(meta.hasSetter('z')).toBe(true);
      expect(meta.findProperty('anyName')).toBe('anyName');
      expect(meta.isCollection()).toBe(false);
      expect(() => meta.add('x')).toThrow(UnsupportedOperationError);
    });

    it('navigates plain objects as maps', () => {
      const root: Record<string, unknown> = { name: 'report' };
      const meta = forObject(root);

      meta.setValue('settings.theme', 'dark');

      expect(meta.getValue('name')).toBe('report');
      expect(root).toEqual({ name: 'report', settings: { theme: 'dark' } });
      expect(meta.getGetterType('settings.theme')).toBe(Types.STRING);
    });

    it('creates absent entries in the container shape', () => {
      const map = new Map<string, unknown>();
      forObject(map).setValue('inner.x', 1);
      expect(map.get('inner')).toEqual(new Map([['x', 1]]));
    });

    it('creates absent entries from a declared value type', () => {
      const map = new Map<string, unknown>();
      const meta = forObject(map, parameterized(Types.MAP, [Types.STRING, types.address]));

      meta.setValue('home.city', 'Oslo');

      expect(map.get('home')).toBeInstanceOf(Address);
      expect(meta.getValue('home.city')).toBe('Oslo');
      expect(meta.getGetterType('home.city')).toBe(Types.STRING);
    });
  });

  describe('arrays', () => {
    it('addresses elements by position', () => {
      const list = ['a', 'b'];
      const meta = forObject(list);

      meta.setValue('[0]', 'z');

      expect(meta.getValue('[1]')).toBe('b');
      expect(meta.getValue('0')).toBe('z');
      expect(list).toEqual(['z', 'b']);
    });

    it('raises out of range for missing or malformed positions', () => {
      const meta = forObject(['a']);
      expect(() => meta.getValue('[5]')).toThrow(IndexOutOfRangeError);
      expect(() => meta.getValue('[x]')).toThrow(IndexOutOfRangeError);
      expect(() => meta.setValue('[1]', 'b')).toThrow(IndexOutOfRangeError);
    });

    it('adds elements', () => {
      const list: unknown[] = [];
      const meta = forObject(list);

      meta.add('a');
      meta.addAll(['b', 'c']);

      expect(meta.isCollection()).toBe(true);
      expect(list).toEqual(['a', 'b', 'c']);
    });

    it('navigates into elements', () => {
      const item = new LineItem();
      item.sku = 'A-1';
      const meta = forObject([item], parameterized(Types.LIST, [types.lineItem]));

      expect(meta.getValue('[0].sku')).toBe('A-1');
      expect(meta.getGetterType('[0].price')).toBe(Types.NUMBER);
      expect(meta.metaObjectForProperty('[0]').getType()).toBe(types.lineItem);
    });

    it('answers getter and setter checks by range', () => {
      const meta = forObject([new LineItem()]);
      expect(meta.hasGetter('[0]')).toBe(true);
      expect(meta.hasGetter('[0].sku')).toBe(true);
      expect(meta.hasGetter('[0].zip')).toBe(false);
      expect(meta.hasSetter('[1]')).toBe(false);
      expect(meta.getGetterType('[0]')).toBe(Types.OBJECT);
    });

    it('has no named properties', () => {
      const meta = forObject([]);
      expect(() => meta.getGetterNames()).toThrow(UnsupportedOperationError);
      expect(() => meta.getSetterNames()).toThrow(UnsupportedOperationError);
      expect(() => meta.findProperty('a')).toThrow(UnsupportedOperationError);
    });

    it('does not create absent elements', () => {
      const meta = forObject([null]);
      expect(() => meta.setValue('[0].sku', 'A-1')).toThrow(UnsupportedOperationError);
    });
  });

  describe('wrapper selection', () => {
    it('lets a wrapper factory claim objects first', () => {
      const objectWrapperFactory: ObjectWrapperFactory = {
        hasWrapperFor: (object) => object instanceof Settings,
        getWrapperFor: (metaObject, object): ObjectWrapper => {
          if (!(object instanceof Settings)) {
            throw new Error('Only settings are wrapped');
          }
          return new MapWrapper(metaObject, object.values);
        },
      };
      const settings = new Settings();
      const meta = createNavigator(registry, { objectWrapperFactory })(settings);

      meta.setValue('fontSize', 14);

      expect(meta.getValue('theme')).toBe('light');
      expect(settings.values).toEqual({ theme: 'light', fontSize: 14 });
      expect(meta.getObjectWrapper()).toBeInstanceOf(MapWrapper);
    });

    it('uses an object that is already a wrapper as its own wrapper', () => {
      const wrapper = forObject({ a: 1 }).getObjectWrapper();
      const meta = forObject(wrapper);
      expect(meta.getObjectWrapper()).toBe(wrapper);
      expect(meta.getValue('a')).toBe(1);
    });

    it('uses any object implementing the wrapper contract as its own wrapper', () => {
      const wrapper = new FixedEntryWrapper();
      const meta = forObject(wrapper);

      meta.setValue('x', 'changed');

      expect(meta.getObjectWrapper()).toBe(wrapper);
      expect(meta.getValue('x')).toBe('changed');
      expect(wrapper.value).toBe('changed');
      expect(meta.getGetterNames()).toEqual(['x']);
    });

    it('shares one navigator for absent values', () => {
      const meta = forObject(null);
      expect(meta).toBe(MetaObject.NULL_META_OBJECT);
      expect(forObject(undefined)).toBe(meta);
      expect(meta.isNull()).toBe(true);
      expect(forObject({}).isNull()).toBe(false);
    });

    it('keeps its collaborators', () => {
      const order = new Order();
      const meta = forObject(order);
      expect(meta.getOriginalObject()).toBe(order);
      expect(meta.getReflectorFactory().getTypeRegistry()).toBe(registry);
      expect(meta.metaObjectForProperty('tags').getObjectFactory()).toBe(meta.getObjectFactory());
      expect(meta.metaObjectForProperty('tags').getObjectWrapperFactory()).toBe(
        meta.getObjectWrapperFactory(),
      );
    });
  });
});
