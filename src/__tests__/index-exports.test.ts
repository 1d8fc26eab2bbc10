import * as library from '..';
import * as reflection from '../reflection';
import * as wrapper from '../wrapper';
import { NoLogger, noLogger } from '../util/logger';

describe('index module re-exports', () => {
  it('exposes the navigation entry points', () => {
    expect(library.SystemMetaObject.forObject({ a: 1 }).getValue('a')).toBe(1);
    expect(library.MetaObject).toBeDefined();
    expect(library.TypeParameterResolver).toBeDefined();
    expect(library.PropertyTokenizer).toBeDefined();
  });

  it('exposes reflection exports', () => {
    expect(reflection.Reflector).toBeDefined();
    expect(reflection.MetaClass).toBeDefined();
    expect(reflection.DefaultReflectorFactory).toBeDefined();
  });

  it('exposes wrapper exports', () => {
    expect(wrapper.BeanWrapper).toBeDefined();
    expect(wrapper.MapWrapper).toBeDefined();
    expect(wrapper.CollectionWrapper).toBeDefined();
  });

  it('exposes configuration defaults', () => {
    expect(library.DEFAULT_MAX_RESOLUTION_DEPTH).toBe(64);
    expect(library.DEFAULT_OPEN_TOKEN).toBe('${');
  });

  it('exposes logger re-exports', () => {
    expect(NoLogger.getInstance()).toBe(noLogger);
    expect(library.noLogger).toBe(noLogger);
  });
});
