import { PropertyParser } from '../property-parser';

describe('PropertyParser', () => {
  const variables = { host: 'db.internal', port: 5432, 'name:alias': 'aliased' };

  it('substitutes known variables', () => {
    expect(PropertyParser.parse('${host}:${port}', variables)).toBe('db.internal:5432');
  });

  it('leaves unknown placeholders as written', () => {
    expect(PropertyParser.parse('${user}@${host}', variables)).toBe('${user}@db.internal');
    expect(PropertyParser.parse('${host}')).toBe('${host}');
  });

  it('ignores defaults unless enabled', () => {
    expect(PropertyParser.parse('${user:admin}', variables)).toBe('${user:admin}');
    expect(PropertyParser.parse('${name:alias}', variables)).toBe('aliased');
  });

  it('falls back to defaults when enabled', () => {
    const options = { enableDefaultValue: true };
    expect(PropertyParser.parse('${user:admin}', variables, options)).toBe('admin');
    expect(PropertyParser.parse('${host:localhost}', variables, options)).toBe('db.internal');
    expect(PropertyParser.parse('${user:}', variables, options)).toBe('');
  });

  it('splits on a custom separator', () => {
    const options = { enableDefaultValue: true, defaultValueSeparator: '?:' };
    expect(PropertyParser.parse('${user?:admin}', variables, options)).toBe('admin');
    expect(PropertyParser.parse('${host?:x}', variables, options)).toBe('db.internal');
  });
});
