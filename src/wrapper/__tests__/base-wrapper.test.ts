import { ErrorCode, IndexOutOfRangeError } from '../../errors';
import { isPlainObject, parseIndex } from '../base-wrapper';
import { DefaultObjectWrapperFactory } from '../object-wrapper-factory';

describe('parseIndex', () => {
  it('accepts positions inside the sequence', () => {
    expect(parseIndex('0', 1)).toBe(0);
    expect(parseIndex('12', 13)).toBe(12);
  });

  it('rejects positions past the end', () => {
    expect(() => parseIndex('3', 3)).toThrow(
      new IndexOutOfRangeError('Index 3 out of bounds for length 3', '3', 3),
    );
  });

  it.each(['-1', 'x', '1.5', ''])('rejects the non-integer index %p', (index) => {
    let error: unknown;
    try {
      parseIndex(index, 10);
    } catch (caught) {
      error = caught;
    }
    expect(error).toBeInstanceOf(IndexOutOfRangeError);
    expect(error).toMatchObject({
      code: ErrorCode.INDEX_OUT_OF_RANGE,
      index,
      length: 10,
    });
  });
});

describe('isPlainObject', () => {
  it('accepts object literals and null-prototype objects', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
  });

  it('rejects everything else', () => {
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(new Map())).toBe(false);
    expect(isPlainObject(new Date())).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject('text')).toBe(false);
  });
});

describe('DefaultObjectWrapperFactory', () => {
  it('never claims an object', () => {
    const factory = new DefaultObjectWrapperFactory();
    expect(factory.hasWrapperFor({})).toBe(false);
    expect(() => factory.getWrapperFor()).toThrow(
      'The DefaultObjectWrapperFactory should never be called to provide an ObjectWrapper',
    );
  });
});
