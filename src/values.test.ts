import { describe, it, expect } from 'vitest';
import {
  Bits,
  Char,
  Composite,
  EncodeAsType,
  Variant,
  classify,
  describeSource,
  err,
  isEncodable,
  isUnit,
  none,
  ok,
  some,
  variant,
} from './values';

describe('classify', () => {
  it('classifies scalars', () => {
    expect(classify(true)).toEqual({ kind: 'bool', value: true });
    expect(classify(5)).toEqual({ kind: 'number', value: 5 });
    expect(classify(5n)).toEqual({ kind: 'number', value: 5n });
    expect(classify('x')).toEqual({ kind: 'str', value: 'x' });
    expect(classify(new Char('x'))).toEqual({ kind: 'char', codePoint: 0x78 });
  });

  it('treats null and undefined as unit', () => {
    expect(isUnit(classify(null))).toBe(true);
    expect(isUnit(classify(undefined))).toBe(true);
    expect(isUnit(classify({}))).toBe(true);
  });

  it('treats arrays and sets as sequences', () => {
    expect(classify([1, 2])).toEqual({ kind: 'sequence', items: [1, 2] });
    expect(classify(new Set([3, 4]))).toEqual({ kind: 'sequence', items: [3, 4] });
  });

  it('keeps byte arrays apart from sequences', () => {
    const bytes = new Uint8Array([1]);
    expect(classify(bytes)).toEqual({ kind: 'bytes', value: bytes });
  });

  it('reads plain records as named fields in key order', () => {
    expect(classify({ b: 1, a: 'x' })).toEqual({
      kind: 'composite',
      fields: [
        { name: 'b', value: 1 },
        { name: 'a', value: 'x' },
      ],
    });
  });

  it('recognises the wrapper classes', () => {
    expect(classify(Composite.unnamed([1])).kind).toBe('composite');
    expect(classify(some(1)).kind).toBe('variant');
    expect(classify(new Bits([true])).kind).toBe('bits');
    expect(classify(new Map([['a', 1]])).kind).toBe('map');
  });

  it('prefers a custom hook over everything else', () => {
    const hook: EncodeAsType = {
      encodeAsTypeTo: () => undefined,
    };
    expect(classify(hook)).toEqual({ kind: 'custom', hook });
  });
});

describe('describeSource', () => {
  it('names each kind', () => {
    expect(describeSource(classify(false))).toBe('bool');
    expect(describeSource(classify(300))).toBe('number 300');
    expect(describeSource(classify([1]))).toBe('sequence');
    expect(describeSource(classify(null))).toBe('unit');
    expect(describeSource(classify({ a: 1 }))).toBe('struct');
    expect(describeSource(classify(Composite.unnamed([1, 2])))).toBe('tuple');
    expect(describeSource(classify(none()))).toBe('variant None');
    expect(describeSource(classify(Bits.fromString('01')))).toBe('bit sequence');
  });
});

describe('wrappers', () => {
  it('builds named and unnamed composites', () => {
    expect(Composite.named({ x: 1 }).fields).toEqual([{ name: 'x', value: 1 }]);
    expect(Composite.unnamed([1, 2]).fields).toEqual([{ value: 1 }, { value: 2 }]);
  });

  it('builds variants from arrays and records', () => {
    expect(variant('A', [1]).fields.fields).toEqual([{ value: 1 }]);
    expect(variant('B', { x: 2 }, 3)).toEqual(new Variant('B', [{ name: 'x', value: 2 }], 3));
  });

  it('builds Option and Result variants', () => {
    expect(some(1).name).toBe('Some');
    expect(none().fields.fields).toEqual([]);
    expect(ok('y').name).toBe('Ok');
    expect(err('n').fields.fields).toEqual([{ value: 'n' }]);
  });

  it('parses bit strings', () => {
    expect(Bits.fromString('101').bits).toEqual([true, false, true]);
    expect(() => Bits.fromString('102')).toThrow(RangeError);
  });

  it('accepts exactly one code point per char', () => {
    expect(new Char('😀').codePoint).toBe(0x1f600);
    expect(new Char('😀').toString()).toBe('😀');
    expect(() => new Char('ab')).toThrow(RangeError);
    expect(() => new Char('')).toThrow(RangeError);
  });
});

describe('isEncodable', () => {
  it('rejects functions and symbols', () => {
    expect(isEncodable(() => 1)).toBe(false);
    expect(isEncodable(Symbol('s'))).toBe(false);
    expect(isEncodable({ a: 1 })).toBe(true);
    expect(isEncodable(undefined)).toBe(true);
  });
});
