import { describe, it, expect, vi } from 'vitest';
import { resolveDialect, resolveParseConfig, resolveStringifyConfig } from '../../src/config.js';
import { InvalidOptionError, MalformedInputError } from '../../src/errors.js';
import type { ParseOptions, StringifyOptions } from '../../src/types.js';

describe('resolveDialect', () => {
  it('applies defaults', () => {
    expect(resolveDialect()).toEqual({
      depth: 5,
      parameterLimit: 1000,
      allowDots: false,
      allowSparse: false,
      arrayLimit: 20,
      parseArrays: false,
      allowEmpty: false,
      comma: false,
    });
  });

  it('keeps explicit values', () => {
    const config = resolveDialect({ depth: 1, arrayLimit: 0, parameterLimit: Infinity, allowDots: true });
    expect(config.depth).toBe(1);
    expect(config.arrayLimit).toBe(0);
    expect(config.parameterLimit).toBe(Infinity);
    expect(config.allowDots).toBe(true);
  });

  it('rejects a negative depth', () => {
    expect(() => resolveDialect({ depth: -1 })).toThrow(InvalidOptionError);
  });

  it('rejects a fractional arrayLimit', () => {
    expect(() => resolveDialect({ arrayLimit: 1.5 })).toThrow(InvalidOptionError);
  });

  it('rejects a zero parameterLimit', () => {
    expect(() => resolveDialect({ parameterLimit: 0 })).toThrow(InvalidOptionError);
  });
});

describe('resolveParseConfig', () => {
  it('applies parse defaults', () => {
    const config = resolveParseConfig();
    expect(config.delimiter).toBe('&');
    expect(config.charset).toBe('utf-8');
    expect(config.fromUrl).toBe(false);
    expect(config.charsetSentinel).toBe(false);
    expect(config.interpretNumericEntities).toBe(false);
    expect(config.parsePrimitive).toBe(false);
    expect(config.primitiveStrict).toBe(true);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(resolveParseConfig())).toBe(true);
  });

  it('accepts a RegExp delimiter', () => {
    const delimiter = /[;&]/;
    expect(resolveParseConfig({ delimiter }).delimiter).toBe(delimiter);
  });

  it('rejects an empty delimiter', () => {
    expect(() => resolveParseConfig({ delimiter: '' })).toThrow(InvalidOptionError);
  });

  it('rejects an unknown charset', () => {
    const options: ParseOptions = JSON.parse('{"charset":"latin-2"}');
    expect(() => resolveParseConfig(options)).toThrow(InvalidOptionError);
  });

  it('uses the supplied onFallback', () => {
    const onFallback = vi.fn();
    const config = resolveParseConfig({ onFallback });
    const err = new MalformedInputError('x');
    config.onFallback(err, 'x');
    expect(onFallback).toHaveBeenCalledWith(err, 'x');
  });

  it('defaults onFallback to a prefixed console.warn', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    try {
      resolveParseConfig().onFallback(new MalformedInputError('x', 'broken'), 'x');
      expect(warn).toHaveBeenCalledWith('[querytree] falling back to flat parsing: broken');
    } finally {
      warn.mockRestore();
    }
  });
});

describe('resolveStringifyConfig', () => {
  it('applies stringify defaults', () => {
    expect(resolveStringifyConfig()).toEqual({
      allowDots: false,
      encode: true,
      encodeValuesOnly: false,
      delimiter: '&',
      arrayFormat: 'indices',
      sort: false,
      sortReverse: false,
      charset: 'utf-8',
      filter: null,
      charsetSentinel: false,
    });
  });

  it('copies and freezes the filter', () => {
    const filter = ['a', 0];
    const config = resolveStringifyConfig({ filter });
    filter.push('b');
    expect(config.filter).toEqual(['a', 0]);
    expect(Object.isFrozen(config.filter)).toBe(true);
  });

  it('rejects an unknown arrayFormat', () => {
    const options: StringifyOptions = JSON.parse('{"arrayFormat":"nested"}');
    expect(() => resolveStringifyConfig(options)).toThrow(InvalidOptionError);
  });
});
