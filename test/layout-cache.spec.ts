import {describe, it, expect} from 'vitest';
import {TextLayoutCache} from '../src/layout-cache.js';
import {MonospaceShaper} from '../src/text-shape.js';
import {font, shaper} from './fixtures.js';

import type {WrapOptions} from '../src/layout-wrap.js';

const options: WrapOptions = {
  font,
  fontSize: 10,
  maxWidth: 60,
  wrapMode: 'break-word',
  baseDirection: 'auto',
  shaper
};

describe('TextLayoutCache', function () {
  it('wraps once per key', function () {
    const cache = new TextLayoutCache();
    const lines = cache.getOrWrap('Hello World', options);
    expect(lines.map(l => [l.start, l.end])).toEqual([[0, 6], [6, 11]]);
    expect(cache.getOrWrap('Hello World', options)).toBe(lines);
    expect(cache.size).toBe(1);
  });

  it('keys on every wrap option', function () {
    const key = TextLayoutCache.key('x', options);
    expect(TextLayoutCache.key('x', {...options, maxWidth: undefined})).not.toBe(key);
    expect(TextLayoutCache.key('x', {...options, fontSize: 12})).not.toBe(key);
    expect(TextLayoutCache.key('x', {...options, baseDirection: 'rtl'})).not.toBe(key);
    expect(TextLayoutCache.key('x', {...options, shaper: new MonospaceShaper(1)})).not.toBe(key);
    expect(TextLayoutCache.key('x', {...options})).toBe(key);
  });

  it('evicts the oldest entries once twice as full', function () {
    const cache = new TextLayoutCache(2);
    for (const text of ['a', 'b', 'c']) cache.getOrWrap(text, options);
    expect(cache.size).toBe(3);

    cache.getOrWrap('d', options);
    expect(cache.size).toBe(2);
    expect(cache.get('a', options)).toBeUndefined();
    expect(cache.get('b', options)).toBeUndefined();
    expect(cache.get('c', options)).toBeDefined();
    expect(cache.get('d', options)).toBeDefined();
  });

  it('clears', function () {
    const cache = new TextLayoutCache(0);
    expect(cache.maxEntries).toBe(1);
    cache.getOrWrap('a', options);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
