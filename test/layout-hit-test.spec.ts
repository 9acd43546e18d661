import {describe, it, expect} from 'vitest';
import {HitTestResult, lineIndexAtY} from '../src/layout-hit-test.js';
import {PrefixSums} from '../src/layout-prefix-sums.js';
import {boundaries, layout} from './fixtures.js';

import type {LayoutOptions} from '../src/layout-text.js';

describe('Hit testing', function () {
  it('resolves the nearer edge of a grapheme', function () {
    const l = layout('Hello');
    expect(l.hitTest({x: 12, y: 5}, 'strict')).toEqual(new HitTestResult(1, 'downstream', 0));
    expect(l.hitTest({x: 17, y: 5}, 'strict')).toEqual(new HitTestResult(2, 'downstream', 0));
  });

  it('clamps points outside the text', function () {
    const l = layout('Hello');
    expect(l.hitTest({x: -5, y: -10})).toEqual(new HitTestResult(0, 'downstream', 0));
    expect(l.hitTest({x: 1000, y: 1000})).toEqual(new HitTestResult(5, 'downstream', 0));
  });

  it('misses points outside the text when strict', function () {
    const l = layout('Hello');
    expect(l.hitTest({x: 1000, y: 1000}, 'strict')).toBeUndefined();
    expect(l.hitTest({x: 60, y: 5}, 'strict')).toBeUndefined();
    expect(l.hitTest({x: 5, y: -1}, 'strict')).toBeUndefined();
  });

  it('handles empty text', function () {
    const l = layout('');
    expect(l.hitTest({x: 50, y: 50})).toEqual(new HitTestResult(0, 'downstream', 0));
    expect(l.hitTest({x: 0, y: 0}, 'strict')).toBeUndefined();
  });

  it('marks the end of a wrapped line upstream', function () {
    const l = layout('Hello World', {maxWidth: 60});
    expect(l.hitTest({x: 100, y: 5})).toEqual(new HitTestResult(6, 'upstream', 0));
    expect(l.hitTest({x: 0, y: 15})).toEqual(new HitTestResult(6, 'downstream', 1));
  });

  it('reads right-to-left runs from the right', function () {
    const l = layout('abc אבג', {baseDirection: 'ltr'});
    expect(l.hitTest({x: 62, y: 5})?.offset).toBe(5);
    expect(l.hitTest({x: 68, y: 5})?.offset).toBe(4);
    expect(l.hitTest({x: 42, y: 5})?.offset).toBe(7);
  });

  it('finds lines by y', function () {
    const {lines} = layout('a\nb\nc');
    expect(lineIndexAtY(lines, 0, 'strict')).toBe(0);
    expect(lineIndexAtY(lines, 19.5, 'strict')).toBe(1);
    expect(lineIndexAtY(lines, 20, 'strict')).toBe(2);
    expect(lineIndexAtY(lines, 30, 'strict')).toBeUndefined();
    expect(lineIndexAtY(lines, 30, 'clamp')).toBe(2);
  });

  it('round-trips every grapheme boundary', function () {
    const cases: [string, LayoutOptions][] = [
      ['Hello World wrapping', {maxWidth: 60}],
      ['Line 1\nLine 2\n', {}],
      ['e\u0301 \u{1F468}\u200d\u{1F469}\u200d\u{1F467}\u200d\u{1F466} x', {}],
      ['abc אבג', {baseDirection: 'ltr'}],
      ['אבג דהו', {maxWidth: 40}]
    ];

    for (const [text, options] of cases) {
      const l = layout(text, options);
      for (const offset of boundaries(text)) {
        const position = l.offsetToPosition(offset);
        if (!position) throw new Error(`No position for ${offset}`);
        const hit = l.hitTest({x: position.x, y: position.y});
        expect(hit?.offset, `${text} @ ${offset}`).toBe(offset);
      }
    }
  });
});

describe('Prefix sums', function () {
  it('looks up lines by offset and by code point', function () {
    const text = 'a\u{1F600}\nbc\nd';
    const sums = PrefixSums.fromLines(text, [
      {start: 0, end: 4},
      {start: 4, end: 7},
      {start: 7, end: 8}
    ]);

    expect(sums.offsets).toEqual([0, 4, 7]);
    expect(sums.chars).toEqual([0, 3, 6]);
    expect(sums.totalChars).toBe(7);
    expect(sums.lineAtOffset(5)).toBe(1);
    expect(sums.lineAtOffset(7)).toBe(2);
    expect(sums.lineAtChar(2)).toBe(0);
    expect(sums.lineAtChar(3)).toBe(1);
    expect(sums.offsetAtLine(2)).toBe(7);
    expect(sums.charOffsetAtLine(3)).toBeUndefined();
    expect(sums.lineCount).toBe(3);
  });
});
