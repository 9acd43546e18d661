import stringWidth from 'string-width';
import {graphemeClusters, isNewline} from './text-segment.js';

import type {FontFace} from './text-font.js';
import type {TextRange} from './text-segment.js';

export type Direction = 'ltr' | 'rtl';

export interface GlyphPosition {
  x: number;
  y: number;
}

/**
 * Glyphs for one level run in one font. Arrays are parallel and in visual
 * (left to right) order, so clusters decrease in right-to-left runs.
 */
export interface ShapedRun extends TextRange {
  glyphs: number[];
  positions: GlyphPosition[];
  advances: number[];
  /** Offset of the first code unit of each glyph's cluster, relative to start */
  clusters: number[];
  width: number;
  /** Visual x of the run's left edge on its line */
  xOffset: number;
  level: number;
  direction: Direction;
  script: string;
  font: FontFace;
  fontSize: number;
}

export interface Shaper {
  shape(text: string, range: TextRange, font: FontFace, size: number, level: number): ShapedRun;
}

const scripts: [string, RegExp][] = [
  ['Latn', /\p{Script=Latin}/u],
  ['Hebr', /\p{Script=Hebrew}/u],
  ['Arab', /\p{Script=Arabic}/u],
  ['Cyrl', /\p{Script=Cyrillic}/u],
  ['Grek', /\p{Script=Greek}/u],
  ['Hani', /\p{Script=Han}/u],
  ['Hira', /\p{Script=Hiragana}/u],
  ['Kana', /\p{Script=Katakana}/u],
  ['Hang', /\p{Script=Hangul}/u],
  ['Thai', /\p{Script=Thai}/u],
  ['Deva', /\p{Script=Devanagari}/u]
];

/**
 * ISO 15924 code of the first character with a known script, or Zyyy
 */
export function guessScript(text: string): string {
  for (const char of text) {
    for (const [code, re] of scripts) {
      if (re.test(char)) return code;
    }
  }
  return 'Zyyy';
}

export function runDirection(level: number): Direction {
  return level & 1 ? 'rtl' : 'ltr';
}

/**
 * One glyph per grapheme, advancing by terminal columns. Deterministic and
 * font-independent, so it suits grid layouts and tests.
 */
export class MonospaceShaper implements Shaper {
  /** Column width in ems */
  advance: number;
  tabColumns: number;

  constructor(advance = 0.6, tabColumns = 4) {
    this.advance = advance;
    this.tabColumns = tabColumns;
  }

  columns(grapheme: string) {
    if (grapheme === '\t') return this.tabColumns;
    if (grapheme === '\r\n' || isNewline(grapheme)) return 0;
    return stringWidth(grapheme);
  }

  shape(text: string, range: TextRange, font: FontFace, size: number, level: number): ShapedRun {
    const slice = text.slice(range.start, range.end);
    const glyphs: number[] = [];
    const positions: GlyphPosition[] = [];
    const advances: number[] = [];
    const clusters: number[] = [];
    let width = 0;

    for (const {start, end} of graphemeClusters(slice)) {
      const grapheme = slice.slice(start, end);
      const advance = this.columns(grapheme) * this.advance * size;
      glyphs.push(grapheme.codePointAt(0) ?? 0);
      positions.push({x: 0, y: 0});
      advances.push(advance);
      clusters.push(start);
      width += advance;
    }

    const direction = runDirection(level);

    if (direction === 'rtl') {
      glyphs.reverse();
      positions.reverse();
      advances.reverse();
      clusters.reverse();
    }

    return {
      start: range.start,
      end: range.end,
      glyphs,
      positions,
      advances,
      clusters,
      width,
      xOffset: 0,
      level,
      direction,
      script: guessScript(slice),
      font,
      fontSize: size
    };
  }
}
