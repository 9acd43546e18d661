import bidiFactory from 'bidi-js';

import type {TextRange} from './text-segment.js';

const bidi = bidiFactory();

export type BaseDirection = 'auto' | 'ltr' | 'rtl';

export type ParagraphDirection = 'ltr' | 'rtl' | 'mixed';

export interface ParagraphBidi extends TextRange {
  level: number;
  direction: 'ltr' | 'rtl';
  /**
   * Resolved levels inside the paragraph have different parities, meaning
   * there is text running against the paragraph direction
   */
  mixed: boolean;
}

export interface BidiRun extends TextRange {
  level: number;
}

export interface BidiInfo {
  text: string;
  /** One level per UTF-16 code unit, surrogate pairs repeat */
  levels: Uint8Array;
  paragraphs: ParagraphBidi[];
}

function isHighSurrogate(code: number) {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number) {
  return code >= 0xdc00 && code <= 0xdfff;
}

function isParagraphSeparator(char: string) {
  return bidi.getBidiCharTypeName(char) === 'B';
}

/**
 * Splits after each paragraph separator, keeping CRLF together
 */
export function splitBidiParagraphs(text: string): TextRange[] {
  const ranges: TextRange[] = [];
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    if (isParagraphSeparator(text[i])) {
      if (text[i] === '\r' && text[i + 1] === '\n') i += 1;
      ranges.push({start, end: i + 1});
      start = i + 1;
    }
  }

  if (start < text.length || ranges.length === 0) {
    ranges.push({start, end: text.length});
  }

  return ranges;
}

function defaultLevel(base: BaseDirection) {
  return base === 'rtl' ? 1 : 0;
}

export function resolveBidi(text: string, base: BaseDirection): BidiInfo {
  const levels = new Uint8Array(text.length);
  const paragraphs: ParagraphBidi[] = [];
  const explicit = base === 'auto' ? undefined : base;

  for (const {start, end} of splitBidiParagraphs(text)) {
    const slice = text.slice(start, end);
    let level = defaultLevel(base);

    if (slice.length) {
      const result = bidi.getEmbeddingLevels(slice, explicit);
      levels.set(result.levels.subarray(0, slice.length), start);
      if (result.paragraphs.length) level = result.paragraphs[0].level;
    }

    let mixed = false;
    for (let i = start; i < end; i++) {
      if (isHighSurrogate(text.charCodeAt(i)) && isLowSurrogate(text.charCodeAt(i + 1))) {
        levels[i + 1] = levels[i];
      }
      if ((levels[i] & 1) !== (level & 1) && !isParagraphSeparator(text[i])) {
        mixed = true;
      }
    }

    paragraphs.push({start, end, level, direction: level & 1 ? 'rtl' : 'ltr', mixed});
  }

  return {text, levels, paragraphs};
}

export function paragraphAt(info: BidiInfo, offset: number): ParagraphBidi {
  for (const paragraph of info.paragraphs) {
    if (offset < paragraph.end) return paragraph;
  }
  const last = info.paragraphs.at(-1);
  if (!last) throw new Error('Assertion failed');
  return last;
}

/**
 * Applies rule L1 to a line's levels: segment and paragraph separators, and
 * whitespace before them or at the end of the line, go back to the paragraph
 * level.
 */
export function lineLevels(info: BidiInfo, start: number, end: number): Uint8Array {
  const {text} = info;
  const levels = info.levels.slice(start, end);
  const paragraphLevel = paragraphAt(info, start).level;
  let trailing = true;

  for (let i = end - 1; i >= start; i--) {
    const type = bidi.getBidiCharTypeName(text[i]);
    if (type === 'S' || type === 'B') {
      levels[i - start] = paragraphLevel;
      trailing = true;
    } else if (
      trailing &&
      (type === 'WS' || type === 'LRI' || type === 'RLI' || type === 'FSI' || type === 'PDI' || type === 'BN')
    ) {
      levels[i - start] = paragraphLevel;
    } else {
      trailing = false;
    }
  }

  return levels;
}

/**
 * Rule L2: from the highest level to the lowest odd level, reverse every
 * contiguous sequence of items at that level or higher.
 */
export function reorder<T>(items: T[], levels: ArrayLike<number>): T[] {
  const result = items.slice();
  const lv = Array.from(levels);
  let max = 0;
  let minOdd = Infinity;

  for (const level of lv) {
    if (level > max) max = level;
    if (level & 1 && level < minOdd) minOdd = level;
  }

  for (let level = max; level >= minOdd; level--) {
    let i = 0;
    while (i < result.length) {
      if (lv[i] >= level) {
        let j = i;
        while (j + 1 < result.length && lv[j + 1] >= level) j++;
        reverseRange(result, i, j);
        reverseRange(lv, i, j);
        i = j + 1;
      } else {
        i++;
      }
    }
  }

  return result;
}

function reverseRange<T>(a: T[], i: number, j: number) {
  while (i < j) {
    const t = a[i];
    a[i++] = a[j];
    a[j--] = t;
  }
}

/**
 * Groups line levels into level runs and returns them in visual order
 */
export function reorderLevelRuns(levels: Uint8Array, start: number): BidiRun[] {
  const runs: BidiRun[] = [];

  for (let i = 0; i < levels.length; i++) {
    const last = runs.at(-1);
    if (last && last.level === levels[i]) {
      last.end = start + i + 1;
    } else {
      runs.push({start: start + i, end: start + i + 1, level: levels[i]});
    }
  }

  return reorder(runs, runs.map(run => run.level));
}

function assertSingleParagraph(info: BidiInfo, range: TextRange) {
  const paragraph = paragraphAt(info, range.start);
  if (range.start < paragraph.start || range.end > paragraph.end) {
    throw new Error(
      `Line [${range.start}, ${range.end}) must lie within a single paragraph ` +
      `(paragraph is [${paragraph.start}, ${paragraph.end}))`
    );
  }
}

export function paragraphBidiInfo(text: string, base: BaseDirection): ParagraphBidi[] {
  return resolveBidi(text, base).paragraphs;
}

export function paragraphDirection(paragraph: ParagraphBidi): ParagraphDirection {
  return paragraph.mixed ? 'mixed' : paragraph.direction;
}

export function levelsPerCodeUnit(text: string, base: BaseDirection): Uint8Array {
  return resolveBidi(text, base).levels;
}

export function visualRuns(
  text: string,
  base: BaseDirection,
  range: TextRange
): {levels: Uint8Array, runs: BidiRun[]} {
  const info = resolveBidi(text, base);
  assertSingleParagraph(info, range);
  const levels = lineLevels(info, range.start, range.end);
  return {levels, runs: reorderLevelRuns(levels, range.start)};
}

/**
 * Maps visual code point index to logical code point index within the line
 */
export function visualIndexMap(text: string, base: BaseDirection, range: TextRange): number[] {
  const info = resolveBidi(text, base);
  assertSingleParagraph(info, range);
  const levels = lineLevels(info, range.start, range.end);
  const indices: number[] = [];
  const charLevels: number[] = [];

  for (let i = range.start; i < range.end; i++) {
    if (isLowSurrogate(text.charCodeAt(i)) && i > range.start && isHighSurrogate(text.charCodeAt(i - 1))) {
      continue;
    }
    charLevels.push(levels[i - range.start]);
    indices.push(indices.length);
  }

  return reorder(indices, charLevels);
}

const asciiMirrors: Record<string, string> = {
  '(': ')', ')': '(',
  '[': ']', ']': '[',
  '{': '}', '}': '{',
  '<': '>', '>': '<'
};

/**
 * The mirrored form of a character displayed in a right-to-left run, or the
 * character itself if it has none
 */
export function mirroredBracket(char: string): string {
  return asciiMirrors[char] ?? bidi.getMirroredCharacter(char) ?? char;
}
