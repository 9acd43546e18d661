import LineBreaker from 'linebreak';
import {clamp} from './util.js';

export interface TextRange {
  start: number;
  end: number;
}

export interface GraphemeCluster extends TextRange {}

export interface WordBoundary extends TextRange {
  kind: 'word' | 'non-word';
}

export interface LineBreak {
  offset: number;
  kind: 'mandatory' | 'opportunity';
}

const graphemeSegmenter = new Intl.Segmenter(undefined, {granularity: 'grapheme'});
const wordSegmenter = new Intl.Segmenter(undefined, {granularity: 'word'});

const alphanumeric = /[\p{L}\p{N}]/u;

// LF, VT, FF, CR, NEL, LS, PS
const newlineChars = new Set(['\n', '\v', '\f', '\r', '\u0085', '\u2028', '\u2029']);

export function isNewline(char: string) {
  return newlineChars.has(char);
}

/**
 * Length of the break sequence (CRLF counts as one) that ends at `offset`
 */
export function newlineLengthBefore(text: string, offset: number) {
  if (offset <= 0 || !isNewline(text[offset - 1])) return 0;
  if (text[offset - 1] === '\n' && text[offset - 2] === '\r') return 2;
  return 1;
}

export function graphemeClusters(text: string): GraphemeCluster[] {
  const clusters: GraphemeCluster[] = [];
  for (const {index, segment} of graphemeSegmenter.segment(text)) {
    clusters.push({start: index, end: index + segment.length});
  }
  return clusters;
}

export function isGraphemeBoundary(text: string, offset: number) {
  offset = clamp(offset, 0, text.length);
  if (offset === 0 || offset === text.length) return true;
  const segment = graphemeSegmenter.segment(text).containing(offset);
  return segment !== undefined && segment.index === offset;
}

/**
 * Start of the grapheme that contains the code unit before `offset`
 */
export function prevGraphemeBoundary(text: string, offset: number): number | undefined {
  offset = Math.min(offset, text.length);
  if (offset <= 0) return;
  const segment = graphemeSegmenter.segment(text).containing(offset - 1);
  return segment ? segment.index : 0;
}

/**
 * End of the grapheme that contains the code unit at `offset`
 */
export function nextGraphemeBoundary(text: string, offset: number): number | undefined {
  offset = Math.max(offset, 0);
  if (offset >= text.length) return;
  const segment = graphemeSegmenter.segment(text).containing(offset);
  return segment ? segment.index + segment.segment.length : text.length;
}

/**
 * Clamps to the text and moves down to the nearest grapheme boundary
 */
export function snapToGraphemeBoundary(text: string, offset: number) {
  offset = clamp(Math.floor(offset), 0, text.length);
  if (offset === text.length) return offset;
  const segment = graphemeSegmenter.segment(text).containing(offset);
  return segment ? segment.index : offset;
}

export function computeWordBoundaries(text: string): WordBoundary[] {
  const boundaries: WordBoundary[] = [];
  for (const {index, segment} of wordSegmenter.segment(text)) {
    boundaries.push({
      start: index,
      end: index + segment.length,
      kind: alphanumeric.test(segment) ? 'word' : 'non-word'
    });
  }
  return boundaries;
}

/**
 * UAX #14 break opportunities. The last entry is always a mandatory break at
 * the end of the text.
 */
export function computeLineBreaks(text: string): LineBreak[] {
  const breaks: LineBreak[] = [];
  const breaker = new LineBreaker(text);
  let bk: LineBreaker.LineBreak | null;

  while ((bk = breaker.nextBreak())) {
    breaks.push({
      offset: bk.position,
      kind: bk.required ? 'mandatory' : 'opportunity'
    });
  }

  const last = breaks.at(-1);
  if (last && last.offset === text.length) {
    last.kind = 'mandatory';
  } else {
    breaks.push({offset: text.length, kind: 'mandatory'});
  }

  return breaks;
}
