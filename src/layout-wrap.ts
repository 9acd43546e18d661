import {computeLineBreaks, graphemeClusters, newlineLengthBefore} from './text-segment.js';
import {resolveBidi, lineLevels, reorderLevelRuns, splitBidiParagraphs} from './text-bidi.js';
import {LineBox, runCarets} from './layout-linebox.js';

import type {BaseDirection, BidiInfo} from './text-bidi.js';
import type {CaretSpan} from './layout-linebox.js';
import type {FontFace} from './text-font.js';
import type {ShapedRun, Shaper} from './text-shape.js';
import type {TextRange} from './text-segment.js';

export type WrapMode = 'no-wrap' | 'break-word' | 'break-all';

export interface WrapOptions {
  font: FontFace;
  fontSize: number;
  /** No wrapping when undefined */
  maxWidth: number | undefined;
  wrapMode: WrapMode;
  baseDirection: BaseDirection;
  shaper: Shaper;
}

// whitespace that hangs past the end of a line instead of being measured
const hangingSpace = /[\t\n\v\f\r \u0085\u1680\u2000-\u2006\u2008-\u200a\u2028\u2029\u205f\u3000]/;

function trimEnd(text: string, start: number, end: number) {
  while (end > start && hangingSpace.test(text[end - 1])) end -= 1;
  return end;
}

/**
 * Paragraphs between mandatory breaks within [start, end). `start` must be a
 * paragraph start. Bidi paragraph separators the line breaker does not force
 * (U+001C to U+001E) end a paragraph too, so no line crosses a bidi paragraph.
 * When the range runs to the end of a text that ends in a break, `final` adds
 * the empty paragraph after it.
 */
export function splitParagraphs(
  text: string,
  start = 0,
  end = text.length,
  final = end === text.length
): TextRange[] {
  const paragraphs: TextRange[] = [];
  const slice = text.slice(start, end);
  const ends = new Set<number>();
  let paragraphStart = start;

  for (const bk of computeLineBreaks(slice)) {
    if (bk.kind === 'mandatory') ends.add(start + bk.offset);
  }

  for (const range of splitBidiParagraphs(slice)) ends.add(start + range.end);

  for (const offset of [...ends].sort((a, b) => a - b)) {
    if (offset > paragraphStart) {
      paragraphs.push({start: paragraphStart, end: offset});
      paragraphStart = offset;
    }
  }

  if (
    final &&
    paragraphStart === end &&
    end === text.length &&
    (end === start || newlineLengthBefore(text, end) > 0)
  ) {
    paragraphs.push({start: end, end});
  }

  return paragraphs;
}

/**
 * Shapes and measures pieces of one paragraph. Widths are cached per range
 * since the greedy wrap measures the same candidates from each line start.
 */
class ParagraphMeasure {
  text: string;
  paragraph: TextRange;
  bidi: BidiInfo;
  options: WrapOptions;
  widths: Map<string, number>;

  constructor(text: string, paragraph: TextRange, options: WrapOptions) {
    this.text = text;
    this.paragraph = paragraph;
    this.bidi = resolveBidi(text.slice(paragraph.start, paragraph.end), options.baseDirection);
    this.options = options;
    this.widths = new Map();
  }

  get level() {
    return this.bidi.paragraphs[0]?.level ?? (this.options.baseDirection === 'rtl' ? 1 : 0);
  }

  shape(range: TextRange, level: number): ShapedRun {
    const {text, options} = this;
    return options.shaper.shape(text, range, options.font, options.fontSize, level);
  }

  /**
   * Width of [start, end) in logical order, excluding trailing whitespace
   */
  width(start: number, end: number) {
    end = trimEnd(this.text, start, end);
    const key = `${start},${end}`;
    let width = this.widths.get(key);

    if (width === undefined) {
      const {levels} = this.bidi;
      const base = this.paragraph.start;
      width = 0;
      let runStart = start;
      for (let i = start + 1; i <= end; i++) {
        if (i === end || levels[i - base] !== levels[runStart - base]) {
          width += this.shape({start: runStart, end: i}, levels[runStart - base]).width;
          runStart = i;
        }
      }
      this.widths.set(key, width);
    }

    return width;
  }

  /**
   * Shapes a committed line: levels get rule L1, runs are reordered and
   * placed left to right.
   */
  line(start: number, end: number, y: number): LineBox {
    const {text, options} = this;
    const base = this.paragraph.start;
    // the empty paragraph after a trailing break has no break of its own
    const contentEnd = end === this.paragraph.end && end > start
      ? end - newlineLengthBefore(text, end)
      : end;
    const levels = lineLevels(this.bidi, start - base, contentEnd - base);
    const runs = reorderLevelRuns(levels, start).map(run => this.shape(run, run.level));
    const carets: CaretSpan[] = [];
    let x = 0;

    for (const run of runs) {
      run.xOffset = x;
      x += run.width;
      carets.push(...runCarets(text, run));
    }

    const trimmed = trimEnd(text, start, contentEnd);
    let hanging = 0;
    for (const caret of carets) {
      if (caret.start >= trimmed) hanging += caret.x1 - caret.x0;
    }

    let ascent = 0, descent = 0, leading = 0;
    const metrics = runs.length
      ? runs.map(run => run.font.scaledMetrics(run.fontSize))
      : [options.font.scaledMetrics(options.fontSize)];

    for (const m of metrics) {
      ascent = Math.max(ascent, m.ascent);
      descent = Math.max(descent, m.descent);
      leading = Math.max(leading, m.lineGap);
    }

    return new LineBox({
      start,
      end,
      contentEnd,
      trimmedWidth: x - hanging,
      ascent,
      descent,
      leading,
      y,
      runs,
      level: this.level,
      carets
    });
  }
}

function graphemeBoundaries(text: string, range: TextRange) {
  return graphemeClusters(text.slice(range.start, range.end)).map(g => range.start + g.end);
}

/**
 * Greedy wrap of one paragraph. Commits the furthest break opportunity that
 * fits and force-breaks a token at graphemes only when it can't fit alone.
 */
export function wrapParagraph(
  text: string,
  paragraph: TextRange,
  options: WrapOptions,
  y: number
): LineBox[] {
  const measure = new ParagraphMeasure(text, paragraph, options);
  const {maxWidth, wrapMode} = options;
  const lines: LineBox[] = [];

  if (paragraph.start === paragraph.end || maxWidth === undefined || wrapMode === 'no-wrap') {
    lines.push(measure.line(paragraph.start, paragraph.end, y));
    return lines;
  }

  const opportunities = wrapMode === 'break-all'
    ? graphemeBoundaries(text, paragraph)
    : computeLineBreaks(text.slice(paragraph.start, paragraph.end)).map(bk => paragraph.start + bk.offset);

  let lineStart = paragraph.start;
  let i = 0;

  while (lineStart < paragraph.end) {
    while (opportunities[i] <= lineStart) i++;

    let end = -1;
    for (; i < opportunities.length; i++) {
      if (measure.width(lineStart, opportunities[i]) > maxWidth) break;
      end = opportunities[i];
    }

    if (end < 0) {
      const token = {start: lineStart, end: opportunities[i]};
      for (const boundary of graphemeBoundaries(text, token)) {
        if (end >= 0 && measure.width(lineStart, boundary) > maxWidth) break;
        end = boundary;
      }
    }

    const line = measure.line(lineStart, end, y);
    lines.push(line);
    y = line.bottomY();
    lineStart = end;
  }

  return lines;
}

/**
 * Lays out every paragraph in [start, end) from `y` downwards
 */
export function wrapRange(
  text: string,
  options: WrapOptions,
  start = 0,
  end = text.length,
  y = 0,
  final = end === text.length
): LineBox[] {
  const lines: LineBox[] = [];

  for (const paragraph of splitParagraphs(text, start, end, final)) {
    const paragraphLines = wrapParagraph(text, paragraph, options, y);
    lines.push(...paragraphLines);
    const last = paragraphLines.at(-1);
    if (last) y = last.bottomY();
  }

  return lines;
}

export function wrapText(text: string, options: WrapOptions): LineBox[] {
  return wrapRange(text, options);
}
