import {graphemeClusters} from './text-segment.js';

import type {ShapedRun} from './text-shape.js';
import type {TextRange} from './text-segment.js';
import type {CursorAffinity} from './layout-cursor.js';

/**
 * Visual span of one grapheme on a line
 */
export interface CaretSpan extends TextRange {
  x0: number;
  x1: number;
  rtl: boolean;
}

/**
 * Splits a run's width across its graphemes. Glyph advances are credited to
 * the cluster they belong to, and clusters covering several graphemes
 * (ligatures) are divided evenly between them.
 */
export function runCarets(text: string, run: ShapedRun): CaretSpan[] {
  const length = run.end - run.start;
  const graphemes = graphemeClusters(text.slice(run.start, run.end));
  const credit = new Float64Array(length + 1);
  const clusterWidths = new Map<number, number>();

  for (let i = 0; i < run.glyphs.length; i++) {
    const cl = run.clusters[i];
    clusterWidths.set(cl, (clusterWidths.get(cl) ?? 0) + run.advances[i]);
  }

  const clusterStarts = [...clusterWidths.keys()].sort((a, b) => a - b);

  for (let k = 0; k < clusterStarts.length; k++) {
    const start = clusterStarts[k];
    const end = k + 1 < clusterStarts.length ? clusterStarts[k + 1] : length;
    const width = clusterWidths.get(start) ?? 0;
    const inside = graphemes.filter(g => g.start >= start && g.start < end);

    if (inside.length) {
      for (const g of inside) credit[g.start] += width / inside.length;
    } else {
      // cluster starts mid-grapheme
      const owner = graphemes.find(g => g.start <= start && start < g.end);
      if (owner) credit[owner.start] += width;
    }
  }

  const rtl = run.direction === 'rtl';
  const ordered = rtl ? graphemes.slice().reverse() : graphemes;
  const carets: CaretSpan[] = [];
  let x = run.xOffset;

  for (const g of ordered) {
    const w = credit[g.start];
    carets.push({start: run.start + g.start, end: run.start + g.end, x0: x, x1: x + w, rtl});
    x += w;
  }

  return carets;
}

export class LineBox {
  start: number;
  end: number;
  /**
   * End of the text before a trailing mandatory break. Equal to `end` for
   * soft-wrapped lines and the last line.
   */
  contentEnd: number;
  /** Advance of the whole line, hanging whitespace included */
  width: number;
  /** Advance without trailing whitespace, used to fit the line */
  trimmedWidth: number;
  ascent: number;
  descent: number;
  leading: number;
  /** Offset of the line's top from the layout origin */
  y: number;
  /** In visual order with xOffset set */
  runs: ShapedRun[];
  /** Paragraph embedding level */
  level: number;
  hardBreak: boolean;
  carets: CaretSpan[];

  constructor(init: {
    start: number,
    end: number,
    contentEnd: number,
    trimmedWidth: number,
    ascent: number,
    descent: number,
    leading: number,
    y: number,
    runs: ShapedRun[],
    level: number,
    carets: CaretSpan[]
  }) {
    this.start = init.start;
    this.end = init.end;
    this.contentEnd = init.contentEnd;
    this.width = init.runs.reduce((w, run) => w + run.width, 0);
    this.trimmedWidth = init.trimmedWidth;
    this.ascent = init.ascent;
    this.descent = init.descent;
    this.leading = init.leading;
    this.y = init.y;
    this.runs = init.runs;
    this.level = init.level;
    this.hardBreak = init.contentEnd < init.end;
    this.carets = init.carets;
  }

  get height() {
    return this.ascent + this.descent + this.leading;
  }

  get baselineOffset() {
    return this.ascent;
  }

  baselineY() {
    return this.y + this.baselineOffset;
  }

  bottomY() {
    return this.y + this.height;
  }

  containsY(y: number) {
    return y >= this.y && y < this.bottomY();
  }

  containsPoint(x: number, y: number) {
    return this.containsY(y) && x >= 0 && x <= this.width;
  }

  /**
   * Offset at the left edge of a grapheme (its logical end if right-to-left)
   */
  static leftOffset(caret: CaretSpan) {
    return caret.rtl ? caret.end : caret.start;
  }

  static rightOffset(caret: CaretSpan) {
    return caret.rtl ? caret.start : caret.end;
  }

  visualStartOffset() {
    const first = this.carets[0];
    return first ? LineBox.leftOffset(first) : this.start;
  }

  visualEndOffset() {
    const last = this.carets.at(-1);
    return last ? LineBox.rightOffset(last) : this.start;
  }

  /**
   * Caret x for an offset on this line. Downstream takes the leading edge of
   * the grapheme that starts at the offset, upstream the trailing edge of the
   * one that ends there, each falling back to the other.
   */
  xAtOffset(offset: number, affinity: CursorAffinity = 'downstream'): number {
    let leading: number | undefined;
    let trailing: number | undefined;

    for (const caret of this.carets) {
      if (caret.start === offset) leading = caret.rtl ? caret.x1 : caret.x0;
      if (caret.end === offset) trailing = caret.rtl ? caret.x0 : caret.x1;
      if (leading === undefined && caret.start < offset && offset < caret.end) {
        leading = caret.rtl ? caret.x1 : caret.x0;
      }
    }

    if (affinity === 'upstream') return trailing ?? leading ?? 0;
    return leading ?? trailing ?? 0;
  }

  /**
   * Copy moved by `delta` code units and `dy` pixels, for lines after an edit
   */
  shifted(delta: number, dy: number): LineBox {
    return new LineBox({
      start: this.start + delta,
      end: this.end + delta,
      contentEnd: this.contentEnd + delta,
      trimmedWidth: this.trimmedWidth,
      ascent: this.ascent,
      descent: this.descent,
      leading: this.leading,
      y: this.y + dy,
      runs: this.runs.map(run => ({...run, start: run.start + delta, end: run.end + delta})),
      level: this.level,
      carets: this.carets.map(c => ({...c, start: c.start + delta, end: c.end + delta}))
    });
  }
}
