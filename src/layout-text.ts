import {environment} from './environment.js';
import {
  computeWordBoundaries,
  isNewline,
  prevGraphemeBoundary,
  snapToGraphemeBoundary
} from './text-segment.js';
import {wrapRange} from './layout-wrap.js';
import {PrefixSums} from './layout-prefix-sums.js';
import {HitTestResult, hitTest, hitTestLine, lineIndexAtY} from './layout-hit-test.js';
import {
  CursorPosition,
  moveLeftCharacter,
  moveLeftWord,
  moveRightCharacter,
  moveRightWord
} from './layout-cursor.js';
import {Selection} from './layout-selection.js';
import {Logger, loggableText, round} from './util.js';

import type {BaseDirection} from './text-bidi.js';
import type {FontFace} from './text-font.js';
import type {Shaper} from './text-shape.js';
import type {TextRange} from './text-segment.js';
import type {LineBox} from './layout-linebox.js';
import type {WrapMode, WrapOptions} from './layout-wrap.js';
import type {HitTestPolicy, Point, Position} from './layout-hit-test.js';
import type {
  CursorAffinity,
  CursorRect,
  MovementDirection,
  MovementUnit
} from './layout-cursor.js';
import type {SelectionRect} from './layout-selection.js';

/**
 * Parameters an edit may change along with the text
 */
export interface LayoutParams {
  font: FontFace;
  fontSize: number;
  maxWidth: number | undefined;
  wrapMode: WrapMode;
}

export interface LayoutOptions {
  maxWidth?: number;
  wrapMode?: WrapMode;
  baseDirection?: BaseDirection;
  shaper?: Shaper;
  cursorWidth?: number;
  /** Print the line table after every layout */
  log?: boolean;
}

/**
 * The last change made to the text, in terms of the text before it
 */
export interface TextEdit {
  offset: number;
  deleted: string;
  inserted: string;
}

export interface VerticalMove {
  offset: number;
  preferredX: number;
  affinity: CursorAffinity;
}

export class TextLayout {
  text: string;
  lines: LineBox[];
  prefixSums: PrefixSums;
  font: FontFace;
  fontSize: number;
  maxWidth: number | undefined;
  wrapMode: WrapMode;
  baseDirection: BaseDirection;
  shaper: Shaper;
  cursorWidth: number;
  logging: boolean;
  lastEdit: TextEdit | undefined;

  constructor(text: string, font: FontFace, fontSize: number, options: LayoutOptions = {}) {
    this.text = text;
    this.font = font;
    this.fontSize = fontSize;
    this.maxWidth = options.maxWidth;
    this.wrapMode = options.wrapMode ?? (options.maxWidth === undefined ? 'no-wrap' : 'break-word');
    this.baseDirection = options.baseDirection ?? 'auto';
    this.shaper = options.shaper ?? environment.shaper;
    this.cursorWidth = options.cursorWidth ?? environment.cursorWidth;
    this.logging = options.log ?? false;
    this.lastEdit = undefined;
    this.lines = wrapRange(text, this.wrapOptions);
    this.prefixSums = PrefixSums.fromLines(text, this.lines);
    if (this.logging) this.log();
  }

  static withWrap(
    text: string,
    font: FontFace,
    fontSize: number,
    maxWidth: number,
    wrapMode: WrapMode = 'break-word',
    options: LayoutOptions = {}
  ) {
    return new TextLayout(text, font, fontSize, {...options, maxWidth, wrapMode});
  }

  get wrapOptions(): WrapOptions {
    return {
      font: this.font,
      fontSize: this.fontSize,
      maxWidth: this.maxWidth,
      wrapMode: this.wrapMode,
      baseDirection: this.baseDirection,
      shaper: this.shaper
    };
  }

  get lineCount() {
    return this.lines.length;
  }

  /**
   * Widest line, hanging whitespace included
   */
  get width() {
    return this.lines.reduce((w, line) => Math.max(w, line.width), 0);
  }

  get height() {
    const last = this.lines.at(-1);
    return last ? last.bottomY() : 0;
  }

  relayout() {
    this.lines = wrapRange(this.text, this.wrapOptions);
    this.prefixSums = PrefixSums.fromLines(this.text, this.lines);
    if (this.logging) this.log();
  }

  /**
   * Re-wraps the paragraphs touched by replacing old [start, oldEnd) with
   * `insertedLength` code units and shifts the lines after them
   */
  relayoutRange(start: number, oldEnd: number, insertedLength: number) {
    const lines = this.lines;
    const delta = insertedLength - (oldEnd - start);

    let a = this.prefixSums.lineAtOffset(start);
    while (a > 0 && !lines[a - 1].hardBreak) a--;
    // an insertion at a paragraph start can join with the break before it
    if (a > 0 && start === lines[a].start) {
      a--;
      while (a > 0 && !lines[a - 1].hardBreak) a--;
    }

    let b = this.prefixSums.lineAtOffset(oldEnd);
    while (b < lines.length - 1 && !lines[b].hardBreak) b++;

    const from = lines[a].start;
    const to = lines[b].end + delta;
    const isLast = b === lines.length - 1;
    const fresh = wrapRange(this.text, this.wrapOptions, from, to, lines[a].y, isLast);
    const bottom = fresh.at(-1)?.bottomY() ?? lines[a].y;
    const dy = bottom - lines[b].bottomY();
    const tail = lines.slice(b + 1).map(line => line.shifted(delta, dy));

    this.lines = [...lines.slice(0, a), ...fresh, ...tail];
    this.prefixSums = PrefixSums.fromLines(this.text, this.lines);

    if (this.logging) {
      const log = new Logger();
      log.dim();
      log.text(`Paragraph [${from}, ${to}) relayout`);
      log.reset();
      log.flush();
      this.log();
    }
  }

  private applyParams(params: Partial<LayoutParams> | undefined) {
    let changed = false;
    if (!params) return changed;

    if (params.font !== undefined && params.font !== this.font) {
      this.font = params.font;
      changed = true;
    }
    if (params.fontSize !== undefined && params.fontSize !== this.fontSize) {
      this.fontSize = params.fontSize;
      changed = true;
    }
    if ('maxWidth' in params && params.maxWidth !== this.maxWidth) {
      this.maxWidth = params.maxWidth;
      changed = true;
    }
    if (params.wrapMode !== undefined && params.wrapMode !== this.wrapMode) {
      this.wrapMode = params.wrapMode;
      changed = true;
    }

    return changed;
  }

  private edit(start: number, end: number, inserted: string, params?: Partial<LayoutParams>) {
    const old = this.text;
    this.text = old.slice(0, start) + inserted + old.slice(end);
    this.lastEdit = {offset: start, deleted: old.slice(start, end), inserted};

    if (this.applyParams(params)) {
      this.relayout();
    } else {
      this.relayoutRange(start, end, inserted.length);
    }
  }

  snap(offset: number) {
    return snapToGraphemeBoundary(this.text, offset);
  }

  setText(text: string) {
    this.edit(0, this.text.length, text);
  }

  setWrap(maxWidth: number | undefined, wrapMode: WrapMode = maxWidth === undefined ? 'no-wrap' : 'break-word') {
    if (this.applyParams({maxWidth, wrapMode})) this.relayout();
  }

  /**
   * Replaces [start, end) verbatim, clamped to the text but not snapped to
   * graphemes. History replays edits with this.
   */
  splice(start: number, end: number, inserted: string, params?: Partial<LayoutParams>) {
    start = Math.max(0, Math.min(start, this.text.length));
    end = Math.max(start, Math.min(end, this.text.length));
    this.edit(start, end, inserted, params);
    return start + inserted.length;
  }

  //
  // Editing. Every operation snaps its offsets to grapheme boundaries and
  // returns the new cursor offset.
  //

  insertStr(offset: number, str: string, params?: Partial<LayoutParams>) {
    offset = this.snap(offset);
    this.edit(offset, offset, str, params);
    return offset + str.length;
  }

  insertChar(offset: number, char: string, params?: Partial<LayoutParams>) {
    return this.insertStr(offset, char, params);
  }

  insertNewline(offset: number, params?: Partial<LayoutParams>) {
    return this.insertStr(offset, '\n', params);
  }

  insertTab(offset: number, params?: Partial<LayoutParams>) {
    return this.insertStr(offset, '\t', params);
  }

  replaceSelection(selection: Selection, str: string, params?: Partial<LayoutParams>) {
    const {start, end} = selection.snapToGraphemeBoundaries(this.text);
    this.edit(start, end, str, params);
    return start + str.length;
  }

  deleteBackward(offset: number, params?: Partial<LayoutParams>) {
    offset = this.snap(offset);
    const prev = prevGraphemeBoundary(this.text, offset);
    if (prev === undefined) return offset;
    this.edit(prev, offset, '', params);
    return prev;
  }

  deleteForward(offset: number, params?: Partial<LayoutParams>) {
    offset = this.snap(offset);
    const next = moveRightCharacter(this.text, offset);
    if (next > offset) this.edit(offset, next, '', params);
    return offset;
  }

  deleteWordBackward(offset: number, params?: Partial<LayoutParams>) {
    offset = this.snap(offset);
    const target = moveLeftWord(this.text, offset);
    if (target < offset) this.edit(target, offset, '', params);
    return target;
  }

  deleteWordForward(offset: number, params?: Partial<LayoutParams>) {
    offset = this.snap(offset);
    const target = moveRightWord(this.text, offset);
    if (target > offset) this.edit(offset, target, '', params);
    return offset;
  }

  deleteSelection(selection: Selection, params?: Partial<LayoutParams>) {
    const snapped = selection.snapToGraphemeBoundaries(this.text);
    if (snapped.isCollapsed()) return snapped.focus;
    this.edit(snapped.start, snapped.end, '', params);
    return snapped.start;
  }

  /**
   * Deletes the newline-delimited line around `offset` with its break
   */
  deleteLine(offset: number, params?: Partial<LayoutParams>) {
    const {start, end} = this.paragraphAt(offset);
    let breakEnd = end;
    if (this.text[end] === '\r' && this.text[end + 1] === '\n') {
      breakEnd += 2;
    } else if (end < this.text.length && isNewline(this.text[end])) {
      breakEnd += 1;
    }
    if (breakEnd > start) this.edit(start, breakEnd, '', params);
    return Math.min(start, this.text.length);
  }

  //
  // Line lookups
  //

  /**
   * Line an offset draws on. A soft-wrap offset belongs to the next line
   * downstream and to the end of the previous line upstream.
   */
  lineIndexAtOffset(offset: number, affinity: CursorAffinity = 'downstream') {
    offset = Math.max(0, Math.min(offset, this.text.length));
    let i = this.prefixSums.lineAtOffset(offset);
    const line = this.lines[i];
    if (affinity === 'upstream' && i > 0 && offset === line.start && !this.lines[i - 1].hardBreak) {
      i -= 1;
    }
    return i;
  }

  lineAtOffset(offset: number, affinity: CursorAffinity = 'downstream'): LineBox {
    return this.lines[this.lineIndexAtOffset(offset, affinity)];
  }

  /**
   * Line containing the code point at index `char`, counting from the start
   * of the text. Clamped like offsets.
   */
  lineIndexAtChar(char: number) {
    return this.prefixSums.lineAtChar(Math.max(0, Math.min(char, this.prefixSums.totalChars)));
  }

  /** Code point index of a line's first character */
  charOffsetAtLine(line: number): number | undefined {
    return this.prefixSums.charOffsetAtLine(line);
  }

  offsetAtLine(line: number): number | undefined {
    return this.prefixSums.offsetAtLine(line);
  }

  lineAtY(y: number, policy: HitTestPolicy = 'clamp'): LineBox | undefined {
    const i = lineIndexAtY(this.lines, y, policy);
    return i === undefined ? undefined : this.lines[i];
  }

  /**
   * Newline-delimited paragraph containing `offset`, without its break
   */
  paragraphAt(offset: number): TextRange {
    const {text} = this;
    offset = this.snap(offset);
    let start = offset;
    let end = offset;
    while (start > 0 && !isNewline(text[start - 1])) start--;
    while (end < text.length && !isNewline(text[end])) end++;
    return {start, end};
  }

  //
  // Hit testing
  //

  hitTest(point: Point, policy: HitTestPolicy = 'clamp'): HitTestResult | undefined {
    if (!this.text.length) {
      return policy === 'clamp' ? new HitTestResult(0, 'downstream', 0) : undefined;
    }
    return hitTest(this.lines, point, policy);
  }

  offsetToPosition(offset: number, affinity: CursorAffinity = 'downstream'): Position | undefined {
    if (!this.lines.length) return;
    offset = this.snap(offset);
    const lineIndex = this.lineIndexAtOffset(offset, affinity);
    const line = this.lines[lineIndex];
    return {x: line.xAtOffset(offset, affinity), y: line.y, lineIndex};
  }

  offsetToBaselinePosition(offset: number, affinity: CursorAffinity = 'downstream'): Position | undefined {
    const position = this.offsetToPosition(offset, affinity);
    if (!position) return;
    return {...position, y: this.lines[position.lineIndex].baselineY()};
  }

  cursorRectAtPosition(position: CursorPosition): CursorRect | undefined {
    const {offset, affinity} = position.snapToGraphemeBoundary(this.text);
    const point = this.offsetToPosition(offset, affinity);
    if (!point) return;
    const line = this.lines[point.lineIndex];
    return {x: point.x, y: line.y, width: this.cursorWidth, height: line.height};
  }

  /**
   * One rectangle per visually contiguous span of selected graphemes, line by
   * line from the top and left to right within a line
   */
  selectionRects(selection: Selection): SelectionRect[] {
    const {start, end} = selection.snapToGraphemeBoundaries(this.text);
    const rects: SelectionRect[] = [];
    if (start === end) return rects;

    for (let i = this.lineIndexAtOffset(start); i < this.lines.length; i++) {
      const line = this.lines[i];
      if (line.start >= end) break;
      let rect: SelectionRect | undefined;

      for (const caret of line.carets) {
        const selected = caret.start >= start && caret.end <= end;
        if (selected && rect && Math.abs(rect.x + rect.width - caret.x0) < 1e-6) {
          rect.width += caret.x1 - caret.x0;
        } else {
          if (rect && rect.width > 0) rects.push(rect);
          rect = selected
            ? {x: caret.x0, y: line.y, width: caret.x1 - caret.x0, height: line.height}
            : undefined;
        }
      }

      if (rect && rect.width > 0) rects.push(rect);
    }

    return rects;
  }

  //
  // Cursor movement
  //

  moveCursorLeft(offset: number) {
    return moveLeftCharacter(this.text, offset);
  }

  moveCursorRight(offset: number) {
    return moveRightCharacter(this.text, offset);
  }

  moveCursorLeftWord(offset: number) {
    return moveLeftWord(this.text, offset);
  }

  moveCursorRightWord(offset: number) {
    return moveRightWord(this.text, offset);
  }

  moveCursorLineStart(offset: number) {
    return this.lineAtOffset(this.snap(offset)).visualStartOffset();
  }

  moveCursorLineEnd(offset: number) {
    return this.lineAtOffset(this.snap(offset)).visualEndOffset();
  }

  moveCursorDocumentStart() {
    return 0;
  }

  moveCursorDocumentEnd() {
    return this.text.length;
  }

  move(offset: number, direction: MovementDirection, unit: MovementUnit) {
    switch (unit) {
      case 'character':
        return direction === 'left' ? this.moveCursorLeft(offset) : this.moveCursorRight(offset);
      case 'word':
        return direction === 'left' ? this.moveCursorLeftWord(offset) : this.moveCursorRightWord(offset);
      case 'line':
        return direction === 'left' ? this.moveCursorLineStart(offset) : this.moveCursorLineEnd(offset);
      case 'document':
        return direction === 'left' ? this.moveCursorDocumentStart() : this.moveCursorDocumentEnd();
    }
  }

  /**
   * Where `move` lands as a caret position: the end of a soft-wrapped line
   * is drawn upstream, on the line it ends
   */
  movePosition(offset: number, direction: MovementDirection, unit: MovementUnit): CursorPosition {
    const target = this.move(offset, direction, unit);
    if (unit === 'line' && direction === 'right') {
      const line = this.lineAtOffset(this.snap(offset));
      if (target === line.end && !line.hardBreak && line !== this.lines.at(-1)) {
        return new CursorPosition(target, 'upstream');
      }
    }
    return new CursorPosition(target);
  }

  private moveVertical(
    offset: number,
    step: -1 | 1,
    preferredX: number | undefined,
    affinity: CursorAffinity
  ): VerticalMove {
    offset = this.snap(offset);
    const i = this.lineIndexAtOffset(offset, affinity);
    const x = preferredX ?? this.lines[i].xAtOffset(offset, affinity);
    const target = i + step;

    if (target < 0 || target >= this.lines.length) {
      return {offset, preferredX: x, affinity};
    }

    const isLast = target === this.lines.length - 1;
    const hit = hitTestLine(this.lines[target], target, x, 'clamp', isLast);
    if (!hit) throw new Error('Assertion failed');
    return {offset: hit.offset, preferredX: x, affinity: hit.affinity};
  }

  moveCursorUp(offset: number, preferredX?: number, affinity: CursorAffinity = 'downstream') {
    return this.moveVertical(offset, -1, preferredX, affinity);
  }

  moveCursorDown(offset: number, preferredX?: number, affinity: CursorAffinity = 'downstream') {
    return this.moveVertical(offset, 1, preferredX, affinity);
  }

  //
  // Selection helpers
  //

  /**
   * The word, or run of spaces and punctuation, under `offset`
   */
  selectWordAt(offset: number) {
    offset = this.snap(offset);
    const words = computeWordBoundaries(this.text);
    const word = words.find(w => offset >= w.start && offset < w.end) ?? words.at(-1);
    return word ? new Selection(word.start, word.end) : Selection.collapsed(offset);
  }

  /**
   * The visual line under `offset`, without its break
   */
  selectLineAt(offset: number) {
    const line = this.lineAtOffset(this.snap(offset));
    return new Selection(line.start, line.contentEnd);
  }

  selectParagraphAt(offset: number) {
    const {start, end} = this.paragraphAt(offset);
    return new Selection(start, end);
  }

  extendSelection(selection: Selection, direction: MovementDirection, unit: MovementUnit) {
    return selection.extendTo(this.move(selection.focus, direction, unit));
  }

  extendSelectionVertical(
    selection: Selection,
    direction: 'up' | 'down',
    preferredX?: number
  ): {selection: Selection, preferredX: number} {
    const move = direction === 'up'
      ? this.moveCursorUp(selection.focus, preferredX)
      : this.moveCursorDown(selection.focus, preferredX);
    return {selection: selection.extendTo(move.offset), preferredX: move.preferredX};
  }

  snapSelectionToBoundaries(selection: Selection) {
    return selection.snapToGraphemeBoundaries(this.text);
  }

  //
  // Logging
  //

  repr() {
    const log = new Logger({color: false});
    this.lines.forEach((line, i) => {
      const text = loggableText(this.text.slice(line.start, line.end));
      log.text(
        `Line ${i} (W:${round(line.width)} A:${round(line.ascent)} ` +
        `D:${round(line.descent)} Y:${round(line.y)}) “${text}”\n`
      );
    });
    return log.string;
  }

  log() {
    const log = new Logger();
    log.bold();
    log.text(`TextLayout (${this.lines.length} lines, ${this.text.length} code units)`);
    log.reset();
    log.text('\n');
    log.pushIndent();

    this.lines.forEach((line, i) => {
      const text = loggableText(this.text.slice(line.start, line.end));
      log.text(
        `Line ${i} (W:${round(line.width)} A:${round(line.ascent)} ` +
        `D:${round(line.descent)} Y:${round(line.y)}) “${text}”\n`
      );
      log.pushIndent();
      for (const run of line.runs) {
        log.dim();
        log.text(`[${run.start}, ${run.end}) ${run.direction} ${run.script} `);
        log.reset();
        log.glyphs(run);
        log.text('\n');
      }
      log.popIndent();
    });

    log.popIndent();
    log.flush();
  }
}
