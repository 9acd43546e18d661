import {Cursor, CursorPosition} from './layout-cursor.js';
import {Selection} from './layout-selection.js';
import {UndoStack, operationFromEdit} from './layout-undo.js';

import type {TextLayout} from './layout-text.js';
import type {CursorAffinity, CursorRect, MovementUnit} from './layout-cursor.js';
import type {Point} from './layout-hit-test.js';
import type {SelectionRect} from './layout-selection.js';

export interface TextEditorOptions {
  undoLimit?: number;
  /** Milliseconds, used to group edits for undo */
  clock?: () => number;
}

/**
 * An editing session over one layout: caret, selection and history. Input
 * handlers call these with already-decoded keys and pointer positions.
 */
export class TextEditor {
  layout: TextLayout;
  cursor: Cursor;
  selection: Selection;
  history: UndoStack;
  clock: () => number;

  constructor(layout: TextLayout, options: TextEditorOptions = {}) {
    this.layout = layout;
    this.cursor = new Cursor();
    this.selection = Selection.collapsed(0);
    this.history = new UndoStack(options.undoLimit);
    this.clock = options.clock ?? Date.now;
  }

  get text() {
    return this.layout.text;
  }

  private place(offset: number, affinity: CursorAffinity = 'downstream') {
    this.selection = Selection.collapsed(offset);
    this.cursor.moveTo(new CursorPosition(offset, affinity));
  }

  private select(selection: Selection) {
    this.selection = selection;
    this.cursor.moveTo(new CursorPosition(selection.focus));
  }

  /**
   * Runs an edit and records what it changed
   */
  private change(edit: () => number) {
    const before = this.selection;
    this.layout.lastEdit = undefined;
    const offset = edit();
    this.place(offset);
    const {lastEdit} = this.layout;
    if (lastEdit) {
      this.history.push(operationFromEdit(lastEdit, before, this.selection), this.clock());
    }
  }

  insertText(str: string) {
    const {layout, selection} = this;
    this.change(() => selection.isCollapsed()
      ? layout.insertStr(selection.focus, str)
      : layout.replaceSelection(selection, str));
  }

  insertNewline() {
    this.insertText('\n');
  }

  insertTab() {
    this.insertText('\t');
  }

  private deleteWith(collapsed: (offset: number) => number) {
    const {layout, selection} = this;
    if (!selection.isCollapsed()) this.history.breakGroup();
    this.change(() => selection.isCollapsed()
      ? collapsed(selection.focus)
      : layout.deleteSelection(selection));
  }

  backspace() {
    this.deleteWith(offset => this.layout.deleteBackward(offset));
  }

  deleteForward() {
    this.deleteWith(offset => this.layout.deleteForward(offset));
  }

  deleteWordBackward() {
    this.deleteWith(offset => this.layout.deleteWordBackward(offset));
  }

  deleteWordForward() {
    this.deleteWith(offset => this.layout.deleteWordForward(offset));
  }

  deleteLine() {
    this.history.breakGroup();
    this.change(() => this.layout.deleteLine(this.selection.focus));
    this.history.breakGroup();
  }

  private moveHorizontal(direction: 'left' | 'right', unit: MovementUnit, extend: boolean) {
    const {layout, selection} = this;
    this.history.breakGroup();

    if (extend) {
      this.select(layout.extendSelection(selection, direction, unit));
    } else if (!selection.isCollapsed() && unit === 'character') {
      this.place(direction === 'left' ? selection.start : selection.end);
    } else {
      const position = layout.movePosition(selection.focus, direction, unit);
      this.place(position.offset, position.affinity);
    }
  }

  moveLeft(unit: MovementUnit = 'character', extend = false) {
    this.moveHorizontal('left', unit, extend);
  }

  moveRight(unit: MovementUnit = 'character', extend = false) {
    this.moveHorizontal('right', unit, extend);
  }

  private moveVertical(direction: 'up' | 'down', extend: boolean) {
    const {layout, cursor, selection} = this;
    const affinity = cursor.position.affinity;
    this.history.breakGroup();

    const move = direction === 'up'
      ? layout.moveCursorUp(selection.focus, cursor.preferredX, affinity)
      : layout.moveCursorDown(selection.focus, cursor.preferredX, affinity);

    if (extend) {
      this.select(selection.extendTo(move.offset));
    } else {
      this.place(move.offset, move.affinity);
    }

    this.cursor.preferredX = move.preferredX;
  }

  moveUp(extend = false) {
    this.moveVertical('up', extend);
  }

  moveDown(extend = false) {
    this.moveVertical('down', extend);
  }

  selectAll() {
    this.select(new Selection(0, this.text.length));
  }

  /**
   * Pointer press: 1 places the caret, 2 selects a word, 3 a paragraph.
   * With `extend` the current anchor is kept.
   */
  clickAt(point: Point, clickCount = 1, extend = false) {
    const hit = this.layout.hitTest(point, 'clamp');
    if (!hit) return;
    this.history.breakGroup();

    if (extend) {
      this.select(this.selection.extendTo(hit.offset));
    } else if (clickCount === 2) {
      this.select(this.layout.selectWordAt(hit.offset));
    } else if (clickCount >= 3) {
      this.select(this.layout.selectParagraphAt(hit.offset));
    } else {
      this.place(hit.offset, hit.affinity);
    }
  }

  dragTo(point: Point) {
    const hit = this.layout.hitTest(point, 'clamp');
    if (hit) this.select(this.selection.extendTo(hit.offset));
  }

  undo() {
    const group = this.history.undo();
    if (!group) return false;
    this.select(group.revert(this.layout));
    return true;
  }

  redo() {
    const group = this.history.redo();
    if (!group) return false;
    this.select(group.apply(this.layout));
    return true;
  }

  cursorRect(): CursorRect | undefined {
    return this.layout.cursorRectAtPosition(this.cursor.position);
  }

  selectionRects(): SelectionRect[] {
    return this.layout.selectionRects(this.selection);
  }
}
