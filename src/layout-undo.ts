import type {Selection} from './layout-selection.js';
import type {TextEdit, TextLayout} from './layout-text.js';

interface OperationSelections {
  selectionBefore: Selection;
  selectionAfter: Selection;
}

export type TextOperation = OperationSelections & (
  | {type: 'insert', offset: number, text: string}
  | {type: 'delete', offset: number, text: string}
  | {type: 'replace', offset: number, deleted: string, inserted: string}
);

export const DEFAULT_UNDO_LIMIT = 1000;
export const DEFAULT_GROUP_THRESHOLD_MS = 500;

export function operationFromEdit(
  edit: TextEdit,
  selectionBefore: Selection,
  selectionAfter: Selection
): TextOperation {
  const {offset, deleted, inserted} = edit;
  if (!deleted) return {type: 'insert', offset, text: inserted, selectionBefore, selectionAfter};
  if (!inserted) return {type: 'delete', offset, text: deleted, selectionBefore, selectionAfter};
  return {type: 'replace', offset, deleted, inserted, selectionBefore, selectionAfter};
}

export function invertOperation(op: TextOperation): TextOperation {
  const selections = {selectionBefore: op.selectionAfter, selectionAfter: op.selectionBefore};
  switch (op.type) {
    case 'insert':
      return {type: 'delete', offset: op.offset, text: op.text, ...selections};
    case 'delete':
      return {type: 'insert', offset: op.offset, text: op.text, ...selections};
    case 'replace':
      return {type: 'replace', offset: op.offset, deleted: op.inserted, inserted: op.deleted, ...selections};
  }
}

/**
 * Whether `b`, done right after `a`, continues it: typing forward, or
 * deleting backward or forward from the same place
 */
export function canMerge(a: TextOperation, b: TextOperation) {
  if (a.type === 'insert' && b.type === 'insert') {
    return b.offset === a.offset + a.text.length;
  }
  if (a.type === 'delete' && b.type === 'delete') {
    return b.offset + b.text.length === a.offset || b.offset === a.offset;
  }
  return false;
}

export function mergeOperations(a: TextOperation, b: TextOperation): TextOperation {
  const selections = {selectionBefore: a.selectionBefore, selectionAfter: b.selectionAfter};

  if (a.type === 'insert' && b.type === 'insert') {
    return {type: 'insert', offset: a.offset, text: a.text + b.text, ...selections};
  }

  if (a.type === 'delete' && b.type === 'delete') {
    if (b.offset + b.text.length === a.offset) {
      return {type: 'delete', offset: b.offset, text: b.text + a.text, ...selections};
    }
    return {type: 'delete', offset: a.offset, text: a.text + b.text, ...selections};
  }

  throw new Error(`Cannot merge ${a.type} with ${b.type}`);
}

/**
 * Replays an operation, returning the cursor offset after it
 */
export function applyOperation(layout: TextLayout, op: TextOperation) {
  switch (op.type) {
    case 'insert':
      return layout.splice(op.offset, op.offset, op.text);
    case 'delete':
      return layout.splice(op.offset, op.offset + op.text.length, '');
    case 'replace':
      return layout.splice(op.offset, op.offset + op.deleted.length, op.inserted);
  }
}

/**
 * Operations undone and redone together
 */
export class OperationGroup {
  operations: TextOperation[];
  /** Time of the last operation added */
  timestamp: number;

  constructor(op: TextOperation, timestamp: number) {
    this.operations = [op];
    this.timestamp = timestamp;
  }

  get selectionBefore() {
    return this.operations[0].selectionBefore;
  }

  get selectionAfter() {
    const last = this.operations[this.operations.length - 1];
    return last.selectionAfter;
  }

  add(op: TextOperation, timestamp: number) {
    const last = this.operations[this.operations.length - 1];
    if (canMerge(last, op)) {
      this.operations[this.operations.length - 1] = mergeOperations(last, op);
    } else {
      this.operations.push(op);
    }
    this.timestamp = timestamp;
  }

  /**
   * Reverts the group's operations, newest first. Returns the selection to
   * restore.
   */
  revert(layout: TextLayout) {
    for (let i = this.operations.length - 1; i >= 0; i--) {
      applyOperation(layout, invertOperation(this.operations[i]));
    }
    return this.selectionBefore;
  }

  apply(layout: TextLayout) {
    for (const op of this.operations) applyOperation(layout, op);
    return this.selectionAfter;
  }
}

export class UndoStack {
  undoGroups: OperationGroup[];
  redoGroups: OperationGroup[];
  limit: number;
  grouping: boolean;
  groupThreshold: number;
  /** Set by breakGroup, the next push starts a new group */
  sealed: boolean;

  constructor(limit = DEFAULT_UNDO_LIMIT, groupThreshold = DEFAULT_GROUP_THRESHOLD_MS) {
    this.undoGroups = [];
    this.redoGroups = [];
    this.limit = limit;
    this.grouping = true;
    this.groupThreshold = groupThreshold;
    this.sealed = false;
  }

  push(op: TextOperation, timestamp = Date.now()) {
    this.redoGroups.length = 0;

    const top = this.undoGroups.at(-1);
    if (
      top &&
      this.grouping &&
      !this.sealed &&
      timestamp - top.timestamp <= this.groupThreshold &&
      canMerge(top.operations[top.operations.length - 1], op)
    ) {
      top.add(op, timestamp);
    } else {
      this.undoGroups.push(new OperationGroup(op, timestamp));
      this.trim();
    }

    this.sealed = false;
  }

  breakGroup() {
    this.sealed = true;
  }

  undo(): OperationGroup | undefined {
    const group = this.undoGroups.pop();
    if (group) this.redoGroups.push(group);
    this.sealed = true;
    return group;
  }

  redo(): OperationGroup | undefined {
    const group = this.redoGroups.pop();
    if (group) this.undoGroups.push(group);
    this.sealed = true;
    return group;
  }

  canUndo() {
    return this.undoGroups.length > 0;
  }

  canRedo() {
    return this.redoGroups.length > 0;
  }

  clear() {
    this.undoGroups.length = 0;
    this.redoGroups.length = 0;
    this.sealed = false;
  }

  setLimit(limit: number) {
    this.limit = Math.max(1, limit);
    this.trim();
  }

  setGrouping(grouping: boolean) {
    this.grouping = grouping;
  }

  private trim() {
    if (this.undoGroups.length > this.limit) {
      this.undoGroups.splice(0, this.undoGroups.length - this.limit);
    }
  }
}
