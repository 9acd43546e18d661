import {describe, it, expect} from 'vitest';
import {
  UndoStack,
  applyOperation,
  canMerge,
  invertOperation,
  mergeOperations,
  operationFromEdit
} from '../src/layout-undo.js';
import {Selection} from '../src/layout-selection.js';
import {layout} from './fixtures.js';

import type {TextOperation} from '../src/layout-undo.js';

const none = {selectionBefore: Selection.collapsed(0), selectionAfter: Selection.collapsed(0)};

function insert(offset: number, text: string): TextOperation {
  return {type: 'insert', offset, text, ...none};
}

function remove(offset: number, text: string): TextOperation {
  return {type: 'delete', offset, text, ...none};
}

describe('Operations', function () {
  it('come from edits', function () {
    expect(operationFromEdit({offset: 2, deleted: '', inserted: 'x'}, none.selectionBefore, none.selectionAfter))
      .toEqual(insert(2, 'x'));
    expect(operationFromEdit({offset: 2, deleted: 'y', inserted: ''}, none.selectionBefore, none.selectionAfter))
      .toEqual(remove(2, 'y'));
    expect(operationFromEdit({offset: 2, deleted: 'y', inserted: 'x'}, none.selectionBefore, none.selectionAfter))
      .toMatchObject({type: 'replace', offset: 2, deleted: 'y', inserted: 'x'});
  });

  it('invert', function () {
    const op: TextOperation = {
      type: 'replace',
      offset: 1,
      deleted: 'ab',
      inserted: 'c',
      selectionBefore: new Selection(1, 3),
      selectionAfter: Selection.collapsed(2)
    };
    expect(invertOperation(op)).toEqual({
      type: 'replace',
      offset: 1,
      deleted: 'c',
      inserted: 'ab',
      selectionBefore: Selection.collapsed(2),
      selectionAfter: new Selection(1, 3)
    });
    expect(invertOperation(insert(3, 'x'))).toEqual(remove(3, 'x'));
  });

  it('merge typing and deleting', function () {
    expect(canMerge(insert(0, 'ab'), insert(2, 'c'))).toBe(true);
    expect(canMerge(insert(0, 'ab'), insert(5, 'c'))).toBe(false);
    expect(canMerge(remove(4, 'o'), remove(3, 'l'))).toBe(true);
    expect(canMerge(remove(3, 'l'), remove(3, 'o'))).toBe(true);
    expect(canMerge(insert(0, 'a'), remove(0, 'a'))).toBe(false);

    expect(mergeOperations(insert(0, 'ab'), insert(2, 'c'))).toEqual(insert(0, 'abc'));
    expect(mergeOperations(remove(4, 'o'), remove(3, 'l'))).toEqual(remove(3, 'lo'));
    expect(mergeOperations(remove(3, 'l'), remove(3, 'o'))).toEqual(remove(3, 'lo'));
    expect(() => mergeOperations(insert(0, 'a'), remove(0, 'a'))).toThrow('Cannot merge insert with delete');
  });

  it('replay without snapping', function () {
    const l = layout('e\u0301');
    expect(applyOperation(l, remove(1, '\u0301'))).toBe(1);
    expect(l.text).toBe('e');
    expect(applyOperation(l, insert(1, '\u0301'))).toBe(2);
    expect(l.text).toBe('e\u0301');
  });
});

describe('UndoStack', function () {
  it('groups operations close in time', function () {
    const stack = new UndoStack();
    stack.push(insert(0, 'a'), 0);
    stack.push(insert(1, 'b'), 100);
    stack.push(insert(2, 'c'), 1000);
    expect(stack.undoGroups.length).toBe(2);
    expect(stack.undoGroups[0].operations).toEqual([insert(0, 'ab')]);
  });

  it('starts a new group after breakGroup', function () {
    const stack = new UndoStack();
    stack.push(insert(0, 'a'), 0);
    stack.breakGroup();
    stack.push(insert(1, 'b'), 10);
    expect(stack.undoGroups.length).toBe(2);
  });

  it('keeps unmergeable operations of one group apart', function () {
    const stack = new UndoStack();
    stack.push(insert(0, 'a'), 0);
    stack.undoGroups[0].add(remove(0, 'a'), 10);
    expect(stack.undoGroups[0].operations.length).toBe(2);
    expect(stack.undoGroups[0].timestamp).toBe(10);
  });

  it('does not group when grouping is off', function () {
    const stack = new UndoStack();
    stack.setGrouping(false);
    stack.push(insert(0, 'a'), 0);
    stack.push(insert(1, 'b'), 0);
    expect(stack.undoGroups.length).toBe(2);
  });

  it('moves groups between undo and redo', function () {
    const stack = new UndoStack();
    stack.push(insert(0, 'a'), 0);
    expect(stack.canUndo()).toBe(true);
    expect(stack.canRedo()).toBe(false);

    const group = stack.undo();
    expect(group?.operations).toEqual([insert(0, 'a')]);
    expect(stack.canRedo()).toBe(true);
    expect(stack.redo()).toBe(group);
    expect(stack.redo()).toBeUndefined();

    stack.undo();
    stack.push(insert(0, 'b'), 5000);
    expect(stack.canRedo()).toBe(false);
  });

  it('drops the oldest groups past the limit', function () {
    const stack = new UndoStack(2);
    stack.push(insert(0, 'a'), 0);
    stack.push(insert(0, 'b'), 1000);
    stack.push(insert(0, 'c'), 2000);
    expect(stack.undoGroups.map(g => g.operations[0])).toEqual([insert(0, 'b'), insert(0, 'c')]);

    stack.setLimit(1);
    expect(stack.undoGroups.length).toBe(1);
    stack.clear();
    expect(stack.canUndo()).toBe(false);
  });
});
