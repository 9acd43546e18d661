import {describe, it, expect} from 'vitest';
import {TextEditor} from '../src/editor.js';
import {Selection} from '../src/layout-selection.js';
import {layout} from './fixtures.js';

function editor(text: string) {
  let now = 0;
  const e = new TextEditor(layout(text), {clock: () => now});
  return {
    e,
    wait(ms: number) {
      now += ms;
    }
  };
}

describe('TextEditor', function () {
  it('undoes a burst of typing at once', function () {
    const {e, wait} = editor('');
    e.insertText('a');
    wait(100);
    e.insertText('b');
    wait(100);
    e.insertText('c');
    expect(e.text).toBe('abc');
    expect(e.history.undoGroups.length).toBe(1);

    expect(e.undo()).toBe(true);
    expect(e.text).toBe('');
    expect(e.selection).toEqual(Selection.collapsed(0));

    expect(e.redo()).toBe(true);
    expect(e.text).toBe('abc');
    expect(e.selection).toEqual(Selection.collapsed(3));
  });

  it('splits typing separated by a pause', function () {
    const {e, wait} = editor('');
    e.insertText('a');
    wait(1000);
    e.insertText('b');
    e.undo();
    expect(e.text).toBe('a');
  });

  it('has nothing to undo at first', function () {
    const {e} = editor('abc');
    expect(e.undo()).toBe(false);
    expect(e.redo()).toBe(false);
  });

  it('undoes backspaces together', function () {
    const {e} = editor('Hello');
    e.moveRight('document');
    e.backspace();
    e.backspace();
    expect(e.text).toBe('Hel');
    expect(e.selection).toEqual(Selection.collapsed(3));
    e.undo();
    expect(e.text).toBe('Hello');
    expect(e.selection).toEqual(Selection.collapsed(5));
  });

  it('undoes a combining mark on its own', function () {
    const {e} = editor('e');
    e.moveRight('document');
    e.insertText('\u0301');
    expect(e.text).toBe('e\u0301');
    e.undo();
    expect(e.text).toBe('e');
  });

  it('replaces the selection when typing', function () {
    const {e} = editor('Hello world');
    e.selectAll();
    e.insertText('x');
    expect(e.text).toBe('x');
    e.undo();
    expect(e.text).toBe('Hello world');
    expect(e.selection).toEqual(new Selection(0, 11));
  });

  it('deletes the selection', function () {
    const {e} = editor('Hello world');
    e.selectAll();
    e.backspace();
    expect(e.text).toBe('');
  });

  it('deletes words and lines', function () {
    const {e} = editor('Line 1\nLine 2');
    e.clickAt({x: 0, y: 15});
    expect(e.selection).toEqual(Selection.collapsed(7));
    e.deleteLine();
    expect(e.text).toBe('Line 1\n');
    e.undo();
    expect(e.text).toBe('Line 1\nLine 2');

    e.moveRight('document');
    e.deleteWordBackward();
    expect(e.text).toBe('Line 1\nLine ');
    e.moveLeft('document');
    e.deleteWordForward();
    expect(e.text).toBe(' 1\nLine ');
  });

  it('inserts breaks', function () {
    const {e} = editor('ab');
    e.moveRight();
    e.insertNewline();
    e.insertTab();
    expect(e.text).toBe('a\n\tb');
    e.deleteForward();
    expect(e.text).toBe('a\n\t');
  });

  it('clicks, double-clicks and drags', function () {
    const {e} = editor('Hello world');
    e.clickAt({x: 72, y: 5}, 2);
    expect(e.selection).toEqual(new Selection(6, 11));
    e.clickAt({x: 72, y: 5}, 3);
    expect(e.selection).toEqual(new Selection(0, 11));

    e.clickAt({x: 22, y: 5});
    expect(e.selection).toEqual(Selection.collapsed(2));
    e.dragTo({x: 80, y: 5});
    expect(e.selection).toEqual(new Selection(2, 8));
    e.clickAt({x: 0, y: 5}, 1, true);
    expect(e.selection).toEqual(new Selection(2, 0));
  });

  it('collapses or extends on arrow keys', function () {
    const {e} = editor('Hello world');
    e.selectAll();
    e.moveLeft();
    expect(e.selection).toEqual(Selection.collapsed(0));
    e.moveRight('word', true);
    expect(e.selection).toEqual(new Selection(0, 5));
    e.moveRight();
    expect(e.selection).toEqual(Selection.collapsed(5));
  });

  it('keeps its column moving down', function () {
    const {e} = editor('Long line here\nab\nLong line here');
    e.clickAt({x: 100, y: 5});
    expect(e.cursor.offset).toBe(10);
    e.moveDown();
    expect(e.cursor.offset).toBe(17);
    expect(e.cursor.preferredX).toBe(100);
    e.moveDown();
    expect(e.cursor.offset).toBe(28);
    e.moveUp(true);
    expect(e.selection).toEqual(new Selection(28, 17));
  });

  it('reports the caret and selection geometry', function () {
    const {e} = editor('Hello world');
    e.clickAt({x: 22, y: 5});
    expect(e.cursorRect()).toEqual({x: 20, y: 0, width: 1, height: 10});
    e.moveRight('word', true);
    expect(e.selectionRects()).toEqual([{x: 20, y: 0, width: 30, height: 10}]);
  });
});
