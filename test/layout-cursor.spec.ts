import {describe, it, expect} from 'vitest';
import {
  Cursor,
  CursorPosition,
  DEFAULT_BLINK_INTERVAL,
  moveLeftCharacter,
  moveLeftWord,
  moveRightCharacter,
  moveRightWord
} from '../src/layout-cursor.js';
import {Selection} from '../src/layout-selection.js';

describe('Cursor', function () {
  it('starts visible at the beginning', function () {
    const cursor = new Cursor();
    expect(cursor.offset).toBe(0);
    expect(cursor.visible).toBe(true);
    expect(cursor.blinkInterval).toBe(DEFAULT_BLINK_INTERVAL);
  });

  it('blinks once per interval', function () {
    const cursor = new Cursor();
    expect(cursor.updateBlink(0.25)).toBe(false);
    expect(cursor.visible).toBe(true);
    expect(cursor.updateBlink(0.25)).toBe(true);
    expect(cursor.visible).toBe(false);
    expect(cursor.updateBlink(0.5)).toBe(true);
    expect(cursor.visible).toBe(true);
  });

  it('does not blink faster than the minimum', function () {
    const cursor = new Cursor();
    cursor.setBlinkInterval(0.01);
    expect(cursor.blinkInterval).toBe(0.1);
  });

  it('shows itself and forgets the column when moved', function () {
    const cursor = new Cursor();
    cursor.updateBlink(0.5);
    cursor.preferredX = 40;
    cursor.moveTo(new CursorPosition(3, 'upstream'));
    expect(cursor.visible).toBe(true);
    expect(cursor.blinkTime).toBe(0);
    expect(cursor.preferredX).toBeUndefined();
    expect(cursor.position.equals(new CursorPosition(3, 'upstream'))).toBe(true);
  });

  it('snaps positions to graphemes', function () {
    const position = new CursorPosition(1, 'upstream').snapToGraphemeBoundary('e\u0301');
    expect(position).toEqual(new CursorPosition(0, 'upstream'));
  });
});

describe('Movement', function () {
  it('moves by grapheme', function () {
    expect(moveRightCharacter('e\u0301x', 0)).toBe(2);
    expect(moveLeftCharacter('e\u0301x', 2)).toBe(0);
    expect(moveLeftCharacter('e\u0301x', 0)).toBe(0);
    expect(moveRightCharacter('e\u0301x', 3)).toBe(3);
  });

  it('moves by word', function () {
    const text = 'Hello, world!';
    expect(moveRightWord(text, 0)).toBe(5);
    expect(moveRightWord(text, 5)).toBe(12);
    expect(moveRightWord(text, 12)).toBe(13);
    expect(moveLeftWord(text, 13)).toBe(7);
    expect(moveLeftWord(text, 7)).toBe(0);
    expect(moveLeftWord(text, 0)).toBe(0);
  });
});

describe('Selection', function () {
  it('orders its ends', function () {
    const s = new Selection(8, 3);
    expect(s.start).toBe(3);
    expect(s.end).toBe(8);
    expect(s.length).toBe(5);
    expect(s.range).toEqual({start: 3, end: 8});
    expect(s.isBackward()).toBe(true);
    expect(s.isForward()).toBe(false);
    expect(s.isCollapsed()).toBe(false);
  });

  it('extends from its anchor', function () {
    const s = Selection.collapsed(4).extendTo(1).extendTo(6);
    expect(s).toEqual(new Selection(4, 6));
    expect(s.flip()).toEqual(new Selection(6, 4));
  });

  it('collapses', function () {
    const s = new Selection(8, 3);
    expect(s.collapseToStart()).toEqual(Selection.collapsed(3));
    expect(s.collapseToEnd()).toEqual(Selection.collapsed(8));
    expect(s.collapseToAnchor()).toEqual(Selection.collapsed(8));
    expect(s.collapseToFocus()).toEqual(Selection.collapsed(3));
    expect(s.moveTo(5).isCollapsed()).toBe(true);
  });

  it('reads its text', function () {
    const s = new Selection(0, 5);
    expect(s.text('Hello world')).toBe('Hello');
    expect(s.contains(4)).toBe(true);
    expect(s.contains(5)).toBe(false);
  });

  it('snaps to graphemes', function () {
    expect(new Selection(1, 99).snapToGraphemeBoundaries('e\u0301x')).toEqual(new Selection(0, 3));
  });

  it('prints', function () {
    expect(String(new Selection(2, 5))).toBe('Selection(2 → 5)');
    expect(new Selection(2, 5).equals(new Selection(2, 5))).toBe(true);
  });
});
