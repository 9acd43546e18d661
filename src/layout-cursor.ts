import {
  computeWordBoundaries,
  nextGraphemeBoundary,
  prevGraphemeBoundary,
  snapToGraphemeBoundary
} from './text-segment.js';

export type CursorAffinity = 'upstream' | 'downstream';

export type MovementUnit = 'character' | 'word' | 'line' | 'document';

export type MovementDirection = 'left' | 'right';

export interface CursorRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export class CursorPosition {
  offset: number;
  /**
   * Which side of an ambiguous boundary the caret draws on: upstream sticks
   * to the text before the offset (end of a wrapped line), downstream to the
   * text after it
   */
  affinity: CursorAffinity;

  constructor(offset: number, affinity: CursorAffinity = 'downstream') {
    this.offset = offset;
    this.affinity = affinity;
  }

  snapToGraphemeBoundary(text: string) {
    return new CursorPosition(snapToGraphemeBoundary(text, this.offset), this.affinity);
  }

  equals(other: CursorPosition) {
    return this.offset === other.offset && this.affinity === other.affinity;
  }
}

export const DEFAULT_BLINK_INTERVAL = 0.5;
export const MIN_BLINK_INTERVAL = 0.1;

/**
 * Caret state owned by an editing session: its position, the x column kept
 * across vertical moves, and blinking
 */
export class Cursor {
  position: CursorPosition;
  visible: boolean;
  /** Seconds since the last visibility toggle */
  blinkTime: number;
  blinkInterval: number;
  preferredX: number | undefined;

  constructor(position = new CursorPosition(0)) {
    this.position = position;
    this.visible = true;
    this.blinkTime = 0;
    this.blinkInterval = DEFAULT_BLINK_INTERVAL;
    this.preferredX = undefined;
  }

  get offset() {
    return this.position.offset;
  }

  setBlinkInterval(seconds: number) {
    this.blinkInterval = Math.max(MIN_BLINK_INTERVAL, seconds);
  }

  /**
   * Advances the blink clock. Returns true if visibility changed.
   */
  updateBlink(dt: number) {
    const visible = this.visible;
    this.blinkTime += dt;
    while (this.blinkTime >= this.blinkInterval) {
      this.blinkTime -= this.blinkInterval;
      this.visible = !this.visible;
    }
    return visible !== this.visible;
  }

  resetBlink() {
    this.visible = true;
    this.blinkTime = 0;
  }

  /**
   * Places the caret and forgets the vertical-movement column
   */
  moveTo(position: CursorPosition) {
    this.position = position;
    this.preferredX = undefined;
    this.resetBlink();
  }
}

export function moveLeftCharacter(text: string, offset: number) {
  offset = snapToGraphemeBoundary(text, offset);
  return prevGraphemeBoundary(text, offset) ?? 0;
}

export function moveRightCharacter(text: string, offset: number) {
  offset = snapToGraphemeBoundary(text, offset);
  return nextGraphemeBoundary(text, offset) ?? text.length;
}

/**
 * Start of the last word beginning before `offset`, or 0
 */
export function moveLeftWord(text: string, offset: number) {
  offset = snapToGraphemeBoundary(text, offset);
  let target = 0;
  for (const word of computeWordBoundaries(text)) {
    if (word.start >= offset) break;
    if (word.kind === 'word') target = word.start;
  }
  return target;
}

/**
 * End of the word containing or following `offset`, or the end of the text
 */
export function moveRightWord(text: string, offset: number) {
  offset = snapToGraphemeBoundary(text, offset);
  for (const word of computeWordBoundaries(text)) {
    if (word.kind === 'word' && word.end > offset) return word.end;
  }
  return text.length;
}
