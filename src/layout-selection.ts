import {snapToGraphemeBoundary} from './text-segment.js';

import type {TextRange} from './text-segment.js';

export interface SelectionRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * A range between where the selection began (anchor) and where it is being
 * extended (focus). Either may be larger.
 */
export class Selection {
  anchor: number;
  focus: number;

  constructor(anchor: number, focus = anchor) {
    this.anchor = anchor;
    this.focus = focus;
  }

  static collapsed(offset: number) {
    return new Selection(offset, offset);
  }

  get start() {
    return Math.min(this.anchor, this.focus);
  }

  get end() {
    return Math.max(this.anchor, this.focus);
  }

  get range(): TextRange {
    return {start: this.start, end: this.end};
  }

  get length() {
    return this.end - this.start;
  }

  isCollapsed() {
    return this.anchor === this.focus;
  }

  isForward() {
    return this.focus > this.anchor;
  }

  isBackward() {
    return this.focus < this.anchor;
  }

  contains(offset: number) {
    return offset >= this.start && offset < this.end;
  }

  text(source: string) {
    return source.slice(this.start, this.end);
  }

  extendTo(offset: number) {
    return new Selection(this.anchor, offset);
  }

  moveTo(offset: number) {
    return Selection.collapsed(offset);
  }

  collapseToStart() {
    return Selection.collapsed(this.start);
  }

  collapseToEnd() {
    return Selection.collapsed(this.end);
  }

  collapseToAnchor() {
    return Selection.collapsed(this.anchor);
  }

  collapseToFocus() {
    return Selection.collapsed(this.focus);
  }

  flip() {
    return new Selection(this.focus, this.anchor);
  }

  /**
   * Clamps both ends to the text and pulls each back to a grapheme boundary
   */
  snapToGraphemeBoundaries(source: string) {
    return new Selection(
      snapToGraphemeBoundary(source, this.anchor),
      snapToGraphemeBoundary(source, this.focus)
    );
  }

  equals(other: Selection) {
    return this.anchor === other.anchor && this.focus === other.focus;
  }

  toString() {
    return `Selection(${this.anchor} → ${this.focus})`;
  }
}
