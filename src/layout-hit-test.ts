import {CursorPosition} from './layout-cursor.js';
import {LineBox} from './layout-linebox.js';
import {binarySearchFloorOf} from './util.js';

import type {CursorAffinity} from './layout-cursor.js';

export type HitTestPolicy = 'clamp' | 'strict';

export interface Point {
  x: number;
  y: number;
}

/**
 * Layout-local coordinates of a caret
 */
export interface Position {
  x: number;
  y: number;
  lineIndex: number;
}

export class HitTestResult {
  offset: number;
  affinity: CursorAffinity;
  lineIndex: number;

  constructor(offset: number, affinity: CursorAffinity, lineIndex: number) {
    this.offset = offset;
    this.affinity = affinity;
    this.lineIndex = lineIndex;
  }

  toCursorPosition() {
    return new CursorPosition(this.offset, this.affinity);
  }
}

/**
 * Line under `y`. Clamp snaps points above or below the text to the first or
 * last line.
 */
export function lineIndexAtY(lines: LineBox[], y: number, policy: HitTestPolicy) {
  if (!lines.length) return;

  const first = lines[0];
  const last = lines[lines.length - 1];

  if (y < first.y) return policy === 'clamp' ? 0 : undefined;
  if (y >= last.bottomY()) return policy === 'clamp' ? lines.length - 1 : undefined;

  return Math.max(0, binarySearchFloorOf(lines, y, line => line.y));
}

function affinityAt(line: LineBox, offset: number, x: number, isLast: boolean): CursorAffinity {
  if (offset === line.end && !line.hardBreak && !isLast && line.end > line.start) {
    return 'upstream';
  }
  return Math.abs(line.xAtOffset(offset, 'downstream') - x) > 1e-6 ? 'upstream' : 'downstream';
}

/**
 * Offset nearest to `x` on one line. The left half of a grapheme resolves to
 * the offset at its left edge, the right half to the one at its right edge.
 */
export function hitTestLine(
  line: LineBox,
  lineIndex: number,
  x: number,
  policy: HitTestPolicy,
  isLast = false
): HitTestResult | undefined {
  if (policy === 'strict' && (x < 0 || x > line.width)) return;

  let offset: number | undefined;
  let edge = 0;

  if (x <= 0) {
    offset = line.visualStartOffset();
  } else if (x >= line.width) {
    offset = line.visualEndOffset();
    edge = line.width;
  } else {
    for (const caret of line.carets) {
      if (x >= caret.x0 && x < caret.x1) {
        if (x < (caret.x0 + caret.x1) / 2) {
          offset = LineBox.leftOffset(caret);
          edge = caret.x0;
        } else {
          offset = LineBox.rightOffset(caret);
          edge = caret.x1;
        }
        break;
      }
    }
    if (offset === undefined) {
      offset = line.visualEndOffset();
      edge = line.width;
    }
  }

  return new HitTestResult(offset, affinityAt(line, offset, edge, isLast), lineIndex);
}

export function hitTest(
  lines: LineBox[],
  point: Point,
  policy: HitTestPolicy = 'clamp'
): HitTestResult | undefined {
  const lineIndex = lineIndexAtY(lines, point.y, policy);
  if (lineIndex === undefined) return;
  const isLast = lineIndex === lines.length - 1;
  return hitTestLine(lines[lineIndex], lineIndex, point.x, policy, isLast);
}
