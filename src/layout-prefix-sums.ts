import {binarySearchFloor} from './util.js';

import type {TextRange} from './text-segment.js';

function countCodePoints(text: string, start: number, end: number) {
  let count = 0;
  for (let i = start; i < end; i++) {
    const code = text.charCodeAt(i);
    // skip the low half of a surrogate pair
    if (code >= 0xdc00 && code <= 0xdfff && i > start) {
      const prev = text.charCodeAt(i - 1);
      if (prev >= 0xd800 && prev <= 0xdbff) continue;
    }
    count++;
  }
  return count;
}

/**
 * Start offsets (code units) and start chars (code points) of every line, for
 * line lookups by binary search
 */
export class PrefixSums {
  offsets: number[];
  chars: number[];
  totalChars: number;

  constructor(offsets: number[], chars: number[], totalChars: number) {
    this.offsets = offsets;
    this.chars = chars;
    this.totalChars = totalChars;
  }

  static fromLines(text: string, lines: TextRange[]) {
    const offsets: number[] = [];
    const chars: number[] = [];
    let total = 0;

    for (const line of lines) {
      offsets.push(line.start);
      chars.push(total);
      total += countCodePoints(text, line.start, line.end);
    }

    return new PrefixSums(offsets, chars, total);
  }

  get lineCount() {
    return this.offsets.length;
  }

  /**
   * Index of the last line starting at or before `offset`
   */
  lineAtOffset(offset: number) {
    return Math.max(0, binarySearchFloor(this.offsets, offset));
  }

  lineAtChar(char: number) {
    return Math.max(0, binarySearchFloor(this.chars, char));
  }

  offsetAtLine(line: number): number | undefined {
    return this.offsets[line];
  }

  charOffsetAtLine(line: number): number | undefined {
    return this.chars[line];
  }
}
