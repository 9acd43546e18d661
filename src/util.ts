import type {ShapedRun} from './text-shape.js';

/**
 * Binary search that returns the index of the last element less than or equal
 * to `x`, or -1 if every element is greater. Equal runs resolve to their last
 * element.
 */
export function binarySearchFloor(a: ArrayLike<number>, x: number) {
  let l = 0, r = a.length - 1, found = -1;

  while (l <= r) {
    const i = (l + r) >>> 1;
    if (a[i] <= x) {
      found = i;
      l = i + 1;
    } else {
      r = i - 1;
    }
  }

  return found;
}

/**
 * Same as binarySearchFloor, but reads the key with `start`
 */
export function binarySearchFloorOf<T>(
  a: T[],
  x: number,
  start: (item: T) => number
): number {
  let l = 0, r = a.length - 1, found = -1;

  while (l <= r) {
    const i = (l + r) >>> 1;
    if (start(a[i]) <= x) {
      found = i;
      l = i + 1;
    } else {
      r = i - 1;
    }
  }

  return found;
}

let _id = 0;
export function id(): number {
  return _id++;
}

export function clamp(x: number, min: number, max: number) {
  return Math.max(min, Math.min(max, x));
}

export function loggableText(text: string): string {
  return text.replace(/\r?\n|\r/g, '⏎').replace(/\t/g, '␉');
}

export function basename(url: URL) {
  return url.href.slice(url.href.lastIndexOf('/') + 1);
}

export function round(n: number) {
  return Math.round(n * 100) / 100;
}

export interface LoggerOptions {
  /** ANSI escapes for bold/dim, on by default */
  color?: boolean;
}

export class Logger {
  string: string;
  indent: string[];
  lineIsEmpty: boolean;
  color: boolean;

  constructor(options?: LoggerOptions) {
    this.string = '';
    this.indent = [];
    this.lineIsEmpty = false;
    this.color = options?.color ?? true;
  }

  bold() {
    if (this.color) this.string += '\x1b[1m';
  }

  dim() {
    if (this.color) this.string += '\x1b[2m';
  }

  reset() {
    if (this.color) this.string += '\x1b[0m';
  }

  flush() {
    console.log(this.string);
    this.string = '';
  }

  text(str: string | number) {
    const lines = String(str).split('\n');

    const append = (s: string) => {
      if (s) {
        if (this.lineIsEmpty) this.string += this.indent.join('');
        this.string += s;
        this.lineIsEmpty = false;
      }
    };

    for (let i = 0; i < lines.length; i++) {
      if (i === 0) {
        append(lines[i]);
      } else {
        this.string += '\n';
        this.lineIsEmpty = true;
        append(lines[i]);
      }
    }
  }

  /**
   * Glyph ids of a run, with multi-glyph clusters in bold and parentheses
   */
  glyphs(run: ShapedRun) {
    const {glyphs, clusters} = run;
    for (let i = 0; i < glyphs.length; i++) {
      const cl = clusters[i];
      const isp = i - 1 >= 0 && clusters[i - 1] === cl;
      const isn = i + 1 < glyphs.length && clusters[i + 1] === cl;
      if (isp || isn) this.bold();
      if (isn && !isp) this.text('(');
      this.text(glyphs[i]);
      if (!isn && isp) this.text(')');
      this.text(' ');
      if (isp || isn) this.reset();
    }
  }

  pushIndent(indent = '  ') {
    this.indent.push(indent);
  }

  popIndent() {
    this.indent.pop();
  }
}
