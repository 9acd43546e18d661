import {FontFace} from '../src/text-font.js';
import {MonospaceShaper} from '../src/text-shape.js';
import {TextLayout} from '../src/layout-text.js';
import {graphemeClusters} from '../src/text-segment.js';

import type {LayoutOptions} from '../src/layout-text.js';

// at 10px: ascent 8, descent 2, no gap, so every line is 10px tall
export const metrics = {ascent: 800, descent: 200, lineGap: 0, unitsPerEm: 1000};

export const font = new FontFace(metrics);

// one column is 10px at 10px
export const shaper = new MonospaceShaper(1);

export function layout(text: string, options: LayoutOptions = {}) {
  return new TextLayout(text, font, 10, {shaper, ...options});
}

export function boundaries(text: string) {
  return [0, ...graphemeClusters(text).map(g => g.end)];
}

export function ranges(l: TextLayout) {
  return l.lines.map(line => [line.start, line.end]);
}
