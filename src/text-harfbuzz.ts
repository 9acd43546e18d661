import {guessScript, runDirection} from './text-shape.js';

import type {HarfBuzz} from 'harfbuzzjs';
import type {FontFace} from './text-font.js';
import type {GlyphPosition, ShapedRun, Shaper} from './text-shape.js';
import type {TextRange} from './text-segment.js';

let hb: HarfBuzz | undefined;
let hbPromise: Promise<HarfBuzz> | undefined;

/**
 * Loads the HarfBuzz wasm module. Fonts can only be created after this
 * resolves.
 */
export function loadHarfbuzz(): Promise<HarfBuzz> {
  if (!hbPromise) {
    hbPromise = import('harfbuzzjs').then(async mod => {
      hb = await mod.default;
      return hb;
    });
  }
  return hbPromise;
}

export function getHarfbuzz(): HarfBuzz {
  if (!hb) throw new Error('HarfBuzz is not loaded. Await loadHarfbuzz() first.');
  return hb;
}

export class HarfbuzzShaper implements Shaper {
  shape(text: string, range: TextRange, font: FontFace, size: number, level: number): ShapedRun {
    const hbFont = font.hbFont;
    if (!hbFont) {
      throw new Error(`${font} has no font data to shape with`);
    }

    const hb = getHarfbuzz();
    const slice = text.slice(range.start, range.end);
    const direction = runDirection(level);
    const buffer = hb.createBuffer();

    buffer.addText(slice);
    buffer.setDirection(direction);
    buffer.guessSegmentProperties();
    hb.shape(hbFont, buffer);
    const infos = buffer.json();
    buffer.destroy();

    const scale = size / font.metrics.unitsPerEm;
    const glyphs: number[] = [];
    const positions: GlyphPosition[] = [];
    const advances: number[] = [];
    const clusters: number[] = [];
    let width = 0;

    for (const info of infos) {
      const advance = info.ax * scale;
      glyphs.push(info.g);
      positions.push({x: info.dx * scale, y: info.dy * scale});
      advances.push(advance);
      clusters.push(info.cl);
      width += advance;
    }

    return {
      start: range.start,
      end: range.end,
      glyphs,
      positions,
      advances,
      clusters,
      width,
      xOffset: 0,
      level,
      direction,
      script: guessScript(slice),
      font,
      fontSize: size
    };
  }
}
