import {environment} from './environment.js';
import {getHarfbuzz} from './text-harfbuzz.js';
import {basename, id} from './util.js';

import type {HarfBuzz, HbFace, HbFont} from 'harfbuzzjs';

export interface FontMetrics {
  ascent: number;
  /** Positive distance below the baseline */
  descent: number;
  lineGap: number;
  unitsPerEm: number;
}

export interface ScaledFontMetrics {
  ascent: number;
  descent: number;
  lineGap: number;
}

export function scaleMetrics(metrics: FontMetrics, sizePx: number): ScaledFontMetrics {
  const scale = sizePx / metrics.unitsPerEm;
  return {
    ascent: metrics.ascent * scale,
    descent: metrics.descent * scale,
    lineGap: metrics.lineGap * scale
  };
}

export class FontLoadError extends Error {
  url: URL | undefined;

  constructor(message: string, url?: URL, options?: {cause?: unknown}) {
    super(url ? `${message}: ${url.href}` : message, options);
    this.name = 'FontLoadError';
    this.url = url;
  }
}

export class FontFace {
  id: number;
  url: URL;
  metrics: FontMetrics;
  hbFace: HbFace | undefined;
  hbFont: HbFont | undefined;

  constructor(metrics: FontMetrics, url?: URL, hb?: {face: HbFace, font: HbFont}) {
    this.id = id();
    this.url = url ?? new URL(`anon://font-${this.id}`);
    this.metrics = metrics;
    this.hbFace = hb?.face;
    this.hbFont = hb?.font;
  }

  scaledMetrics(sizePx: number) {
    return scaleMetrics(this.metrics, sizePx);
  }

  destroy() {
    this.hbFont?.destroy();
    this.hbFace?.destroy();
    this.hbFont = undefined;
    this.hbFace = undefined;
  }

  toString() {
    return `FontFace(${basename(this.url)}, upem=${this.metrics.unitsPerEm})`;
  }
}

/**
 * Reads ascender, descender and lineGap from the hhea table
 */
function readHhea(table: Uint8Array | undefined) {
  if (!table || table.byteLength < 10) return;
  const view = new DataView(table.buffer, table.byteOffset, table.byteLength);
  return {
    ascent: view.getInt16(4),
    descent: -view.getInt16(6),
    lineGap: view.getInt16(8)
  };
}

/**
 * Creates a face from font file bytes. Requires `loadHarfbuzz()` to have
 * resolved.
 */
export function createFontFace(
  data: ArrayBufferLike | Uint8Array,
  index = 0,
  url?: URL
): FontFace {
  let hb: HarfBuzz;
  try {
    hb = getHarfbuzz();
  } catch (e) {
    throw new FontLoadError('HarfBuzz is not loaded', url, {cause: e});
  }

  const bytes = data instanceof Uint8Array ? data : new Uint8Array(data);
  const blob = hb.createBlob(bytes);
  const face = hb.createFace(blob, index);
  blob.destroy();

  const hhea = readHhea(face.reference_table('hhea'));

  if (!hhea || !face.upem) {
    face.destroy();
    throw new FontLoadError(`Error reading font face ${index}`, url);
  }

  const font = hb.createFont(face);

  return new FontFace({...hhea, unitsPerEm: face.upem}, url, {face, font});
}

export async function loadFontFace(url: URL, index = 0): Promise<FontFace> {
  let data: ArrayBufferLike;
  try {
    data = await environment.resolveUrl(url);
  } catch (e) {
    throw new FontLoadError('Could not read font', url, {cause: e});
  }
  return createFontFace(data, index, url);
}

export function loadFontFaceSync(url: URL, index = 0): FontFace {
  let data: ArrayBufferLike;
  try {
    data = environment.resolveUrlSync(url);
  } catch (e) {
    throw new FontLoadError('Could not read font', url, {cause: e});
  }
  return createFontFace(data, index, url);
}

function fontKey(url: URL, index: number) {
  return `${url.href}#${index}`;
}

/**
 * Loaded faces keyed by (url, face index). Owned by whoever creates it.
 */
export class FontCache {
  #faces = new Map<string, FontFace>();
  #loading = new Map<string, Promise<FontFace>>();

  get size() {
    return this.#faces.size;
  }

  get(url: URL, index = 0): FontFace | undefined {
    return this.#faces.get(fontKey(url, index));
  }

  insert(face: FontFace, index = 0) {
    this.#faces.set(fontKey(face.url, index), face);
  }

  async getOrLoad(url: URL, index = 0): Promise<FontFace> {
    const key = fontKey(url, index);
    const face = this.#faces.get(key);
    if (face) return face;

    let loading = this.#loading.get(key);
    if (!loading) {
      loading = loadFontFace(url, index).then(face => {
        this.#faces.set(key, face);
        return face;
      }).finally(() => {
        this.#loading.delete(key);
      });
      this.#loading.set(key, loading);
    }

    return loading;
  }

  getOrLoadSync(url: URL, index = 0): FontFace {
    const key = fontKey(url, index);
    let face = this.#faces.get(key);
    if (!face) {
      face = loadFontFaceSync(url, index);
      this.#faces.set(key, face);
    }
    return face;
  }

  delete(url: URL, index = 0) {
    const key = fontKey(url, index);
    const face = this.#faces.get(key);
    face?.destroy();
    return this.#faces.delete(key);
  }

  clear() {
    for (const face of this.#faces.values()) face.destroy();
    this.#faces.clear();
  }
}
