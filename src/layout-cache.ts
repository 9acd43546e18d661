import {wrapText} from './layout-wrap.js';

import type {LineBox} from './layout-linebox.js';
import type {Shaper} from './text-shape.js';
import type {WrapOptions} from './layout-wrap.js';

const shaperIds = new WeakMap<Shaper, number>();
let nextShaperId = 0;

function shaperId(shaper: Shaper) {
  let id = shaperIds.get(shaper);
  if (id === undefined) {
    id = nextShaperId++;
    shaperIds.set(shaper, id);
  }
  return id;
}

/**
 * Wrapped lines keyed by text and wrap options. Once it holds twice
 * `maxEntries`, the oldest entries are dropped until `maxEntries` remain.
 *
 * Pass the cache to whatever needs it; there is no shared instance.
 */
export class TextLayoutCache {
  maxEntries: number;
  #entries = new Map<string, readonly LineBox[]>();

  constructor(maxEntries = 256) {
    this.maxEntries = Math.max(1, maxEntries);
  }

  static key(text: string, options: WrapOptions) {
    return [
      options.font.id,
      options.fontSize,
      options.maxWidth ?? 'none',
      options.wrapMode,
      options.baseDirection,
      shaperId(options.shaper),
      text
    ].join('\0');
  }

  get size() {
    return this.#entries.size;
  }

  get(text: string, options: WrapOptions) {
    return this.#entries.get(TextLayoutCache.key(text, options));
  }

  getOrWrap(text: string, options: WrapOptions): readonly LineBox[] {
    const key = TextLayoutCache.key(text, options);
    let lines = this.#entries.get(key);

    if (!lines) {
      lines = wrapText(text, options);
      this.#entries.set(key, lines);
      this.evict();
    }

    return lines;
  }

  clear() {
    this.#entries.clear();
  }

  private evict() {
    if (this.#entries.size < this.maxEntries * 2) return;
    for (const key of this.#entries.keys()) {
      if (this.#entries.size <= this.maxEntries) break;
      this.#entries.delete(key);
    }
  }
}
