import {MonospaceShaper} from './text-shape.js';

import type {Shaper} from './text-shape.js';

export interface Environment {
  /**
   * Must return a promise of a buffer for the given URL. Used to read font
   * files.
   */
  resolveUrl(url: URL): Promise<ArrayBufferLike>;
  /**
   * Same as `resolveUrl`, but synchronous if it's a file:// URL. This should
   * throw if the URL can only be read asynchronously.
   */
  resolveUrlSync(url: URL): ArrayBufferLike;
  /**
   * Shaper used by layouts that don't pass their own. Replace with a
   * HarfbuzzShaper once fonts are loaded from files.
   */
  shaper: Shaper;
  /**
   * Width of the caret rectangle in pixels
   */
  cursorWidth: number;
}

export const defaultEnvironment: Readonly<Environment> = Object.freeze({
  resolveUrl() {
    throw new Error(
      'No URL resolver configured. Import the package entry point or assign ' +
      'environment.resolveUrl.'
    );
  },
  resolveUrlSync() {
    throw new Error(
      'No URL resolver configured. Import the package entry point or assign ' +
      'environment.resolveUrlSync.'
    );
  },
  shaper: new MonospaceShaper(),
  cursorWidth: 1
});

export const environment: Environment = {...defaultEnvironment};
