declare module 'harfbuzzjs' {
  export interface HbBlob {
    ptr: number;
    destroy(): void;
  }

  export interface HbFace {
    ptr: number;
    upem: number;
    reference_table(table: string): Uint8Array | undefined;
    destroy(): void;
  }

  export interface HbFont {
    ptr: number;
    setScale(xScale: number, yScale: number): void;
    destroy(): void;
  }

  export interface HbGlyphInfo {
    g: number;
    cl: number;
    ax: number;
    ay: number;
    dx: number;
    dy: number;
    flags: number;
  }

  export interface HbBuffer {
    ptr: number;
    addText(text: string): void;
    guessSegmentProperties(): void;
    setDirection(dir: 'ltr' | 'rtl' | 'ttb' | 'btt'): void;
    json(): HbGlyphInfo[];
    destroy(): void;
  }

  export interface HarfBuzz {
    createBlob(blob: ArrayBufferLike | Uint8Array): HbBlob;
    createFace(blob: HbBlob, index: number): HbFace;
    createFont(face: HbFace): HbFont;
    createBuffer(): HbBuffer;
    shape(font: HbFont, buffer: HbBuffer, features?: string): void;
  }

  const init: Promise<HarfBuzz>;

  export default init;
}
