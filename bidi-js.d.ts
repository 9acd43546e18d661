declare module 'bidi-js' {
  export interface EmbeddingLevelsResult {
    levels: Uint8Array;
    paragraphs: {start: number, end: number, level: number}[];
  }

  export interface Bidi {
    getEmbeddingLevels(
      text: string,
      explicitDirection?: 'ltr' | 'rtl'
    ): EmbeddingLevelsResult;
    getReorderSegments(
      text: string,
      embeddingLevels: EmbeddingLevelsResult,
      start?: number,
      end?: number
    ): [number, number][];
    getReorderedIndices(
      text: string,
      embeddingLevels: EmbeddingLevelsResult,
      start?: number,
      end?: number
    ): number[];
    getBidiCharTypeName(char: string): string;
    getMirroredCharacter(char: string): string | null;
  }

  function bidiFactory(): Bidi;

  export default bidiFactory;
}
