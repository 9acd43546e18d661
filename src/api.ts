import './environment-node.js';

export {environment, defaultEnvironment} from './environment.js';
export type {Environment} from './environment.js';

export {
  graphemeClusters,
  isGraphemeBoundary,
  prevGraphemeBoundary,
  nextGraphemeBoundary,
  snapToGraphemeBoundary,
  computeWordBoundaries,
  computeLineBreaks,
  isNewline
} from './text-segment.js';
export type {TextRange, GraphemeCluster, WordBoundary, LineBreak} from './text-segment.js';

export {
  paragraphBidiInfo,
  paragraphDirection,
  levelsPerCodeUnit,
  visualRuns,
  visualIndexMap,
  mirroredBracket
} from './text-bidi.js';
export type {BaseDirection, ParagraphDirection, ParagraphBidi, BidiRun} from './text-bidi.js';

export {MonospaceShaper, guessScript} from './text-shape.js';
export type {Shaper, ShapedRun, GlyphPosition, Direction} from './text-shape.js';
export {HarfbuzzShaper, loadHarfbuzz} from './text-harfbuzz.js';
export {
  FontFace,
  FontCache,
  FontLoadError,
  createFontFace,
  loadFontFace,
  loadFontFaceSync,
  scaleMetrics
} from './text-font.js';
export type {FontMetrics, ScaledFontMetrics} from './text-font.js';

export {LineBox} from './layout-linebox.js';
export type {CaretSpan} from './layout-linebox.js';
export {splitParagraphs, wrapParagraph, wrapText} from './layout-wrap.js';
export type {WrapMode, WrapOptions} from './layout-wrap.js';
export {PrefixSums} from './layout-prefix-sums.js';
export {TextLayout} from './layout-text.js';
export type {LayoutOptions, LayoutParams, TextEdit, VerticalMove} from './layout-text.js';
export {HitTestResult} from './layout-hit-test.js';
export type {HitTestPolicy, Point, Position} from './layout-hit-test.js';
export {
  Cursor,
  CursorPosition,
  moveLeftCharacter,
  moveRightCharacter,
  moveLeftWord,
  moveRightWord
} from './layout-cursor.js';
export type {
  CursorAffinity,
  CursorRect,
  MovementDirection,
  MovementUnit
} from './layout-cursor.js';
export {Selection} from './layout-selection.js';
export type {SelectionRect} from './layout-selection.js';
export {
  UndoStack,
  OperationGroup,
  applyOperation,
  canMerge,
  invertOperation
} from './layout-undo.js';
export type {TextOperation} from './layout-undo.js';
export {TextLayoutCache} from './layout-cache.js';
export {TextEditor} from './editor.js';
export type {TextEditorOptions} from './editor.js';
