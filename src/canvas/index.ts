/**
 * Canvas module — barrel export
 */

export { BrailleBuffer, EMPTY_RANGE, type Range } from "./braille-buffer.ts";
export { Canvas } from "./canvas.ts";
export { Turtle } from "./turtle.ts";
export { linePoints, roundHalfUp } from "./line.ts";
export {
  BRAILLE_BASE,
  CELL_WIDTH,
  CELL_HEIGHT,
  cellOf,
  dotMask,
  encodeGlyph,
  decodeGlyph,
  type CellCoord,
} from "./braille.ts";
export * from "./utils.ts";
