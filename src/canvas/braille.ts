/**
 * Braille cell encoding.
 *
 * Each braille character (U+2800–U+28FF) encodes a 2-wide × 4-tall dot grid:
 *
 *   bit 0 (0x01): row 0, col 0    bit 3 (0x08): row 0, col 1
 *   bit 1 (0x02): row 1, col 0    bit 4 (0x10): row 1, col 1
 *   bit 2 (0x04): row 2, col 0    bit 5 (0x20): row 2, col 1
 *   bit 6 (0x40): row 3, col 0    bit 7 (0x80): row 3, col 1
 */

export const BRAILLE_BASE = 0x2800;

/** Pixels per cell, horizontally and vertically */
export const CELL_WIDTH = 2;
export const CELL_HEIGHT = 4;

// DOT_MAP[y mod 4][x mod 2] = bit mask
const DOT_MAP = [
  [0x01, 0x08],
  [0x02, 0x10],
  [0x04, 0x20],
  [0x40, 0x80],
] as const;

/** Bit definitions in bit order: [pixelRow, pixelCol, bitmask] */
export const DOT_BITS: readonly (readonly [number, number, number])[] = [
  [0, 0, 0x01],
  [1, 0, 0x02],
  [2, 0, 0x04],
  [0, 1, 0x08],
  [1, 1, 0x10],
  [2, 1, 0x20],
  [3, 0, 0x40],
  [3, 1, 0x80],
];

export interface CellCoord {
  row: number;
  col: number;
}

/**
 * Cell containing a pixel. Uses division rather than shifts: coordinates
 * may exceed 32 bits.
 */
export function cellOf(x: number, y: number): CellCoord {
  return { row: Math.floor(y / CELL_HEIGHT), col: Math.floor(x / CELL_WIDTH) };
}

/** Bit for a pixel within its cell */
export function dotMask(x: number, y: number): number {
  return DOT_MAP[y % CELL_HEIGHT]?.[x % CELL_WIDTH] ?? 0;
}

export function encodeGlyph(mask: number): string {
  return String.fromCodePoint(BRAILLE_BASE + (mask & 0xff));
}

/** Dot mask of a braille glyph, or null for anything outside the braille block */
export function decodeGlyph(char: string): number | null {
  const code = char.codePointAt(0);
  if (code === undefined) return null;
  const mask = code - BRAILLE_BASE;
  return mask >= 0 && mask <= 0xff ? mask : null;
}
