/**
 * BrailleBuffer — sparse pixel store backed by braille cells
 *
 * Pixels live in an unbounded grid; each 2x4 block of pixels is one braille
 * cell holding an 8-bit dot mask (see braille.ts for the bit layout). Only
 * cells with at least one dot set are stored, so the rendered frame always
 * covers exactly the bounding box of the drawn pixels.
 */

import {
  DOT_BITS,
  cellOf,
  decodeGlyph,
  dotMask,
  encodeGlyph,
  CELL_HEIGHT,
  CELL_WIDTH,
} from "./braille.ts";
import { assertPixel, type Point } from "./utils.ts";

/** Inclusive [min, max] span of cell indices */
export type Range = readonly [min: number, max: number];

export const EMPTY_RANGE: Range = [0, 0];

function sortedEntries<T>(map: Map<number, T>): [number, T][] {
  return [...map.entries()].sort(([a], [b]) => a - b);
}

export class BrailleBuffer {
  // cell row → (cell column → dot mask); a zero mask is never stored
  private cells = new Map<number, Map<number, number>>();

  /** Parse rendered braille lines, first line at cell row 0 */
  static fromLines(lines: readonly string[]): BrailleBuffer {
    const buffer = new BrailleBuffer();
    lines.forEach((line, row) => {
      [...line].forEach((char, col) => {
        const mask = decodeGlyph(char);
        if (mask) buffer._store(row, col, mask);
      });
    });
    return buffer;
  }

  /** Number of non-empty cells */
  get cellCount(): number {
    let count = 0;
    for (const cols of this.cells.values()) count += cols.size;
    return count;
  }

  get isEmpty(): boolean {
    return this.cells.size === 0;
  }

  clear(): void {
    this.cells.clear();
  }

  setPixel(x: number, y: number): void {
    this._update(x, y, (mask, bit) => mask | bit);
  }

  unsetPixel(x: number, y: number): void {
    this._update(x, y, (mask, bit) => mask & ~bit);
  }

  togglePixel(x: number, y: number): void {
    this._update(x, y, (mask, bit) => mask ^ bit);
  }

  getPixel(x: number, y: number): boolean {
    return (this.maskAt(x, y) & dotMask(x, y)) !== 0;
  }

  /** Dot mask of the cell containing (x, y); 0 for an empty cell */
  maskAt(x: number, y: number): number {
    assertPixel(x, y);
    const { row, col } = cellOf(x, y);
    return this._load(row, col);
  }

  rowRange(): Range {
    return this._span(this.cells.keys());
  }

  colRange(): Range {
    let min = Infinity;
    let max = -Infinity;
    for (const cols of this.cells.values()) {
      const [lo, hi] = this._span(cols.keys());
      min = Math.min(min, lo);
      max = Math.max(max, hi);
    }
    return this.isEmpty ? EMPTY_RANGE : [min, max];
  }

  /** Every set pixel, cell by cell (rows, then columns, ascending) */
  pixels(): Point[] {
    const points: Point[] = [];
    for (const [row, cols] of sortedEntries(this.cells)) {
      for (const [col, mask] of sortedEntries(cols)) {
        for (const [dy, dx, bit] of DOT_BITS) {
          if (mask & bit) {
            points.push({ x: col * CELL_WIDTH + dx, y: row * CELL_HEIGHT + dy });
          }
        }
      }
    }
    return points;
  }

  /** Render the bounding box of set pixels, one string per cell row */
  toLines(): string[] {
    const lines: string[] = [];
    if (this.isEmpty) return lines;
    const [minRow, maxRow] = this.rowRange();
    const [minCol, maxCol] = this.colRange();

    for (let row = minRow; row <= maxRow; row++) {
      const parts: string[] = [];
      for (let col = minCol; col <= maxCol; col++) {
        parts.push(encodeGlyph(this._load(row, col)));
      }
      lines.push(parts.join(""));
    }
    return lines;
  }

  /** Render entire buffer to a single string with newlines */
  frame(): string {
    return this.toLines().join("\n");
  }

  private _update(x: number, y: number, op: (mask: number, bit: number) => number): void {
    assertPixel(x, y);
    const { row, col } = cellOf(x, y);
    this._store(row, col, op(this._load(row, col), dotMask(x, y)) & 0xff);
  }

  private _load(row: number, col: number): number {
    return this.cells.get(row)?.get(col) ?? 0;
  }

  private _store(row: number, col: number, mask: number): void {
    let cols = this.cells.get(row);
    if (mask === 0) {
      if (!cols) return;
      cols.delete(col);
      if (cols.size === 0) this.cells.delete(row);
      return;
    }
    if (!cols) {
      cols = new Map();
      this.cells.set(row, cols);
    }
    cols.set(col, mask);
  }

  private _span(keys: Iterable<number>): Range {
    let min = Infinity;
    let max = -Infinity;
    for (const key of keys) {
      if (key < min) min = key;
      if (key > max) max = key;
    }
    return min === Infinity ? EMPTY_RANGE : [min, max];
  }
}
