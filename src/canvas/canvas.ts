/**
 * Canvas — drawing primitives on top of BrailleBuffer
 *
 * Pixel operations go straight to the buffer and reject coordinates that are
 * not non-negative integers. Shapes are built from the line rasterizer;
 * ellipses, markers and polygons may reach past the origin and clip there.
 */

import earcut from "earcut";
import { BrailleBuffer, type Range } from "./braille-buffer.ts";
import { linePoints } from "./line.ts";
import { assertPixel, isPixel, type Point } from "./utils.ts";

export type { Point } from "./utils.ts";

export class Canvas {
  readonly buffer: BrailleBuffer;

  constructor(buffer = new BrailleBuffer()) {
    this.buffer = buffer;
  }

  /** Rebuild a canvas from a rendered frame, its top-left cell at the origin */
  static fromFrame(frame: string): Canvas {
    return new Canvas(BrailleBuffer.fromLines(frame.split("\n")));
  }

  set(x: number, y: number): void {
    this.buffer.setPixel(x, y);
  }

  unset(x: number, y: number): void {
    this.buffer.unsetPixel(x, y);
  }

  toggle(x: number, y: number): void {
    this.buffer.togglePixel(x, y);
  }

  get(x: number, y: number): boolean {
    return this.buffer.getPixel(x, y);
  }

  maskAt(x: number, y: number): number {
    return this.buffer.maskAt(x, y);
  }

  clear(): void {
    this.buffer.clear();
  }

  rowRange(): Range {
    return this.buffer.rowRange();
  }

  colRange(): Range {
    return this.buffer.colRange();
  }

  pixels(): Point[] {
    return this.buffer.pixels();
  }

  frame(): string {
    return this.buffer.frame();
  }

  toLines(): string[] {
    return this.buffer.toLines();
  }

  /** Draw a straight segment, both endpoints included */
  line(x1: number, y1: number, x2: number, y2: number): void {
    // Check both ends first so a rejected segment draws nothing
    assertPixel(x1, y1);
    assertPixel(x2, y2);
    for (const { x, y } of linePoints(x1, y1, x2, y2)) {
      this.set(x, y);
    }
  }

  /** Draw a connected series of line segments */
  polyline(points: readonly Point[]): void {
    if (points.length === 1) {
      const [only] = points;
      if (only) this.set(only.x, only.y);
      return;
    }
    for (let i = 1; i < points.length; i++) {
      const from = points[i - 1]!;
      const to = points[i]!;
      this.line(from.x, from.y, to.x, to.y);
    }
  }

  /** Draw the outline of the box with corners (x1, y1) and (x2, y2) */
  rectangle(x1: number, y1: number, x2: number, y2: number): void {
    this.line(x1, y1, x2, y1);
    this.line(x1, y1, x1, y2);
    this.line(x1, y2, x2, y2);
    this.line(x2, y1, x2, y2);
  }

  /** Draw the ellipse inscribed in the box with corners (x1, y1) and (x2, y2) */
  ellipseBox(x1: number, y1: number, x2: number, y2: number): void {
    const halfX = Math.trunc((x1 - x2) / 2);
    const halfY = Math.trunc((y1 - y2) / 2);
    this.ellipseCenter(x2 + halfX, y2 + halfY, Math.abs(halfX), Math.abs(halfY));
  }

  /**
   * Ellipse outline around (xm, ym) with radii a and b.
   * Based on Alois Zingl's "The Beauty of Bresenham's Algorithm"
   */
  ellipseCenter(xm: number, ym: number, a: number, b: number): void {
    let x = -a;
    let y = 0;
    const a2 = a * a;
    const b2 = b * b;
    let err = x * (2 * b2 + x) + b2;

    do {
      this._plot(xm - x, ym + y);
      this._plot(xm + x, ym + y);
      this._plot(xm + x, ym - y);
      this._plot(xm - x, ym - y);
      const e2 = 2 * err;
      if (e2 >= (x * 2 + 1) * b2) {
        x++;
        err += (x * 2 + 1) * b2;
      }
      if (e2 <= (y * 2 + 1) * a2) {
        y++;
        err += (y * 2 + 1) * a2;
      }
    } while (x <= 0);

    // Flat ellipses (a = 1) stop early; finish the tips
    while (y++ < b) {
      this._plot(xm, ym + y);
      this._plot(xm, ym - y);
    }
  }

  /** Draw a filled polygon (supports holes via multiple rings) */
  polygon(rings: readonly (readonly Point[])[]): boolean {
    const vertices: number[] = [];
    const holes: number[] = [];

    for (const ring of rings) {
      if (vertices.length) {
        if (ring.length < 3) continue;
        holes.push(vertices.length / 2);
      } else {
        if (ring.length < 3) return false;
      }
      for (const point of ring) {
        vertices.push(Math.round(point.x));
        vertices.push(Math.round(point.y));
      }
    }
    if (!vertices.length) return false;

    const triangles = earcut(vertices, holes.length ? holes : undefined);
    if (!triangles.length) return false;

    for (let i = 0; i < triangles.length; i += 3) {
      this._filledTriangle(
        vertexAt(vertices, triangles[i]!),
        vertexAt(vertices, triangles[i + 1]!),
        vertexAt(vertices, triangles[i + 2]!),
      );
    }
    return true;
  }

  /** Draw a marker (small cross) at a point */
  marker(x: number, y: number, size = 3): void {
    for (let i = -size; i <= size; i++) {
      this._plot(x + i, y);
      this._plot(x, y + i);
    }
    // Corner dots for visibility
    this._plot(x - 1, y - 1);
    this._plot(x + 1, y - 1);
    this._plot(x - 1, y + 1);
    this._plot(x + 1, y + 1);
  }

  // ── Private drawing methods ──────────────────────────────────

  /** Set a pixel, dropping anything off the canvas */
  private _plot(x: number, y: number): void {
    if (isPixel(x) && isPixel(y)) this.set(x, y);
  }

  /** Draw a filled triangle using scanline fill */
  private _filledTriangle(pa: Point, pb: Point, pc: Point): void {
    const spans = new Map<number, [number, number]>();
    const edges = [
      ...linePoints(pb.x, pb.y, pc.x, pc.y),
      ...linePoints(pa.x, pa.y, pc.x, pc.y),
      ...linePoints(pa.x, pa.y, pb.x, pb.y),
    ];

    for (const { x, y } of edges) {
      const span = spans.get(y);
      if (span) {
        span[0] = Math.min(span[0], x);
        span[1] = Math.max(span[1], x);
      } else {
        spans.set(y, [x, x]);
      }
    }

    for (const [y, [left, right]] of spans) {
      if (y < 0) continue;
      for (let x = Math.max(0, left); x <= right; x++) {
        this.set(x, y);
      }
    }
  }
}

function vertexAt(vertices: readonly number[], idx: number): Point {
  return { x: vertices[idx * 2]!, y: vertices[idx * 2 + 1]! };
}
