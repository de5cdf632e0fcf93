/**
 * Turtle — a pen that walks around a Canvas drawing lines
 *
 * Position is fractional; it is rounded to the nearest pixel (and clamped
 * at the origin) only when a segment is drawn. Rotation is in degrees,
 * 0 facing +x, increasing clockwise on screen since y grows downward.
 */

import { Canvas } from "./canvas.ts";
import { deg2rad, toPixel } from "./utils.ts";

export class Turtle {
  x: number;
  y: number;
  brush = true;
  rotation = 0;
  readonly canvas: Canvas;

  /** Starts with its brush down, facing right */
  constructor(x: number, y: number, canvas = new Canvas()) {
    this.x = x;
    this.y = y;
    this.canvas = canvas;
  }

  /** Lift the brush */
  up(): void {
    this.brush = false;
  }

  /** Put the brush down */
  down(): void {
    this.brush = true;
  }

  toggle(): void {
    this.brush = !this.brush;
  }

  forward(distance: number): void {
    const angle = deg2rad(this.rotation);
    this.teleport(
      this.x + Math.cos(angle) * distance,
      this.y + Math.sin(angle) * distance,
    );
  }

  back(distance: number): void {
    this.forward(-distance);
  }

  /** Move to (x, y), drawing a line from the old position if the brush is down */
  teleport(x: number, y: number): void {
    if (this.brush) {
      this.canvas.line(toPixel(this.x), toPixel(this.y), toPixel(x), toPixel(y));
    }
    this.x = x;
    this.y = y;
  }

  /** Turn clockwise by `angle` degrees */
  right(angle: number): void {
    this.rotation += angle;
  }

  /** Turn counter-clockwise by `angle` degrees */
  left(angle: number): void {
    this.rotation -= angle;
  }

  frame(): string {
    return this.canvas.frame();
  }
}
