/**
 * Canvas utility functions — shared point type, coordinate checks, angles
 */

export interface Point {
  x: number;
  y: number;
}

export function isPixel(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 0;
}

/** Throw unless (x, y) addresses a pixel: both non-negative safe integers */
export function assertPixel(x: number, y: number): void {
  if (!isPixel(x) || !isPixel(y)) {
    throw new RangeError(
      `Pixel coordinates must be non-negative integers, received: (${x}, ${y})`,
    );
  }
}

/** Degrees to radians */
export function deg2rad(angle: number): number {
  return angle * 0.017453292519943295;
}

/** Nearest pixel coordinate on the canvas, clamped at the origin */
export function toPixel(n: number): number {
  return Math.max(0, Math.round(n));
}
