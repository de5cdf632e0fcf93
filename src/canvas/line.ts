/**
 * Segment rasterization by uniform interpolation.
 *
 * A segment spans max(|dx|, |dy|) steps; step s lands on
 * (x1 + round(s·dx / steps), y1 + round(s·dy / steps)) with ties rounded up.
 * The major axis advances exactly one pixel per step, so the result has no
 * gaps and always includes both endpoints.
 */

import type { Point } from "./utils.ts";

/**
 * numerator / denominator rounded to nearest, ties toward +∞ (denominator > 0).
 * The float quotient only seeds the result; the remainder fixes it up, so it
 * stays exact for any safe-integer numerator.
 */
export function roundHalfUp(numerator: number, denominator: number): number {
  let quotient = Math.floor(numerator / denominator);
  let remainder = numerator - quotient * denominator;
  if (remainder < 0) {
    quotient--;
    remainder += denominator;
  } else if (remainder >= denominator) {
    quotient++;
    remainder -= denominator;
  }
  return 2 * remainder >= denominator ? quotient + 1 : quotient;
}

/**
 * Offsets round(s·delta / steps) for s = 0, 1, 2, ...; |delta| <= steps.
 * Carries quotient and remainder from step to step instead of forming
 * s·delta, which can pass 2^53 on very long segments.
 */
function offsets(delta: number, steps: number): () => number {
  let quotient = 0;
  let remainder = 0; // s·delta = quotient·steps + remainder, 0 <= remainder < steps
  return () => {
    const offset = 2 * remainder >= steps ? quotient + 1 : quotient;
    remainder += delta;
    if (remainder >= steps) {
      remainder -= steps;
      quotient++;
    } else if (remainder < 0) {
      remainder += steps;
      quotient--;
    }
    return offset;
  };
}

/** Pixels from (x1, y1) to (x2, y2) inclusive, in drawing order */
export function linePoints(x1: number, y1: number, x2: number, y2: number): Point[] {
  const dx = x2 - x1;
  const dy = y2 - y1;
  const steps = Math.max(Math.abs(dx), Math.abs(dy));
  if (steps === 0) return [{ x: x1, y: y1 }];

  const nextX = offsets(dx, steps);
  const nextY = offsets(dy, steps);
  const points: Point[] = [];
  for (let s = 0; s <= steps; s++) {
    points.push({ x: x1 + nextX(), y: y1 + nextY() });
  }
  return points;
}
