/**
 * Demo scenes for the CLI, each sized to a terminal of `columns` × `rows`
 * characters (so `columns * 2` × `rows * 4` pixels).
 */

import { Canvas, Turtle, CELL_HEIGHT, CELL_WIDTH, type Point } from "./canvas/index.ts";

export interface DemoSize {
  columns: number;
  rows: number;
}

type Demo = (width: number, height: number) => Canvas;

const DEMOS = {
  /** Right triangle hugging the top-left corner */
  triangle(width, height) {
    const canvas = new Canvas();
    const far = Math.max(2, Math.min(width, height) - 2);
    canvas.line(2, 2, far, far);
    canvas.line(2, far, far, far);
    canvas.line(2, 2, 2, far);
    return canvas;
  },

  /** Inward turtle spiral */
  spiral(width, height) {
    const scale = Math.min(width, height) / 120;
    const turtle = new Turtle(width / 2, 0);
    for (let n = 0; n < 100; n++) {
      turtle.forward((10 - n / 10) * scale);
      turtle.right(10);
    }
    return turtle.canvas;
  },

  /** Nested half-circles drawn by one turtle */
  arcs(width, height) {
    const scale = Math.min(width, height / 2) / 100;
    const turtle = new Turtle(0, 0);
    for (let band = 0; band < 5; band++) {
      turtle.up();
      turtle.teleport(band * 3 * scale, 50 * scale);
      turtle.rotation = -90;
      turtle.down();
      for (let i = 0; i < 150; i++) {
        turtle.forward((1 - band / 16) * scale);
        turtle.right(180 / 150);
      }
    }
    return turtle.canvas;
  },

  /** One period of a sine wave over its axis */
  sine(width, height) {
    const canvas = new Canvas();
    const mid = Math.floor((height - 1) / 2);
    const amplitude = mid;
    const points: Point[] = [];
    for (let x = 0; x < width; x++) {
      const y = mid - amplitude * Math.sin((2 * Math.PI * x) / width);
      points.push({ x, y: Math.round(y) });
    }
    canvas.line(0, mid, width - 1, mid);
    canvas.polyline(points);
    return canvas;
  },

  /** Border, inscribed ellipse, filled triangle and a centre marker */
  shapes(width, height) {
    const canvas = new Canvas();
    const right = width - 1;
    const bottom = height - 1;
    canvas.rectangle(0, 0, right, bottom);
    canvas.ellipseBox(2, 2, right - 2, bottom - 2);
    const cx = Math.floor(right / 2);
    const cy = Math.floor(bottom / 2);
    canvas.polygon([
      [
        { x: cx, y: Math.floor(bottom / 4) },
        { x: Math.floor(right * 0.7), y: Math.floor(bottom * 0.7) },
        { x: Math.floor(right * 0.3), y: Math.floor(bottom * 0.7) },
      ],
    ]);
    canvas.marker(cx, cy);
    return canvas;
  },
} satisfies Record<string, Demo>;

export type DemoName = keyof typeof DEMOS;

/** In declaration order */
export const DEMO_NAMES: readonly DemoName[] = Object.keys(DEMOS).filter(isDemoName);

export function isDemoName(name: string): name is DemoName {
  return Object.hasOwn(DEMOS, name);
}

export function renderDemo(name: DemoName, size: DemoSize): Canvas {
  return DEMOS[name](size.columns * CELL_WIDTH, size.rows * CELL_HEIGHT);
}
