/**
 * Demo configuration — CLI argument, environment, then terminal size
 */

import { DEMO_NAMES, isDemoName, type DemoName } from "./demos.ts";

export interface DemoConfig {
  demo: DemoName;
  /** Terminal character columns available for the frame */
  columns: number;
  /** Terminal character rows available for the frame */
  rows: number;
}

export interface TerminalSize {
  columns?: number;
  rows?: number;
}

const DEFAULT_DEMO: DemoName = "triangle";
const DEFAULT_COLUMNS = 80;
const DEFAULT_ROWS = 24;

export function loadConfig(
  args: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  terminal: TerminalSize = process.stdout,
): DemoConfig {
  const demo = args.find((arg) => !arg.startsWith("-")) || env.BRAILLE_DEMO || DEFAULT_DEMO;
  if (!isDemoName(demo)) {
    throw new Error(`Unknown demo "${demo}" (expected one of: ${DEMO_NAMES.join(", ")})`);
  }

  return {
    demo,
    columns: parseSize("BRAILLE_COLUMNS", env.BRAILLE_COLUMNS) ?? terminal.columns ?? DEFAULT_COLUMNS,
    rows: parseSize("BRAILLE_ROWS", env.BRAILLE_ROWS) ?? terminal.rows ?? DEFAULT_ROWS,
  };
}

function parseSize(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer, received: ${value}`);
  }
  return n;
}
