/**
 * CLI body — kept apart from the entry point so it runs without a process
 */

import { loadConfig, type TerminalSize } from "./config.ts";
import { DEMO_NAMES, renderDemo } from "./demos.ts";

export interface CliIO {
  env: NodeJS.ProcessEnv;
  terminal: TerminalSize;
  write: (text: string) => void;
}

/** Print the demo list, or the frame of the configured demo */
export function run(args: readonly string[], io: CliIO): void {
  if (args.includes("--list")) {
    io.write(DEMO_NAMES.join("\n") + "\n");
    return;
  }

  const config = loadConfig(args, io.env, io.terminal);
  io.write(renderDemo(config.demo, config).frame() + "\n");
}
