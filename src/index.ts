/**
 * Demo CLI — render a named scene sized to the terminal and print its frame
 *
 *   npm run demo -- [triangle|spiral|arcs|sine|shapes]
 *   npm run demo -- --list
 */

import { run } from "./cli.ts";

try {
  run(process.argv.slice(2), {
    env: process.env,
    terminal: process.stdout,
    write: (text) => process.stdout.write(text),
  });
} catch (e) {
  console.error("Error:", e instanceof Error ? e.message : e);
  process.exitCode = 1;
}
