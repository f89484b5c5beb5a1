/**
 * CLI entry point for the break simulator.
 *
 * Usage:
 *   npm run sim                                   # original vent at 60 fps
 *   npm run sim -- --fps 30
 *   npm run sim -- --config heavy-vent.json
 */

import { DEFAULT_SEQUENCE_CONFIG } from "@breakaway/schema";
import { parseArgs } from "./args.js";
import { loadSequenceConfig } from "./load-config.js";
import { formatTimeline, simulateBreak } from "./simulate.js";

async function main(): Promise<void> {
  const args = parseArgs(process.argv);
  const config = args.configPath
    ? await loadSequenceConfig(args.configPath)
    : DEFAULT_SEQUENCE_CONFIG;

  const result = simulateBreak({ config, fps: args.fps });

  console.log(`Breakaway simulator`);
  console.log(`  config: ${args.configPath ?? "(defaults)"}`);
  console.log(`  fps:    ${args.fps}`);
  console.log(``);
  console.log(formatTimeline(result.entries));
  console.log(``);
  console.log(`  frames: ${result.frames}`);
  console.log(`  pitch:  ${result.finalPitchDegrees.toFixed(2)}°`);

  if (!result.done) {
    console.error("Sequence did not finish within the time limit.");
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
