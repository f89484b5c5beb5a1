/**
 * @breakaway/sim — headless break simulation.
 */

export { simulateBreak, formatTimeline, SIMULATION_SOUNDS } from "./simulate.js";
export { parseArgs, DEFAULT_FPS } from "./args.js";
export { loadSequenceConfig } from "./load-config.js";

export type {
  SimulationOptions,
  SimulationResult,
  TimelineEntry,
  TimelineEvent,
} from "./simulate.js";
export type { SimArgs } from "./args.js";
