/**
 * CLI argument parsing for the break simulator.
 *
 * Supports:
 *   breakaway-sim
 *   breakaway-sim --fps 30
 *   breakaway-sim --config heavy-vent.json --fps 144
 */

/** Parsed simulator arguments. */
export interface SimArgs {
  /** Frames per second to step at. */
  readonly fps: number;
  /** Path to a JSON file of config overrides. */
  readonly configPath?: string;
}

/** Default simulation rate. */
export const DEFAULT_FPS = 60;

/**
 * Parses process.argv into SimArgs.
 *
 * @param argv - The full process.argv array
 * @throws Error on an unknown flag or a non-numeric --fps
 */
export function parseArgs(argv: readonly string[]): SimArgs {
  const args = argv.slice(2); // skip node + script
  let fps = DEFAULT_FPS;
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (arg === "--fps" && next !== undefined) {
      fps = Number(next);
      if (!Number.isFinite(fps) || fps <= 0) {
        throw new Error(`--fps expects a positive number, got "${next}"`);
      }
      i++;
    } else if (arg === "--config" && next !== undefined) {
      configPath = next;
      i++;
    } else {
      throw new Error(`Unknown argument: "${arg ?? ""}"`);
    }
  }

  return { fps, configPath };
}
