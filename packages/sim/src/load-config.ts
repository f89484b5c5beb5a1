/**
 * Loads a sequence config from a JSON file of overrides.
 */

import { readFile } from "node:fs/promises";
import { parseSequenceOverrides, resolveSequenceConfig } from "@breakaway/schema";
import type { SequenceConfig } from "@breakaway/schema";

/**
 * Read `path`, validate it as config overrides and merge onto the defaults.
 *
 * @throws Error when the file is missing or not JSON
 * @throws SequenceConfigError when a field is invalid or unknown
 */
export async function loadSequenceConfig(path: string): Promise<SequenceConfig> {
  const raw = await readFile(path, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`${path} is not valid JSON: ${reason}`);
  }
  return resolveSequenceConfig(parseSequenceOverrides(json));
}
