/**
 * @breakaway/schema — configuration schema for break sequences.
 *
 * Zod schemas are the source of truth; TypeScript types are inferred from them.
 */

export {
  sequenceConfigSchema,
  DEFAULT_SEQUENCE_CONFIG,
  SequenceConfigError,
  parseSequenceConfig,
  parseSequenceOverrides,
  resolveSequenceConfig,
} from "./sequence-config.js";

export type {
  SequenceConfig,
  SequenceConfigOverrides,
} from "./sequence-config.js";
