/**
 * Sequence configuration — the tunables of a break sequence.
 *
 * The shape is declared once as a zod schema; the TypeScript type is
 * inferred from it. Parsed configs are frozen, so a single config object
 * can be shared between sequences.
 */

import { z } from "zod";

/**
 * Schema for the seven tunables of a break sequence.
 *
 * `resistanceFraction` is exclusive on both ends: the curve divides by it
 * and by `1 - resistanceFraction`.
 */
export const sequenceConfigSchema = z.object({
  targetAngleX: z
    .number()
    .finite()
    .describe("Target X rotation in degrees. Y and Z are kept from the initial orientation."),
  durationSeconds: z
    .number()
    .finite()
    .nonnegative()
    .describe("Length of the animated phase in seconds."),
  initialDelaySeconds: z
    .number()
    .finite()
    .nonnegative()
    .describe("Hold time before the creak, in seconds."),
  resistanceFraction: z
    .number()
    .gt(0)
    .lt(1)
    .describe("Share of the animation spent resisting, strictly between 0 and 1."),
  breakSharpness: z
    .number()
    .finite()
    .positive()
    .describe("Exponent of the break phase. Higher values snap later and harder."),
  oscillationFrequency: z
    .number()
    .finite()
    .nonnegative()
    .describe("Half-cycles of spring-back over the break phase."),
  dampingRate: z
    .number()
    .finite()
    .nonnegative()
    .describe("Exponential decay rate of the spring-back."),
});

/** Validated, immutable sequence configuration. */
export type SequenceConfig = Readonly<z.infer<typeof sequenceConfigSchema>>;

/** Input accepted by `resolveSequenceConfig`: any subset of the tunables. */
export type SequenceConfigOverrides = Partial<z.input<typeof sequenceConfigSchema>>;

/** Tuning of the original vent cover. */
export const DEFAULT_SEQUENCE_CONFIG: SequenceConfig = Object.freeze({
  targetAngleX: -75,
  durationSeconds: 1.5,
  initialDelaySeconds: 0.2,
  resistanceFraction: 0.8,
  breakSharpness: 8,
  oscillationFrequency: 5,
  dampingRate: 3,
});

/** Thrown when a sequence configuration fails validation. */
export class SequenceConfigError extends Error {
  /** One human-readable line per failing field. */
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid sequence config: ${issues.join("; ")}`);
    this.name = "SequenceConfigError";
    this.issues = issues;
  }
}

/** Same fields, all optional, unknown keys rejected. For config files. */
const sequenceOverridesSchema = sequenceConfigSchema.partial().strict();

function toConfigError(error: z.ZodError): SequenceConfigError {
  return new SequenceConfigError(
    error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
  );
}

/**
 * Validate a complete config object.
 *
 * @throws SequenceConfigError listing every invalid or missing field.
 */
export function parseSequenceConfig(input: unknown): SequenceConfig {
  const result = sequenceConfigSchema.safeParse(input);
  if (!result.success) {
    throw toConfigError(result.error);
  }
  return Object.freeze(result.data);
}

/**
 * Validate a partial config, e.g. the contents of a JSON file.
 * Misspelled keys are errors rather than silently ignored.
 *
 * @throws SequenceConfigError listing every invalid or unknown field.
 */
export function parseSequenceOverrides(input: unknown): SequenceConfigOverrides {
  const result = sequenceOverridesSchema.safeParse(input);
  if (!result.success) {
    throw toConfigError(result.error);
  }
  return result.data;
}

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws SequenceConfigError when the merged config is invalid.
 */
export function resolveSequenceConfig(overrides: SequenceConfigOverrides = {}): SequenceConfig {
  return parseSequenceConfig({ ...DEFAULT_SEQUENCE_CONFIG, ...overrides });
}
