/**
 * The break curve — the easing that makes a held object give way.
 *
 * Maps raw progress t ∈ [0, 1] to blend progress in [0, 1] in two phases:
 *
 * 1. Resistance (`t < r`): a cubic creep from 0 up to 0.1. The onset is
 *    slow enough that nothing visibly kicks at t = 0.
 * 2. Break (`t ≥ r`): progress through the phase `b` is raised to the
 *    sharpness exponent, so the object snaps near the end, with a decaying
 *    sinusoid layered on top for spring-back.
 *
 * The spring-back is a closed-form flourish, not a spring simulation. Its
 * amplitude is fixed; any overshoot past 0 or 1 is clamped, which can pin
 * the curve flat for aggressive frequency/damping settings.
 */

import type { SequenceConfig } from "@breakaway/schema";

/**
 * A pure function that maps linear progress to eased progress.
 *
 * @param t - Raw progress in [0, 1] where 0 = start, 1 = end.
 * @returns Eased progress, typically in [0, 1].
 */
export type EasingFn = (t: number) => number;

/** The curve-shaping subset of a sequence config. */
export type BreakCurveParams = Pick<
  SequenceConfig,
  "resistanceFraction" | "breakSharpness" | "oscillationFrequency" | "dampingRate"
>;

/** Progress reached at the end of the resistance phase. */
export const RESISTANCE_CEILING = 0.1;

/** Fixed amplitude of the spring-back oscillation. */
export const OSCILLATION_AMPLITUDE = 0.15;

/** Clamp a value to [0, 1]. */
export function clamp01(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}

/** Evaluate the break curve at raw progress `t`. */
export function breakProgress(t: number, params: BreakCurveParams): number {
  const r = params.resistanceFraction;

  if (t < r) {
    return (t / r) ** 3 * RESISTANCE_CEILING;
  }

  const b = (t - r) / (1 - r);
  const base = b ** params.breakSharpness;

  // b = 0 is the phase boundary; the spring-back has not started yet.
  const oscillation = b > 0
    ? Math.sin(b * params.oscillationFrequency * Math.PI) *
      Math.exp(-b * params.dampingRate) *
      OSCILLATION_AMPLITUDE
    : 0;

  return clamp01(RESISTANCE_CEILING + base * (1 - RESISTANCE_CEILING) + oscillation);
}

/**
 * Bind the break curve to a set of params.
 *
 * @example
 * ```ts
 * const ease = createBreakEasing(DEFAULT_SEQUENCE_CONFIG);
 * ease(0.8); // 0.1, the instant the object gives way
 * ```
 */
export function createBreakEasing(params: BreakCurveParams): EasingFn {
  const bound: BreakCurveParams = {
    resistanceFraction: params.resistanceFraction,
    breakSharpness: params.breakSharpness,
    oscillationFrequency: params.oscillationFrequency,
    dampingRate: params.dampingRate,
  };
  return (t) => breakProgress(t, bound);
}
