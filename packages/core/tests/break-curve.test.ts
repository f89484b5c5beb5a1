import { describe, it, expect } from "vitest";
import { DEFAULT_SEQUENCE_CONFIG } from "@breakaway/schema";
import {
  breakProgress,
  clamp01,
  createBreakEasing,
} from "../src/sequence/break-curve.js";
import type { BreakCurveParams } from "../src/sequence/break-curve.js";

const vent: BreakCurveParams = DEFAULT_SEQUENCE_CONFIG;

function sweep(samples: number): number[] {
  return Array.from({ length: samples + 1 }, (_, i) => i / samples);
}

describe("break curve", () => {
  describe("resistance phase", () => {
    it("starts at zero", () => {
      expect(breakProgress(0, vent)).toBe(0);
    });

    it("is a cubic creep scaled to 0.1", () => {
      // t / r = 0.5 → 0.5³ × 0.1
      expect(breakProgress(0.4, vent)).toBeCloseTo(0.0125, 12);
    });

    it("never decreases", () => {
      let previous = -Infinity;
      for (const t of sweep(400)) {
        if (t >= vent.resistanceFraction) break;
        const value = breakProgress(t, vent);
        expect(value).toBeGreaterThanOrEqual(previous);
        previous = value;
      }
    });

    it("approaches 0.1 from below at the boundary", () => {
      const below = breakProgress(vent.resistanceFraction - 1e-9, vent);
      expect(below).toBeLessThan(0.1);
      expect(below).toBeCloseTo(0.1, 6);
    });
  });

  describe("break phase", () => {
    it("is exactly 0.1 at the boundary", () => {
      expect(breakProgress(vent.resistanceFraction, vent)).toBe(0.1);
    });

    it("adds a decaying oscillation on top of the sharp rise", () => {
      // b = 0.5: base = 0.5⁸, osc = sin(2.5π) · e^-1.5 · 0.15
      const expected = 0.1 + 0.5 ** 8 * 0.9 + Math.exp(-1.5) * 0.15;
      expect(breakProgress(0.9, vent)).toBeCloseTo(expected, 10);
      expect(breakProgress(0.9, vent)).toBeCloseTo(0.136985, 6);
    });

    it("ends at full progress", () => {
      const oscAtEnd = Math.sin(5 * Math.PI) * Math.exp(-3) * 0.15;
      expect(breakProgress(1, vent)).toBeCloseTo(clamp01(0.1 + 0.9 + oscAtEnd), 12);
      expect(breakProgress(1, vent)).toBeCloseTo(1, 12);
    });

    it("is a plain power curve without oscillation", () => {
      const params: BreakCurveParams = {
        resistanceFraction: 0.5,
        breakSharpness: 2,
        oscillationFrequency: 0,
        dampingRate: 0,
      };
      expect(breakProgress(0.75, params)).toBeCloseTo(0.325, 12);
    });

    it("pins to 0 when the spring-back undershoots", () => {
      // b = 0.5, sin(1.5π) = -1: 0.1 + 0.5⁸ × 0.9 - 0.15 < 0
      const params: BreakCurveParams = {
        resistanceFraction: 0.5,
        breakSharpness: 8,
        oscillationFrequency: 3,
        dampingRate: 0,
      };
      expect(breakProgress(0.75, params)).toBe(0);
    });

    it("pins to 1 when the spring-back overshoots", () => {
      // b = 1, sin(0.5π) = 1: 0.1 + 0.9 + 0.15 > 1
      const params: BreakCurveParams = {
        resistanceFraction: 0.5,
        breakSharpness: 8,
        oscillationFrequency: 0.5,
        dampingRate: 0,
      };
      expect(breakProgress(1, params)).toBe(1);
    });
  });

  describe("range", () => {
    const configs: BreakCurveParams[] = [
      vent,
      { resistanceFraction: 0.1, breakSharpness: 0.5, oscillationFrequency: 50, dampingRate: 0 },
      { resistanceFraction: 0.5, breakSharpness: 20, oscillationFrequency: 13, dampingRate: 0.1 },
      { resistanceFraction: 0.999, breakSharpness: 8, oscillationFrequency: 5, dampingRate: 3 },
    ];

    it("stays within [0, 1] for every config", () => {
      for (const params of configs) {
        for (const t of sweep(1000)) {
          const value = breakProgress(t, params);
          expect(value).toBeGreaterThanOrEqual(0);
          expect(value).toBeLessThanOrEqual(1);
        }
      }
    });

    it("handles a resistance fraction close to 1", () => {
      const params: BreakCurveParams = {
        resistanceFraction: 0.999,
        breakSharpness: 8,
        oscillationFrequency: 5,
        dampingRate: 3,
      };
      expect(breakProgress(0.998, params)).toBeLessThan(0.1);
      expect(breakProgress(0.999, params)).toBe(0.1);
      expect(Number.isFinite(breakProgress(0.9995, params))).toBe(true);
      expect(breakProgress(1, params)).toBeCloseTo(1, 6);
    });
  });

  describe("createBreakEasing", () => {
    it("binds the params", () => {
      const ease = createBreakEasing(vent);
      for (const t of [0, 0.25, 0.8, 0.9, 1]) {
        expect(ease(t)).toBe(breakProgress(t, vent));
      }
    });

    it("keeps only the curve fields of a full config", () => {
      const ease = createBreakEasing({ ...DEFAULT_SEQUENCE_CONFIG });
      expect(ease(0.8)).toBe(0.1);
    });
  });

  describe("clamp01", () => {
    it("clamps to the unit interval", () => {
      expect(clamp01(-0.2)).toBe(0);
      expect(clamp01(0.4)).toBe(0.4);
      expect(clamp01(1.3)).toBe(1);
    });
  });
});
