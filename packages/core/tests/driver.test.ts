import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { resolveSequenceConfig } from "@breakaway/schema";
import {
  BreakSequence,
  RecordingHost,
  SequenceDriver,
  TestClock,
  TimerClock,
} from "../src/sequence/index.js";
import { AngleStore } from "./helpers/angle-store.js";
import type { Angles } from "./helpers/angle-store.js";

const config = resolveSequenceConfig({
  durationSeconds: 1,
  initialDelaySeconds: 0.5,
  resistanceFraction: 0.5,
  breakSharpness: 2,
  oscillationFrequency: 0,
  dampingRate: 0,
});

describe("SequenceDriver", () => {
  let clock: TestClock;
  let host: RecordingHost;
  let sequence: BreakSequence<Angles>;
  let driver: SequenceDriver;

  beforeEach(() => {
    clock = new TestClock();
    host = new RecordingHost();
    sequence = new BreakSequence({
      config,
      orientation: new AngleStore(),
      audio: host,
      sounds: { creak: "creak", unload: "unload" },
      player: host,
    });
    host.attach(sequence);
    driver = new SequenceDriver(clock, sequence);
  });

  it("steps with zero on the first frame", () => {
    sequence.activate();
    driver.start();
    expect(driver.running).toBe(true);
    expect(clock.pendingCount).toBe(1);

    clock.advance(100);
    expect(sequence.phase).toBe("delaying");
    expect(sequence.elapsed).toBe(0);
  });

  it("converts frame intervals from milliseconds to seconds", () => {
    sequence.activate();
    driver.start();
    clock.advance(0);
    clock.advance(250);
    expect(sequence.elapsed).toBe(0.25);
  });

  it("runs the sequence to completion and stops scheduling", () => {
    sequence.activate();
    driver.start();
    clock.advance(0);
    for (let i = 0; i < 8; i++) {
      clock.advance(250);
    }
    expect(sequence.phase).toBe("snapped");
    expect(driver.running).toBe(true);

    clock.advance(250);
    expect(sequence.done).toBe(true);
    expect(driver.running).toBe(false);
    expect(clock.pendingCount).toBe(0);
    expect(host.playerStates).toEqual(["moving"]);
  });

  it("keeps ticking an idle sequence until it is activated", () => {
    driver.start();
    clock.advance(0);
    clock.advance(1000);
    expect(sequence.phase).toBe("idle");
    expect(clock.pendingCount).toBe(1);

    sequence.activate();
    clock.advance(500);
    expect(sequence.phase).toBe("animating");
  });

  it("stop() cancels the pending frame and keeps state", () => {
    sequence.activate();
    driver.start();
    clock.advance(0);
    clock.advance(250);
    driver.stop();

    expect(driver.running).toBe(false);
    expect(clock.pendingCount).toBe(0);
    clock.advance(1000);
    expect(sequence.elapsed).toBe(0.25);
  });

  it("start() is a no-op while running", () => {
    sequence.activate();
    driver.start();
    driver.start();
    expect(clock.pendingCount).toBe(1);
  });

  it("start() is a no-op once the sequence is done", () => {
    sequence.activate();
    sequence.interrupt();
    driver.start();
    expect(driver.running).toBe(false);
    expect(clock.pendingCount).toBe(0);
  });

  it("stays restartable when a step throws", () => {
    let failNext = true;
    const flaky = {
      done: false,
      step: (): void => {
        if (failNext) {
          failNext = false;
          throw new Error("frame failed");
        }
      },
    };
    const flakyDriver = new SequenceDriver(clock, flaky);

    flakyDriver.start();
    expect(() => clock.advance(0)).toThrow("frame failed");
    expect(flakyDriver.running).toBe(false);
    expect(clock.pendingCount).toBe(0);

    flakyDriver.start();
    expect(flakyDriver.running).toBe(true);
    clock.advance(16);
    expect(clock.pendingCount).toBe(1);
  });

  it("finishes a run whose completion listener throws", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    sequence.onCompleted(() => {
      throw new Error("listener failed");
    });

    sequence.activate();
    driver.start();
    clock.advance(0);
    for (let i = 0; i < 9; i++) {
      clock.advance(250);
    }

    expect(sequence.done).toBe(true);
    expect(host.playerStates).toEqual(["moving"]);
    expect(driver.running).toBe(false);
    expect(clock.pendingCount).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it("restarts from a fresh reference timestamp", () => {
    sequence.activate();
    driver.start();
    clock.advance(0);
    driver.stop();
    clock.advance(5000);

    driver.start();
    clock.advance(100); // first frame after restart
    expect(sequence.elapsed).toBe(0);
    clock.advance(250);
    expect(sequence.elapsed).toBe(0.25);
  });
});

describe("TestClock", () => {
  it("fires callbacks scheduled during advance on the next advance", () => {
    const clock = new TestClock();
    const seen: number[] = [];
    clock.requestFrame((timestamp) => {
      seen.push(timestamp);
      clock.requestFrame((next) => seen.push(next));
    });

    clock.advance(10);
    expect(seen).toEqual([10]);
    clock.advance(5);
    expect(seen).toEqual([10, 15]);
    expect(clock.now()).toBe(15);
  });

  it("drops cancelled callbacks", () => {
    const clock = new TestClock();
    const callback = vi.fn();
    clock.requestFrame(callback).cancel();
    clock.advance(16);
    expect(callback).not.toHaveBeenCalled();
  });
});

describe("TimerClock", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("fires a frame after the interval", () => {
    const clock = new TimerClock(20);
    const callback = vi.fn();
    clock.requestFrame(callback);

    vi.advanceTimersByTime(19);
    expect(callback).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(typeof callback.mock.calls[0]?.[0]).toBe("number");
  });

  it("cancels a pending frame", () => {
    const clock = new TimerClock();
    const callback = vi.fn();
    clock.requestFrame(callback).cancel();
    vi.advanceTimersByTime(100);
    expect(callback).not.toHaveBeenCalled();
  });
});
