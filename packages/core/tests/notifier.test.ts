import { describe, it, expect } from "vitest";
import { Notifier } from "../src/sequence/notifier.js";

describe("Notifier", () => {
  it("calls listeners in registration order with the payload", () => {
    const notifier = new Notifier<number>();
    const calls: string[] = [];
    notifier.on((n) => calls.push(`a${n}`));
    notifier.on((n) => calls.push(`b${n}`));

    notifier.emit(1);
    expect(calls).toEqual(["a1", "b1"]);
    expect(notifier.size).toBe(2);
  });

  it("removes a listener with off() or the returned unsubscribe", () => {
    const notifier = new Notifier<void>();
    const calls: string[] = [];
    const a = (): void => {
      calls.push("a");
    };
    notifier.on(a);
    const offB = notifier.on(() => calls.push("b"));
    notifier.on(() => calls.push("c"));

    notifier.off(a);
    offB();
    notifier.emit();
    expect(calls).toEqual(["c"]);
    expect(notifier.size).toBe(1);
  });

  it("still reaches later listeners when one unsubscribes mid-emit", () => {
    const notifier = new Notifier<void>();
    const calls: string[] = [];
    const offFirst = notifier.on(() => {
      calls.push("first");
      offFirst();
    });
    notifier.on(() => calls.push("second"));

    notifier.emit();
    notifier.emit();
    expect(calls).toEqual(["first", "second", "second"]);
  });

  it("hands listener errors to the error handler and keeps going", () => {
    const errors: unknown[] = [];
    const notifier = new Notifier<void>((err) => errors.push(err));
    const calls: string[] = [];
    const boom = new Error("boom");
    notifier.on(() => {
      throw boom;
    });
    notifier.on(() => calls.push("after"));

    notifier.emit();
    expect(errors).toEqual([boom]);
    expect(calls).toEqual(["after"]);
  });

  it("rethrows the first error after every listener ran when there is no handler", () => {
    const notifier = new Notifier<void>();
    const calls: string[] = [];
    notifier.on(() => {
      throw new Error("first");
    });
    notifier.on(() => {
      throw new Error("second");
    });
    notifier.on(() => calls.push("last"));

    expect(() => notifier.emit()).toThrow("first");
    expect(calls).toEqual(["last"]);
  });
});
