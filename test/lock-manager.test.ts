import { describe, expect, it } from "vitest";
import { LockManager } from "../src/executor/lock-manager.js";

describe("LockManager", () => {
  it("grants free keys and refuses held ones", () => {
    const locks = new LockManager();
    expect(locks.tryAcquire("a", ["logical:db", "/tmp/out"])).toBe(true);
    expect(locks.holder("logical:db")).toBe("a");
    expect(locks.canAcquire(["logical:db"])).toBe(false);
    expect(locks.canAcquire(["logical:db"], "a")).toBe(true);
    expect(locks.tryAcquire("b", ["logical:other"])).toBe(true);
    expect(locks.size).toBe(3);
  });

  it("never grants a subset", () => {
    const locks = new LockManager();
    locks.tryAcquire("a", ["logical:x"]);

    expect(locks.tryAcquire("b", ["logical:y", "logical:x"])).toBe(false);
    expect(locks.holder("logical:y")).toBeUndefined();
    expect(locks.conflicts(["logical:y", "logical:x"], "b")).toEqual([{ key: "logical:x", holder: "a" }]);
  });

  it("releases every key a task holds", () => {
    const locks = new LockManager();
    locks.tryAcquire("a", ["k1", "k2"]);
    locks.tryAcquire("b", ["k3"]);

    expect(locks.release("a").sort()).toEqual(["k1", "k2"]);
    expect(locks.snapshot()).toEqual({ k3: "b" });
    expect(locks.release("a")).toEqual([]);
    expect(locks.tryAcquire("c", ["k1"])).toBe(true);
  });

  it("accepts tasks without write targets", () => {
    const locks = new LockManager();
    expect(locks.tryAcquire("a", [])).toBe(true);
    expect(locks.size).toBe(0);
  });
});
