import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type RunRecord, RunStore } from "../src/persistence/store.js";

const record = (runId: string, startedAt: string, extra?: Partial<RunRecord>): RunRecord => ({
  runId,
  missionPath: "/work/mission.json",
  status: "succeeded",
  cancelled: false,
  startedAt,
  finishedAt: startedAt,
  durationSec: 1.5,
  failedOrBlocked: [],
  reportPath: "/work/report.json",
  ...extra,
});

describe("RunStore", () => {
  let store: RunStore;

  beforeEach(() => {
    store = new RunStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("round-trips a run", () => {
    const run = record("r1", "2026-01-01T00:00:00.000Z", {
      status: "failed",
      cancelled: true,
      failedOrBlocked: ["a", "integrate"],
      reportPath: null,
    });
    store.insert(run);
    expect(store.get("r1")).toEqual(run);
    expect(store.get("missing")).toBeUndefined();
  });

  it("lists most recent first with a limit", () => {
    store.insert(record("old", "2026-01-01T00:00:00.000Z"));
    store.insert(record("new", "2026-01-03T00:00:00.000Z"));
    store.insert(record("mid", "2026-01-02T00:00:00.000Z"));

    expect(store.list().map((r) => r.runId)).toEqual(["new", "mid", "old"]);
    expect(store.list(2).map((r) => r.runId)).toEqual(["new", "mid"]);
  });

  it("prunes runs older than a timestamp", () => {
    store.insert(record("old", "2026-01-01T00:00:00.000Z"));
    store.insert(record("new", "2026-02-01T00:00:00.000Z"));

    expect(store.deleteOlderThan("2026-01-15T00:00:00.000Z")).toBe(1);
    expect(store.list().map((r) => r.runId)).toEqual(["new"]);
  });
});
