import { describe, expect, it } from "vitest";
import { findCycles, topologicalOrder } from "../src/mission/task-graph.js";

const node = (id: string, dependsOn: string[] = []) => ({ id, dependsOn });

const diamond = [node("d", ["c"]), node("c", ["a", "b"]), node("a"), node("b")];

describe("findCycles", () => {
  it("returns nothing for an acyclic graph", () => {
    expect(findCycles(diamond)).toEqual([]);
  });

  it("reports the cycle path", () => {
    expect(findCycles([node("a", ["c"]), node("b", ["a"]), node("c", ["b"])])).toEqual([["a", "c", "b", "a"]]);
  });

  it("reports self-loops", () => {
    expect(findCycles([node("a", ["a"])])).toEqual([["a", "a"]]);
  });

  it("finds cycles in disconnected components", () => {
    const tasks = [node("x"), node("a", ["b"]), node("b", ["a"]), node("p", ["q"]), node("q", ["p"])];
    expect(findCycles(tasks)).toEqual([
      ["a", "b", "a"],
      ["p", "q", "p"],
    ]);
  });

  it("ignores edges to unknown ids", () => {
    expect(findCycles([node("a", ["ghost"])])).toEqual([]);
  });
});

describe("topologicalOrder", () => {
  it("orders dependencies first", () => {
    expect(topologicalOrder(diamond).map((t) => t.id)).toEqual(["a", "b", "c", "d"]);
  });

  it("keeps declaration order among independent tasks", () => {
    const tasks = [node("z"), node("y", ["x"]), node("x")];
    expect(topologicalOrder(tasks).map((t) => t.id)).toEqual(["z", "x", "y"]);
  });
});
