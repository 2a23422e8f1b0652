import type { MissionTask } from "./types.js";

type GraphNode = Pick<MissionTask, "id" | "dependsOn">;

/**
 * Find every dependency cycle using DFS with coloring. Each cycle is returned
 * as a path that starts and ends on the same id. Edges to unknown ids are ignored.
 */
export function findCycles(tasks: GraphNode[]): string[][] {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const byId = new Map(tasks.map((t) => [t.id, t]));
  const color = new Map<string, number>();
  for (const task of tasks) color.set(task.id, WHITE);

  const cycles: string[][] = [];
  const stack: string[] = [];

  function dfs(id: string): void {
    color.set(id, GRAY);
    stack.push(id);
    for (const dep of byId.get(id)?.dependsOn ?? []) {
      const c = color.get(dep);
      if (c === undefined) continue;
      if (c === GRAY) {
        // back edge: the cycle is the stack segment from `dep` to here
        const from = stack.indexOf(dep);
        cycles.push([...stack.slice(from), dep]);
      } else if (c === WHITE) {
        dfs(dep);
      }
    }
    stack.pop();
    color.set(id, BLACK);
  }

  for (const task of tasks) {
    if (color.get(task.id) === WHITE) dfs(task.id);
  }
  return cycles;
}

/** Return tasks in topological order (dependencies first), stable on declaration order. */
export function topologicalOrder<T extends GraphNode>(tasks: T[]): T[] {
  const byId = new Map(tasks.map((t) => [t.id, t]));
  const visited = new Set<string>();
  const sorted: T[] = [];

  function visit(task: T): void {
    if (visited.has(task.id)) return;
    visited.add(task.id);
    for (const dep of task.dependsOn) {
      const node = byId.get(dep);
      if (node) visit(node);
    }
    sorted.push(task);
  }

  for (const task of tasks) visit(task);
  return sorted;
}
