import { realpathSync } from "node:fs";
import { homedir } from "node:os";
import { basename, dirname, join, resolve } from "node:path";

export const LOGICAL_PREFIX = "logical:";

export function isLogicalTarget(key: string): boolean {
  return key.startsWith(LOGICAL_PREFIX);
}

/**
 * Normalize a write target into a lock key. `logical:<name>` is kept verbatim;
 * anything else is a path, canonicalized so equivalent spellings collide.
 * Returns null for an empty target.
 */
export function normalizeWriteTarget(target: string, cwd: string = process.cwd()): string | null {
  const cleaned = target.trim();
  if (cleaned.length === 0) return null;
  if (isLogicalTarget(cleaned)) {
    return cleaned.length > LOGICAL_PREFIX.length ? cleaned : null;
  }
  return canonicalPath(resolve(cwd, expandHome(cleaned)));
}

/** Normalize a task's write targets, dropping duplicates. Invalid entries are reported by index. */
export function normalizeWriteTargets(
  targets: string[],
  cwd?: string,
): { keys: string[]; invalid: number[] } {
  const keys: string[] = [];
  const invalid: number[] = [];
  targets.forEach((target, i) => {
    const key = normalizeWriteTarget(target, cwd);
    if (key === null) {
      invalid.push(i);
    } else if (!keys.includes(key)) {
      keys.push(key);
    }
  });
  return { keys, invalid };
}

function expandHome(p: string): string {
  if (p === "~") return homedir();
  if (p.startsWith("~/")) return join(homedir(), p.slice(2));
  return p;
}

/** Resolve symlinks through the deepest ancestor that exists; the rest is appended as-is. */
function canonicalPath(absolute: string): string {
  const missing: string[] = [];
  let current = absolute;
  for (;;) {
    const real = tryRealpath(current);
    if (real !== null) {
      return missing.length > 0 ? join(real, ...missing.reverse()) : real;
    }
    const parent = dirname(current);
    if (parent === current) return absolute;
    missing.push(basename(current));
    current = parent;
  }
}

function tryRealpath(p: string): string | null {
  try {
    return realpathSync.native(p);
  } catch {
    return null;
  }
}
