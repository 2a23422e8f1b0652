import { isErrnoException } from "../errors.js";

const GROUPS_SUPPORTED = process.platform !== "win32";

/** Whether children are spawned as their own process group (POSIX only). */
export function spawnsProcessGroups(): boolean {
  return GROUPS_SUPPORTED;
}

/** True if a process with this pid exists (signal 0 check). */
export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(err) && err.code === "EPERM";
  }
}

/**
 * Signal a child's whole process group, falling back to the pid alone where
 * groups are unavailable. Returns false when nothing was there to signal.
 */
export function killProcessTree(pid: number, signal: NodeJS.Signals): boolean {
  try {
    process.kill(GROUPS_SUPPORTED ? -pid : pid, signal);
    return true;
  } catch (err) {
    if (isErrnoException(err) && err.code === "ESRCH") {
      if (!GROUPS_SUPPORTED) return false;
      return killSingle(pid, signal);
    }
    throw err;
  }
}

function killSingle(pid: number, signal: NodeJS.Signals): boolean {
  try {
    process.kill(pid, signal);
    return true;
  } catch (err) {
    if (isErrnoException(err) && err.code === "ESRCH") return false;
    throw err;
  }
}

/** Resolve once `pid` is gone or `timeoutMs` elapses. Returns whether it exited. */
export async function waitForExit(pid: number, timeoutMs: number, pollIntervalMs: number): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (isProcessAlive(pid)) {
    if (Date.now() >= deadline) return false;
    await new Promise((r) => setTimeout(r, pollIntervalMs));
  }
  return true;
}
