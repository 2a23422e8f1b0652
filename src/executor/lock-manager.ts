/**
 * Ownership table for write-target keys. A key maps to the id of the task
 * holding it; absence means free. Acquisition is all-or-nothing.
 */
export class LockManager {
  private owners = new Map<string, string>();

  /** True when every key is free (or already held by `taskId`). */
  canAcquire(keys: readonly string[], taskId?: string): boolean {
    return keys.every((key) => {
      const owner = this.owners.get(key);
      return owner === undefined || owner === taskId;
    });
  }

  /** Take every key for `taskId`, or none of them. */
  tryAcquire(taskId: string, keys: readonly string[]): boolean {
    if (!this.canAcquire(keys, taskId)) return false;
    for (const key of keys) this.owners.set(key, taskId);
    return true;
  }

  /** Free every key held by `taskId`. Returns the released keys. */
  release(taskId: string): string[] {
    const released: string[] = [];
    for (const [key, owner] of this.owners) {
      if (owner === taskId) released.push(key);
    }
    for (const key of released) this.owners.delete(key);
    return released;
  }

  holder(key: string): string | undefined {
    return this.owners.get(key);
  }

  /** Keys in `keys` currently held by another task, with their holders. */
  conflicts(keys: readonly string[], taskId?: string): Array<{ key: string; holder: string }> {
    const out: Array<{ key: string; holder: string }> = [];
    for (const key of keys) {
      const owner = this.owners.get(key);
      if (owner !== undefined && owner !== taskId) out.push({ key, holder: owner });
    }
    return out;
  }

  get size(): number {
    return this.owners.size;
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries(this.owners);
  }
}
