import { ImportInProgressError } from '../errors';

/**
 * Exclusive per-assessment lock. Imports hold it for the whole batch, and
 * changes that would invalidate a running batch (archive, delete, grade key
 * reassignment or band edits) take it too. A second holder fails immediately
 * instead of queueing.
 */
export class ImportLockRegistry {
  private held = new Set<string>();

  isHeld(assessmentId: string): boolean {
    return this.held.has(assessmentId);
  }

  withLock<T>(assessmentId: string, fn: () => Promise<T>): Promise<T> {
    return this.withLocks([assessmentId], fn);
  }

  /** Takes all locks or none. */
  async withLocks<T>(assessmentIds: string[], fn: () => Promise<T>): Promise<T> {
    const ids = [...new Set(assessmentIds)];
    const busy = ids.find((id) => this.held.has(id));
    if (busy !== undefined) {
      throw new ImportInProgressError(busy);
    }
    for (const id of ids) this.held.add(id);
    try {
      return await fn();
    } finally {
      for (const id of ids) this.held.delete(id);
    }
  }
}
