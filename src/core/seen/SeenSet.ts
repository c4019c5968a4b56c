// src/core/seen/SeenSet.ts

import type { NotificationKey } from '../notification/types';

/**
 * Record of (source, id) pairs already reported as new. Ids are grouped per
 * source, so equal ids from different sources never collide. Grows only.
 */
export class SeenSet {
  private bySource: Map<string, Set<string>> = new Map();
  private count = 0;

  has(key: NotificationKey): boolean {
    return this.bySource.get(key.source)?.has(key.id) ?? false;
  }

  /**
   * @returns true if the key was not present before
   */
  add(key: NotificationKey): boolean {
    let ids = this.bySource.get(key.source);
    if (!ids) {
      ids = new Set();
      this.bySource.set(key.source, ids);
    }

    if (ids.has(key.id)) return false;

    ids.add(key.id);
    this.count++;
    return true;
  }

  get size(): number {
    return this.count;
  }
}
