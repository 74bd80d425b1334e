/**
 * Bounded intent history. Oldest entry evicted first once the cap is exceeded.
 */

import type { IntentRecord } from "./vocabulary.js";

export class IntentHistory {
  private readonly entries: IntentRecord[] = [];

  constructor(readonly maxEntries: number) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`History size must be a positive integer, got ${maxEntries}`);
    }
  }

  append(intent: IntentRecord): void {
    this.entries.push(intent);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  /** Oldest first. */
  toArray(): IntentRecord[] {
    return [...this.entries];
  }
}
