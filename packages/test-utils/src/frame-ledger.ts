import type { FrameTracker, Message } from "@packline/rpc-protocol";

/**
 * Allocation-tracking harness for client tests. Counts every message the
 * client acquires and releases and remembers the ones still live.
 */
export interface FrameLedger extends FrameTracker {
  /** Messages acquired and not yet released */
  getLive(): Message[];
  /** Total acquisitions */
  acquired(): number;
  /** Total successful releases */
  released(): number;
  /** Releases of a message that was not live */
  invalidReleases(): number;
  /** Acquisitions of a message that was already live */
  duplicateAcquires(): number;
}

export function createFrameLedger(): FrameLedger {
  const live = new Set<Message>();
  let acquiredCount = 0;
  let releasedCount = 0;
  let invalidReleaseCount = 0;
  let duplicateAcquireCount = 0;

  return {
    acquire(message) {
      if (live.has(message)) {
        duplicateAcquireCount++;
        return;
      }
      live.add(message);
      acquiredCount++;
    },
    release(message) {
      if (!live.delete(message)) {
        invalidReleaseCount++;
        return;
      }
      releasedCount++;
    },
    getLive: () => [...live],
    acquired: () => acquiredCount,
    released: () => releasedCount,
    invalidReleases: () => invalidReleaseCount,
    duplicateAcquires: () => duplicateAcquireCount,
  };
}
