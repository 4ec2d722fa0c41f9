/**
 * Raised when the linked order or the free list points somewhere it must not:
 * a free slot reached through a head, tail, next or prev link, or an occupied
 * slot at the head of the free list.
 *
 * This signals a bug inside IndexList, never caller misuse. Stale handles
 * are reported as `undefined`, not through this error.
 */
export class CorruptedListError extends Error {
  readonly slot: number;

  constructor(slot: number, context: string) {
    super(`Corrupted list: ${context} (slot ${slot})`);
    this.name = "CorruptedListError";
    this.slot = slot;
  }
}
