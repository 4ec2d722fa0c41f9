/**
 * Handle and option types for IndexList.
 */

declare const itemType: unique symbol;

/**
 * A generational handle into an IndexList.
 * Two numbers packed together: index (which slot) and generation (which occupant).
 *
 * The phantom `itemType` member binds a handle to the item type of the list
 * that issued it, so an `Index<string>` cannot be passed to an `IndexList<number>`.
 */
export interface Index<T> {
  readonly index: number;
  readonly generation: number;
  readonly [itemType]?: T;
}

export interface IndexListOptions {
  /**
   * Expected number of elements. A sizing hint only: the list always grows past it.
   */
  capacity?: number;
}

/** @internal */
export function createIndex<T>(index: number, generation: number): Index<T> {
  const handle: Index<T> = { index, generation };
  return Object.freeze(handle);
}

// =============================================================================
// Index Utilities
// =============================================================================

/**
 * Compare two handles for equality.
 */
export function indexesEqual<T>(a: Index<T>, b: Index<T>): boolean {
  return a.index === b.index && a.generation === b.generation;
}

/**
 * Compare two handles for ordering (by slot, then generation).
 * This is storage order, not list order.
 */
export function indexesCompare<T>(a: Index<T>, b: Index<T>): number {
  if (a.index !== b.index) return a.index - b.index;
  return a.generation - b.generation;
}
