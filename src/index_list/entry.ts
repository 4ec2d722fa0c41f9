/**
 * Arena slots.
 *
 * A slot is either on the free list or occupied. Occupied slots carry the
 * stored item, the generation they were filled under, and the prev/next slot
 * positions that form the list order. Links are positions, never references.
 */

import { CorruptedListError } from "./errors.ts";

export interface FreeEntry {
  readonly kind: "free";
  /** Next slot on the free list; undefined ends it. */
  readonly nextFree: number | undefined;
}

export interface OccupiedEntry<T> {
  readonly kind: "occupied";
  item: T;
  readonly generation: number;
  next: number | undefined;
  prev: number | undefined;
}

export type Entry<T> = FreeEntry | OccupiedEntry<T>;

export function freeEntry(nextFree: number | undefined): FreeEntry {
  return { kind: "free", nextFree };
}

export function occupiedEntry<T>(
  item: T,
  generation: number,
  prev: number | undefined,
  next: number | undefined,
): OccupiedEntry<T> {
  return { kind: "occupied", item, generation, next, prev };
}

/**
 * Follow an internal link. Links only ever point at occupied slots, so
 * anything else means the list is corrupt.
 */
export function occupiedAt<T>(
  contents: readonly Entry<T>[],
  slot: number,
  context: string,
): OccupiedEntry<T> {
  const entry = contents[slot];
  if (entry?.kind !== "occupied") {
    throw new CorruptedListError(slot, context);
  }
  return entry;
}
