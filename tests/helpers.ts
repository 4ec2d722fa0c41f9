/**
 * Test helpers and utilities.
 */

import { type Index, IndexList } from "../src/index_list/index.ts";

/**
 * Push every value to the back of a fresh list.
 * Returns the list and the handles in push order.
 */
export function listOf<T>(...values: T[]): { list: IndexList<T>; handles: Index<T>[] } {
  const list = new IndexList<T>();
  const handles = values.map((value) => list.pushBack(value));
  return { list, handles };
}

/** Items read by following `prev` links from the tail, in head-to-tail order. */
export function backwardValues<T>(list: IndexList<T>): T[] {
  return [...list.entriesReversed()].map(([, value]) => value).reverse();
}

/**
 * Assert-free consistency probe: forward and backward traversals must agree
 * with each other and with `size`.
 */
export function linksAgree<T>(list: IndexList<T>): boolean {
  const forward = list.toArray();
  const backward = backwardValues(list);
  return (
    forward.length === list.size &&
    backward.length === list.size &&
    forward.every((value, i) => Object.is(value, backward[i]))
  );
}
