/**
 * Forward traversal over an IndexList, head to tail.
 *
 * Both iterators are single-pass: once exhausted they stay exhausted, and a
 * new traversal has to be started from the list. Neither may overlap a
 * structural change to the list (push or remove) made by the caller.
 */

import { type Entry, occupiedAt } from "./entry.ts";
import type { Index } from "./types.ts";
import { createIndex } from "./types.ts";

/**
 * Borrowing iterator. Walks `next` links from a starting slot and yields
 * each item together with the handle that currently addresses it.
 */
export class ForwardIter<T> implements IterableIterator<[Index<T>, T]> {
  private nextSlot: number | undefined;

  constructor(
    private readonly contents: readonly Entry<T>[],
    head: number | undefined,
  ) {
    this.nextSlot = head;
  }

  next(): IteratorResult<[Index<T>, T]> {
    const slot = this.nextSlot;
    if (slot === undefined) {
      return { done: true, value: undefined };
    }

    const entry = occupiedAt(this.contents, slot, "free slot reached while iterating");
    this.nextSlot = entry.next;
    return { done: false, value: [createIndex(slot, entry.generation), entry.item] };
  }

  [Symbol.iterator](): this {
    return this;
  }
}

/**
 * Walks `prev` links from the tail. Same contract as ForwardIter.
 */
export class BackwardIter<T> implements IterableIterator<[Index<T>, T]> {
  private nextSlot: number | undefined;

  constructor(
    private readonly contents: readonly Entry<T>[],
    tail: number | undefined,
  ) {
    this.nextSlot = tail;
  }

  next(): IteratorResult<[Index<T>, T]> {
    const slot = this.nextSlot;
    if (slot === undefined) {
      return { done: true, value: undefined };
    }

    const entry = occupiedAt(this.contents, slot, "free slot reached while iterating backwards");
    this.nextSlot = entry.prev;
    return { done: false, value: [createIndex(slot, entry.generation), entry.item] };
  }

  [Symbol.iterator](): this {
    return this;
  }
}

/**
 * The part of a list a consuming iterator needs: detach the head element
 * and hand back its item.
 */
export interface Drainable<T> {
  /** Returns `done: true` once the list is empty. */
  takeHead(): IteratorResult<T, undefined>;
}

/**
 * Consuming iterator. Each step unlinks the current head and frees its slot,
 * so by the time the iterator is exhausted the list is empty. Stopping early
 * leaves the untouched tail of the list in place.
 */
export class DrainIter<T> implements IterableIterator<T> {
  private finished = false;

  constructor(private readonly list: Drainable<T>) {}

  next(): IteratorResult<T, undefined> {
    if (this.finished) {
      return { done: true, value: undefined };
    }

    const result = this.list.takeHead();
    if (result.done) {
      this.finished = true;
    }
    return result;
  }

  [Symbol.iterator](): this {
    return this;
  }
}
