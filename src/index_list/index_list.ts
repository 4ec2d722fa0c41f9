/**
 * An ordered list stored in a generational arena.
 *
 * Items live in a flat array of slots. Freed slots are threaded into a free
 * list and reused by later pushes, and occupied slots are chained into a
 * doubly-linked list by slot position. Callers hold `Index` handles rather
 * than references:
 * - O(1) push at either end, lookup, and removal
 * - Removed slots are recycled, so churn does not grow the arena
 * - Every removal bumps the list's generation, and a slot is stamped with
 *   the generation current at insertion, so a handle to a removed item
 *   never matches whatever reoccupies its slot
 */

import { CorruptedListError } from "./errors.ts";
import {
  type Entry,
  freeEntry,
  type OccupiedEntry,
  occupiedAt,
  occupiedEntry,
} from "./entry.ts";
import { BackwardIter, DrainIter, ForwardIter } from "./iter.ts";
import { createIndex, type Index, type IndexListOptions } from "./types.ts";

export class IndexList<T> implements Iterable<T> {
  private readonly contents: Entry<T>[] = [];
  private _generation = 0;
  private nextFree: number | undefined = undefined;
  private headSlot: number | undefined = undefined;
  private tailSlot: number | undefined = undefined;
  private _size = 0;
  private readonly capacityHint: number;

  constructor(options: IndexListOptions = {}) {
    const capacity = options.capacity ?? 0;
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`IndexList capacity must be a non-negative integer, got ${capacity}`);
    }
    this.capacityHint = capacity;
  }

  /**
   * Create an empty list sized for `capacity` elements.
   */
  static withCapacity<T>(capacity: number): IndexList<T> {
    return new IndexList<T>({ capacity });
  }

  /**
   * Build a list by pushing every item to the back, in iteration order.
   */
  static from<T>(items: Iterable<T>, options?: IndexListOptions): IndexList<T> {
    const list = new IndexList<T>(options);
    for (const item of items) {
      list.pushBack(item);
    }
    return list;
  }

  get size(): number {
    return this._size;
  }

  get isEmpty(): boolean {
    return this.headSlot === undefined;
  }

  /** Number of elements the list can hold without growing the arena. */
  get capacity(): number {
    return Math.max(this.capacityHint, this.contents.length);
  }

  /** Number of removals performed on this list so far. */
  get generation(): number {
    return this._generation;
  }

  // ===========================================================================
  // Head / Tail
  // ===========================================================================

  head(): T | undefined {
    return this.endpoint(this.headSlot)?.item;
  }

  tail(): T | undefined {
    return this.endpoint(this.tailSlot)?.item;
  }

  /**
   * Replace the head item. Returns false if the list is empty.
   */
  setHead(item: T): boolean {
    const entry = this.endpoint(this.headSlot);
    if (!entry) return false;
    entry.item = item;
    return true;
  }

  /**
   * Replace the tail item. Returns false if the list is empty.
   */
  setTail(item: T): boolean {
    const entry = this.endpoint(this.tailSlot);
    if (!entry) return false;
    entry.item = item;
    return true;
  }

  /**
   * Apply `fn` to the head item and store the result.
   * Returns the new item, or undefined if the list is empty.
   */
  updateHead(fn: (item: T) => T): T | undefined {
    const entry = this.endpoint(this.headSlot);
    if (!entry) return undefined;
    entry.item = fn(entry.item);
    return entry.item;
  }

  /**
   * Apply `fn` to the tail item and store the result.
   * Returns the new item, or undefined if the list is empty.
   */
  updateTail(fn: (item: T) => T): T | undefined {
    const entry = this.endpoint(this.tailSlot);
    if (!entry) return undefined;
    entry.item = fn(entry.item);
    return entry.item;
  }

  private endpoint(slot: number | undefined): OccupiedEntry<T> | undefined {
    if (slot === undefined) return undefined;
    return occupiedAt(this.contents, slot, "list endpoint is not occupied");
  }

  // ===========================================================================
  // Lookup
  // ===========================================================================

  /**
   * Get the item for a handle, or undefined if the handle is stale or invalid.
   */
  get(index: Index<T>): T | undefined {
    return this.lookup(index)?.item;
  }

  /**
   * Check if a handle still addresses a live item.
   */
  has(index: Index<T>): boolean {
    return this.lookup(index) !== undefined;
  }

  /**
   * Replace the item at a handle. Returns true if the handle was valid.
   */
  set(index: Index<T>, item: T): boolean {
    const entry = this.lookup(index);
    if (!entry) return false;
    entry.item = item;
    return true;
  }

  /**
   * Apply `fn` to the item at a handle and store the result.
   * Returns the new item, or undefined if the handle was stale or invalid.
   */
  update(index: Index<T>, fn: (item: T) => T): T | undefined {
    const entry = this.lookup(index);
    if (!entry) return undefined;
    entry.item = fn(entry.item);
    return entry.item;
  }

  private lookup(index: Index<T>): OccupiedEntry<T> | undefined {
    const entry = this.contents[index.index];
    if (entry?.kind === "occupied" && entry.generation === index.generation) {
      return entry;
    }
    return undefined;
  }

  // ===========================================================================
  // Insertion
  // ===========================================================================

  /**
   * Append an item after the current tail and return its handle.
   */
  pushBack(item: T): Index<T> {
    const oldTail = this.tailSlot;
    const slot = this.allocate(occupiedEntry(item, this._generation, oldTail, undefined));

    if (oldTail !== undefined) {
      occupiedAt(this.contents, oldTail, "tail is free").next = slot;
    }
    if (this.headSlot === undefined) {
      this.headSlot = slot;
    }
    this.tailSlot = slot;

    this._size++;
    return createIndex(slot, this._generation);
  }

  /**
   * Prepend an item before the current head and return its handle.
   */
  pushFront(item: T): Index<T> {
    const oldHead = this.headSlot;
    const slot = this.allocate(occupiedEntry(item, this._generation, undefined, oldHead));

    // The old head gains a predecessor; the tail is untouched unless the list was empty.
    if (oldHead !== undefined) {
      occupiedAt(this.contents, oldHead, "head is free").prev = slot;
    }
    if (this.tailSlot === undefined) {
      this.tailSlot = slot;
    }
    this.headSlot = slot;

    this._size++;
    return createIndex(slot, this._generation);
  }

  /**
   * Place an entry in the arena: reuse the first free slot if there is one,
   * otherwise grow the backing array. Returns the slot position.
   */
  private allocate(entry: OccupiedEntry<T>): number {
    const slot = this.nextFree;
    if (slot === undefined) {
      this.contents.push(entry);
      return this.contents.length - 1;
    }

    const free = this.contents[slot];
    if (free?.kind !== "free") {
      throw new CorruptedListError(slot, "free list head is occupied");
    }
    this.nextFree = free.nextFree;
    this.contents[slot] = entry;
    return slot;
  }

  // ===========================================================================
  // Removal
  // ===========================================================================

  /**
   * Remove the item at a handle and return it.
   * Returns undefined if the handle is stale or invalid; the list is unchanged.
   */
  remove(index: Index<T>): T | undefined {
    if (this.headSlot === undefined || this.tailSlot === undefined) {
      return undefined;
    }
    if (!this.lookup(index)) {
      return undefined;
    }
    return this.unlink(index.index);
  }

  /**
   * Remove and return the head item, or undefined if the list is empty.
   */
  popFront(): T | undefined {
    const result = this.takeHead();
    return result.done ? undefined : result.value;
  }

  /**
   * Remove and return the tail item, or undefined if the list is empty.
   */
  popBack(): T | undefined {
    if (this.tailSlot === undefined) return undefined;
    return this.unlink(this.tailSlot);
  }

  /**
   * Remove every item, head to tail. All outstanding handles become stale.
   */
  clear(): void {
    while (this.headSlot !== undefined) {
      this.unlink(this.headSlot);
    }
  }

  private takeHead(): IteratorResult<T, undefined> {
    if (this.headSlot === undefined) {
      return { done: true, value: undefined };
    }
    return { done: false, value: this.unlink(this.headSlot) };
  }

  /**
   * Detach an occupied slot from the order list, push it onto the free list,
   * and bump the generation.
   */
  private unlink(slot: number): T {
    const entry = occupiedAt(this.contents, slot, "removing a free slot");
    const { prev, next } = entry;

    if (prev !== undefined) {
      occupiedAt(this.contents, prev, "prev link is free").next = next;
    }
    if (next !== undefined) {
      occupiedAt(this.contents, next, "next link is free").prev = prev;
    }
    if (slot === this.tailSlot) {
      this.tailSlot = prev;
    }
    if (slot === this.headSlot) {
      this.headSlot = next;
    }

    this.contents[slot] = freeEntry(this.nextFree);
    this.nextFree = slot;
    this._generation++;
    this._size--;
    return entry.item;
  }

  // ===========================================================================
  // Iteration
  // ===========================================================================

  /**
   * Iterate items head to tail without modifying the list.
   */
  *values(): IterableIterator<T> {
    for (const [, item] of this.entries()) {
      yield item;
    }
  }

  /**
   * Iterate live handles head to tail.
   */
  *indexes(): IterableIterator<Index<T>> {
    for (const [index] of this.entries()) {
      yield index;
    }
  }

  /**
   * Iterate (handle, item) pairs head to tail.
   */
  entries(): IterableIterator<[Index<T>, T]> {
    return new ForwardIter(this.contents, this.headSlot);
  }

  /**
   * Iterate (handle, item) pairs tail to head.
   */
  entriesReversed(): IterableIterator<[Index<T>, T]> {
    return new BackwardIter(this.contents, this.tailSlot);
  }

  /**
   * Consume the list head to tail. Each yielded item is removed from the list
   * as it is produced, so after a full pass the list is empty.
   */
  drain(): IterableIterator<T> {
    return new DrainIter({ takeHead: () => this.takeHead() });
  }

  toArray(): T[] {
    return [...this.values()];
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.values();
  }
}
