/**
 * Iteration tests - borrowing and consuming traversals, and corruption
 * detection on the internal links.
 */

import { describe, expect, test } from "vitest";
import { freeEntry, occupiedAt, occupiedEntry, type Entry } from "../../src/index_list/entry.ts";
import { CorruptedListError, IndexList } from "../../src/index_list/index.ts";
import { BackwardIter, DrainIter, ForwardIter } from "../../src/index_list/iter.ts";
import { listOf } from "../helpers.ts";

describe("Borrowing Iteration", () => {
  test("values walks head to tail and then stops", () => {
    const { list } = listOf(100, 200, 300, 400, 500);

    const iter = list.values();
    expect(iter.next()).toEqual({ done: false, value: 100 });
    expect(iter.next()).toEqual({ done: false, value: 200 });
    expect(iter.next()).toEqual({ done: false, value: 300 });
    expect(iter.next()).toEqual({ done: false, value: 400 });
    expect(iter.next()).toEqual({ done: false, value: 500 });
    expect(iter.next().done).toBe(true);
    expect(iter.next().done).toBe(true);
  });

  test("skips removed items", () => {
    const { list, handles } = listOf(100, 200, 300, 400, 500);
    list.remove(handles[2]);
    expect([...list.values()]).toEqual([100, 200, 400, 500]);
  });

  test("does not modify the list", () => {
    const { list } = listOf(1, 2, 3);
    expect([...list]).toEqual([1, 2, 3]);
    expect([...list]).toEqual([1, 2, 3]);
    expect(list.size).toBe(3);
    expect(list.generation).toBe(0);
  });

  test("entries pairs each item with its live handle", () => {
    const { list, handles } = listOf("a", "b", "c");
    list.remove(handles[0]);
    const d = list.pushFront("d");

    const entries = [...list.entries()];
    expect(entries.map(([, value]) => value)).toEqual(["d", "b", "c"]);
    expect(entries.map(([index]) => list.get(index))).toEqual(["d", "b", "c"]);
    expect(entries[0][0]).toEqual(d);
  });

  test("indexes yields handles in list order", () => {
    const list = new IndexList<number>();
    const second = list.pushBack(2);
    const first = list.pushFront(1);

    expect([...list.indexes()]).toEqual([first, second]);
  });

  test("entriesReversed walks tail to head", () => {
    const { list } = listOf(1, 2, 3);
    list.pushFront(0);
    expect([...list.entriesReversed()].map(([, value]) => value)).toEqual([3, 2, 1, 0]);
  });

  test("empty list iterates nothing", () => {
    const list = new IndexList<number>();
    expect([...list]).toEqual([]);
    expect([...list.entries()]).toEqual([]);
    expect([...list.entriesReversed()]).toEqual([]);
    expect([...list.drain()]).toEqual([]);
  });
});

describe("Consuming Iteration", () => {
  test("drain yields every item in order and empties the list", () => {
    const { list, handles } = listOf(100, 200, 300, 400);

    const iter = list.drain();
    expect(iter.next()).toEqual({ done: false, value: 100 });
    expect(iter.next()).toEqual({ done: false, value: 200 });
    expect(iter.next()).toEqual({ done: false, value: 300 });
    expect(iter.next()).toEqual({ done: false, value: 400 });
    expect(iter.next()).toEqual({ done: true, value: undefined });

    expect(list.isEmpty).toBe(true);
    expect(list.size).toBe(0);
    expect(list.head()).toBeUndefined();
    expect(list.tail()).toBeUndefined();
    expect(list.generation).toBe(4);
    for (const handle of handles) {
      expect(list.get(handle)).toBeUndefined();
    }
  });

  test("stays exhausted even if the list is refilled", () => {
    const { list } = listOf(1);
    const iter = list.drain();
    expect([...iter]).toEqual([1]);

    list.pushBack(2);
    expect(iter.next().done).toBe(true);
    expect(list.toArray()).toEqual([2]);
  });

  test("stopping early leaves the rest of the list", () => {
    const { list, handles } = listOf(1, 2, 3, 4);

    for (const value of list.drain()) {
      if (value === 2) break;
    }

    expect(list.toArray()).toEqual([3, 4]);
    expect(list.head()).toBe(3);
    expect(list.get(handles[0])).toBeUndefined();
    expect(list.get(handles[2])).toBe(3);
  });

  test("yields undefined items without stopping", () => {
    const list = IndexList.from<number | undefined>([1, undefined, 3]);
    expect([...list.drain()]).toEqual([1, undefined, 3]);
    expect(list.isEmpty).toBe(true);
  });

  test("drained slots are reused by later pushes", () => {
    const { list } = listOf("a", "b");
    expect([...list.drain()]).toEqual(["a", "b"]);

    list.pushBack("c");
    list.pushBack("d");
    list.pushBack("e");
    expect(list.capacity).toBe(3);
    expect(list.toArray()).toEqual(["c", "d", "e"]);
  });

  test("DrainIter stops at the first empty result", () => {
    const results: IteratorResult<string, undefined>[] = [
      { done: false, value: "x" },
      { done: true, value: undefined },
      { done: false, value: "never" },
    ];
    const iter = new DrainIter({
      takeHead: () => results.shift() ?? { done: true, value: undefined },
    });

    expect([...iter]).toEqual(["x"]);
    expect(iter.next().done).toBe(true);
    expect(results).toHaveLength(1);
  });
});

describe("Corruption Detection", () => {
  test("ForwardIter throws on a free slot in the chain", () => {
    const contents: Entry<number>[] = [occupiedEntry(7, 0, undefined, 1), freeEntry(undefined)];
    const iter = new ForwardIter(contents, 0);

    expect(iter.next().value).toEqual([{ index: 0, generation: 0 }, 7]);
    expect(() => iter.next()).toThrow(CorruptedListError);
  });

  test("BackwardIter throws on a free slot in the chain", () => {
    const contents: Entry<number>[] = [freeEntry(undefined), occupiedEntry(7, 0, 0, undefined)];
    const iter = new BackwardIter(contents, 1);

    expect(iter.next().value).toEqual([{ index: 1, generation: 0 }, 7]);
    expect(() => iter.next()).toThrow(CorruptedListError);
  });

  test("occupiedAt reports the offending slot", () => {
    const contents: Entry<string>[] = [freeEntry(undefined)];

    expect(() => occupiedAt(contents, 0, "test link")).toThrow("Corrupted list: test link (slot 0)");
    let caught: unknown;
    try {
      occupiedAt(contents, 3, "dangling link");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CorruptedListError);
    expect(caught).toMatchObject({ name: "CorruptedListError", slot: 3 });
  });

  test("occupiedAt returns the live entry", () => {
    const contents: Entry<string>[] = [occupiedEntry("a", 2, undefined, undefined)];
    expect(occupiedAt(contents, 0, "unused").item).toBe("a");
  });
});
