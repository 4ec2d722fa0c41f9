/**
 * IndexList benchmarks.
 *
 * Key performance targets:
 * - pushBack / pushFront: amortized O(1)
 * - get: O(1), including stale handles
 * - remove: O(1) regardless of position in the list
 * - Full iteration: O(n)
 */

import { type Index, IndexList } from "../src/index_list/index.ts";
import type { BenchmarkSuite } from "./harness.ts";

let list10k: IndexList<number>;
let handles10k: Index<number>[];
let staleHandles: Index<number>[];
let churnList: IndexList<number>;

function fill(count: number): { list: IndexList<number>; handles: Index<number>[] } {
  const list = IndexList.withCapacity<number>(count);
  const handles: Index<number>[] = [];
  for (let i = 0; i < count; i++) {
    handles.push(list.pushBack(i));
  }
  return { list, handles };
}

export const indexListBenchmarks: BenchmarkSuite = {
  name: "IndexList Operations",
  benchmarks: [
    {
      name: "pushBack 10K items",
      iterations: 100,
      targetMs: 2,
      fn: () => {
        fill(10_000);
      },
    },
    {
      name: "pushFront 10K items",
      iterations: 100,
      targetMs: 2,
      fn: () => {
        const list = new IndexList<number>();
        for (let i = 0; i < 10_000; i++) {
          list.pushFront(i);
        }
      },
    },
    {
      name: "get - live handle (middle of 10K)",
      iterations: 10000,
      targetMs: 0.001,
      setup: () => {
        ({ list: list10k, handles: handles10k } = fill(10_000));
      },
      fn: () => {
        list10k.get(handles10k[5000]);
      },
    },
    {
      name: "get - 1K stale handles",
      iterations: 1000,
      targetMs: 0.1,
      setup: () => {
        const { list, handles } = fill(1000);
        for (const handle of handles) {
          list.remove(handle);
        }
        for (let i = 0; i < 1000; i++) {
          list.pushBack(i);
        }
        list10k = list;
        staleHandles = handles;
      },
      fn: () => {
        for (const handle of staleHandles) {
          list10k.get(handle);
        }
      },
    },
    {
      name: "Churn - push + remove at both ends",
      iterations: 10000,
      targetMs: 0.001,
      setup: () => {
        churnList = fill(1000).list;
      },
      fn: () => {
        churnList.remove(churnList.pushBack(1));
        churnList.remove(churnList.pushFront(2));
      },
    },
    {
      name: "Remove + re-push interior item (10K)",
      iterations: 10000,
      targetMs: 0.001,
      setup: () => {
        ({ list: list10k, handles: handles10k } = fill(10_000));
      },
      fn: () => {
        const value = list10k.remove(handles10k[5000]);
        if (value !== undefined) {
          handles10k[5000] = list10k.pushBack(value);
        }
      },
    },
    {
      name: "Iterate 10K items",
      iterations: 100,
      targetMs: 1,
      setup: () => {
        list10k = fill(10_000).list;
      },
      fn: () => {
        Array.from(list10k);
      },
    },
    {
      name: "Drain 10K items",
      iterations: 10,
      targetMs: 2,
      fn: () => {
        Array.from(fill(10_000).list.drain());
      },
    },
  ],
};
