/**
 * Benchmark runner for IndexList.
 *
 * Run with: npm run bench
 *
 * Target performance:
 * - push / get / remove: O(1), well under a microsecond each
 * - Churn: no arena growth when removals keep pace with pushes
 */

import { IndexList } from "../src/index_list/index.ts";
import { type BenchmarkSuite, measureMemory, runBenchmarks } from "./harness.ts";
import { indexListBenchmarks } from "./index_list.bench.ts";

const suites: BenchmarkSuite[] = [indexListBenchmarks];

console.log("=".repeat(60));
console.log("IndexList Performance Benchmarks");
console.log("=".repeat(60));
console.log("");

const { result: list, heapUsedKb } = measureMemory(() => IndexList.from(Array.from({ length: 100_000 }, (_, i) => i)));
console.log(`Heap for ${list.size.toLocaleString("en-US")} items: ${heapUsedKb.toFixed(0)}KB`);

runBenchmarks(suites);
