/**
 * Benchmark harness: timed iterations against a per-call target, with a
 * console report per suite.
 */

export interface Benchmark {
  name: string;
  /** Called once before warmup */
  setup?: () => void;
  /** The operation under measurement */
  fn: () => void;
  /** Number of timed calls (default: 1000) */
  iterations?: number;
  /** Max median time per call in ms */
  targetMs?: number;
}

export interface BenchmarkSuite {
  name: string;
  benchmarks: Benchmark[];
}

export interface BenchmarkResult {
  name: string;
  iterations: number;
  medianMs: number;
  p99Ms: number;
  opsPerSec: number;
  targetMs?: number;
  passed: boolean;
}

function percentile(sorted: number[], p: number): number {
  const i = Math.min(sorted.length - 1, Math.floor(sorted.length * p));
  return sorted[i] ?? 0;
}

/**
 * Run a single benchmark. Warms up with a tenth of the iterations (at least 10)
 * before timing each call separately.
 */
export function runBenchmark(bench: Benchmark): BenchmarkResult {
  const iterations = bench.iterations ?? 1000;
  bench.setup?.();

  const warmup = Math.max(10, Math.floor(iterations / 10));
  for (let i = 0; i < warmup; i++) {
    bench.fn();
  }

  const times = new Array<number>(iterations);
  for (let i = 0; i < iterations; i++) {
    const start = performance.now();
    bench.fn();
    times[i] = performance.now() - start;
  }
  times.sort((a, b) => a - b);

  const medianMs = percentile(times, 0.5);
  const totalMs = times.reduce((a, b) => a + b, 0);
  return {
    name: bench.name,
    iterations,
    medianMs,
    p99Ms: percentile(times, 0.99),
    opsPerSec: totalMs > 0 ? (iterations * 1000) / totalMs : Number.POSITIVE_INFINITY,
    targetMs: bench.targetMs,
    passed: bench.targetMs === undefined || medianMs <= bench.targetMs,
  };
}

function formatMs(ms: number): string {
  return ms < 0.01 ? `${(ms * 1000).toFixed(2)}µs` : `${ms.toFixed(3)}ms`;
}

export function formatResult(result: BenchmarkResult): string {
  const status = result.passed ? "✓" : "✗";
  const target = result.targetMs !== undefined ? ` (target: <${formatMs(result.targetMs)})` : "";

  return [
    `${status} ${result.name}`,
    `  median: ${formatMs(result.medianMs)}${target}, p99: ${formatMs(result.p99Ms)}`,
    `  ops/sec: ${Math.round(result.opsPerSec).toLocaleString("en-US")} over ${result.iterations} runs`,
  ].join("\n");
}

/**
 * Run every suite and print a report. Sets a failing exit code when any
 * benchmark misses its target or throws.
 */
export function runBenchmarks(suites: BenchmarkSuite[]): BenchmarkResult[] {
  const results: BenchmarkResult[] = [];
  let failed = 0;

  for (const suite of suites) {
    console.log(`\n## ${suite.name}\n`);

    for (const bench of suite.benchmarks) {
      try {
        const result = runBenchmark(bench);
        results.push(result);
        console.log(`${formatResult(result)}\n`);
        if (!result.passed) failed++;
      } catch (error) {
        console.log(`✗ ${bench.name}\n  ERROR: ${error}\n`);
        failed++;
      }
    }
  }

  console.log("=".repeat(60));
  console.log(`Results: ${results.filter((r) => r.passed).length} passed, ${failed} failed`);
  console.log("=".repeat(60));

  if (failed > 0) {
    process.exitCode = 1;
  }
  return results;
}

/**
 * Measure heap growth across a function call.
 * Collects garbage first when Node runs with --expose-gc; best-effort otherwise.
 */
export function measureMemory<T>(fn: () => T): { result: T; heapUsedKb: number } {
  const gc: unknown = Reflect.get(globalThis, "gc");
  if (typeof gc === "function") {
    gc();
  }

  const before = process.memoryUsage().heapUsed;
  const result = fn();
  const after = process.memoryUsage().heapUsed;

  return {
    result,
    heapUsedKb: (after - before) / 1024,
  };
}
