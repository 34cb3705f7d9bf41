/**
 * Tour solver performance benchmark.
 * Compares the spanning-tree approximation against the exact solver.
 */

import { approximateTour } from '../../src/tour/metric-tour.js';
import { exactTour } from '../../src/tour/exact-tour.js';
import { tourCost } from '../../src/tour/tour-cost.js';

interface BenchmarkResult {
  ms: number | string;
  cost?: number;
}

function generateRandomPoints(n: number): number[][] {
  const points: number[][] = [];
  for (let i = 0; i < n; i++) {
    points.push([Math.random() * 1000, Math.random() * 1000]);
  }
  return points;
}

function distanceMatrix(points: number[][]): number[][] {
  return points.map(([x1 = 0, y1 = 0]) => points.map(([x2 = 0, y2 = 0]) => Math.hypot(x1 - x2, y1 - y2)));
}

function benchmarkFn<T>(fn: () => T): { ms: number; value: T } {
  const start = performance.now();
  const value = fn();
  const ms = performance.now() - start;
  return { ms: Math.round(ms), value };
}

function runBenchmarks(): void {
  console.log('Tour Solver Performance Benchmark');
  console.log('=================================\n');

  const sizes = [5, 8, 10, 12, 14, 16, 18, 20];

  console.log('| Size | Approx        | Exact          | Ratio |');
  console.log('|------|---------------|----------------|-------|');

  for (const size of sizes) {
    const costs = distanceMatrix(generateRandomPoints(size));

    const approxRun = benchmarkFn(() => approximateTour(size, costs));
    const approx: BenchmarkResult = { ms: approxRun.ms, cost: tourCost(costs, approxRun.value) };

    let exact: BenchmarkResult;
    try {
      const exactRun = benchmarkFn(() => exactTour(size, costs, { timeoutMs: 60_000 }));
      exact = { ms: exactRun.ms, cost: tourCost(costs, exactRun.value) };
    } catch (e) {
      exact = { ms: e instanceof Error ? e.message : 'error' };
    }

    const ratio =
      approx.cost !== undefined && exact.cost !== undefined && exact.cost > 0
        ? (approx.cost / exact.cost).toFixed(3)
        : '-';

    console.log(
      `| ${size.toString().padEnd(4)} | ${String(approx.ms).padEnd(11)}ms | ${String(exact.ms).padEnd(12)}ms | ${ratio.padEnd(5)} |`
    );
  }

  console.log('\n--- Large Dataset Test ---');

  const largeSize = 2000;
  console.log(`\nApproximating a tour through ${largeSize} points...`);

  const largeCosts = distanceMatrix(generateRandomPoints(largeSize));
  const largeResult = benchmarkFn(() => approximateTour(largeSize, largeCosts));

  console.log(`Duration: ${largeResult.ms}ms`);
  console.log(`Cost: ${tourCost(largeCosts, largeResult.value).toFixed(1)}`);
}

runBenchmarks();
