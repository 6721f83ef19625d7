import {
  bruteForceClosestPair,
  closestPairDivideAndConquer,
  createSearchStats,
  type SearchResult,
} from "../../ClosestPair";
import { randomPoints, type Point, type Range } from "../../points";

export type BenchmarkOptions = {
  sizes: number[];
  iterations: number;
  range: Range;
};

export type BenchmarkRow = {
  n: number;
  bruteForceMs: number;
  divideAndConquerMs: number;
  agree: boolean;
};

export type ComparisonCount = {
  n: number;
  bruteForce: number;
  divideAndConquer: number;
};

export function nowNs() {
  return process.hrtime.bigint();
}

export function stats(nums: number[]) {
  const n = nums.length;
  const mean = nums.reduce((a, b) => a + b, 0) / n;
  const sq = nums.reduce((a, b) => a + (b - mean) * (b - mean), 0);
  const std = Math.sqrt(sq / n);
  return { mean, std, n };
}

function timed(search: (points: readonly Point[]) => SearchResult, points: readonly Point[]) {
  const t0 = nowNs();
  const result = search(points);
  const t1 = nowNs();
  return { result, ms: Number(t1 - t0) / 1e6 };
}

export function benchmarkAlgorithms(options: BenchmarkOptions, rng: () => number): BenchmarkRow[] {
  const { sizes, iterations, range } = options;
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new RangeError(`iterations must be a positive integer, got ${iterations}`);
  }

  const rows: BenchmarkRow[] = [];
  for (const n of sizes) {
    const points = randomPoints(n, rng, range);
    const bfTimes: number[] = [];
    const dncTimes: number[] = [];
    let agree = true;
    for (let i = 0; i < iterations; i++) {
      const bf = timed(bruteForceClosestPair, points);
      const dnc = timed(closestPairDivideAndConquer, points);
      bfTimes.push(bf.ms);
      dncTimes.push(dnc.ms);
      if (bf.result.distance !== dnc.result.distance) agree = false;
    }
    rows.push({
      n,
      bruteForceMs: stats(bfTimes).mean,
      divideAndConquerMs: stats(dncTimes).mean,
      agree,
    });
  }
  return rows;
}

// Deterministic work measure, unlike wall-clock time.
export function countComparisons(points: readonly Point[]): ComparisonCount {
  const bf = createSearchStats();
  const dnc = createSearchStats();
  bruteForceClosestPair(points, bf);
  closestPairDivideAndConquer(points, dnc);
  return {
    n: points.length,
    bruteForce: bf.distanceEvaluations,
    divideAndConquer: dnc.distanceEvaluations,
  };
}

export function formatBenchmarkTable(rows: BenchmarkRow[]): string {
  const header = `${"n".padStart(6)}  ${"BF Time (s)".padStart(12)}  ${"DnC Time (s)".padStart(12)}`;
  const lines = rows.map((r) => {
    const bf = (r.bruteForceMs / 1000).toFixed(6).padStart(12);
    const dnc = (r.divideAndConquerMs / 1000).toFixed(6).padStart(12);
    return `${String(r.n).padStart(6)}  ${bf}  ${dnc}`;
  });
  return [header, ...lines].join("\n");
}
