import { describe, expect, it } from "vitest";
import {
  bruteForceClosestPair,
  closestInStrip,
  closestPairDivideAndConquer,
  createSearchStats,
  distance,
  type SearchResult,
} from "../ClosestPair";
import { fromTuples, mulberry32, point, randomPoints, type Point } from "../points";

const searches: [string, (points: readonly Point[]) => SearchResult][] = [
  ["bruteForceClosestPair", bruteForceClosestPair],
  ["closestPairDivideAndConquer", closestPairDivideAndConquer],
];

function expectMinimalPair(result: SearchResult, points: readonly Point[]) {
  expect(result.pair).not.toBeNull();
  if (!result.pair) return;
  const [a, b] = result.pair;
  expect(a).not.toBe(b);
  expect(points).toContain(a);
  expect(points).toContain(b);
  expect(distance(a, b)).toBe(result.distance);
}

describe("distance", () => {
  it("computes the euclidean distance", () => {
    expect(distance(point(0, 0), point(3, 4))).toBe(5);
    expect(distance(point(-1, -1), point(2, 3))).toBe(5);
  });

  it("is symmetric and zero for equal coordinates", () => {
    const a = point(1.5, -2.25);
    const b = point(7, 0.125);
    expect(distance(a, b)).toBe(distance(b, a));
    expect(distance(a, point(1.5, -2.25))).toBe(0);
  });
});

describe.each(searches)("%s", (_, search) => {
  it("returns no pair for fewer than two points", () => {
    expect(search([])).toEqual({ distance: Infinity, pair: null });
    expect(search([point(1, 2)])).toEqual({ distance: Infinity, pair: null });
  });

  it("stops at zero distance for duplicate points", () => {
    const points = fromTuples([
      [1, 1],
      [1, 1],
      [5, 5],
    ]);
    const result = search(points);
    expect(result.distance).toBe(0);
    expect(result.pair?.[0]).toBe(points[0]);
    expect(result.pair?.[1]).toBe(points[1]);
  });

  it("finds the 3-4-5 pair of a triangle", () => {
    const points = fromTuples([
      [0, 0],
      [3, 4],
      [9, 9],
    ]);
    const result = search(points);
    expect(result.distance).toBe(5);
    expect(result.pair?.[0]).toBe(points[0]);
    expect(result.pair?.[1]).toBe(points[1]);
  });

  it("handles points on a vertical line", () => {
    const points = fromTuples([
      [0, 0],
      [0, 3],
      [0, 1],
      [0, 7],
      [0, 10],
    ]);
    const result = search(points);
    expect(result.distance).toBe(1);
    expect(result.pair?.[0]).toBe(points[0]);
    expect(result.pair?.[1]).toBe(points[2]);
  });

  it("handles points on a horizontal line", () => {
    const points = fromTuples([
      [0, 0],
      [4, 0],
      [9, 0],
      [11, 0],
      [20, 0],
      [22.5, 0],
    ]);
    const result = search(points);
    expect(result.distance).toBe(2);
    expectMinimalPair(result, points);
  });

  it("returns zero when every point is identical", () => {
    const points = Array.from({ length: 6 }, () => point(2, 2));
    const result = search(points);
    expect(result.distance).toBe(0);
    expectMinimalPair(result, points);
  });

  it("is deterministic", () => {
    const points = randomPoints(150, mulberry32(7));
    const first = search(points);
    const second = search(points);
    expect(second.distance).toBe(first.distance);
    expect(second.pair?.[0]).toBe(first.pair?.[0]);
    expect(second.pair?.[1]).toBe(first.pair?.[1]);
  });

  it("does not reorder its input", () => {
    const points = fromTuples([
      [9, 1],
      [2, 8],
      [5, 5],
      [1, 2],
      [7, 3],
    ]);
    const copy = [...points];
    search(points);
    expect(points).toEqual(copy);
  });
});

describe("tie-breaks", () => {
  it("brute force keeps the first minimal pair in scan order", () => {
    const points = fromTuples([
      [0, 0],
      [1, 0],
      [0, 1],
      [1, 1],
    ]);
    const result = bruteForceClosestPair(points);
    expect(result.distance).toBe(1);
    expect(result.pair?.[0]).toBe(points[0]);
    expect(result.pair?.[1]).toBe(points[1]);
  });

  it("divide and conquer prefers the right half on equal distances", () => {
    const points = fromTuples([
      [0, 0],
      [0, 1],
      [10, 0],
      [10, 1],
    ]);
    const result = closestPairDivideAndConquer(points);
    expect(result.distance).toBe(1);
    expect(result.pair?.[0]).toBe(points[2]);
    expect(result.pair?.[1]).toBe(points[3]);
  });
});

describe("agreement", () => {
  it("returns identical distances on random point sets", () => {
    for (let seed = 1; seed <= 25; seed++) {
      const rng = mulberry32(seed);
      const n = 2 + Math.floor(rng() * 300);
      const points = randomPoints(n, rng, { min: -50, max: 50 });
      const bf = bruteForceClosestPair(points);
      const dnc = closestPairDivideAndConquer(points);
      expect(dnc.distance).toBe(bf.distance);
      expectMinimalPair(dnc, points);
    }
  });

  it("finds an injected duplicate in a random set", () => {
    const points = randomPoints(200, mulberry32(99), { min: 0, max: 1000 });
    const twin = point(points[137].x, points[137].y);
    const withTwin = [...points, twin];
    expect(bruteForceClosestPair(withTwin).distance).toBe(0);
    const dnc = closestPairDivideAndConquer(withTwin);
    expect(dnc.distance).toBe(0);
    expect(dnc.pair).toContain(twin);
  });

  it("agrees on small integer grids with repeated coordinates", () => {
    const rng = mulberry32(3);
    for (let round = 0; round < 20; round++) {
      const points = Array.from({ length: 40 }, () =>
        point(Math.floor(rng() * 12), Math.floor(rng() * 12))
      );
      expect(closestPairDivideAndConquer(points).distance).toBe(bruteForceClosestPair(points).distance);
    }
  });
});

describe("closestInStrip", () => {
  it("returns the best pair that beats dMin", () => {
    const strip = fromTuples([
      [0, 0],
      [0.5, 0.2],
      [0, 3],
    ]);
    const result = closestInStrip(strip, 1);
    expect(result.distance).toBe(distance(strip[0], strip[1]));
    expect(result.pair?.[0]).toBe(strip[0]);
    expect(result.pair?.[1]).toBe(strip[1]);
  });

  it("returns dMin with no pair when nothing improves", () => {
    const strip = fromTuples([
      [0, 0],
      [0, 2],
    ]);
    expect(closestInStrip(strip, 1)).toEqual({ distance: 1, pair: null });
  });

  it("narrows the scan window as the minimum tightens", () => {
    const strip = fromTuples([
      [0, 0],
      [0, 0.1],
      [0.5, 0.5],
      [0, 0.9],
    ]);
    const stats = createSearchStats();
    const result = closestInStrip(strip, 1, stats);
    expect(result.distance).toBe(distance(strip[0], strip[1]));
    expect(stats.stripComparisons).toBe(1);
    expect(stats.maxStripWindow).toBe(1);
  });

  it("bounds comparisons per point on points crowded around the split line", () => {
    const rng = mulberry32(11);
    const points = Array.from({ length: 400 }, () => point((rng() - 0.5) * 0.01, rng() * 100));
    const stats = createSearchStats();
    const dnc = closestPairDivideAndConquer(points, stats);
    expect(dnc.distance).toBe(bruteForceClosestPair(points).distance);
    expect(stats.stripComparisons).toBeGreaterThan(0);
    expect(stats.maxStripWindow).toBeGreaterThan(0);
    expect(stats.maxStripWindow).toBeLessThanOrEqual(7);
  });
});

describe("search stats", () => {
  it("counts every pair in brute force", () => {
    const stats = createSearchStats();
    bruteForceClosestPair(randomPoints(30, mulberry32(5)), stats);
    expect(stats.distanceEvaluations).toBe(435);
    expect(stats.stripComparisons).toBe(0);
  });

  it("does not change results", () => {
    const points = randomPoints(120, mulberry32(8));
    expect(closestPairDivideAndConquer(points, createSearchStats())).toEqual(closestPairDivideAndConquer(points));
  });
});
