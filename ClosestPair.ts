// ClosestPair.ts
import type { Point } from "./points";

export type PointPair = readonly [Point, Point];

export type SearchResult = {
  readonly distance: number;
  readonly pair: PointPair | null;
};

// Caller-owned counters, only ever incremented by the search.
export type SearchStats = {
  distanceEvaluations: number;
  stripComparisons: number;
  maxStripWindow: number;
};

export function createSearchStats(): SearchStats {
  return { distanceEvaluations: 0, stripComparisons: 0, maxStripWindow: 0 };
}

const NO_PAIR: SearchResult = { distance: Infinity, pair: null };

export function distance(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export function bruteForceClosestPair(
  points: readonly Point[],
  stats?: SearchStats
): SearchResult {
  const n = points.length;
  if (n < 2) return NO_PAIR;

  let best = Infinity;
  let pair: PointPair | null = null;
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      const d = distance(points[i], points[j]);
      if (stats) stats.distanceEvaluations++;
      if (d < best) {
        best = d;
        pair = [points[i], points[j]];
        // duplicates, nothing can beat them
        if (best === 0) return { distance: 0, pair };
      }
    }
  }
  return { distance: best, pair };
}

export function closestPairDivideAndConquer(
  points: readonly Point[],
  stats?: SearchStats
): SearchResult {
  if (points.length < 2) return NO_PAIR;

  // Sorted once; every level below works on stable filters of these.
  const px = [...points].sort((a, b) => a.x - b.x);
  const py = [...points].sort((a, b) => a.y - b.y);
  return closestPairRec(px, py, stats);
}

function closestPairRec(
  px: readonly Point[],
  py: readonly Point[],
  stats?: SearchStats
): SearchResult {
  const n = px.length;
  if (n <= 3) return bruteForceClosestPair(px, stats);

  const mid = Math.floor(n / 2);
  const midX = px[mid].x;

  const pyLeft: Point[] = [];
  const pyRight: Point[] = [];
  for (const p of py) {
    if (p.x <= midX) pyLeft.push(p);
    else pyRight.push(p);
  }

  const left = closestPairRec(px.slice(0, mid), pyLeft, stats);
  const right = closestPairRec(px.slice(mid), pyRight, stats);
  const best = left.distance < right.distance ? left : right;

  const strip = py.filter((p) => Math.abs(p.x - midX) < best.distance);
  const fromStrip = closestInStrip(strip, best.distance, stats);
  return fromStrip.distance < best.distance ? fromStrip : best;
}

/**
 * Best pair inside a y-ordered strip that beats `dMin`.
 *
 * The forward scan stops once the vertical gap reaches the running minimum,
 * which bounds the work per point by a constant (at most 7 comparisons when
 * the strip's halves are each `dMin`-separated).
 */
export function closestInStrip(
  strip: readonly Point[],
  dMin: number,
  stats?: SearchStats
): SearchResult {
  let best = dMin;
  let pair: PointPair | null = null;
  const n = strip.length;

  for (let i = 0; i < n; i++) {
    let window = 0;
    for (let j = i + 1; j < n && strip[j].y - strip[i].y < best; j++) {
      window++;
      const d = distance(strip[i], strip[j]);
      if (stats) {
        stats.distanceEvaluations++;
        stats.stripComparisons++;
      }
      if (d < best) {
        best = d;
        pair = [strip[i], strip[j]];
        if (best === 0) {
          recordWindow(stats, window);
          return { distance: 0, pair };
        }
      }
    }
    recordWindow(stats, window);
  }
  return { distance: best, pair };
}

function recordWindow(stats: SearchStats | undefined, window: number) {
  if (stats && window > stats.maxStripWindow) stats.maxStripWindow = window;
}
