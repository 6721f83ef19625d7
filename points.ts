// points.ts
export type Point = {
  readonly x: number;
  readonly y: number;
};

export type Range = { min: number; max: number };

export function point(x: number, y: number): Point {
  return { x, y };
}

export function fromTuples(tuples: readonly (readonly [number, number])[]): Point[] {
  return tuples.map(([x, y]) => point(x, y));
}

export function formatPoint(p: Point, digits = 4): string {
  return `(${p.x.toFixed(digits)}, ${p.y.toFixed(digits)})`;
}

export function formatPair(pair: readonly [Point, Point] | null, digits = 4): string {
  if (!pair) return "(none)";
  return `(${formatPoint(pair[0], digits)}, ${formatPoint(pair[1], digits)})`;
}

// Seeded uniform generator in [0, 1). State lives in the closure, never globally.
export function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let x = Math.imul(t ^ (t >>> 15), 1 | t);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomPoints(
  n: number,
  rng: () => number,
  range: Range = { min: 0, max: 10 }
): Point[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`point count must be a non-negative integer, got ${n}`);
  }
  const { min, max } = range;
  if (!(min < max)) {
    throw new RangeError(`empty coordinate range [${min}, ${max})`);
  }
  const span = max - min;
  const points: Point[] = [];
  for (let i = 0; i < n; i++) {
    const x = min + rng() * span;
    const y = min + rng() * span;
    points.push({ x, y });
  }
  return points;
}
