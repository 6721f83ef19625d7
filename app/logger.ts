import type { SearchResult } from "../ClosestPair";
import { formatPair } from "../points";
import { type BenchmarkRow, formatBenchmarkTable } from "./benchmark/benchmark";

export function formatSearchResult(label: string, result: SearchResult): string {
  return `[${label}] distance = ${result.distance.toFixed(4)}, pair = ${formatPair(result.pair)}`;
}

export function logSearchResult(label: string, result: SearchResult): void {
  console.log(formatSearchResult(label, result));
}

export function logPlotWritten(file: string): void {
  console.log(`Plot written to ${file}`);
}

export function logBenchmark(rows: BenchmarkRow[]): void {
  console.log("Benchmarking Brute Force vs. Divide & Conquer:");
  console.log(formatBenchmarkTable(rows));
  for (const r of rows) {
    if (!r.agree) console.error(`n=${r.n}: brute force and divide & conquer disagree`);
  }
}

export function logError(err: unknown): void {
  if (err instanceof Error) {
    console.error(err.message);
  } else {
    console.error(`Unexpected error: ${String(err)}`);
  }
}
