import { bruteForceClosestPair, closestPairDivideAndConquer } from "../ClosestPair";
import { mulberry32, randomPoints } from "../points";
import { benchmarkAlgorithms } from "./benchmark/benchmark";
import { getConfig } from "./config/config";
import { logBenchmark, logError, logPlotWritten, logSearchResult } from "./logger";
import { writePlot } from "./visualize";

async function main(): Promise<void> {
  const config = getConfig();
  const rng = mulberry32(config.seed);

  const points = randomPoints(config.demo.points, rng, { min: 0, max: config.demo.max });
  const bf = bruteForceClosestPair(points);
  logSearchResult("Brute Force", bf);
  const dnc = closestPairDivideAndConquer(points);
  logSearchResult("Divide & Conquer", dnc);

  const file = await writePlot(config.plot.output, { points, pair: dnc.pair });
  logPlotWritten(file);

  const rows = benchmarkAlgorithms(
    {
      sizes: config.benchmark.sizes,
      iterations: config.benchmark.iterations,
      range: { min: 0, max: config.benchmark.max },
    },
    rng
  );
  logBenchmark(rows);
}

main().catch((err: unknown) => {
  logError(err);
  process.exitCode = 1;
});
