import { z } from "zod";

export const DEFAULT_BENCH_SIZES = "100,500,1000,2000,5000";

const sizeListSchema = z
  .string()
  .default(DEFAULT_BENCH_SIZES)
  .transform((s) => s.split(",").map((v) => Number(v.trim())))
  .pipe(z.array(z.number().int().positive()).min(1));

// Raw environment, every variable optional.
export const envSchema = z.object({
  CLOSEST_PAIR_SEED: z.coerce.number().int().min(0).default(0),
  CLOSEST_PAIR_DEMO_POINTS: z.coerce.number().int().min(0).default(20),
  CLOSEST_PAIR_DEMO_MAX: z.coerce.number().positive().default(10),
  CLOSEST_PAIR_BENCH_SIZES: sizeListSchema,
  CLOSEST_PAIR_BENCH_ITERATIONS: z.coerce.number().int().min(1).default(1),
  CLOSEST_PAIR_BENCH_MAX: z.coerce.number().positive().default(10000),
  CLOSEST_PAIR_PLOT: z.string().min(1).default("closest-pair.html"),
});

export const configSchema = envSchema.transform((env) => ({
  seed: env.CLOSEST_PAIR_SEED,
  demo: {
    points: env.CLOSEST_PAIR_DEMO_POINTS,
    max: env.CLOSEST_PAIR_DEMO_MAX,
  },
  benchmark: {
    sizes: env.CLOSEST_PAIR_BENCH_SIZES,
    iterations: env.CLOSEST_PAIR_BENCH_ITERATIONS,
    max: env.CLOSEST_PAIR_BENCH_MAX,
  },
  plot: {
    output: env.CLOSEST_PAIR_PLOT,
  },
}));

export type Config = z.infer<typeof configSchema>;
