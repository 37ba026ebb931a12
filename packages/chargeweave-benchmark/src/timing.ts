import { envInt } from "./stats.js";

export type BenchTiming = { iterations: number; warmupIterations: number };

/**
 * Measured and warmup iteration counts from `BENCH_ITERATIONS` and `BENCH_WARMUP`. One warmup
 * pass runs by default whenever more than one iteration is measured.
 */
export function benchTiming(opts: { defaultIterations?: number; env?: NodeJS.ProcessEnv } = {}): BenchTiming {
  const env = opts.env ?? process.env;
  const iterations = Math.max(1, envInt("BENCH_ITERATIONS", env) ?? opts.defaultIterations ?? 1);
  const warmup = envInt("BENCH_WARMUP", env) ?? (iterations > 1 ? 1 : 0);
  return { iterations, warmupIterations: Math.max(0, warmup) };
}
