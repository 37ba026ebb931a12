export const WORKLOAD_NAMES = ["step-local", "step-spectral", "step-mixing", "snapshot-roundtrip"] as const;
export type WorkloadName = (typeof WORKLOAD_NAMES)[number];

const WORKLOAD_NAME_SET: ReadonlySet<string> = new Set(WORKLOAD_NAMES);

export const DEFAULT_BENCH_SIZES = [64, 256, 1024] as const;
export const DEFAULT_BENCH_CYCLES = 50;
export const DEFAULT_BENCH_SEED = 42;

export function isWorkloadName(value: string): value is WorkloadName {
  return WORKLOAD_NAME_SET.has(value);
}
