import { Engine, createDriftKernel, createNoiseKernel, type BackendSpec } from "@chargeweave/core";
import type { EngineState } from "@chargeweave/interface";
import { decodeSnapshot, encodeSnapshotReport } from "@chargeweave/snapshot";

import { quantile } from "./stats.js";
import type { BenchTiming } from "./timing.js";
import { DEFAULT_BENCH_CYCLES, DEFAULT_BENCH_SEED, type WorkloadName } from "./workloads.js";

export * from "./stats.js";
export * from "./timing.js";
export * from "./workloads.js";

export type BenchmarkResult = {
  name: string;
  totalOps: number;
  durationMs: number;
  opsPerSec: number;
  samplesMs: number[];
  p50Ms: number;
  p95Ms: number;
  extra?: Record<string, unknown>;
};

export type BenchmarkWorkload = {
  name: string;
  totalOps?: number;
  /** Runs before every measured or warmup iteration, outside the timed region. */
  prepare?: () => Promise<void> | void;
  run: () => Promise<void | { extra?: Record<string, unknown> }> | void | { extra?: Record<string, unknown> };
  cleanup?: () => Promise<void> | void;
};

export type WorkloadOptions = {
  cycles?: number;
  seed?: number;
};

// Effectively unlimited: benchmarks measure stepping, not exhaustion.
const BENCH_BUDGET = 1e12;

export async function runBenchmark(
  workload: BenchmarkWorkload,
  timing: BenchTiming = { iterations: 1, warmupIterations: 0 },
): Promise<BenchmarkResult> {
  const totalOps = workload.totalOps ?? -1;
  const samplesMs: number[] = [];
  let extra: Record<string, unknown> | undefined;

  for (let i = 0; i < timing.warmupIterations + timing.iterations; i++) {
    if (workload.prepare) await workload.prepare();
    const start = performance.now();
    const runResult = await workload.run();
    const end = performance.now();
    if (workload.cleanup) await workload.cleanup();

    if (i < timing.warmupIterations) continue;
    samplesMs.push(end - start);
    if (runResult && typeof runResult === "object") extra = runResult.extra;
  }

  const durationMs = quantile(samplesMs, 0.5);
  const opsPerSec =
    totalOps > 0 && durationMs > 0
      ? (totalOps / durationMs) * 1000
      : durationMs > 0
        ? 1000 / durationMs
        : Infinity;
  return {
    name: workload.name,
    totalOps,
    durationMs,
    opsPerSec,
    samplesMs,
    p50Ms: durationMs,
    p95Ms: quantile(samplesMs, 0.95),
    extra,
  };
}

/**
 * Steps a fresh engine `cycles` times. Reports how many delta entries the sparsity gate
 * skipped, so gated and ungated runs can be compared.
 */
export function makeStepWorkload(opts: {
  count: number;
  backend: BackendSpec;
  label: string;
  cycles?: number;
  seed?: number;
}): BenchmarkWorkload {
  const cycles = opts.cycles ?? DEFAULT_BENCH_CYCLES;
  let engine: Engine | undefined;

  return {
    name: `${opts.label}-${opts.count}`,
    totalOps: opts.count * cycles,
    prepare: () => {
      engine = new Engine({
        nodeCount: opts.count,
        seed: opts.seed ?? DEFAULT_BENCH_SEED,
        budget: BENCH_BUDGET,
        backend: opts.backend,
        kernels: [createDriftKernel(), createNoiseKernel()],
      });
    },
    run: () => {
      if (!engine) throw new Error(`${opts.label}: prepare() must run before run()`);
      let skipped = 0;
      let merges = 0;
      for (const result of engine.run(cycles)) {
        skipped += result.skipped;
        merges += result.merges;
      }
      return { extra: { cycles, skipped, merges, backend: engine.config.backend.name } };
    },
    cleanup: () => {
      engine = undefined;
    },
  };
}

/** Encodes and decodes one evolved engine state `repeats` times. */
export function makeSnapshotRoundtripWorkload(opts: { count: number; repeats?: number; seed?: number }): BenchmarkWorkload {
  const repeats = opts.repeats ?? 10;
  let state: EngineState | undefined;

  return {
    name: `snapshot-roundtrip-${opts.count}`,
    totalOps: repeats,
    prepare: () => {
      if (state) return;
      const engine = new Engine({ nodeCount: opts.count, seed: opts.seed ?? DEFAULT_BENCH_SEED, kernels: [createNoiseKernel()] });
      engine.run(10);
      state = engine.snapshot();
    },
    run: () => {
      if (!state) throw new Error("snapshot-roundtrip: prepare() must run before run()");
      let bytes = 0;
      let keptCoefficients = 0;
      let errorBound = 0;
      for (let i = 0; i < repeats; i++) {
        const report = encodeSnapshotReport(state);
        decodeSnapshot(report.bytes);
        bytes = report.bytes.length;
        keptCoefficients = report.keptCoefficients;
        errorBound = report.errorBound;
      }
      return { extra: { bytes, keptCoefficients, errorBound } };
    },
  };
}

export function makeWorkload(name: WorkloadName, count: number, opts: WorkloadOptions = {}): BenchmarkWorkload {
  switch (name) {
    case "step-local":
      return makeStepWorkload({ count, label: name, backend: { kind: "local-average" }, ...opts });
    case "step-spectral":
      return makeStepWorkload({ count, label: name, backend: { kind: "spectral" }, ...opts });
    case "step-mixing":
      return makeStepWorkload({ count, label: name, backend: { kind: "random-mixing" }, ...opts });
    case "snapshot-roundtrip":
      return makeSnapshotRoundtripWorkload({ count, seed: opts.seed });
    default: {
      const _exhaustive: never = name;
      throw new Error(`unknown workload: ${String(_exhaustive)}`);
    }
  }
}

export function buildWorkloads(
  names: readonly WorkloadName[],
  sizes: readonly number[],
  opts: WorkloadOptions = {},
): BenchmarkWorkload[] {
  const result: BenchmarkWorkload[] = [];
  for (const name of names) {
    for (const size of sizes) {
      result.push(makeWorkload(name, size, opts));
    }
  }
  return result;
}

export async function runWorkloads(workloads: BenchmarkWorkload[], timing?: BenchTiming): Promise<BenchmarkResult[]> {
  const results: BenchmarkResult[] = [];
  for (const workload of workloads) {
    results.push(await runBenchmark(workload, timing));
  }
  return results;
}
