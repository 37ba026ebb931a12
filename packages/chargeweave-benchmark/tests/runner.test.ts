import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { expect, test } from "vitest";

import { buildWorkloads, makeWorkload, runBenchmark, runWorkloads, type BenchmarkWorkload } from "../src/index.js";
import { writeResult } from "../src/node.js";

test("runBenchmark: warmups are run but not sampled", async () => {
  let prepared = 0;
  let ran = 0;
  const workload: BenchmarkWorkload = {
    name: "counting",
    totalOps: 10,
    prepare: () => {
      prepared += 1;
    },
    run: () => {
      ran += 1;
      return { extra: { ran } };
    },
  };

  const result = await runBenchmark(workload, { iterations: 3, warmupIterations: 2 });
  expect(prepared).toBe(5);
  expect(ran).toBe(5);
  expect(result.samplesMs.length).toBe(3);
  expect(result.extra).toEqual({ ran: 5 });
  expect(result.p95Ms).toBeGreaterThanOrEqual(result.p50Ms);
});

test("step workloads report gate and merge counts", async () => {
  const result = await runBenchmark(makeWorkload("step-local", 16, { cycles: 3 }));
  expect(result.name).toBe("step-local-16");
  expect(result.totalOps).toBe(48);
  expect(result.extra).toMatchObject({ cycles: 3, backend: "local-average(r=1)" });
  expect(typeof result.extra?.skipped).toBe("number");
});

test("snapshot workload reports the encoded size", async () => {
  const result = await runBenchmark(makeWorkload("snapshot-roundtrip", 32));
  expect(result.totalOps).toBe(10);
  expect(result.extra?.keptCoefficients).toBeGreaterThan(0);
  expect(result.extra?.errorBound).toBeLessThanOrEqual(1e-2);
});

test("buildWorkloads crosses names and sizes; results are written as JSON", async () => {
  const workloads = buildWorkloads(["step-spectral", "step-mixing"], [8, 12], { cycles: 2 });
  expect(workloads.map((w) => w.name)).toEqual(["step-spectral-8", "step-spectral-12", "step-mixing-8", "step-mixing-12"]);

  const dir = mkdtempSync(join(tmpdir(), "chargeweave-bench-"));
  try {
    const results = await runWorkloads(workloads);
    const outFile = join(dir, "out", "bench.json");
    const payload = await writeResult(results, { workload: "step", outFile });

    const parsed: unknown = JSON.parse(readFileSync(outFile, "utf-8"));
    expect(parsed).toMatchObject({ workload: "step", sourceFile: payload.sourceFile });
    expect(payload.results.length).toBe(4);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});
