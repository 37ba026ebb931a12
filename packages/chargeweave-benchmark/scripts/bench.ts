import path from "node:path";

import { benchTiming, buildWorkloads, runWorkloads } from "../src/index.js";
import { parseBenchCliArgs, repoRootFromImportMeta, writeResult } from "../src/node.js";

async function main() {
  const args = parseBenchCliArgs();
  const timing = benchTiming({ defaultIterations: 5 });
  const workloads = buildWorkloads(args.workloads, args.sizes, { cycles: args.cycles });

  const results = await runWorkloads(workloads, timing);
  for (const result of results) {
    console.log(
      `${result.name}: p50=${result.p50Ms.toFixed(2)}ms p95=${result.p95Ms.toFixed(2)}ms ops/s=${result.opsPerSec.toFixed(0)}`,
      result.extra ?? {},
    );
  }

  const outFile =
    args.outFile ?? path.join(repoRootFromImportMeta(import.meta.url, 3), "benchmarks", "engine", `${Date.now()}.json`);
  await writeResult(results, { workload: args.workloads.join(","), outFile });
  console.log(`wrote ${outFile}`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
