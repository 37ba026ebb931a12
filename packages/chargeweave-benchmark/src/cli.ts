import { Command, InvalidArgumentError } from "commander";

import { DEFAULT_BENCH_CYCLES, DEFAULT_BENCH_SIZES, WORKLOAD_NAMES, isWorkloadName, type WorkloadName } from "./workloads.js";

export type BenchCliArgs = {
  sizes: number[];
  workloads: WorkloadName[];
  cycles: number;
  outFile?: string;
};

function parseNumberList(raw: string): number[] {
  const parts = raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  if (parts.length === 0) {
    throw new InvalidArgumentError("expected a comma-separated list of positive integers");
  }

  const nums = parts.map((p) => Number(p));
  const invalid = parts.filter((p, idx) => !Number.isSafeInteger(nums[idx]) || nums[idx] <= 0);
  if (invalid.length > 0) {
    throw new InvalidArgumentError(`invalid number(s): ${invalid.join(", ")}`);
  }
  return nums;
}

function parseWorkloadList(raw: string): WorkloadName[] {
  const vals = raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  if (vals.length === 0) {
    throw new InvalidArgumentError("expected a comma-separated list of workloads");
  }

  const names = vals.filter(isWorkloadName);
  const invalid = vals.filter((v) => !isWorkloadName(v));
  if (invalid.length > 0) {
    throw new InvalidArgumentError(`invalid workload(s): ${invalid.join(", ")} (allowed: ${WORKLOAD_NAMES.join(", ")})`);
  }
  return names;
}

function parsePositiveInteger(flag: string) {
  return (val: string): number => {
    const n = Number(val);
    if (!Number.isSafeInteger(n) || n <= 0) throw new InvalidArgumentError(`invalid ${flag} value: ${val}`);
    return n;
  };
}

export function parseBenchCliArgs(
  opts: {
    argv?: string[];
    defaultSizes?: readonly number[];
    defaultWorkloads?: readonly WorkloadName[];
    writeErr?: (str: string) => void;
  } = {},
): BenchCliArgs {
  const argv = opts.argv ?? process.argv.slice(2);
  const defaultSizes = Array.from(opts.defaultSizes ?? DEFAULT_BENCH_SIZES);
  const defaultWorkloads = Array.from(opts.defaultWorkloads ?? WORKLOAD_NAMES);

  const program = new Command()
    .name("chargeweave-bench")
    .description("Engine step and snapshot benchmark options.")
    .exitOverride()
    .option("--out <file>", "write output JSON to file")
    .option("--count <n>", "shorthand for --sizes <n>", parsePositiveInteger("--count"))
    .option("--cycles <n>", `cycles per step workload (default: ${DEFAULT_BENCH_CYCLES})`, parsePositiveInteger("--cycles"))
    .option("--sizes <n1,n2,...>", `comma-separated node counts (default: ${defaultSizes.join(",")})`, (val: string) =>
      parseNumberList(val),
    )
    .option("--workload <name>", `single workload (${WORKLOAD_NAMES.join(", ")})`, (val: string): WorkloadName => {
      if (!isWorkloadName(val)) {
        throw new InvalidArgumentError(`invalid --workload value: ${val} (allowed: ${WORKLOAD_NAMES.join(", ")})`);
      }
      return val;
    })
    .option("--workloads <w1,w2,...>", `comma-separated workloads (allowed: ${WORKLOAD_NAMES.join(", ")})`, (val: string) =>
      Array.from(new Set(parseWorkloadList(val))),
    );
  if (opts.writeErr) program.configureOutput({ writeErr: opts.writeErr });

  program.parse(argv, { from: "user" });

  const parsed = program.opts<{
    out?: string;
    count?: number;
    cycles?: number;
    sizes?: number[];
    workload?: WorkloadName;
    workloads?: WorkloadName[];
  }>();

  const outFile = parsed.out && parsed.out.length > 0 ? parsed.out : undefined;
  const { count, sizes, workload, workloads } = parsed;

  const finalSizes = sizes && sizes.length > 0 ? sizes : count ? [count] : defaultSizes;
  const finalWorkloads = workloads && workloads.length > 0 ? workloads : workload ? [workload] : defaultWorkloads;

  return { sizes: finalSizes, workloads: finalWorkloads, cycles: parsed.cycles ?? DEFAULT_BENCH_CYCLES, outFile };
}
