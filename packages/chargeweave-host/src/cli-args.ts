import { BACKEND_KINDS, DEFAULT_BUDGET, isBackendKind, type BackendKind } from "@chargeweave/core";
import { Command, InvalidArgumentError } from "commander";

import { envFloat, envInt } from "./env.js";

export const DEFAULT_CLI_NODES = 64;
export const DEFAULT_CLI_SEED = 42;
export const DEFAULT_CLI_CYCLES = 100;

export type RunArgs = {
  nodes: number;
  seed: number;
  cycles: number;
  backend: BackendKind;
  budget: number;
  entanglement?: number;
  weight?: number;
  load?: string;
  save?: string;
  json: boolean;
  debug: boolean;
};

type RawRunOptions = {
  nodes?: number;
  seed?: number;
  cycles?: number;
  backend?: BackendKind;
  budget?: number;
  entanglement?: number;
  weight?: number;
  load?: string;
  save?: string;
  json?: boolean;
  debug?: boolean;
};

function integerOption(flag: string, min: number) {
  return (val: string): number => {
    const n = Number(val);
    if (!Number.isSafeInteger(n) || n < min) {
      throw new InvalidArgumentError(`invalid ${flag} value: ${val} (expected an integer >= ${min})`);
    }
    return n;
  };
}

function numberOption(flag: string, min: number, max: number) {
  return (val: string): number => {
    const n = Number(val);
    if (!Number.isFinite(n) || n < min || n > max) {
      throw new InvalidArgumentError(`invalid ${flag} value: ${val} (expected a number in [${min}, ${max}])`);
    }
    return n;
  };
}

/**
 * Parses `run` options. Flags win over `CHARGEWEAVE_NODES`, `CHARGEWEAVE_SEED`,
 * `CHARGEWEAVE_CYCLES` and `CHARGEWEAVE_BUDGET`, which win over the defaults.
 *
 * Invalid input throws a `CommanderError` instead of exiting the process.
 */
export function parseRunArgs(
  opts: {
    argv?: string[];
    env?: NodeJS.ProcessEnv;
    writeErr?: (str: string) => void;
  } = {},
): RunArgs {
  const argv = opts.argv ?? process.argv.slice(2);
  const env = opts.env ?? process.env;
  const selection: { raw?: RawRunOptions } = {};

  const program = new Command()
    .name("chargeweave")
    .description("Deterministic charge-weave evolution engine.")
    .exitOverride();
  if (opts.writeErr) program.configureOutput({ writeErr: opts.writeErr });

  const run = program
    .command("run")
    .description("advance an engine for a number of cycles")
    .exitOverride()
    .option("--nodes <n>", `node count (env CHARGEWEAVE_NODES, default ${DEFAULT_CLI_NODES})`, integerOption("--nodes", 1))
    .option("--seed <n>", `random seed (env CHARGEWEAVE_SEED, default ${DEFAULT_CLI_SEED})`, integerOption("--seed", Number.MIN_SAFE_INTEGER))
    .option("--cycles <n>", `cycles to run (env CHARGEWEAVE_CYCLES, default ${DEFAULT_CLI_CYCLES})`, integerOption("--cycles", 0))
    .option("--backend <kind>", `evolution backend (${BACKEND_KINDS.join(", ")})`, (val: string): BackendKind => {
      if (!isBackendKind(val)) {
        throw new InvalidArgumentError(`invalid --backend value: ${val} (allowed: ${BACKEND_KINDS.join(", ")})`);
      }
      return val;
    })
    .option("--budget <x>", `energy budget (env CHARGEWEAVE_BUDGET, default ${DEFAULT_BUDGET})`, numberOption("--budget", 0, Number.MAX_VALUE))
    .option("--entanglement <p>", "per-node entanglement probability", numberOption("--entanglement", 0, 1))
    .option("--weight <w>", "coherent field mixing weight", numberOption("--weight", 0, 1))
    .option("--load <file>", "restore a snapshot before running")
    .option("--save <file>", "write a snapshot after running")
    .option("--json", "print the summary as JSON")
    .option("--debug", "log engine and host diagnostics");
  run.action(() => {
    selection.raw = run.opts<RawRunOptions>();
  });
  if (opts.writeErr) run.configureOutput({ writeErr: opts.writeErr });

  program.parse(argv, { from: "user" });

  const raw = selection.raw;
  if (!raw) throw new Error("expected the run command (see: chargeweave run --help)");

  return {
    nodes: raw.nodes ?? envInt("CHARGEWEAVE_NODES", env) ?? DEFAULT_CLI_NODES,
    seed: raw.seed ?? envInt("CHARGEWEAVE_SEED", env) ?? DEFAULT_CLI_SEED,
    cycles: raw.cycles ?? envInt("CHARGEWEAVE_CYCLES", env) ?? DEFAULT_CLI_CYCLES,
    backend: raw.backend ?? "local-average",
    budget: raw.budget ?? envFloat("CHARGEWEAVE_BUDGET", env) ?? DEFAULT_BUDGET,
    entanglement: raw.entanglement,
    weight: raw.weight,
    load: raw.load,
    save: raw.save,
    json: Boolean(raw.json),
    debug: Boolean(raw.debug),
  };
}
