import { Engine } from "@chargeweave/core";

import type { RunArgs } from "./cli-args.js";
import { createEngineHost, type EngineView } from "./host.js";

export type RunSummary = {
  seed: number;
  nodes: number;
  backend: string;
  cycle: number;
  status: EngineView["status"];
  ledger: number;
  leakage: number;
  components: number;
  mean: number | undefined;
  dispersion: number | undefined;
  savedCoefficients?: number;
};

function lastOf(values: readonly number[] | undefined): number | undefined {
  return values && values.length > 0 ? values[values.length - 1] : undefined;
}

export function summarize(args: RunArgs, backend: string, view: EngineView): RunSummary {
  return {
    seed: args.seed,
    nodes: args.nodes,
    backend,
    cycle: view.cycle,
    status: view.status,
    ledger: view.ledgerValue,
    leakage: view.leakage,
    components: view.componentCount,
    mean: lastOf(view.trends.mean),
    dispersion: lastOf(view.trends.dispersion),
  };
}

export function formatSummary(summary: RunSummary): string[] {
  const fmt = (value: number | undefined) => (value === undefined ? "-" : value.toFixed(6));
  const lines = [
    `seed=${summary.seed} nodes=${summary.nodes} backend=${summary.backend}`,
    `cycle=${summary.cycle} status=${summary.status}`,
    `ledger=${summary.ledger.toFixed(6)} leakage=${summary.leakage.toFixed(6)} components=${summary.components}`,
    `mean=${fmt(summary.mean)} dispersion=${fmt(summary.dispersion)}`,
  ];
  if (summary.savedCoefficients !== undefined) lines.push(`saved coefficients=${summary.savedCoefficients}`);
  return lines;
}

/** Builds an engine from parsed CLI arguments, runs it through a host and reports. */
export async function runSimulation(
  args: RunArgs,
  io: { out: (line: string) => void; log?: (line: string) => void },
): Promise<RunSummary> {
  const engine = new Engine({
    nodeCount: args.nodes,
    seed: args.seed,
    budget: args.budget,
    entanglementProbability: args.entanglement,
    mixingWeight: args.weight,
    backend: { kind: args.backend },
    debug: args.debug,
    log: io.log,
  });
  const host = createEngineHost(engine, { debug: args.debug, log: io.log });

  if (args.load) await host.load(args.load);
  const view = await host.step(args.cycles);
  const summary = summarize(args, engine.config.backend.name, view);
  if (args.save) summary.savedCoefficients = (await host.save(args.save)).keptCoefficients;

  if (args.json) io.out(JSON.stringify(summary));
  else for (const line of formatSummary(summary)) io.out(line);
  return summary;
}
