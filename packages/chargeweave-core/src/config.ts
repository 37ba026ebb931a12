import type { EngineLogOptions, EvolutionBackend, NumericKernel } from "@chargeweave/interface";

import { createBackend, type BackendSpec } from "./backends.js";
import { DEFAULT_TREND_METRICS, type TrendMetric } from "./trends.js";

export const DEFAULT_BUDGET = 1000;
export const DEFAULT_ENTANGLEMENT_PROBABILITY = 0.05;
export const DEFAULT_MIXING_WEIGHT = 0.2;
export const DEFAULT_SPARSITY_EPSILON = 1e-5;
export const DEFAULT_TREND_LENGTH = 50;
export const DEFAULT_EVENT_LOG_LENGTH = 20;
export const DEFAULT_MAX_ADJUSTMENT = 0.05;

export type EngineConfigInput = EngineLogOptions & {
  nodeCount: number;
  seed: number;
  budget?: number;
  entanglementProbability?: number;
  /** Weight `w` of the coherent field in `state' = (1-w)·state + w·field`. */
  mixingWeight?: number;
  /** Delta entries with `|delta| < epsilon` are skipped. */
  epsilon?: number;
  trendLength?: number;
  eventLogLength?: number;
  /** Upper bound on `|amount|` for collaborator adjustments. */
  maxAdjustment?: number;
  backend?: BackendSpec | EvolutionBackend;
  kernels?: readonly NumericKernel[];
  trendMetrics?: readonly TrendMetric[];
};

export type EngineConfig = Readonly<{
  nodeCount: number;
  seed: number;
  budget: number;
  entanglementProbability: number;
  mixingWeight: number;
  epsilon: number;
  trendLength: number;
  eventLogLength: number;
  maxAdjustment: number;
  backend: EvolutionBackend;
  kernels: readonly NumericKernel[];
  trendMetrics: readonly TrendMetric[];
  debug: boolean;
  log: (line: string) => void;
}>;

function assertPositiveSafeInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive safe integer, got: ${value}`);
  }
}

function assertUnitInterval(name: string, value: number): void {
  if (!(value >= 0 && value <= 1)) throw new Error(`${name} must be in [0,1], got: ${value}`);
}

function assertNonNegativeFinite(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a finite non-negative number, got: ${value}`);
  }
}

/**
 * Validates an engine configuration, fills defaults and returns an immutable copy.
 * The backend is resolved here, once.
 */
export function resolveEngineConfig(input: EngineConfigInput): EngineConfig {
  assertPositiveSafeInteger("nodeCount", input.nodeCount);
  if (!Number.isSafeInteger(input.seed)) throw new Error(`seed must be a safe integer, got: ${input.seed}`);

  const budget = input.budget ?? DEFAULT_BUDGET;
  const entanglementProbability = input.entanglementProbability ?? DEFAULT_ENTANGLEMENT_PROBABILITY;
  const mixingWeight = input.mixingWeight ?? DEFAULT_MIXING_WEIGHT;
  const epsilon = input.epsilon ?? DEFAULT_SPARSITY_EPSILON;
  const trendLength = input.trendLength ?? DEFAULT_TREND_LENGTH;
  const eventLogLength = input.eventLogLength ?? DEFAULT_EVENT_LOG_LENGTH;
  const maxAdjustment = input.maxAdjustment ?? DEFAULT_MAX_ADJUSTMENT;

  assertNonNegativeFinite("budget", budget);
  assertUnitInterval("entanglementProbability", entanglementProbability);
  assertUnitInterval("mixingWeight", mixingWeight);
  assertNonNegativeFinite("epsilon", epsilon);
  assertPositiveSafeInteger("trendLength", trendLength);
  assertPositiveSafeInteger("eventLogLength", eventLogLength);
  assertNonNegativeFinite("maxAdjustment", maxAdjustment);

  const trendMetrics = input.trendMetrics ?? DEFAULT_TREND_METRICS;
  const names = new Set<string>();
  for (const metric of trendMetrics) {
    if (names.has(metric.name)) throw new Error(`duplicate trend metric: ${metric.name}`);
    names.add(metric.name);
  }

  return Object.freeze({
    nodeCount: input.nodeCount,
    seed: input.seed,
    budget,
    entanglementProbability,
    mixingWeight,
    epsilon,
    trendLength,
    eventLogLength,
    maxAdjustment,
    backend: createBackend(input.backend ?? { kind: "local-average" }),
    kernels: Object.freeze([...(input.kernels ?? [])]),
    trendMetrics: Object.freeze([...trendMetrics]),
    debug: Boolean(input.debug),
    log: input.log ?? ((line: string) => console.warn(line)),
  });
}
