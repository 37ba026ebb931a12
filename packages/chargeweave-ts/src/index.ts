import type { RandomSource } from "./rng.js";

export type NodeIndex = number;

/**
 * Per-node scalar state, one value in `[0, 1]` per node index.
 *
 * The length is fixed when the engine is constructed.
 */
export type NodeState = Float64Array;

export type EngineStatus = "running" | "halted";

/**
 * Read-only view handed to kernels and backends for one cycle.
 *
 * `rng` is the engine's own seeded source; draws made here are part of the
 * deterministic trajectory.
 */
export type SimulationContext = {
  readonly cycle: number;
  readonly nodeCount: number;
  readonly rng: RandomSource;
};

/**
 * Strategy producing a smoothed/correlated "coherent field" from the node state.
 *
 * Implementations receive a private copy of the state and must return a vector of the
 * same length with finite entries; the engine rejects anything else.
 */
export interface EvolutionBackend {
  readonly name: string;
  evolve(state: NodeState, ctx: SimulationContext): ArrayLike<number>;
}

/**
 * Pure numeric update rule. Outputs of all registered kernels are summed into the
 * cycle's delta vector.
 */
export type NumericKernel = (state: NodeState, ctx: SimulationContext) => ArrayLike<number>;

/**
 * Bounded scalar adjustment requested by an external collaborator for a single node.
 */
export type NodeAdjustment = {
  index: NodeIndex;
  amount: number;
};

export type LedgerState = {
  initial: number;
  budget: number;
  leakage: number;
  exhausted: boolean;
};

export type UnionFindState = {
  parent: Int32Array;
  // Z2 charges, one byte per index.
  chargeA: Uint8Array;
  // Z4 charges, one byte per index.
  chargeB: Uint8Array;
};

/**
 * Serializable projection of everything an engine owns.
 *
 * `nodes` is the only field the snapshot codec restores approximately.
 */
export type EngineState = {
  seed: number;
  nodeCount: number;
  cycle: number;
  halted: boolean;
  rngState: number;
  ledger: LedgerState;
  unionFind: UnionFindState;
  nodes: NodeState;
  trends: Record<string, number[]>;
};

export type EngineEventKind = "init" | "cycle" | "halt" | "divergence" | "restore" | "adjust";

export type EngineEvent = {
  cycle: number;
  kind: EngineEventKind;
  message: string;
};

export type Unsubscribe = () => void;

export type WireCodec<Message, Wire> = {
  encode(message: Message): Wire;
  decode(wire: Wire): Message;
};

export type EngineLogOptions = {
  debug?: boolean;
  log?: (line: string) => void;
};

export * from "./errors.js";
export * from "./rng.js";
