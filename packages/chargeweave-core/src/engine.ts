import {
  DeterministicRng,
  IndexOutOfRangeError,
  InvalidStateError,
  NumericDivergenceError,
  SnapshotCorruptError,
  type EngineEvent,
  type EngineEventKind,
  type EngineState,
  type EngineStatus,
  type LedgerState,
  type NodeState,
  type SimulationContext,
} from "@chargeweave/interface";

import { resolveEngineConfig, type EngineConfig, type EngineConfigInput } from "./config.js";
import { EnergyLedger } from "./ledger.js";
import { BoundedHistory } from "./trends.js";
import { ChargeUnionFind, type Charges } from "./union-find.js";

const INITIAL_STATE_MIN = 0.4;
const INITIAL_STATE_MAX = 0.7;

export type StepStatus = "advanced" | "halted";

export type StepResult = {
  status: StepStatus;
  /** Cycle counter after the step. */
  cycle: number;
  /** Sum of `|delta|` charged to the ledger. */
  cost: number;
  /** Delta entries that passed the sparsity gate. */
  applied: number;
  skipped: number;
  merges: number;
};

type OwnedState = {
  rng: DeterministicRng;
  nodes: NodeState;
  unionFind: ChargeUnionFind;
  ledger: EnergyLedger;
  cycle: number;
  halted: boolean;
  trends: Map<string, BoundedHistory<number>>;
  events: BoundedHistory<EngineEvent>;
};

function clampUnit(value: number): number {
  return value < 0 ? 0 : value > 1 ? 1 : value;
}

/**
 * Owns the node state, the charge union-find, the energy ledger and the active backend,
 * and advances them one cycle at a time.
 *
 * Single mutator: nothing outside `step`, `adjustNode`, `reset` and `restore` changes the
 * owned buffers, and every accessor hands out copies. `reset` and `restore` replace the
 * buffers wholesale.
 */
export class Engine {
  readonly config: EngineConfig;
  private owned: OwnedState;

  constructor(input: EngineConfigInput) {
    this.config = resolveEngineConfig(input);
    this.owned = this.initialState();
  }

  get status(): EngineStatus {
    return this.owned.halted ? "halted" : "running";
  }

  get halted(): boolean {
    return this.owned.halted;
  }

  get cycle(): number {
    return this.owned.cycle;
  }

  get ledgerValue(): number {
    return this.owned.ledger.value;
  }

  get leakage(): number {
    return this.owned.ledger.leakage;
  }

  get nodeCount(): number {
    return this.config.nodeCount;
  }

  /**
   * Runs one cycle: kernels → gated delta → clamp → entanglement merges → backend blend →
   * ledger charge → cycle advance → trend records.
   *
   * Throws `InvalidStateError` when halted and `NumericDivergenceError` (after halting) when
   * a kernel or the backend emits a wrong-length or non-finite vector. Budget exhaustion is
   * reported through the returned status, not thrown.
   */
  step(): StepResult {
    const s = this.owned;
    if (s.halted) throw new InvalidStateError(`step() called while halted at cycle ${s.cycle}`);

    const n = this.config.nodeCount;
    const ctx: SimulationContext = { cycle: s.cycle, nodeCount: n, rng: s.rng };

    const delta = new Float64Array(n);
    this.config.kernels.forEach((kernel, idx) => {
      const out = kernel(Float64Array.from(s.nodes), ctx);
      this.assertVector(`kernel[${idx}]`, out);
      for (let i = 0; i < n; i++) delta[i] += out[i];
    });

    // Summing finite kernel outputs can still overflow; check before anything is applied.
    let cost = 0;
    for (let i = 0; i < n; i++) {
      if (!Number.isFinite(delta[i])) this.diverge("kernels", `summed delta at index ${i} is not finite: ${delta[i]}`);
      cost += Math.abs(delta[i]);
    }
    if (!Number.isFinite(cost)) this.diverge("kernels", `summed delta cost is not finite: ${cost}`);

    let applied = 0;
    for (let i = 0; i < n; i++) {
      const d = delta[i];
      if (Math.abs(d) < this.config.epsilon) continue;
      s.nodes[i] = clampUnit(s.nodes[i] + d);
      applied += 1;
    }

    let merges = 0;
    for (let i = 0; i < n; i++) {
      if (s.rng.next() >= this.config.entanglementProbability) continue;
      const j = s.rng.int(n);
      if (i !== j && s.unionFind.union(i, j)) merges += 1;
    }

    // Steps above are not rolled back if the backend diverges here.
    const field = this.config.backend.evolve(Float64Array.from(s.nodes), ctx);
    this.assertVector(this.config.backend.name, field);
    const w = this.config.mixingWeight;
    for (let i = 0; i < n; i++) {
      s.nodes[i] = clampUnit((1 - w) * s.nodes[i] + w * field[i]);
    }

    s.ledger.charge(cost);
    if (s.ledger.isExhausted()) {
      s.halted = true;
      const message = `energy exhausted (budget=${s.ledger.value}, leakage=${s.ledger.leakage})`;
      this.record("halt", message);
      this.debugLog(`halted at cycle ${s.cycle}: ${message}`);
      return { status: "halted", cycle: s.cycle, cost, applied, skipped: n - applied, merges };
    }

    s.cycle += 1;
    for (const metric of this.config.trendMetrics) {
      s.trends.get(metric.name)?.push(metric.measure(s.nodes));
    }
    this.record("cycle", `applied=${applied} merges=${merges} cost=${cost}`);

    return { status: "advanced", cycle: s.cycle, cost, applied, skipped: n - applied, merges };
  }

  /** Steps until halted or `maxCycles` steps have run. */
  run(maxCycles: number): StepResult[] {
    if (!Number.isSafeInteger(maxCycles) || maxCycles < 0) {
      throw new Error(`maxCycles must be a safe non-negative integer, got: ${maxCycles}`);
    }
    const results: StepResult[] = [];
    while (!this.owned.halted && results.length < maxCycles) {
      results.push(this.step());
    }
    return results;
  }

  /**
   * Applies a collaborator's bounded adjustment to one node. `amount` is clamped to
   * `±config.maxAdjustment` and the result to `[0,1]`. Returns the node's new value.
   */
  adjustNode(index: number, amount: number): number {
    const s = this.owned;
    if (s.halted) throw new InvalidStateError(`adjustNode() called while halted at cycle ${s.cycle}`);
    if (!Number.isInteger(index) || index < 0 || index >= this.config.nodeCount) {
      throw new IndexOutOfRangeError(index, this.config.nodeCount);
    }
    if (!Number.isFinite(amount)) throw new RangeError(`amount must be finite, got: ${amount}`);

    const max = this.config.maxAdjustment;
    const bounded = Math.max(-max, Math.min(max, amount));
    s.nodes[index] = clampUnit(s.nodes[index] + bounded);
    this.record("adjust", `node ${index} by ${bounded}`);
    return s.nodes[index];
  }

  /** Reinitialises every owned buffer from the configured seed. */
  reset(): void {
    this.owned = this.initialState();
    this.debugLog("reset");
  }

  nodeState(): NodeState {
    return Float64Array.from(this.owned.nodes);
  }

  trends(): Record<string, number[]> {
    const out: Record<string, number[]> = {};
    for (const [name, history] of this.owned.trends) out[name] = history.values();
    return out;
  }

  events(): EngineEvent[] {
    return this.owned.events.values().map((event) => ({ ...event }));
  }

  ledger(): LedgerState {
    return this.owned.ledger.toState();
  }

  charges(index: number): Charges {
    return this.owned.unionFind.charges(index);
  }

  totalCharges(): Charges {
    return this.owned.unionFind.totalCharges();
  }

  connected(i: number, j: number): boolean {
    return this.owned.unionFind.connected(i, j);
  }

  componentCount(): number {
    return this.owned.unionFind.componentCount();
  }

  snapshot(): EngineState {
    const s = this.owned;
    return {
      seed: this.config.seed,
      nodeCount: this.config.nodeCount,
      cycle: s.cycle,
      halted: s.halted,
      rngState: s.rng.getState(),
      ledger: s.ledger.toState(),
      unionFind: s.unionFind.toState(),
      nodes: Float64Array.from(s.nodes),
      trends: this.trends(),
    };
  }

  /**
   * Replaces every owned buffer with `state`. The node count must match this engine's
   * configuration; nothing is changed when validation fails.
   */
  restore(state: EngineState): void {
    const n = this.config.nodeCount;
    if (state.nodeCount !== n || state.nodes.length !== n) {
      throw new SnapshotCorruptError(
        `snapshot holds ${state.nodes.length} nodes (nodeCount=${state.nodeCount}), engine expects ${n}`,
      );
    }
    if (state.unionFind.parent.length !== n) {
      throw new SnapshotCorruptError(`snapshot union-find covers ${state.unionFind.parent.length} nodes, expected ${n}`);
    }

    let next: OwnedState;
    const trends = new Map<string, readonly number[]>();
    try {
      if (!Number.isSafeInteger(state.cycle) || state.cycle < 0) {
        throw new Error(`cycle must be a safe non-negative integer, got: ${state.cycle}`);
      }
      const nodes = Float64Array.from(state.nodes);
      nodes.forEach((value, i) => {
        if (!(value >= 0 && value <= 1)) throw new Error(`node ${i} out of [0,1]: ${value}`);
      });
      next = {
        rng: DeterministicRng.fromState(state.rngState),
        nodes,
        unionFind: ChargeUnionFind.fromState(state.unionFind),
        ledger: EnergyLedger.fromState(state.ledger),
        cycle: state.cycle,
        halted: state.halted,
        trends: this.emptyTrends(),
        events: new BoundedHistory<EngineEvent>(this.config.eventLogLength),
      };
      for (const metric of this.config.trendMetrics) {
        const values: unknown = state.trends[metric.name];
        if (values === undefined) continue;
        if (!Array.isArray(values)) throw new Error(`trend ${metric.name} must be an array`);
        const copy: number[] = [];
        for (const v of values) {
          if (typeof v !== "number" || !Number.isFinite(v)) {
            throw new Error(`trend ${metric.name} holds a non-finite value: ${String(v)}`);
          }
          copy.push(v);
        }
        trends.set(metric.name, copy);
      }
    } catch (err) {
      throw new SnapshotCorruptError(`invalid engine state: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }

    for (const [name, values] of trends) next.trends.get(name)?.replace(values);
    this.owned = next;
    this.record("restore", `restored cycle ${state.cycle}${state.halted ? " (halted)" : ""}`);
    this.debugLog(`restored cycle ${state.cycle}`);
  }

  private initialState(): OwnedState {
    const n = this.config.nodeCount;
    const rng = new DeterministicRng(this.config.seed);
    const nodes = new Float64Array(n);
    for (let i = 0; i < n; i++) nodes[i] = rng.uniform(INITIAL_STATE_MIN, INITIAL_STATE_MAX);
    const state: OwnedState = {
      rng,
      nodes,
      unionFind: new ChargeUnionFind(n, rng),
      ledger: new EnergyLedger(this.config.budget),
      cycle: 0,
      halted: false,
      trends: this.emptyTrends(),
      events: new BoundedHistory<EngineEvent>(this.config.eventLogLength),
    };
    state.events.push({
      cycle: 0,
      kind: "init",
      message: `initialized ${n} nodes, backend ${this.config.backend.name}`,
    });
    return state;
  }

  private emptyTrends(): Map<string, BoundedHistory<number>> {
    const trends = new Map<string, BoundedHistory<number>>();
    for (const metric of this.config.trendMetrics) {
      trends.set(metric.name, new BoundedHistory<number>(this.config.trendLength));
    }
    return trends;
  }

  private assertVector(source: string, out: ArrayLike<number>): void {
    const n = this.config.nodeCount;
    if (out.length !== n) this.diverge(source, `expected ${n} values, got ${out.length}`);
    for (let i = 0; i < n; i++) {
      if (!Number.isFinite(out[i])) this.diverge(source, `non-finite value at index ${i}: ${out[i]}`);
    }
  }

  private diverge(source: string, message: string): never {
    this.owned.halted = true;
    this.record("divergence", `${source}: ${message}`);
    this.debugLog(`numeric divergence in ${source}: ${message}`);
    throw new NumericDivergenceError(source, message);
  }

  private record(kind: EngineEventKind, message: string): void {
    this.owned.events.push({ cycle: this.owned.cycle, kind, message });
  }

  private debugLog(line: string): void {
    if (this.config.debug) this.config.log(`[engine:${this.config.seed}] ${line}`);
  }
}
