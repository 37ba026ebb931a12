import type { Engine, StepResult } from "@chargeweave/core";
import {
  NumericDivergenceError,
  type EngineEvent,
  type EngineLogOptions,
  type EngineState,
  type EngineStatus,
  type NodeAdjustment,
  type Unsubscribe,
} from "@chargeweave/interface";
import type { SnapshotEncodeOptions, SnapshotReport } from "@chargeweave/snapshot";
import { loadSnapshotFile, saveSnapshotFile } from "@chargeweave/snapshot/node";

/** Frozen picture of an engine after one host operation. */
export type EngineView = Readonly<{
  cycle: number;
  status: EngineStatus;
  nodeCount: number;
  ledgerValue: number;
  leakage: number;
  componentCount: number;
  nodes: readonly number[];
  trends: Readonly<Record<string, readonly number[]>>;
  events: readonly Readonly<EngineEvent>[];
  lastStep: Readonly<StepResult> | undefined;
}>;

/**
 * External participant that reads a view after each advanced cycle and proposes bounded
 * node adjustments. A collaborator that throws is logged and skipped for that cycle.
 */
export type Collaborator = {
  name: string;
  propose(view: EngineView): readonly NodeAdjustment[];
};

export type EngineHostOptions = EngineLogOptions & {
  collaborators?: readonly Collaborator[];
  snapshot?: SnapshotEncodeOptions;
};

export type EngineHost = {
  /** Steps up to `count` cycles, stopping early once the engine halts. */
  step(count?: number): Promise<EngineView>;
  reset(): Promise<EngineView>;
  restore(state: EngineState): Promise<EngineView>;
  save(filePath: string): Promise<SnapshotReport>;
  load(filePath: string): Promise<EngineView>;
  latest(): EngineView;
  subscribe(handler: (view: EngineView) => void): Unsubscribe;
  /** Resolves once every queued operation has settled. */
  flush(): Promise<void>;
};

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function viewOf(engine: Engine, lastStep: StepResult | undefined): EngineView {
  const trends: Record<string, readonly number[]> = {};
  for (const [name, values] of Object.entries(engine.trends())) trends[name] = Object.freeze(values);
  return Object.freeze({
    cycle: engine.cycle,
    status: engine.status,
    nodeCount: engine.nodeCount,
    ledgerValue: engine.ledgerValue,
    leakage: engine.leakage,
    componentCount: engine.componentCount(),
    nodes: Object.freeze(Array.from(engine.nodeState())),
    trends: Object.freeze(trends),
    events: Object.freeze(engine.events().map((event) => Object.freeze(event))),
    lastStep: lastStep ? Object.freeze({ ...lastStep }) : undefined,
  });
}

/**
 * Wraps an engine so that every mutation runs through one promise chain and publishes a
 * fresh frozen view afterwards. The engine must not be mutated directly once wrapped.
 */
export function createEngineHost(engine: Engine, opts: EngineHostOptions = {}): EngineHost {
  const collaborators = [...(opts.collaborators ?? [])];
  const debug = Boolean(opts.debug);
  const log = opts.log ?? ((line: string) => console.warn(line));
  const debugLog = (line: string) => {
    if (debug) log(`[host] ${line}`);
  };

  const handlers = new Set<(view: EngineView) => void>();
  let current = viewOf(engine, undefined);
  let lastStep: StepResult | undefined;
  let tail: Promise<void> = Promise.resolve();

  const enqueue = <T>(task: () => T | Promise<T>): Promise<T> => {
    const run = tail.then(task);
    // A failed task rejects its own promise; later tasks still run.
    tail = run.then(
      () => undefined,
      (err: unknown) => debugLog(`queued operation failed: ${describe(err)}`),
    );
    return run;
  };

  const publish = (): EngineView => {
    current = viewOf(engine, lastStep);
    for (const h of handlers) {
      try {
        h(current);
      } catch (err) {
        log(`[host] subscriber failed: ${describe(err)}`);
      }
    }
    return current;
  };

  const consult = () => {
    const view = viewOf(engine, lastStep);
    for (const collaborator of collaborators) {
      try {
        for (const proposal of collaborator.propose(view)) {
          engine.adjustNode(proposal.index, proposal.amount);
        }
      } catch (err) {
        log(`[host] collaborator ${collaborator.name} failed at cycle ${engine.cycle}: ${describe(err)}`);
      }
    }
  };

  const stepMany = (count: number): EngineView => {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new Error(`count must be a safe non-negative integer, got: ${count}`);
    }
    for (let k = 0; k < count && !engine.halted; k++) {
      let result: StepResult;
      try {
        result = engine.step();
      } catch (err) {
        if (!(err instanceof NumericDivergenceError)) throw err;
        log(`[host] halted on numeric divergence at cycle ${engine.cycle}: ${err.message}`);
        break;
      }
      lastStep = result;
      if (result.status === "advanced") consult();
    }
    if (engine.halted) debugLog(`engine halted at cycle ${engine.cycle}`);
    return publish();
  };

  return {
    step: (count = 1) => enqueue(() => stepMany(count)),
    reset: () =>
      enqueue(() => {
        engine.reset();
        lastStep = undefined;
        return publish();
      }),
    restore: (state) =>
      enqueue(() => {
        engine.restore(state);
        lastStep = undefined;
        return publish();
      }),
    save: (filePath) =>
      enqueue(async () => {
        const report = await saveSnapshotFile(filePath, engine.snapshot(), opts.snapshot);
        debugLog(`saved cycle ${engine.cycle} to ${filePath} (${report.keptCoefficients} coefficients)`);
        return report;
      }),
    load: (filePath) =>
      enqueue(async () => {
        const state = await loadSnapshotFile(filePath);
        engine.restore(state);
        lastStep = undefined;
        debugLog(`loaded cycle ${state.cycle} from ${filePath}`);
        return publish();
      }),
    latest: () => current,
    subscribe: (handler) => {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },
    flush: () => tail,
  };
}
