import { DeterministicRng, type EvolutionBackend, type SimulationContext } from "@chargeweave/interface";

export type BackendConformanceScenario = {
  name: string;
  run: (backend: EvolutionBackend) => void;
};

function fail(backend: EvolutionBackend, message: string): never {
  throw new Error(`${backend.name}: ${message}`);
}

function context(nodeCount: number, seed: number, cycle = 0): SimulationContext {
  return { cycle, nodeCount, rng: new DeterministicRng(seed) };
}

function sampleState(nodeCount: number, seed: number): Float64Array {
  const rng = new DeterministicRng(seed);
  const state = new Float64Array(nodeCount);
  for (let i = 0; i < nodeCount; i++) state[i] = rng.uniform(0, 1);
  return state;
}

/**
 * Properties every evolution backend must satisfy. Custom backends can be checked by
 * running each scenario against them.
 */
export const backendConformanceScenarios: readonly BackendConformanceScenario[] = [
  {
    name: "returns one finite value per node",
    run: (backend) => {
      for (const n of [1, 2, 7, 32]) {
        const out = backend.evolve(sampleState(n, n), context(n, 1));
        if (out.length !== n) fail(backend, `expected ${n} values, got ${out.length}`);
        for (let i = 0; i < n; i++) {
          if (!Number.isFinite(out[i])) fail(backend, `non-finite output at ${i} for n=${n}`);
        }
      }
    },
  },
  {
    name: "is deterministic for equal input and equal rng state",
    run: (backend) => {
      const state = sampleState(24, 3);
      const a = backend.evolve(Float64Array.from(state), context(24, 9, 5));
      const b = backend.evolve(Float64Array.from(state), context(24, 9, 5));
      for (let i = 0; i < 24; i++) {
        if (a[i] !== b[i]) fail(backend, `outputs differ at ${i}: ${a[i]} vs ${b[i]}`);
      }
    },
  },
  {
    name: "keeps a uniform state uniform",
    run: (backend) => {
      const state = new Float64Array(16).fill(0.5);
      const out = backend.evolve(state, context(16, 2));
      for (let i = 0; i < 16; i++) {
        if (Math.abs(out[i] - 0.5) > 1e-9) fail(backend, `uniform input drifted at ${i}: ${out[i]}`);
      }
    },
  },
  {
    name: "leaves its input untouched",
    run: (backend) => {
      const state = sampleState(12, 5);
      const copy = Float64Array.from(state);
      backend.evolve(state, context(12, 6));
      for (let i = 0; i < 12; i++) {
        if (state[i] !== copy[i]) fail(backend, `input mutated at ${i}`);
      }
    },
  },
];
