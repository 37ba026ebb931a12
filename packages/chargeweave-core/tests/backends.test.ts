import { expect, test } from "vitest";

import { DeterministicRng, type EvolutionBackend, type SimulationContext } from "@chargeweave/interface";

import {
  createBackend,
  createLocalAverageBackend,
  createRandomMixingBackend,
  createSpectralBackend,
  isBackendKind,
} from "../src/backends.js";
import { backendConformanceScenarios } from "../src/conformance.js";
import { dispersionMetric } from "../src/trends.js";

function ctx(nodeCount: number, seed = 1, cycle = 0): SimulationContext {
  return { cycle, nodeCount, rng: new DeterministicRng(seed) };
}

function randomState(n: number, seed: number): Float64Array {
  const rng = new DeterministicRng(seed);
  const out = new Float64Array(n);
  for (let i = 0; i < n; i++) out[i] = rng.next();
  return out;
}

const stockBackends: EvolutionBackend[] = [
  createLocalAverageBackend(),
  createLocalAverageBackend({ radius: 3 }),
  createRandomMixingBackend(),
  createSpectralBackend(),
];

for (const backend of stockBackends) {
  for (const scenario of backendConformanceScenarios) {
    test(`backend conformance (${backend.name}): ${scenario.name}`, () => {
      scenario.run(backend);
    });
  }
}

test("local-average: averages each node with its ring neighbours", () => {
  const out = createLocalAverageBackend({ radius: 1 }).evolve(Float64Array.of(0, 0, 3, 0), ctx(4));
  expect(Array.from(out)).toEqual([0, 1, 1, 1]);
});

test("local-average: window never exceeds the ring", () => {
  const out = createLocalAverageBackend({ radius: 3 }).evolve(Float64Array.of(0.2, 0.6), ctx(2));
  expect(out[0]).toBeCloseTo(0.4, 12);
  expect(out[1]).toBeCloseTo(0.4, 12);
});

test("random-mixing: the cycle counter rotates the mixed field", () => {
  const backend = createRandomMixingBackend({ bondDimension: 2 });
  const state = randomState(10, 5);
  const at0 = backend.evolve(Float64Array.from(state), ctx(10, 8, 0));
  const at3 = backend.evolve(Float64Array.from(state), ctx(10, 8, 3));
  for (let i = 0; i < 10; i++) expect(at3[(i + 3) % 10]).toBe(at0[i]);
});

test("random-mixing: draws from the context rng", () => {
  const backend = createRandomMixingBackend();
  const state = randomState(16, 2);
  const a = backend.evolve(Float64Array.from(state), ctx(16, 1));
  const b = backend.evolve(Float64Array.from(state), ctx(16, 2));
  expect(Array.from(a)).not.toEqual(Array.from(b));
});

test("spectral: zero damping is the identity", () => {
  const state = randomState(9, 4);
  const out = createSpectralBackend({ damping: 0 }).evolve(state, ctx(9));
  state.forEach((value, i) => expect(out[i]).toBeCloseTo(value, 12));
});

test("smoothing backends never increase dispersion", () => {
  for (const backend of [createLocalAverageBackend({ radius: 2 }), createSpectralBackend({ damping: 4 })]) {
    const state = randomState(32, 11);
    const after = dispersionMetric.measure(Float64Array.from(backend.evolve(Float64Array.from(state), ctx(32))));
    expect(after).toBeLessThanOrEqual(dispersionMetric.measure(state) + 1e-12);
  }
});

test("createBackend: resolves specs and passes custom backends through", () => {
  expect(createBackend({ kind: "local-average" }).name).toBe("local-average(r=1)");
  expect(createBackend({ kind: "random-mixing" }).name).toBe("random-mixing(d=4)");
  expect(createBackend({ kind: "spectral", damping: 2 }).name).toBe("spectral(damping=2)");

  const custom: EvolutionBackend = { name: "identity", evolve: (state) => state };
  expect(createBackend(custom)).toBe(custom);
});

test("backend options are validated", () => {
  expect(() => createLocalAverageBackend({ radius: 0 })).toThrow(/radius/);
  expect(() => createRandomMixingBackend({ bondDimension: 1.5 })).toThrow(/bondDimension/);
  expect(() => createSpectralBackend({ damping: -1 })).toThrow(/damping/);
});

test("isBackendKind", () => {
  expect(isBackendKind("spectral")).toBe(true);
  expect(isBackendKind("local-average")).toBe(true);
  expect(isBackendKind("tensor")).toBe(false);
});
