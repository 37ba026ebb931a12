import { expect, test } from "vitest";

import { DeterministicRng } from "@chargeweave/interface";

import { createDriftKernel, createMeanFieldKernel, createNoiseKernel } from "../src/kernels.js";

const ctx = (seed: number) => ({ cycle: 0, nodeCount: 2, rng: new DeterministicRng(seed) });

test("drift kernel pulls toward its target", () => {
  const out = createDriftKernel({ target: 0.5, rate: 0.1 })(Float64Array.of(0, 1), ctx(1));
  expect(out[0]).toBeCloseTo(0.05, 12);
  expect(out[1]).toBeCloseTo(-0.05, 12);
});

test("mean-field kernel pushes every node by the same amount", () => {
  const out = createMeanFieldKernel({ strength: 0.1, pivot: 0.5 })(Float64Array.of(0.6, 0.8), ctx(1));
  expect(out[0]).toBeCloseTo(0.02, 12);
  expect(out[1]).toBe(out[0]);
});

test("noise kernel is reproducible from the rng and silent at zero amplitude", () => {
  const kernel = createNoiseKernel({ amplitude: 0.01 });
  const a = kernel(Float64Array.of(0.5, 0.5), ctx(9));
  const b = kernel(Float64Array.of(0.5, 0.5), ctx(9));
  expect(Array.from(a)).toEqual(Array.from(b));

  const silent = createNoiseKernel({ amplitude: 0 })(Float64Array.of(0.5, 0.5), ctx(9));
  expect(Array.from(silent)).toEqual([0, 0]);
});

test("kernel options are validated", () => {
  expect(() => createDriftKernel({ rate: Number.NaN })).toThrow(/rate/);
  expect(() => createNoiseKernel({ amplitude: -1 })).toThrow(/amplitude/);
  expect(() => createMeanFieldKernel({ strength: Number.POSITIVE_INFINITY })).toThrow(
    "strength must be finite, got: Infinity",
  );
  expect(() => createMeanFieldKernel({ pivot: Number.NaN })).toThrow("pivot must be finite, got: NaN");
});
