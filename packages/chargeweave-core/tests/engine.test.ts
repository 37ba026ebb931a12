import { expect, test } from "vitest";

import {
  IndexOutOfRangeError,
  InvalidStateError,
  NumericDivergenceError,
  SnapshotCorruptError,
  type NumericKernel,
} from "@chargeweave/interface";

import { Engine } from "../src/engine.js";
import { createNoiseKernel } from "../src/kernels.js";

const constantKernel =
  (value: number): NumericKernel =>
  (state) =>
    new Float64Array(state.length).fill(value);

test("engine: initial state lies in [0.4, 0.7] and every node is its own set", () => {
  const engine = new Engine({ nodeCount: 16, seed: 3 });
  for (const value of engine.nodeState()) {
    expect(value).toBeGreaterThanOrEqual(0.4);
    expect(value).toBeLessThan(0.7);
  }
  expect(engine.componentCount()).toBe(16);
  expect(engine.cycle).toBe(0);
  expect(engine.status).toBe("running");
  expect(engine.events().map((e) => e.kind)).toEqual(["init"]);
});

test("engine: a zero kernel costs nothing over five cycles", () => {
  const engine = new Engine({ nodeCount: 8, seed: 42, budget: 1000, entanglementProbability: 0 });
  const results = engine.run(5);

  expect(results.map((r) => r.cycle)).toEqual([1, 2, 3, 4, 5]);
  expect(results.every((r) => r.cost === 0 && r.merges === 0 && r.applied === 0)).toBe(true);
  expect(engine.cycle).toBe(5);
  expect(engine.halted).toBe(false);
  expect(engine.ledgerValue).toBe(1000);
  expect(engine.componentCount()).toBe(8);
});

test("engine: exhausting the budget halts without advancing the cycle", () => {
  const engine = new Engine({ nodeCount: 8, seed: 42, budget: 0.001, kernels: [constantKernel(0.01)] });
  const result = engine.step();

  expect(result.status).toBe("halted");
  expect(result.cycle).toBe(0);
  expect(result.cost).toBeCloseTo(0.08, 12);
  expect(engine.halted).toBe(true);
  expect(engine.ledgerValue).toBeCloseTo(-0.079, 12);
  expect(engine.leakage).toBeCloseTo(0.079, 12);
  expect(engine.events().at(-1)?.kind).toBe("halt");

  expect(() => engine.step()).toThrow(InvalidStateError);
  expect(() => engine.adjustNode(0, 0.01)).toThrow(InvalidStateError);
});

test("engine: run stops at the halting step", () => {
  const engine = new Engine({ nodeCount: 4, seed: 1, budget: 0.1, kernels: [constantKernel(0.01)] });
  const results = engine.run(100);
  // 0.04 per cycle: cycles 1 and 2 fit, the third overdraws.
  expect(results.map((r) => r.status)).toEqual(["advanced", "advanced", "halted"]);
  expect(engine.cycle).toBe(2);
  expect(engine.run(5)).toEqual([]);
});

test("engine: deltas below epsilon are skipped but still charged", () => {
  const engine = new Engine({
    nodeCount: 8,
    seed: 5,
    entanglementProbability: 0,
    mixingWeight: 0,
    kernels: [constantKernel(1e-6)],
  });
  const before = Array.from(engine.nodeState());
  const result = engine.step();

  expect(result.applied).toBe(0);
  expect(result.skipped).toBe(8);
  expect(result.cost).toBeCloseTo(8e-6, 15);
  expect(Array.from(engine.nodeState())).toEqual(before);
});

test("engine: node values stay clamped to [0, 1]", () => {
  const engine = new Engine({
    nodeCount: 12,
    seed: 9,
    budget: 1e9,
    kernels: [constantKernel(0.5)],
    backend: { kind: "spectral" },
  });
  engine.run(3);
  for (const value of engine.nodeState()) {
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThanOrEqual(1);
  }
});

test("engine: same seed and config replay the same trajectory", () => {
  const config = {
    nodeCount: 24,
    seed: 1234,
    entanglementProbability: 0.3,
    backend: { kind: "random-mixing" as const },
    kernels: [createNoiseKernel({ amplitude: 0.01 })],
  };
  const a = new Engine(config);
  const b = new Engine(config);
  a.run(20);
  b.run(20);

  expect(Array.from(a.nodeState())).toEqual(Array.from(b.nodeState()));
  expect(a.snapshot()).toEqual(b.snapshot());
});

test("engine: entanglement merges conserve total charge", () => {
  const engine = new Engine({ nodeCount: 32, seed: 77, entanglementProbability: 0.5 });
  const before = engine.totalCharges();
  const merges = engine.run(30).reduce((acc, r) => acc + r.merges, 0);

  expect(merges).toBeGreaterThan(0);
  expect(engine.componentCount()).toBe(32 - merges);
  expect(engine.totalCharges()).toEqual(before);
});

test("engine: a diverging kernel halts before touching state", () => {
  const engine = new Engine({ nodeCount: 4, seed: 2, kernels: [() => new Float64Array(3)] });
  const before = Array.from(engine.nodeState());

  expect(() => engine.step()).toThrow(NumericDivergenceError);
  expect(engine.halted).toBe(true);
  expect(Array.from(engine.nodeState())).toEqual(before);
  expect(engine.events().at(-1)).toEqual({
    cycle: 0,
    kind: "divergence",
    message: "kernel[0]: expected 4 values, got 3",
  });
});

test("engine: kernel sums that overflow halt before touching state", () => {
  const huge = constantKernel(1e308);
  const summed = new Engine({ nodeCount: 4, seed: 2, kernels: [huge, huge] });
  const before = Array.from(summed.nodeState());

  expect(() => summed.step()).toThrow(NumericDivergenceError);
  expect(summed.halted).toBe(true);
  expect(Array.from(summed.nodeState())).toEqual(before);
  expect(summed.events().at(-1)?.message).toBe("kernels: summed delta at index 0 is not finite: Infinity");

  const single = new Engine({ nodeCount: 4, seed: 2, kernels: [huge] });
  expect(() => single.step()).toThrow(NumericDivergenceError);
  expect(Array.from(single.nodeState())).toEqual(before);
  expect(single.events().at(-1)?.message).toBe("kernels: summed delta cost is not finite: Infinity");
  expect(single.ledgerValue).toBe(1000);
});

test("engine: a diverging backend raises NumericDivergenceError", () => {
  const engine = new Engine({
    nodeCount: 4,
    seed: 2,
    backend: { name: "broken", evolve: (state) => new Float64Array(state.length).fill(Number.NaN) },
  });

  let caught: unknown;
  try {
    engine.step();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(NumericDivergenceError);
  expect(caught instanceof NumericDivergenceError ? caught.source : undefined).toBe("broken");
  expect(engine.status).toBe("halted");
});

test("engine: adjustNode clamps the amount and validates the index", () => {
  const engine = new Engine({ nodeCount: 4, seed: 11 });
  const before = engine.nodeState()[1];

  expect(engine.adjustNode(1, 1)).toBeCloseTo(before + 0.05, 12);
  expect(engine.adjustNode(1, -1)).toBeCloseTo(before, 12);
  expect(() => engine.adjustNode(9, 0.01)).toThrow(IndexOutOfRangeError);
  expect(() => engine.adjustNode(0, Number.NaN)).toThrow(RangeError);
  expect(engine.events().at(-1)?.kind).toBe("adjust");
});

test("engine: trends are recorded per cycle and bounded", () => {
  const engine = new Engine({ nodeCount: 6, seed: 4, trendLength: 2 });
  engine.run(3);
  const trends = engine.trends();
  expect(Object.keys(trends)).toEqual(["mean", "dispersion"]);
  expect(trends.mean.length).toBe(2);
  expect(trends.dispersion.length).toBe(2);
});

test("engine: the event log is bounded", () => {
  const engine = new Engine({ nodeCount: 4, seed: 4, eventLogLength: 3 });
  engine.run(10);
  const events = engine.events();
  expect(events.length).toBe(3);
  expect(events.map((e) => e.cycle)).toEqual([8, 9, 10]);
});

test("engine: reset reproduces the initial state", () => {
  const engine = new Engine({ nodeCount: 10, seed: 21, kernels: [createNoiseKernel()] });
  const initial = Array.from(engine.nodeState());
  engine.run(7);
  engine.reset();

  expect(engine.cycle).toBe(0);
  expect(engine.ledgerValue).toBe(1000);
  expect(Array.from(engine.nodeState())).toEqual(initial);
});

test("engine: restore resumes the exact trajectory", () => {
  const config = { nodeCount: 16, seed: 8, entanglementProbability: 0.2, kernels: [createNoiseKernel()] };
  const a = new Engine(config);
  a.run(10);
  const b = new Engine(config);
  b.restore(a.snapshot());

  expect(b.cycle).toBe(10);
  a.run(5);
  b.run(5);
  expect(Array.from(b.nodeState())).toEqual(Array.from(a.nodeState()));
  expect(b.totalCharges()).toEqual(a.totalCharges());
  expect(b.ledger()).toEqual(a.ledger());
});

test("engine: snapshots are copies", () => {
  const engine = new Engine({ nodeCount: 4, seed: 1 });
  const snapshot = engine.snapshot();
  snapshot.nodes[0] = 0.99;
  expect(engine.nodeState()[0]).not.toBe(0.99);
});

test("engine: restore rejects mismatched or invalid state and keeps the current one", () => {
  const engine = new Engine({ nodeCount: 4, seed: 1 });
  const other = new Engine({ nodeCount: 5, seed: 1 });
  expect(() => engine.restore(other.snapshot())).toThrow(SnapshotCorruptError);

  const before = Array.from(engine.nodeState());
  const bad = { ...engine.snapshot(), rngState: -1 };
  expect(() => engine.restore(bad)).toThrow(/invalid engine state: rng state must be a uint32/);
  const outOfRange = engine.snapshot();
  outOfRange.nodes[2] = 1.5;
  expect(() => engine.restore(outOfRange)).toThrow(SnapshotCorruptError);
  const badTrend = { ...engine.snapshot(), trends: JSON.parse('{"mean":"oops"}') };
  expect(() => engine.restore(badTrend)).toThrow("invalid engine state: trend mean must be an array");
  const nanTrend = { ...engine.snapshot(), trends: { mean: [0.5, Number.NaN] } };
  expect(() => engine.restore(nanTrend)).toThrow(SnapshotCorruptError);
  expect(Array.from(engine.nodeState())).toEqual(before);
  expect(engine.cycle).toBe(0);
});

test("engine: debug lines are prefixed with the seed", () => {
  const lines: string[] = [];
  const engine = new Engine({ nodeCount: 4, seed: 42, debug: true, log: (line) => lines.push(line) });
  engine.reset();
  expect(lines).toEqual(["[engine:42] reset"]);
});
