import { expect, test } from "vitest";

import { envInt, quantile } from "../src/stats.js";
import { benchTiming } from "../src/timing.js";

test("quantile interpolates between neighbours", () => {
  expect(quantile([4, 1, 3, 2], 0.5)).toBe(2.5);
  expect(quantile([10, 20, 30], 0.5)).toBe(20);
  expect(quantile([1, 2, 3, 4, 5], 0)).toBe(1);
  expect(quantile([1, 2, 3, 4, 5], 1)).toBe(5);
  expect(quantile([0, 100], 0.95)).toBeCloseTo(95, 10);
});

test("quantile edge cases", () => {
  expect(Number.isNaN(quantile([], 0.5))).toBe(true);
  expect(() => quantile([1], 1.5)).toThrow("q must be in [0,1], got: 1.5");
});

test("envInt reads whole numbers and rejects anything else", () => {
  const env = { BENCH_ITERATIONS: " 12 ", BENCH_WARMUP: "", BAD: "2.5" };
  expect(envInt("BENCH_ITERATIONS", env)).toBe(12);
  expect(envInt("BENCH_WARMUP", env)).toBeUndefined();
  expect(envInt("MISSING", env)).toBeUndefined();
  expect(() => envInt("BAD", env)).toThrow("BAD: invalid integer value: 2.5");
});

test("benchTiming takes counts from the environment", () => {
  expect(benchTiming({ env: {} })).toEqual({ iterations: 1, warmupIterations: 0 });
  expect(benchTiming({ env: {}, defaultIterations: 5 })).toEqual({ iterations: 5, warmupIterations: 1 });
  expect(benchTiming({ env: { BENCH_ITERATIONS: "3", BENCH_WARMUP: "0" } })).toEqual({
    iterations: 3,
    warmupIterations: 0,
  });
  expect(benchTiming({ env: { BENCH_ITERATIONS: "0" } })).toEqual({ iterations: 1, warmupIterations: 0 });
  expect(() => benchTiming({ env: { BENCH_ITERATIONS: "2.5" } })).toThrow(
    "BENCH_ITERATIONS: invalid integer value: 2.5",
  );
});
