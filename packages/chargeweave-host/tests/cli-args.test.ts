import { expect, test } from "vitest";

import { parseRunArgs } from "../src/cli-args.js";
import { envFloat, envInt } from "../src/env.js";

const silent = () => {};

test("cli: run flags are parsed", () => {
  const args = parseRunArgs({
    argv: ["run", "--nodes", "8", "--seed", "7", "--cycles", "3", "--backend", "spectral", "--entanglement", "0.1", "--json"],
    env: {},
  });
  expect(args).toEqual({
    nodes: 8,
    seed: 7,
    cycles: 3,
    backend: "spectral",
    budget: 1000,
    entanglement: 0.1,
    weight: undefined,
    load: undefined,
    save: undefined,
    json: true,
    debug: false,
  });
});

test("cli: environment fills in missing flags", () => {
  const env = { CHARGEWEAVE_NODES: "16", CHARGEWEAVE_SEED: "5", CHARGEWEAVE_CYCLES: "2", CHARGEWEAVE_BUDGET: "12.5" };
  const args = parseRunArgs({ argv: ["run", "--seed", "9"], env });
  expect(args.nodes).toBe(16);
  expect(args.seed).toBe(9);
  expect(args.cycles).toBe(2);
  expect(args.budget).toBe(12.5);
  expect(args.backend).toBe("local-average");
});

test("cli: defaults apply without flags or environment", () => {
  const args = parseRunArgs({ argv: ["run"], env: {} });
  expect([args.nodes, args.seed, args.cycles, args.budget]).toEqual([64, 42, 100, 1000]);
});

test("cli: invalid values are rejected", () => {
  expect(() => parseRunArgs({ argv: ["run", "--backend", "qft"], env: {}, writeErr: silent })).toThrow(
    /invalid --backend value: qft/,
  );
  expect(() => parseRunArgs({ argv: ["run", "--nodes", "0"], env: {}, writeErr: silent })).toThrow(
    /invalid --nodes value: 0/,
  );
  expect(() => parseRunArgs({ argv: ["run", "--weight", "2"], env: {}, writeErr: silent })).toThrow(
    /invalid --weight value: 2/,
  );
  expect(() => parseRunArgs({ argv: ["run"], env: { CHARGEWEAVE_NODES: "many" } })).toThrow(
    "CHARGEWEAVE_NODES: invalid integer value: many",
  );
});

test("env helpers", () => {
  expect(envInt("X", { X: " 12 " })).toBe(12);
  expect(envInt("X", { X: "" })).toBeUndefined();
  expect(envInt("X", {})).toBeUndefined();
  expect(envFloat("X", { X: "0.25" })).toBe(0.25);
  expect(() => envInt("X", { X: "1.5" })).toThrow("X: invalid integer value: 1.5");
  expect(() => envFloat("X", { X: "abc" })).toThrow("X: invalid number: abc");
});
