import { expect, test } from "vitest";

import {
  ChargeweaveError,
  IndexOutOfRangeError,
  InvalidStateError,
  NumericDivergenceError,
  SnapshotCorruptError,
  isChargeweaveError,
} from "../src/errors.js";

test("errors carry a code and their class name", () => {
  const err = new IndexOutOfRangeError(5, 3);
  expect(err).toBeInstanceOf(ChargeweaveError);
  expect(err).toBeInstanceOf(Error);
  expect(err.name).toBe("IndexOutOfRangeError");
  expect(err.code).toBe("IndexOutOfRange");
  expect(err.message).toBe("index 5 out of range [0, 3)");
  expect([err.index, err.size]).toEqual([5, 3]);
});

test("numeric divergence names its source", () => {
  const err = new NumericDivergenceError("kernel[1]", "non-finite value at index 0: NaN");
  expect(err.source).toBe("kernel[1]");
  expect(err.message).toBe("kernel[1]: non-finite value at index 0: NaN");
});

test("snapshot errors keep their cause", () => {
  const cause = new Error("inflate failed");
  const err = new SnapshotCorruptError("unreadable", { cause });
  expect(err.cause).toBe(cause);
});

test("isChargeweaveError narrows by code", () => {
  const err: unknown = new InvalidStateError("halted");
  expect(isChargeweaveError(err)).toBe(true);
  expect(isChargeweaveError(err, "InvalidState")).toBe(true);
  expect(isChargeweaveError(err, "SnapshotCorrupt")).toBe(false);
  expect(isChargeweaveError(new Error("plain"))).toBe(false);
});
