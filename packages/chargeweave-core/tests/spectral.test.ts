import { expect, test } from "vitest";

import { dct2, idct2 } from "../src/spectral.js";

test("spectral: a constant signal has a single DC coefficient", () => {
  const c = dct2([0.5, 0.5, 0.5, 0.5]);
  expect(c[0]).toBeCloseTo(1, 12);
  for (let k = 1; k < 4; k++) expect(c[k]).toBeCloseTo(0, 12);
});

test("spectral: idct2 inverts dct2", () => {
  const input = [0.1, 0.9, 0.4, 0.4, 0.75, 0.2, 0.6];
  const back = idct2(dct2(input));
  input.forEach((value, i) => expect(back[i]).toBeCloseTo(value, 12));
});

test("spectral: the transform preserves energy", () => {
  const input = [0.3, 0.8, 0.1, 0.55, 0.9];
  const c = dct2(input);
  const energy = (xs: ArrayLike<number>) => Array.from(xs).reduce((acc, x) => acc + x * x, 0);
  expect(energy(c)).toBeCloseTo(energy(input), 12);
});

test("spectral: missing trailing coefficients count as zero", () => {
  expect(Array.from(idct2([2], 4))).toEqual([1, 1, 1, 1]);
  expect(Array.from(idct2([], 3))).toEqual([0, 0, 0]);
  expect(() => idct2([1, 2, 3], 2)).toThrow(/3 coefficients for length 2/);
});

test("spectral: empty input", () => {
  expect(dct2([]).length).toBe(0);
  expect(idct2([]).length).toBe(0);
});
