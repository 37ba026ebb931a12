// Orthonormal DCT-II and its inverse (DCT-III). Orthonormal scaling keeps Parseval's
// identity, which the snapshot codec relies on to bound truncation error.
//
// TODO: swap the direct O(n·k) sums for an FFT-based transform once node counts beyond a
// few thousand need to be snapshotted interactively.

export function dct2(input: ArrayLike<number>): Float64Array {
  const n = input.length;
  const out = new Float64Array(n);
  if (n === 0) return out;
  const scale0 = Math.sqrt(1 / n);
  const scale = Math.sqrt(2 / n);
  const step = Math.PI / (2 * n);
  for (let k = 0; k < n; k++) {
    let sum = 0;
    for (let i = 0; i < n; i++) {
      sum += input[i] * Math.cos(step * k * (2 * i + 1));
    }
    out[k] = (k === 0 ? scale0 : scale) * sum;
  }
  return out;
}

/**
 * Inverse of `dct2`. `coefficients` may be shorter than `length`; missing trailing
 * coefficients are treated as zero.
 */
export function idct2(coefficients: ArrayLike<number>, length: number = coefficients.length): Float64Array {
  if (!Number.isSafeInteger(length) || length < 0) {
    throw new Error(`length must be a safe non-negative integer, got: ${length}`);
  }
  if (coefficients.length > length) {
    throw new Error(`got ${coefficients.length} coefficients for length ${length}`);
  }
  const out = new Float64Array(length);
  if (length === 0) return out;
  const scale0 = Math.sqrt(1 / length);
  const scale = Math.sqrt(2 / length);
  const step = Math.PI / (2 * length);
  const kept = coefficients.length;
  for (let i = 0; i < length; i++) {
    let sum = kept > 0 ? scale0 * coefficients[0] : 0;
    for (let k = 1; k < kept; k++) {
      sum += scale * coefficients[k] * Math.cos(step * k * (2 * i + 1));
    }
    out[i] = sum;
  }
  return out;
}
