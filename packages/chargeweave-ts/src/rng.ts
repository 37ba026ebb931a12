/**
 * Seeded random source shared by the engine, its kernels and its backends.
 *
 * Never reach for `Math.random()` inside a cycle: every draw must come from here so that
 * the same seed replays the same trajectory.
 */
export interface RandomSource {
  /** Uniform float in `[0, 1)`. */
  next(): number;
  /** Uniform integer in `[0, maxExclusive)`. */
  int(maxExclusive: number): number;
  uniform(min: number, max: number): number;
  normal(mean?: number, stdDev?: number): number;
}

const UINT32_RANGE = 4294967296;

// murmur3 fmix32: spreads nearby seeds apart before they become generator state.
function mixSeed(seed: number): number {
  let h = Math.trunc(seed) >>> 0;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

/**
 * Mulberry32 generator. Its whole state is one uint32, so it persists exactly in snapshots.
 */
export class DeterministicRng implements RandomSource {
  private state: number;

  constructor(seed: number) {
    if (!Number.isFinite(seed)) throw new Error(`seed must be finite, got: ${seed}`);
    this.state = mixSeed(seed);
  }

  static fromState(state: number): DeterministicRng {
    const rng = new DeterministicRng(0);
    rng.setState(state);
    return rng;
  }

  getState(): number {
    return this.state;
  }

  setState(state: number): void {
    if (!Number.isInteger(state) || state < 0 || state >= UINT32_RANGE) {
      throw new Error(`rng state must be a uint32, got: ${state}`);
    }
    this.state = state;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / UINT32_RANGE;
  }

  int(maxExclusive: number): number {
    if (!Number.isSafeInteger(maxExclusive) || maxExclusive <= 0) {
      throw new Error(`maxExclusive must be a positive safe integer, got: ${maxExclusive}`);
    }
    return Math.floor(this.next() * maxExclusive);
  }

  uniform(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  // Box-Muller without caching the second variate, so the state stays a single word.
  normal(mean = 0, stdDev = 1): number {
    const u1 = 1 - this.next();
    const u2 = this.next();
    return mean + stdDev * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }
}
