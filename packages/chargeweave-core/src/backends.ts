import type { EvolutionBackend, NodeState, SimulationContext } from "@chargeweave/interface";

import { dct2, idct2 } from "./spectral.js";

export const BACKEND_KINDS = ["local-average", "random-mixing", "spectral"] as const;
export type BackendKind = (typeof BACKEND_KINDS)[number];

const BACKEND_KIND_SET: ReadonlySet<string> = new Set(BACKEND_KINDS);

export type BackendSpec =
  | {
      kind: "local-average";
      /** Neighbours averaged on each side (circular). Default 1. */
      radius?: number;
    }
  | {
      kind: "random-mixing";
      /** Number of `v ← ½(v + v[idx])` passes per cycle. Default 4. */
      bondDimension?: number;
    }
  | {
      kind: "spectral";
      /** Coefficient `k` is scaled by `exp(-damping · k / n)`. Default 10. */
      damping?: number;
    };

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive safe integer, got: ${value}`);
  }
}

export function createLocalAverageBackend(opts: { radius?: number } = {}): EvolutionBackend {
  const radius = opts.radius ?? 1;
  assertPositiveInteger("radius", radius);

  return {
    name: `local-average(r=${radius})`,
    evolve: (state: NodeState) => {
      const n = state.length;
      const out = new Float64Array(n);
      if (n === 0) return out;
      const width = Math.min(2 * radius + 1, n);
      const lo = -Math.floor((width - 1) / 2);
      // Sliding window over the ring: seed the first window, then add/drop one entry per index.
      let sum = 0;
      for (let d = lo; d < lo + width; d++) sum += state[(((d % n) + n) % n)];
      for (let i = 0; i < n; i++) {
        out[i] = sum / width;
        const drop = (((i + lo) % n) + n) % n;
        const add = (i + lo + width) % n;
        sum += state[add] - state[drop];
      }
      return out;
    },
  };
}

export function createRandomMixingBackend(opts: { bondDimension?: number } = {}): EvolutionBackend {
  const bondDimension = opts.bondDimension ?? 4;
  assertPositiveInteger("bondDimension", bondDimension);

  return {
    name: `random-mixing(d=${bondDimension})`,
    evolve: (state: NodeState, ctx: SimulationContext) => {
      const n = state.length;
      let current = Float64Array.from(state);
      if (n === 0) return current;
      for (let pass = 0; pass < bondDimension; pass++) {
        const next = new Float64Array(n);
        for (let i = 0; i < n; i++) {
          next[i] = 0.5 * (current[i] + current[ctx.rng.int(n)]);
        }
        current = next;
      }
      const shift = ctx.cycle % n;
      const out = new Float64Array(n);
      for (let i = 0; i < n; i++) out[(i + shift) % n] = current[i];
      return out;
    },
  };
}

export function createSpectralBackend(opts: { damping?: number } = {}): EvolutionBackend {
  const damping = opts.damping ?? 10;
  if (!Number.isFinite(damping) || damping < 0) {
    throw new Error(`damping must be a finite non-negative number, got: ${damping}`);
  }

  return {
    name: `spectral(damping=${damping})`,
    evolve: (state: NodeState) => {
      const n = state.length;
      const coefficients = dct2(state);
      for (let k = 1; k < n; k++) {
        coefficients[k] *= Math.exp((-damping * k) / n);
      }
      return idct2(coefficients, n);
    },
  };
}

function isBackendSpec(value: BackendSpec | EvolutionBackend): value is BackendSpec {
  return "kind" in value && !("evolve" in value);
}

/**
 * Resolves a backend once, at engine construction. Custom implementations pass through
 * unchanged.
 */
export function createBackend(spec: BackendSpec | EvolutionBackend): EvolutionBackend {
  if (!isBackendSpec(spec)) return spec;
  switch (spec.kind) {
    case "local-average":
      return createLocalAverageBackend({ radius: spec.radius });
    case "random-mixing":
      return createRandomMixingBackend({ bondDimension: spec.bondDimension });
    case "spectral":
      return createSpectralBackend({ damping: spec.damping });
    default: {
      const _exhaustive: never = spec;
      throw new Error(`unsupported backend kind: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

export function isBackendKind(value: string): value is BackendKind {
  return BACKEND_KIND_SET.has(value);
}
