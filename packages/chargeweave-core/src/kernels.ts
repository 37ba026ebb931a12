import type { NodeState, NumericKernel, SimulationContext } from "@chargeweave/interface";

/** Pulls every node toward `target` at `rate` per cycle. */
export function createDriftKernel(opts: { target?: number; rate?: number } = {}): NumericKernel {
  const target = opts.target ?? 0.5;
  const rate = opts.rate ?? 0.01;
  if (!Number.isFinite(target)) throw new Error(`target must be finite, got: ${target}`);
  if (!Number.isFinite(rate)) throw new Error(`rate must be finite, got: ${rate}`);

  return (state: NodeState) => {
    const out = new Float64Array(state.length);
    for (let i = 0; i < state.length; i++) out[i] = rate * (target - state[i]);
    return out;
  };
}

/** Zero-mean gaussian jitter drawn from the engine's random source. */
export function createNoiseKernel(opts: { amplitude?: number } = {}): NumericKernel {
  const amplitude = opts.amplitude ?? 0.001;
  if (!Number.isFinite(amplitude) || amplitude < 0) {
    throw new Error(`amplitude must be a finite non-negative number, got: ${amplitude}`);
  }

  return (state: NodeState, ctx: SimulationContext) => {
    const out = new Float64Array(state.length);
    for (let i = 0; i < state.length; i++) out[i] = ctx.rng.normal(0, amplitude);
    return out;
  };
}

/**
 * Couples every node to the population mean, scaled by how far that mean sits from
 * `pivot`; a population above the pivot pushes itself higher.
 */
export function createMeanFieldKernel(opts: { strength?: number; pivot?: number } = {}): NumericKernel {
  const strength = opts.strength ?? 0.01;
  const pivot = opts.pivot ?? 0.5;
  if (!Number.isFinite(strength)) throw new Error(`strength must be finite, got: ${strength}`);
  if (!Number.isFinite(pivot)) throw new Error(`pivot must be finite, got: ${pivot}`);

  return (state: NodeState) => {
    const out = new Float64Array(state.length);
    if (state.length === 0) return out;
    let sum = 0;
    for (let i = 0; i < state.length; i++) sum += state[i];
    const push = strength * (sum / state.length - pivot);
    out.fill(push);
    return out;
  };
}
