import type { NodeState } from "@chargeweave/interface";

export type TrendMetric = {
  name: string;
  measure: (state: NodeState) => number;
};

export const meanMetric: TrendMetric = {
  name: "mean",
  measure: (state) => {
    if (state.length === 0) return 0;
    let sum = 0;
    for (let i = 0; i < state.length; i++) sum += state[i];
    return sum / state.length;
  },
};

export const dispersionMetric: TrendMetric = {
  name: "dispersion",
  measure: (state) => {
    if (state.length === 0) return 0;
    const mean = meanMetric.measure(state);
    let acc = 0;
    for (let i = 0; i < state.length; i++) acc += (state[i] - mean) ** 2;
    return Math.sqrt(acc / state.length);
  },
};

export const DEFAULT_TREND_METRICS: readonly TrendMetric[] = [meanMetric, dispersionMetric];

/** Keeps the most recent `capacity` values, oldest first. */
export class BoundedHistory<T> {
  private items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new Error(`capacity must be a positive safe integer, got: ${capacity}`);
    }
  }

  get length(): number {
    return this.items.length;
  }

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) this.items.splice(0, this.items.length - this.capacity);
  }

  replace(items: readonly T[]): void {
    this.items = items.slice(Math.max(0, items.length - this.capacity));
  }

  values(): T[] {
    return this.items.slice();
  }

  clear(): void {
    this.items = [];
  }
}
