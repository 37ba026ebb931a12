import type { LedgerState } from "@chargeweave/interface";

function assertNonNegativeFinite(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${name} must be a finite non-negative number, got: ${value}`);
  }
}

/**
 * Depleting energy budget. Overdrawing it is a hard cap: the ledger reports exhaustion
 * until an explicit `replenish` brings it back to zero or above, or `reset` runs.
 */
export class EnergyLedger {
  readonly initial: number;
  private budget: number;
  private overdraft = 0;
  private exhausted = false;

  constructor(initial: number) {
    assertNonNegativeFinite("initial budget", initial);
    this.initial = initial;
    this.budget = initial;
  }

  static fromState(state: LedgerState): EnergyLedger {
    const ledger = new EnergyLedger(state.initial);
    ledger.restore(state);
    return ledger;
  }

  get value(): number {
    return this.budget;
  }

  get leakage(): number {
    return this.overdraft;
  }

  charge(amount: number): void {
    assertNonNegativeFinite("charge amount", amount);
    this.budget -= amount;
    if (this.budget < 0) {
      this.overdraft = Math.abs(this.budget);
      this.exhausted = true;
    }
  }

  isExhausted(): boolean {
    return this.exhausted;
  }

  replenish(amount: number): void {
    assertNonNegativeFinite("replenish amount", amount);
    this.budget += amount;
    if (this.budget >= 0) {
      this.exhausted = false;
      this.overdraft = 0;
    } else {
      this.overdraft = Math.abs(this.budget);
    }
  }

  reset(): void {
    this.budget = this.initial;
    this.overdraft = 0;
    this.exhausted = false;
  }

  toState(): LedgerState {
    return {
      initial: this.initial,
      budget: this.budget,
      leakage: this.overdraft,
      exhausted: this.exhausted,
    };
  }

  private restore(state: LedgerState): void {
    if (!Number.isFinite(state.budget)) throw new RangeError(`budget must be finite, got: ${state.budget}`);
    assertNonNegativeFinite("leakage", state.leakage);
    if (state.exhausted !== state.budget < 0) {
      throw new RangeError(`exhausted flag (${state.exhausted}) disagrees with budget ${state.budget}`);
    }
    this.budget = state.budget;
    this.overdraft = state.leakage;
    this.exhausted = state.exhausted;
  }
}
