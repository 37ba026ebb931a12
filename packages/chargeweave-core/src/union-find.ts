import { IndexOutOfRangeError, type RandomSource, type UnionFindState } from "@chargeweave/interface";

const CHARGE_A_MODULUS = 2;
const CHARGE_B_MODULUS = 4;

export type Charges = {
  a: number;
  b: number;
};

function modulo(value: number, modulus: number): number {
  if (!Number.isInteger(value)) throw new Error(`charge must be an integer, got: ${value}`);
  return ((value % modulus) + modulus) % modulus;
}

/**
 * Disjoint-set forest over node indices where every root carries a Z2 charge (A) and a
 * Z4 charge (B).
 *
 * On merge the surviving root folds in the losing root's charges; charge is never lost or
 * duplicated, so the modular sum over all roots is invariant under `union`.
 */
export class ChargeUnionFind {
  private parent: Int32Array;
  private chargeA: Uint8Array;
  private chargeB: Uint8Array;
  private count = 0;
  private readonly rng: RandomSource | undefined;

  /**
   * @param size - initial number of singleton sets
   * @param rng - when given, initial and appended charges are sampled from it; otherwise 0
   */
  constructor(size = 0, rng?: RandomSource) {
    if (!Number.isSafeInteger(size) || size < 0) {
      throw new Error(`size must be a safe non-negative integer, got: ${size}`);
    }
    this.rng = rng;
    const capacity = Math.max(size, 8);
    this.parent = new Int32Array(capacity);
    this.chargeA = new Uint8Array(capacity);
    this.chargeB = new Uint8Array(capacity);
    for (let i = 0; i < size; i++) this.addNode();
  }

  static fromState(state: UnionFindState): ChargeUnionFind {
    const size = state.parent.length;
    if (state.chargeA.length !== size || state.chargeB.length !== size) {
      throw new Error(
        `union-find arrays must share one length (parent=${size}, chargeA=${state.chargeA.length}, chargeB=${state.chargeB.length})`,
      );
    }
    const uf = new ChargeUnionFind(0);
    uf.ensureCapacity(size);
    for (let i = 0; i < size; i++) {
      const p = state.parent[i];
      if (!Number.isInteger(p) || p < 0 || p >= size) {
        throw new Error(`parent[${i}] out of range: ${p}`);
      }
      const a = state.chargeA[i];
      const b = state.chargeB[i];
      if (a >= CHARGE_A_MODULUS) throw new Error(`chargeA[${i}] must be < ${CHARGE_A_MODULUS}, got: ${a}`);
      if (b >= CHARGE_B_MODULUS) throw new Error(`chargeB[${i}] must be < ${CHARGE_B_MODULUS}, got: ${b}`);
      uf.parent[i] = p;
      uf.chargeA[i] = a;
      uf.chargeB[i] = b;
    }
    uf.count = size;
    // A parent cycle would make find() spin forever.
    for (let i = 0; i < size; i++) {
      let cur = i;
      for (let steps = 0; uf.parent[cur] !== cur; steps++) {
        if (steps > size) throw new Error(`parent chain from ${i} does not reach a root`);
        cur = uf.parent[cur];
      }
    }
    return uf;
  }

  get size(): number {
    return this.count;
  }

  find(i: number): number {
    this.assertIndex(i);
    const parent = this.parent;
    let root = i;
    while (parent[root] !== root) root = parent[root];
    let cur = i;
    while (parent[cur] !== root) {
      const next = parent[cur];
      parent[cur] = root;
      cur = next;
    }
    return root;
  }

  union(i: number, j: number): boolean {
    const rootI = this.find(i);
    const rootJ = this.find(j);
    if (rootI === rootJ) return false;
    this.parent[rootJ] = rootI;
    this.chargeA[rootI] = (this.chargeA[rootI] + this.chargeA[rootJ]) % CHARGE_A_MODULUS;
    this.chargeB[rootI] = (this.chargeB[rootI] + this.chargeB[rootJ]) % CHARGE_B_MODULUS;
    return true;
  }

  connected(i: number, j: number): boolean {
    return this.find(i) === this.find(j);
  }

  /**
   * Appends a singleton set and returns its index. Omitted charges are sampled from the
   * constructor's random source (or 0 without one).
   */
  addNode(chargeA?: number, chargeB?: number): number {
    const a = chargeA ?? (this.rng ? this.rng.int(CHARGE_A_MODULUS) : 0);
    const b = chargeB ?? (this.rng ? this.rng.int(CHARGE_B_MODULUS) : 0);
    this.ensureCapacity(this.count + 1);
    const idx = this.count;
    this.parent[idx] = idx;
    this.chargeA[idx] = modulo(a, CHARGE_A_MODULUS);
    this.chargeB[idx] = modulo(b, CHARGE_B_MODULUS);
    this.count += 1;
    return idx;
  }

  /** Charges held by the representative of `i`'s set. */
  charges(i: number): Charges {
    const root = this.find(i);
    return { a: this.chargeA[root], b: this.chargeB[root] };
  }

  roots(): number[] {
    const out: number[] = [];
    for (let i = 0; i < this.count; i++) {
      if (this.parent[i] === i) out.push(i);
    }
    return out;
  }

  componentCount(): number {
    let n = 0;
    for (let i = 0; i < this.count; i++) {
      if (this.parent[i] === i) n += 1;
    }
    return n;
  }

  /** Modular sum of charges across all current representatives. */
  totalCharges(): Charges {
    let a = 0;
    let b = 0;
    for (let i = 0; i < this.count; i++) {
      if (this.parent[i] !== i) continue;
      a = (a + this.chargeA[i]) % CHARGE_A_MODULUS;
      b = (b + this.chargeB[i]) % CHARGE_B_MODULUS;
    }
    return { a, b };
  }

  toState(): UnionFindState {
    return {
      parent: this.parent.slice(0, this.count),
      chargeA: this.chargeA.slice(0, this.count),
      chargeB: this.chargeB.slice(0, this.count),
    };
  }

  private assertIndex(i: number): void {
    if (!Number.isInteger(i) || i < 0 || i >= this.count) {
      throw new IndexOutOfRangeError(i, this.count);
    }
  }

  private ensureCapacity(needed: number): void {
    if (needed <= this.parent.length) return;
    let capacity = this.parent.length;
    while (capacity < needed) capacity *= 2;
    const parent = new Int32Array(capacity);
    const chargeA = new Uint8Array(capacity);
    const chargeB = new Uint8Array(capacity);
    parent.set(this.parent.subarray(0, this.count));
    chargeA.set(this.chargeA.subarray(0, this.count));
    chargeB.set(this.chargeB.subarray(0, this.count));
    this.parent = parent;
    this.chargeA = chargeA;
    this.chargeB = chargeB;
  }
}
