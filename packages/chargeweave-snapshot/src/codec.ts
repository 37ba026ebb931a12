import { deflateSync, inflateSync } from "node:zlib";

import { sha256 } from "@noble/hashes/sha256";

import { ChargeUnionFind, EnergyLedger, dct2, idct2 } from "@chargeweave/core";
import { SnapshotCorruptError, type EngineState, type WireCodec } from "@chargeweave/interface";

import {
  assertBoolean,
  assertBytes,
  assertFiniteNumber,
  assertIndexArray,
  assertMap,
  assertNumberArray,
  assertSafeInteger,
  assertSafeNonNegativeInteger,
  assertString,
  bytesEqual,
  decodeCbor,
  encodeCbor,
  mapGet,
} from "./internal/util.js";

export const SNAPSHOT_VERSION = 1;
export const SNAPSHOT_TAG = "chargeweave/snapshot/v1";

/** Default bound on the largest absolute error of any restored node value. */
export const DEFAULT_SNAPSHOT_TOLERANCE = 1e-2;

const UINT32_RANGE = 4294967296;

export type SnapshotEncodeOptions = {
  tolerance?: number;
  /**
   * Hard cap on stored coefficients. When it binds, `errorBound` may exceed `tolerance`.
   */
  maxCoefficients?: number;
};

export type SnapshotReport = {
  bytes: Uint8Array;
  keptCoefficients: number;
  /** Upper bound on `max |x - x̂|` over all node values. */
  errorBound: number;
};

type CompressedNodes = {
  coefficients: number[];
  errorBound: number;
};

/**
 * Orthonormal DCT of the node vector, float32-rounded, with the longest tail dropped whose
 * removal keeps the L2 reconstruction error within `tolerance`. By Parseval that L2 error
 * equals `sqrt(Σ dropped² + Σ rounding²)` and bounds the max-abs error.
 */
function compressNodes(nodes: ArrayLike<number>, tolerance: number, maxCoefficients: number): CompressedNodes {
  const n = nodes.length;
  const exact = dct2(nodes);
  let stored = exact.map((c) => Math.fround(c));

  const roundingSq = (upTo: Float64Array) => {
    const prefix = new Float64Array(n + 1);
    for (let k = 0; k < n; k++) prefix[k + 1] = prefix[k] + (exact[k] - upTo[k]) ** 2;
    return prefix;
  };
  let headSq = roundingSq(stored);
  // Rounding alone can exceed very small tolerances; keep full precision then.
  if (Math.sqrt(headSq[n]) > tolerance) {
    stored = Float64Array.from(exact);
    headSq = new Float64Array(n + 1);
  }

  const tailSq = new Float64Array(n + 1);
  for (let k = n - 1; k >= 0; k--) tailSq[k] = tailSq[k + 1] + exact[k] * exact[k];

  const errorAt = (kept: number) => Math.sqrt(tailSq[kept] + headSq[kept]);

  let kept = n;
  while (kept > 0 && errorAt(kept - 1) <= tolerance) kept -= 1;
  kept = Math.min(kept, maxCoefficients);

  return { coefficients: Array.from(stored.subarray(0, kept)), errorBound: errorAt(kept) };
}

function restoreNodes(length: number, coefficients: number[]): Float64Array {
  const out = idct2(coefficients, length);
  for (let i = 0; i < length; i++) out[i] = Math.min(1, Math.max(0, out[i]));
  return out;
}

export function encodeSnapshotReport(state: EngineState, opts: SnapshotEncodeOptions = {}): SnapshotReport {
  const tolerance = opts.tolerance ?? DEFAULT_SNAPSHOT_TOLERANCE;
  if (!Number.isFinite(tolerance) || tolerance < 0) {
    throw new Error(`tolerance must be a finite non-negative number, got: ${tolerance}`);
  }
  const maxCoefficients = opts.maxCoefficients ?? state.nodes.length;
  if (!Number.isSafeInteger(maxCoefficients) || maxCoefficients < 0) {
    throw new Error(`maxCoefficients must be a safe non-negative integer, got: ${maxCoefficients}`);
  }

  const { coefficients, errorBound } = compressNodes(state.nodes, tolerance, maxCoefficients);
  const body = encodeCbor({
    v: SNAPSHOT_VERSION,
    t: SNAPSHOT_TAG,
    seed: state.seed,
    nodeCount: state.nodeCount,
    cycle: state.cycle,
    halted: state.halted,
    rng: state.rngState,
    ledger: {
      initial: state.ledger.initial,
      budget: state.ledger.budget,
      leakage: state.ledger.leakage,
      exhausted: state.ledger.exhausted,
    },
    uf: {
      parent: Array.from(state.unionFind.parent),
      a: Uint8Array.from(state.unionFind.chargeA),
      b: Uint8Array.from(state.unionFind.chargeB),
    },
    nodes: { length: state.nodes.length, coefficients },
    trends: state.trends,
  });
  const envelope = encodeCbor({ v: SNAPSHOT_VERSION, digest: sha256(body), body });

  return {
    bytes: new Uint8Array(deflateSync(envelope)),
    keptCoefficients: coefficients.length,
    errorBound,
  };
}

export function encodeSnapshot(state: EngineState, opts: SnapshotEncodeOptions = {}): Uint8Array {
  return encodeSnapshotReport(state, opts).bytes;
}

function decodeBody(body: Uint8Array): EngineState {
  const map = assertMap(decodeCbor(body), "SnapshotBody");
  const v = mapGet(map, "v");
  if (v !== SNAPSHOT_VERSION) throw new Error(`SnapshotBody.v: expected ${SNAPSHOT_VERSION}, got ${String(v)}`);
  const tag = assertString(mapGet(map, "t"), "SnapshotBody.t");
  if (tag !== SNAPSHOT_TAG) throw new Error(`SnapshotBody.t: unexpected tag ${tag}`);

  const seed = assertSafeInteger(mapGet(map, "seed"), "SnapshotBody.seed");
  const nodeCount = assertSafeNonNegativeInteger(mapGet(map, "nodeCount"), "SnapshotBody.nodeCount");
  if (nodeCount === 0) throw new Error("SnapshotBody.nodeCount must be positive");
  const cycle = assertSafeNonNegativeInteger(mapGet(map, "cycle"), "SnapshotBody.cycle");
  const halted = assertBoolean(mapGet(map, "halted"), "SnapshotBody.halted");
  const rngState = assertSafeNonNegativeInteger(mapGet(map, "rng"), "SnapshotBody.rng");
  if (rngState >= UINT32_RANGE) throw new Error(`SnapshotBody.rng must be a uint32, got: ${rngState}`);

  const ledgerMap = assertMap(mapGet(map, "ledger"), "SnapshotBody.ledger");
  const ledger = EnergyLedger.fromState({
    initial: assertFiniteNumber(mapGet(ledgerMap, "initial"), "ledger.initial"),
    budget: assertFiniteNumber(mapGet(ledgerMap, "budget"), "ledger.budget"),
    leakage: assertFiniteNumber(mapGet(ledgerMap, "leakage"), "ledger.leakage"),
    exhausted: assertBoolean(mapGet(ledgerMap, "exhausted"), "ledger.exhausted"),
  }).toState();

  const ufMap = assertMap(mapGet(map, "uf"), "SnapshotBody.uf");
  const parent = assertIndexArray(mapGet(ufMap, "parent"), nodeCount, "uf.parent");
  if (parent.length !== nodeCount) throw new Error(`uf.parent: expected ${nodeCount} entries, got ${parent.length}`);
  const unionFind = ChargeUnionFind.fromState({
    parent: Int32Array.from(parent),
    chargeA: assertBytes(mapGet(ufMap, "a"), "uf.a"),
    chargeB: assertBytes(mapGet(ufMap, "b"), "uf.b"),
  }).toState();

  const nodesMap = assertMap(mapGet(map, "nodes"), "SnapshotBody.nodes");
  const length = assertSafeNonNegativeInteger(mapGet(nodesMap, "length"), "nodes.length");
  if (length !== nodeCount) throw new Error(`nodes.length: expected ${nodeCount}, got ${length}`);
  const coefficients = assertNumberArray(mapGet(nodesMap, "coefficients"), "nodes.coefficients");
  if (coefficients.length > length) {
    throw new Error(`nodes.coefficients: ${coefficients.length} coefficients for ${length} nodes`);
  }

  const trendsMap = assertMap(mapGet(map, "trends"), "SnapshotBody.trends");
  const trends: Record<string, number[]> = {};
  for (const [name, values] of trendsMap) {
    const key = assertString(name, "trends key");
    trends[key] = assertNumberArray(values, `trends.${key}`);
  }

  return {
    seed,
    nodeCount,
    cycle,
    halted,
    rngState,
    ledger,
    unionFind,
    nodes: restoreNodes(length, coefficients),
    trends,
  };
}

/**
 * Decodes a snapshot produced by `encodeSnapshot`. Any malformed, truncated or tampered
 * input throws `SnapshotCorruptError`; no partial state is ever returned.
 */
export function decodeSnapshot(bytes: Uint8Array): EngineState {
  let envelope: Map<unknown, unknown>;
  try {
    envelope = assertMap(decodeCbor(inflateSync(bytes)), "SnapshotEnvelope");
  } catch (err) {
    throw new SnapshotCorruptError(`unreadable snapshot container: ${describe(err)}`, { cause: err });
  }

  const v = mapGet(envelope, "v");
  if (v !== SNAPSHOT_VERSION) {
    throw new SnapshotCorruptError(`unsupported snapshot version: ${String(v)}`);
  }
  let body: Uint8Array;
  let digest: Uint8Array;
  try {
    body = assertBytes(mapGet(envelope, "body"), "SnapshotEnvelope.body");
    digest = assertBytes(mapGet(envelope, "digest"), "SnapshotEnvelope.digest");
  } catch (err) {
    throw new SnapshotCorruptError(describe(err), { cause: err });
  }
  if (!bytesEqual(sha256(body), digest)) throw new SnapshotCorruptError("snapshot digest mismatch");

  try {
    return decodeBody(body);
  } catch (err) {
    throw new SnapshotCorruptError(`invalid snapshot body: ${describe(err)}`, { cause: err });
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createSnapshotCodec(opts: SnapshotEncodeOptions = {}): WireCodec<EngineState, Uint8Array> {
  return {
    encode: (state) => encodeSnapshot(state, opts),
    decode: (bytes) => decodeSnapshot(bytes),
  };
}
