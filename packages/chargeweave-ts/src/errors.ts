export type ChargeweaveErrorCode =
  | "IndexOutOfRange"
  | "NumericDivergence"
  | "SnapshotCorrupt"
  | "InvalidState";

export class ChargeweaveError extends Error {
  readonly code: ChargeweaveErrorCode;

  constructor(code: ChargeweaveErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Programmer error: an index outside the current bounds. */
export class IndexOutOfRangeError extends ChargeweaveError {
  readonly index: number;
  readonly size: number;

  constructor(index: number, size: number) {
    super("IndexOutOfRange", `index ${index} out of range [0, ${size})`);
    this.index = index;
    this.size = size;
  }
}

/** A kernel or backend produced a wrong-length or non-finite vector. The engine halts. */
export class NumericDivergenceError extends ChargeweaveError {
  readonly source: string;

  constructor(source: string, message: string) {
    super("NumericDivergence", `${source}: ${message}`);
    this.source = source;
  }
}

/** Snapshot bytes could not be decoded into a complete engine state. */
export class SnapshotCorruptError extends ChargeweaveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SnapshotCorrupt", message, options);
  }
}

/** Operation attempted in the wrong state machine state, e.g. `step()` while halted. */
export class InvalidStateError extends ChargeweaveError {
  constructor(message: string) {
    super("InvalidState", message);
  }
}

export function isChargeweaveError(err: unknown, code?: ChargeweaveErrorCode): err is ChargeweaveError {
  if (!(err instanceof ChargeweaveError)) return false;
  return code === undefined || err.code === code;
}
