import { decode as cborDecode, encode as cborEncode, rfc8949EncodeOptions } from "cborg";

export function encodeCbor(value: unknown): Uint8Array {
  return cborEncode(value, rfc8949EncodeOptions);
}

export function decodeCbor(bytes: Uint8Array): unknown {
  return cborDecode(bytes, { useMaps: true });
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
  return true;
}

export function assertBytes(val: unknown, field: string): Uint8Array {
  if (!(val instanceof Uint8Array)) throw new Error(`${field} must be bytes`);
  return val;
}

export function assertString(val: unknown, field: string): string {
  if (typeof val !== "string") throw new Error(`${field} must be a string`);
  return val;
}

export function assertBoolean(val: unknown, field: string): boolean {
  if (typeof val !== "boolean") throw new Error(`${field} must be a boolean`);
  return val;
}

export function assertFiniteNumber(val: unknown, field: string): number {
  if (typeof val !== "number" || !Number.isFinite(val)) throw new Error(`${field} must be a finite number`);
  return val;
}

export function assertSafeInteger(val: unknown, field: string): number {
  if (typeof val !== "number" || !Number.isSafeInteger(val)) throw new Error(`${field} must be a safe integer`);
  return val;
}

export function assertSafeNonNegativeInteger(val: unknown, field: string): number {
  const n = assertSafeInteger(val, field);
  if (n < 0) throw new Error(`${field} must be non-negative`);
  return n;
}

export function assertArray(val: unknown, field: string): unknown[] {
  if (!Array.isArray(val)) throw new Error(`${field} must be an array`);
  return val;
}

/** Array of integers in `[0, bound)`. */
export function assertIndexArray(val: unknown, bound: number, field: string): number[] {
  return assertArray(val, field).map((item, i) => {
    const n = assertSafeNonNegativeInteger(item, `${field}[${i}]`);
    if (n >= bound) throw new Error(`${field}[${i}] must be < ${bound}, got: ${n}`);
    return n;
  });
}

export function assertNumberArray(val: unknown, field: string): number[] {
  return assertArray(val, field).map((item, i) => assertFiniteNumber(item, `${field}[${i}]`));
}

export function assertMap(val: unknown, ctx: string): Map<unknown, unknown> {
  if (!(val instanceof Map)) throw new Error(`${ctx} must be a CBOR map`);
  return val;
}

export function mapGet(map: Map<unknown, unknown>, key: unknown): unknown {
  return map.has(key) ? map.get(key) : undefined;
}
