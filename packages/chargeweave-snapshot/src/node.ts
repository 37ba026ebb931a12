import fs from "node:fs/promises";
import path from "node:path";

import { SnapshotCorruptError, type EngineState } from "@chargeweave/interface";

import { decodeSnapshot, encodeSnapshotReport, type SnapshotEncodeOptions, type SnapshotReport } from "./codec.js";

/**
 * Writes a snapshot next to `filePath` and renames it into place, so readers never see a
 * half-written file.
 */
export async function saveSnapshotFile(
  filePath: string,
  state: EngineState,
  opts: SnapshotEncodeOptions = {},
): Promise<SnapshotReport> {
  const report = encodeSnapshotReport(state, opts);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmp, report.bytes);
  await fs.rename(tmp, filePath);
  return report;
}

export async function loadSnapshotFile(filePath: string): Promise<EngineState> {
  let bytes: Uint8Array;
  try {
    bytes = new Uint8Array(await fs.readFile(filePath));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SnapshotCorruptError(`cannot read snapshot ${filePath}: ${reason}`, { cause: err });
  }
  return decodeSnapshot(bytes);
}
