export {
  DEFAULT_SNAPSHOT_TOLERANCE,
  SNAPSHOT_TAG,
  SNAPSHOT_VERSION,
  createSnapshotCodec,
  decodeSnapshot,
  encodeSnapshot,
  encodeSnapshotReport,
  type SnapshotEncodeOptions,
  type SnapshotReport,
} from "./codec.js";
