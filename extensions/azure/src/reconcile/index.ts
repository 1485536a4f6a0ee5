export { ReconcilingBuilder, type FieldDiffer, type ReconcilingBuilderOptions } from "./builder.js";
export { RemoteEntity } from "./entity.js";
export { pollUntil, MIN_POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS } from "./poller.js";
export {
  diffText,
  diffValue,
  diffRecord,
  diffUnit,
  recordsEqual,
  isBlank,
  changed,
  UNSPECIFIED,
  UNCHANGED,
} from "./differ.js";
export type {
  BuilderPhase,
  FieldDiff,
  Patch,
  PollOptions,
  PollResult,
  RemoteResourceClient,
  RemoteSnapshot,
  WriteMode,
} from "./types.js";
