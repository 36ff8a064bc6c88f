export * from "./types";
export { DEFAULT_CONFIG, SyncConfigSchema, resolveConfig, type SyncConfig } from "./config";
export { createConsoleLogger, silentLogger, type Logger } from "./log";
export { BaselineError, SinkError } from "./errors";
export { decodeEntities, escapeEntities } from "./entities";
export {
  EMPTY_BASELINE,
  baselineFromText,
  baselineText,
  baselineToMarkup,
  createBaseline,
  isPositionMap,
  type Baseline,
  type BaselineInput
} from "./baseline";
export { FragmentReassembler, reassemble } from "./reassembler";
export { computeFirstEdit, type FirstEdit } from "./diff";
export { RecordingSink, sinkFromFunctions, type OutputSink } from "./sink";
export { createSessionStore, type SessionState, type SessionStore } from "./state";
export { SyncEngine, describeIssue, type SyncEngineOptions } from "./engine";
