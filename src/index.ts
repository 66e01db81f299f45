export { ClosedLogError, RunlogError, type RunlogErrorCode } from './errors.js';
export { getRevisionInfo, type RevisionInfo } from './git.js';
export {
  collectMetadata,
  collectSchedulerInfo,
  type MetadataSources,
  type RunMetadata,
  type SchedulerInfo,
} from './metadata.js';
export {
  LATEST_ALIAS,
  ensureLatestAlias,
  resolveRunDirectory,
  runPaths,
  type RunDirectoryOptions,
  type RunPaths,
} from './run-directory.js';
export {
  TICK_COLUMN,
  TIME_COLUMN,
  TabularLogAppender,
  type AppendOptions,
  type AppenderState,
  type LogOrigin,
  type LogRecord,
  type LogRow,
  type LogValue,
  type TabularLogOptions,
} from './tabular-log.js';
export { RunRecorder, makeRunId, type RunRecorderOptions } from './recorder.js';
export { recordCommand, parseRowLine, type ExecSummary } from './exec.js';
export { summarizeRun, type RunSummary } from './inspect.js';
export {
  LogLevel,
  Logger,
  consoleSink,
  createLogger,
  fileSink,
  type LogSink,
  type LoggerOptions,
} from './util/logger.js';
export type { JsonObject, JsonValue } from './util/json.js';
