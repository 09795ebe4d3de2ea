export * from './shared/types';
export { ConfigError } from './shared/errors';
export {
  TimeFormat,
  DEFAULT_FORMAT_SPEC,
  bucketFor,
  visibleFields,
  buildPattern,
  computePattern,
  resolvePattern,
} from './format/TimeFormat';
export type { PatternResolution } from './format/TimeFormat';
export {
  NO_DURATION,
  formatDuration,
  formatDurationOpt,
  formatSigned,
  formatDelta,
  splitReadout,
} from './format/duration';
export {
  classifySplit,
  hasRecordedBest,
  splitClassStyle,
  SPLIT_CLASS_STYLES,
  CURRENT_SEGMENT_STYLE,
} from './splits/classify';
export type { SplitClassInput } from './splits/classify';
export * from './splits/timing';
export { computeSplitRows } from './splits/rows';
export { timerReadout, selectedSegmentInfo, previousSegmentDiff, previousSegmentBest } from './splits/info';
export type { RenderContext } from './splits/context';
export { ConfigSchema, parseConfig, loadConfig, defaultConfig, createFormats } from './config/config';
export type { DisplayFormats } from './config/config';
export { SplitsPresenter, REFRESH_INTERVAL_MS } from './state/SplitsPresenter';
export type { RunSource } from './state/SplitsPresenter';
export { createLogger, logger } from './utils/logger';
