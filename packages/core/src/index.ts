export type { ClassifiedSegment, Classifier } from "./classifier.js";
export { categoryForToken, TokenClassifier } from "./classifier.js";
export type { Color, NoColor, RgbColor } from "./color.js";
export {
  blendColors,
  hexColor,
  isHexColor,
  isVisible,
  noColor,
  overrideColor,
  sameColor,
} from "./color.js";
export type {
  Config,
  ConfigInput,
  ConfigResolution,
  ConfigSource,
  ConfigSources,
  DiffConfig,
  PrinterConfig,
  TelemetryConfig,
} from "./config.js";
export {
  ConfigInputSchema,
  ConfigSchema,
  ConfigValidationError,
  decodeConfigInput,
  decodeConfigInputJson,
  defaultConfig,
  defaultSources,
  mergeConfig,
} from "./config.js";
export type { ResolveConfigOptions, ResolvedConfig } from "./config-resolve.js";
export {
  PROJECT_CONFIG_FILE,
  readEnvConfig,
  resolveConfig,
} from "./config-resolve.js";
export type { DiffEvent, DiffHunk, DiffMode, DiffView } from "./diff.js";
export {
  diffLines,
  diffRevisions,
  fullDiff,
  summaryDiff,
} from "./diff.js";
export {
  InvalidSpanError,
  SegmentOverlapError,
  StyleStringError,
  ThemeDecodeError,
} from "./errors.js";
export type { FinderOptions } from "./finder.js";
export { Finder } from "./finder.js";
export type { Logger, LogLevel, LogSink } from "./logger.js";
export { logger, setLoggerSink } from "./logger.js";
export type {
  NormalizerFolds,
  NormalizerOptions,
  UnicodeTransformer,
} from "./normalizer.js";
export {
  defaultNormalizer,
  defaultNormalizerFolds,
  Normalizer,
  NormalizerFoldsSchema,
} from "./normalizer.js";
export type { Position } from "./position.js";
export {
  comparePositions,
  compareSpans,
  position,
  Span,
  unionAdjacentOrOverlapping,
  uniqueSpans,
} from "./position.js";
export { Revision } from "./revision.js";
export type {
  Annotation,
  LineFlag,
  LineInit,
  LineMeta,
  Overlay,
  SourceOptions,
} from "./source.js";
export { relocateSegment, Source } from "./source.js";
export type { StyleProps, TextTransform } from "./style.js";
export { Style } from "./style.js";
export type { StyleCategory } from "./style-category.js";
export {
  categoryLineage,
  isStyleCategory,
  parentCategory,
  styleCategories,
  styleParents,
} from "./style-category.js";
export { StyleComposer } from "./style-composer.js";
export { encodeStyle, parseStyle } from "./style-string.js";
export type { StyleOverrides } from "./styles.js";
export { Styles } from "./styles.js";
export type {
  OtlpSignal,
  RenderMeasure,
  RenderOperation,
  TelemetryAttributes,
  TelemetryOptions,
  TelemetryRecord,
  TelemetryService,
} from "./telemetry.js";
export {
  consoleLine,
  metricName,
  otlpRequest,
  signalEndpoint,
  spanName,
  Telemetry,
  TelemetryLive,
} from "./telemetry.js";
export type {
  Token,
  TokenIndicator,
  TokenKind,
  Tokenizer,
  TokenPosition,
} from "./token.js";
export { isKeyCandidate } from "./token.js";
