export { CsvRecordSplitter, readRecords } from './csvRecordSplitter';
export { Duration } from './duration';
export { REPLACEMENT_CHARACTER, describeRawField, repairUtf8, sanitizeField, sanitizeRecord } from './encoding';
export { DurationParseError, RecordNormalizationError, RecordShapeError, TimestampParseError } from './errors';
export {
  POSTAL_CODE_WIDTH,
  maybeQuote,
  normalizeFields,
  padPostalCode,
  serializeHeader,
  serializeRecord,
  toUpperCaseSimple,
  type FormatterDependencies
} from './formatter';
export {
  RowPipeline,
  runPipeline,
  type PipelineSummary,
  type RowOutcome,
  type RowPipelineOptions,
  type RunPipelineOptions
} from './pipeline';
export {
  FIELD_DELIMITER,
  HEADER_LITERAL,
  QUOTE_CHARACTER,
  RECORD_COLUMNS,
  toSanitizedFields,
  type NormalizedRecord,
  type RawRecord,
  type RecordColumn,
  type SanitizedFields,
  type SanitizedRecord
} from './record';
export {
  DEFAULT_SOURCE_TIME_ZONE,
  DEFAULT_TARGET_TIME_ZONE,
  TimestampNormalizer,
  formatInstant,
  parseSourceTimestamp,
  resolveWallClock,
  type TimestampNormalizerOptions,
  type WallClockTime
} from './timestamp';
export { IntlZoneRules, intlZoneRules, type ZoneRules } from './zoneRules';
