export {
  EnvConfigError,
  enumVar,
  isKnownTimeZone,
  loadEnvConfig,
  timeZoneVar,
  type EnumVarOptions,
  type EnvSource,
  type LoadEnvConfigOptions,
  type TimeZoneVarOptions
} from './envConfig';
export {
  LOG_LEVELS,
  createLogger,
  createLoggerOptions,
  type CreateLoggerOptions,
  type DestinationStream,
  type LogLevel,
  type Logger
} from './logger';
