import { z } from 'zod';
import {
  LOG_LEVELS,
  enumVar,
  loadEnvConfig,
  timeZoneVar,
  type EnvSource,
  type LogLevel
} from '@csv-normalizer/shared';
import { DEFAULT_SOURCE_TIME_ZONE, DEFAULT_TARGET_TIME_ZONE } from '@csv-normalizer/core';

export type NormalizerConfig = {
  logLevel: LogLevel;
  sourceTimeZone: string;
  targetTimeZone: string;
};

const normalizerEnvSchema = z
  .object({
    CSV_NORMALIZER_LOG_LEVEL: enumVar<LogLevel>({ values: LOG_LEVELS, defaultValue: 'info', description: 'log level' }),
    CSV_NORMALIZER_SOURCE_TIME_ZONE: timeZoneVar({
      defaultValue: DEFAULT_SOURCE_TIME_ZONE,
      description: 'source time zone'
    }),
    CSV_NORMALIZER_TARGET_TIME_ZONE: timeZoneVar({
      defaultValue: DEFAULT_TARGET_TIME_ZONE,
      description: 'target time zone'
    })
  })
  .passthrough();

export function loadNormalizerConfig(env?: EnvSource): NormalizerConfig {
  const parsed = loadEnvConfig(normalizerEnvSchema, { env, context: 'csv-normalize' });
  return {
    logLevel: parsed.CSV_NORMALIZER_LOG_LEVEL,
    sourceTimeZone: parsed.CSV_NORMALIZER_SOURCE_TIME_ZONE,
    targetTimeZone: parsed.CSV_NORMALIZER_TARGET_TIME_ZONE
  };
}
