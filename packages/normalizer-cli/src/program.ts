import { once } from 'node:events';
import { createReadStream, createWriteStream } from 'node:fs';
import type { Readable, Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import { Command, Option } from 'commander';
import { LOG_LEVELS, createLogger, type DestinationStream, type EnvSource } from '@csv-normalizer/shared';
import { RowPipeline, TimestampNormalizer, runPipeline, type PipelineSummary } from '@csv-normalizer/core';
import { loadNormalizerConfig } from './config';

type CliOptions = {
  input?: string;
  output?: string;
  logLevel?: string;
};

export type CliDependencies = {
  stdin?: Readable;
  stdout?: Writable;
  env?: EnvSource;
  /** Destination for log entries and dropped-row diagnostics. Defaults to stderr. */
  logDestination?: DestinationStream;
  onSummary?: (summary: PipelineSummary) => void;
};

/** Resolves once the file is open; rejects when it cannot be read. */
async function openInput(path: string): Promise<Readable> {
  const stream = createReadStream(path);
  await once(stream, 'open');
  return stream;
}

async function closeOutput(output: Writable): Promise<void> {
  output.end();
  await finished(output);
}

async function handleNormalize(options: CliOptions, deps: CliDependencies): Promise<void> {
  const env: EnvSource = { ...(deps.env ?? process.env) };
  if (options.logLevel) {
    env.CSV_NORMALIZER_LOG_LEVEL = options.logLevel;
  }
  const config = loadNormalizerConfig(env);
  const logger = createLogger({ level: config.logLevel, name: 'csv-normalize', destination: deps.logDestination });

  const input = options.input ? await openInput(options.input) : deps.stdin ?? process.stdin;
  const output = options.output ? createWriteStream(options.output) : deps.stdout ?? process.stdout;

  const pipeline = new RowPipeline({
    timestampNormalizer: new TimestampNormalizer({
      sourceTimeZone: config.sourceTimeZone,
      targetTimeZone: config.targetTimeZone
    })
  });

  logger.debug(
    { input: options.input ?? '<stdin>', output: options.output ?? '<stdout>', ...config },
    'Starting normalization'
  );
  let summary: PipelineSummary;
  try {
    summary = await runPipeline({ input, output, logger, pipeline });
  } finally {
    if (options.output) {
      await closeOutput(output);
    }
  }
  deps.onSummary?.(summary);
}

export function createInterface(deps: CliDependencies = {}): Command {
  const program = new Command();
  program
    .name('csv-normalize')
    .description('Normalize timestamped event records read as comma-delimited text')
    .option('--input <path>', 'Read records from a file instead of stdin')
    .option('--output <path>', 'Write normalized records to a file instead of stdout')
    .addOption(
      new Option('--log-level <level>', 'Log level (overrides CSV_NORMALIZER_LOG_LEVEL)').choices(LOG_LEVELS)
    )
    .action(async () => {
      await handleNormalize(program.opts<CliOptions>(), deps);
    });
  return program;
}
