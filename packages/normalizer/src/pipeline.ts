import { once } from 'node:events';
import type { Readable, Writable } from 'node:stream';

import type { Logger } from '@csv-normalizer/shared';

import { readRecords } from './csvRecordSplitter';
import { describeRawField, sanitizeRecord } from './encoding';
import { RecordNormalizationError, RecordShapeError } from './errors';
import { normalizeFields, serializeHeader, serializeRecord } from './formatter';
import { HEADER_LITERAL, RECORD_COLUMNS, toSanitizedFields, type RawRecord } from './record';
import { TimestampNormalizer } from './timestamp';

export type RowOutcome =
  | { kind: 'header'; line: string }
  | { kind: 'record'; line: string }
  | { kind: 'dropped'; error: RecordNormalizationError }
  | { kind: 'blank' };

export type RowPipelineOptions = {
  timestampNormalizer?: TimestampNormalizer;
};

/**
 * Row-at-a-time normalization. The only state carried between rows is
 * whether a header has been seen.
 */
export class RowPipeline {
  private readonly timestampNormalizer: TimestampNormalizer;
  private seenHeader = false;

  constructor(options: RowPipelineOptions = {}) {
    this.timestampNormalizer = options.timestampNormalizer ?? new TimestampNormalizer();
  }

  get headerSeen(): boolean {
    return this.seenHeader;
  }

  process(raw: RawRecord): RowOutcome {
    if (raw.length === 0) {
      return { kind: 'blank' };
    }

    const sanitized = sanitizeRecord(raw);
    if (sanitized[0] === HEADER_LITERAL) {
      this.seenHeader = true;
      return { kind: 'header', line: serializeHeader(sanitized) };
    }

    try {
      if (sanitized.length !== RECORD_COLUMNS.length) {
        throw new RecordShapeError(sanitized.length, RECORD_COLUMNS.length);
      }
      const normalized = normalizeFields(toSanitizedFields(sanitized), {
        timestampNormalizer: this.timestampNormalizer
      });
      return { kind: 'record', line: serializeRecord(normalized) };
    } catch (error) {
      if (error instanceof RecordNormalizationError) {
        return { kind: 'dropped', error };
      }
      throw error;
    }
  }
}

export type PipelineSummary = {
  recordsRead: number;
  rowsWritten: number;
  headersPassed: number;
  rowsDropped: number;
  blankLines: number;
};

export type RunPipelineOptions = {
  input: Readable;
  output: Writable;
  logger: Logger;
  pipeline?: RowPipeline;
};

async function writeLine(output: Writable, line: string): Promise<void> {
  if (output.destroyed) {
    throw output.errored ?? new Error('Output stream closed before input was exhausted');
  }
  if (!output.write(`${line}\n`)) {
    await once(output, 'drain');
  }
}

function describeRawRecord(raw: RawRecord): string[] {
  return raw.map((field) => describeRawField(field));
}

function emptySummary(): PipelineSummary {
  return { recordsRead: 0, rowsWritten: 0, headersPassed: 0, rowsDropped: 0, blankLines: 0 };
}

async function handleOutcome(
  outcome: RowOutcome,
  raw: RawRecord,
  summary: PipelineSummary,
  options: RunPipelineOptions
): Promise<void> {
  const { output, logger } = options;
  switch (outcome.kind) {
    case 'blank':
      summary.blankLines += 1;
      logger.debug({ row: summary.recordsRead }, 'Skipping blank line');
      return;
    case 'header':
      summary.headersPassed += 1;
      await writeLine(output, outcome.line);
      return;
    case 'record':
      summary.rowsWritten += 1;
      await writeLine(output, outcome.line);
      return;
    case 'dropped': {
      summary.rowsDropped += 1;
      const fields = describeRawRecord(raw);
      logger.warn(
        {
          row: summary.recordsRead,
          column: outcome.error.column,
          error: outcome.error.name,
          fields
        },
        `(${outcome.error.message}) Dropping row [${fields.join(', ')}]`
      );
      return;
    }
  }
}

/**
 * Streams records from `input` to `output` in order. Rows that fail to
 * normalize are logged as warnings and skipped. Resolves once the input is
 * exhausted and every line has been handed to `output`, which is left open.
 * An error on either stream rejects.
 */
export async function runPipeline(options: RunPipelineOptions): Promise<PipelineSummary> {
  const { input, output, logger } = options;
  const pipeline = options.pipeline ?? new RowPipeline();
  const summary = emptySummary();

  const onOutputError = (error: Error) => input.destroy(error);
  output.once('error', onOutputError);
  try {
    for await (const raw of readRecords(input)) {
      summary.recordsRead += 1;
      await handleOutcome(pipeline.process(raw), raw, summary, options);
    }
  } finally {
    output.off('error', onOutputError);
  }

  logger.info({ ...summary, headerSeen: pipeline.headerSeen }, 'Normalization finished');
  return summary;
}
