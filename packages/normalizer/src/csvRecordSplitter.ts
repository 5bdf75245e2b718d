import { Transform, type Readable, type TransformCallback } from 'node:stream';

import type { RawRecord } from './record';

const COMMA = 0x2c;
const QUOTE = 0x22;
const LF = 0x0a;
const CR = 0x0d;

type SplitterState = 'fieldStart' | 'unquoted' | 'quoted' | 'quoteInQuoted';

/**
 * Splits delimited text into records of raw byte fields without decoding
 * anything. Quoted fields may hold delimiters and line breaks; `""` inside
 * quotes is one literal quote. Records end at LF, CRLF or CR. A blank line
 * becomes a record with no fields.
 */
export class CsvRecordSplitter extends Transform {
  private state: SplitterState = 'fieldStart';
  private fields: Buffer[] = [];
  private field: number[] = [];
  private skipLineFeed = false;

  constructor() {
    super({ readableObjectMode: true });
  }

  override _transform(chunk: Buffer | string, _encoding: BufferEncoding, callback: TransformCallback): void {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    for (const byte of bytes) {
      this.consume(byte);
    }
    callback();
  }

  override _flush(callback: TransformCallback): void {
    if (this.state !== 'fieldStart' || this.fields.length > 0) {
      this.endRecord();
    }
    callback();
  }

  private consume(byte: number): void {
    if (this.skipLineFeed) {
      this.skipLineFeed = false;
      if (byte === LF) {
        return;
      }
    }

    switch (this.state) {
      case 'fieldStart':
        if (byte === QUOTE) {
          this.state = 'quoted';
        } else if (byte === COMMA) {
          this.endField();
        } else if (byte === LF || byte === CR) {
          this.endLine(byte);
        } else {
          this.field.push(byte);
          this.state = 'unquoted';
        }
        return;
      case 'unquoted':
        if (byte === COMMA) {
          this.endField();
        } else if (byte === LF || byte === CR) {
          this.endLine(byte);
        } else {
          this.field.push(byte);
        }
        return;
      case 'quoted':
        if (byte === QUOTE) {
          this.state = 'quoteInQuoted';
        } else {
          this.field.push(byte);
        }
        return;
      case 'quoteInQuoted':
        if (byte === QUOTE) {
          this.field.push(byte);
          this.state = 'quoted';
        } else if (byte === COMMA) {
          this.endField();
        } else if (byte === LF || byte === CR) {
          this.endLine(byte);
        } else {
          this.field.push(byte);
          this.state = 'unquoted';
        }
        return;
    }
  }

  private endField(): void {
    this.fields.push(Buffer.from(this.field));
    this.field = [];
    this.state = 'fieldStart';
  }

  private endLine(terminator: number): void {
    this.skipLineFeed = terminator === CR;
    if (this.state === 'fieldStart' && this.fields.length === 0) {
      this.push([]);
      return;
    }
    this.endRecord();
  }

  private endRecord(): void {
    this.endField();
    const record: RawRecord = this.fields;
    this.fields = [];
    this.push(record);
  }
}

function isRawRecord(value: unknown): value is RawRecord {
  return Array.isArray(value) && value.every((field) => Buffer.isBuffer(field));
}

/**
 * Yields records from a byte stream in input order. An error on the input
 * rejects the iteration.
 */
export async function* readRecords(input: Readable): AsyncGenerator<RawRecord> {
  const splitter = new CsvRecordSplitter();
  input.on('error', (error) => splitter.destroy(error));
  input.pipe(splitter);
  for await (const value of splitter) {
    if (isRawRecord(value)) {
      yield value;
    }
  }
}
