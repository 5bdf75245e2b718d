import { Readable, Writable } from 'node:stream';
import { createLogger, type Logger } from '@csv-normalizer/shared';

export type LogEntry = {
  level: number;
  msg: string;
  [key: string]: unknown;
};

export function captureLogger(level: 'debug' | 'info' | 'warn' = 'info'): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    level,
    timestamp: false,
    destination: {
      write(message: string) {
        entries.push(JSON.parse(message));
      }
    }
  });
  return { logger, entries };
}

export function collectOutput(): { stream: Writable; text: () => string } {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    }
  });
  return { stream, text: () => Buffer.concat(chunks).toString('utf8') };
}

export function inputFrom(...chunks: Array<string | Buffer>): Readable {
  return Readable.from(chunks.map((chunk) => (typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk)));
}
