import { Duration } from './duration';
import {
  FIELD_DELIMITER,
  QUOTE_CHARACTER,
  type NormalizedRecord,
  type SanitizedFields,
  type SanitizedRecord
} from './record';
import type { TimestampNormalizer } from './timestamp';

export const POSTAL_CODE_WIDTH = 5;

/**
 * Wraps the value in quotes when it contains the delimiter. Embedded quotes
 * are not escaped; downstream consumers expect this exact shape.
 */
export function maybeQuote(value: string): string {
  return value.includes(FIELD_DELIMITER) ? `${QUOTE_CHARACTER}${value}${QUOTE_CHARACTER}` : value;
}

/** Left-pads with `0` to five code points. Longer values pass through. */
export function padPostalCode(value: string): string {
  const length = Array.from(value).length;
  return length >= POSTAL_CODE_WIDTH ? value : '0'.repeat(POSTAL_CODE_WIDTH - length) + value;
}

/**
 * One-to-one upper-casing: characters whose upper-case form expands to
 * several code points (`ß`) are kept as they are.
 */
export function toUpperCaseSimple(value: string): string {
  let result = '';
  for (const character of value) {
    const upper = character.toUpperCase();
    result += Array.from(upper).length === 1 ? upper : character;
  }
  return result;
}

export type FormatterDependencies = {
  timestampNormalizer: TimestampNormalizer;
};

/**
 * Applies the per-column rules. The total is always recomputed from the two
 * durations; the input value of that column is ignored.
 */
export function normalizeFields(fields: SanitizedFields, deps: FormatterDependencies): NormalizedRecord {
  const timestamp = deps.timestampNormalizer.normalize(fields.Timestamp);
  const firstDuration = Duration.parse(fields.FirstDuration, 'FirstDuration');
  const secondDuration = Duration.parse(fields.SecondDuration, 'SecondDuration');

  return {
    timestamp,
    address: maybeQuote(fields.Address),
    postalCode: padPostalCode(fields.PostalCode),
    fullName: toUpperCaseSimple(fields.FullName),
    firstDuration: firstDuration.toSecondsString(),
    secondDuration: secondDuration.toSecondsString(),
    totalDuration: firstDuration.plus(secondDuration).toSecondsString(),
    notes: maybeQuote(fields.Notes)
  };
}

export function serializeRecord(record: NormalizedRecord): string {
  return [
    record.timestamp,
    record.address,
    record.postalCode,
    record.fullName,
    record.firstDuration,
    record.secondDuration,
    record.totalDuration,
    record.notes
  ].join(FIELD_DELIMITER);
}

/** Header rows are joined as sanitized, without quoting. */
export function serializeHeader(record: SanitizedRecord): string {
  return record.join(FIELD_DELIMITER);
}
