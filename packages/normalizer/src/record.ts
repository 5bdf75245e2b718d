export const RECORD_COLUMNS = [
  'Timestamp',
  'Address',
  'PostalCode',
  'FullName',
  'FirstDuration',
  'SecondDuration',
  'TotalDuration',
  'Notes'
] as const;

export type RecordColumn = (typeof RECORD_COLUMNS)[number];

export const HEADER_LITERAL = 'Timestamp';
export const FIELD_DELIMITER = ',';
export const QUOTE_CHARACTER = '"';

/** Fields as they came off the wire, before any decoding. */
export type RawRecord = readonly Uint8Array[];

/** Same shape as the raw record, every field decoded to valid text. */
export type SanitizedRecord = readonly string[];

export type SanitizedFields = Readonly<Record<RecordColumn, string>>;

export type NormalizedRecord = Readonly<{
  timestamp: string;
  address: string;
  postalCode: string;
  fullName: string;
  firstDuration: string;
  secondDuration: string;
  totalDuration: string;
  notes: string;
}>;

/**
 * Positional fields to named ones. Callers check the field count first.
 */
export function toSanitizedFields(record: SanitizedRecord): SanitizedFields {
  const field = (index: number): string => record[index] ?? '';
  return {
    Timestamp: field(0),
    Address: field(1),
    PostalCode: field(2),
    FullName: field(3),
    FirstDuration: field(4),
    SecondDuration: field(5),
    TotalDuration: field(6),
    Notes: field(7)
  };
}
