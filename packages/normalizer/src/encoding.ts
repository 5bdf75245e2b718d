import type { RawRecord, SanitizedRecord } from './record';

export const REPLACEMENT_CHARACTER = '\uFFFD';

const decoder = new TextDecoder('utf-8', { ignoreBOM: true });

type SequenceScan = {
  length: number;
  valid: boolean;
};

// Second-byte ranges for lead bytes that narrow it (overlongs, surrogates, > U+10FFFF).
function secondByteRange(lead: number): [number, number] {
  switch (lead) {
    case 0xe0:
      return [0xa0, 0xbf];
    case 0xed:
      return [0x80, 0x9f];
    case 0xf0:
      return [0x90, 0xbf];
    case 0xf4:
      return [0x80, 0x8f];
    default:
      return [0x80, 0xbf];
  }
}

function expectedLength(lead: number): number {
  if (lead <= 0x7f) {
    return 1;
  }
  if (lead >= 0xc2 && lead <= 0xdf) {
    return 2;
  }
  if (lead >= 0xe0 && lead <= 0xef) {
    return 3;
  }
  if (lead >= 0xf0 && lead <= 0xf4) {
    return 4;
  }
  return 0;
}

/**
 * Reads the sequence starting at `index`. An invalid sequence reports the
 * length of its maximal subpart, the span that one replacement character
 * stands in for.
 */
function scanSequence(bytes: Uint8Array, index: number): SequenceScan {
  const lead = bytes[index] ?? 0;
  const length = expectedLength(lead);
  if (length === 0) {
    return { length: 1, valid: false };
  }

  for (let offset = 1; offset < length; offset += 1) {
    const byte = bytes[index + offset];
    const [min, max] = offset === 1 ? secondByteRange(lead) : [0x80, 0xbf];
    if (byte === undefined || byte < min || byte > max) {
      return { length: offset, valid: false };
    }
  }
  return { length, valid: true };
}

/**
 * Decodes UTF-8, handing every invalid span to `replace`. Valid input is
 * decoded unchanged, a leading byte order mark included.
 */
export function repairUtf8(bytes: Uint8Array, replace: (invalid: Uint8Array) => string): string {
  let text = '';
  let segmentStart = 0;
  let index = 0;

  while (index < bytes.length) {
    const scan = scanSequence(bytes, index);
    if (scan.valid) {
      index += scan.length;
      continue;
    }
    text += decoder.decode(bytes.subarray(segmentStart, index));
    text += replace(bytes.subarray(index, index + scan.length));
    index += scan.length;
    segmentStart = index;
  }

  return text + decoder.decode(bytes.subarray(segmentStart));
}

export function sanitizeField(bytes: Uint8Array): string {
  return repairUtf8(bytes, () => REPLACEMENT_CHARACTER);
}

export function sanitizeRecord(record: RawRecord): SanitizedRecord {
  return Object.freeze(record.map((field) => sanitizeField(field)));
}

/**
 * Raw field for diagnostics: valid text as is, invalid bytes as `\xNN`.
 */
export function describeRawField(bytes: Uint8Array): string {
  return repairUtf8(bytes, (invalid) =>
    Array.from(invalid, (byte) => `\\x${byte.toString(16).padStart(2, '0')}`).join('')
  );
}
