import assert from 'node:assert/strict';
import { test } from 'node:test';
import { DurationParseError, TimestampParseError } from '../src/errors';
import { maybeQuote, normalizeFields, padPostalCode, serializeHeader, serializeRecord, toUpperCaseSimple } from '../src/formatter';
import { toSanitizedFields } from '../src/record';
import { TimestampNormalizer } from '../src/timestamp';

const deps = { timestampNormalizer: new TimestampNormalizer() };

const sampleFields = () =>
  toSanitizedFields([
    '4/1/11 11:00:00 AM',
    '123 4th St, Anywhere, AA',
    '94121',
    'Monkey Alberto',
    '1:23:32',
    '1:32:33',
    'zzsasdfa',
    'I am the very model'
  ]);

test('quotes only values containing the delimiter', () => {
  assert.equal(maybeQuote('123 4th St, Anywhere, AA'), '"123 4th St, Anywhere, AA"');
  assert.equal(maybeQuote('I am the very model'), 'I am the very model');
  assert.equal(maybeQuote('say "hi", then leave'), '"say "hi", then leave"');
  assert.equal(maybeQuote('say "hi"'), 'say "hi"');
});

test('pads postal codes to five code points', () => {
  assert.equal(padPostalCode('94121'), '94121');
  assert.equal(padPostalCode('123'), '00123');
  assert.equal(padPostalCode(''), '00000');
  assert.equal(padPostalCode('1234567'), '1234567');
  assert.equal(padPostalCode('ab'), '000ab');
  assert.equal(padPostalCode('😀'), '0000😀');
});

test('upper-cases one code point at a time', () => {
  assert.equal(toUpperCaseSimple('Monkey Alberto'), 'MONKEY ALBERTO');
  assert.equal(toUpperCaseSimple('élan vital'), 'ÉLAN VITAL');
  assert.equal(toUpperCaseSimple('straße'), 'STRAßE');
});

test('normalizes and serializes a record', () => {
  const normalized = normalizeFields(sampleFields(), deps);
  assert.deepEqual(normalized, {
    timestamp: '2011-04-01T14:00:00-04:00',
    address: '"123 4th St, Anywhere, AA"',
    postalCode: '94121',
    fullName: 'MONKEY ALBERTO',
    firstDuration: '5012.0',
    secondDuration: '5553.0',
    totalDuration: '10565.0',
    notes: 'I am the very model'
  });
  assert.equal(
    serializeRecord(normalized),
    '2011-04-01T14:00:00-04:00,"123 4th St, Anywhere, AA",94121,MONKEY ALBERTO,5012.0,5553.0,10565.0,I am the very model'
  );
});

test('reports which duration column failed', () => {
  const fields = { ...sampleFields(), SecondDuration: '1:32' };
  assert.throws(
    () => normalizeFields(fields, deps),
    (error: unknown) => error instanceof DurationParseError && error.column === 'SecondDuration'
  );
});

test('fails on the timestamp before looking at durations', () => {
  const fields = { ...sampleFields(), Timestamp: 'not-a-date', FirstDuration: 'bogus' };
  assert.throws(() => normalizeFields(fields, deps), TimestampParseError);
});

test('serializes header fields without quoting', () => {
  assert.equal(serializeHeader(['Timestamp', 'Address, full', 'ZIP']), 'Timestamp,Address, full,ZIP');
});
