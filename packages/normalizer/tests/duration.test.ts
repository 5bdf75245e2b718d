import assert from 'node:assert/strict';
import { test } from 'node:test';
import { Duration } from '../src/duration';
import { DurationParseError } from '../src/errors';

test('parses hours, minutes and seconds', () => {
  const duration = Duration.parse('1:23:32');
  assert.equal(duration.milliseconds, 5_012_000n);
  assert.equal(duration.toSecondsString(), '5012.0');
});

test('reads the fractional part as milliseconds', () => {
  assert.equal(Duration.parse('2:30:15.500').toSecondsString(), '9015.5');
  assert.equal(Duration.parse('0:00:00.001').toSecondsString(), '0.001');
  assert.equal(Duration.parse('0:00:00.5').toSecondsString(), '0.005');
});

test('accepts spans longer than a day', () => {
  assert.equal(Duration.parse('36:00:01.250').toSecondsString(), '129601.25');
  assert.equal(Duration.parse('100:00:00').milliseconds, 360_000_000n);
  assert.equal(Duration.parse('123456789012345678:00:00').toSecondsString(), '444444440444444440800.0');
});

test('does not range-check minutes or seconds', () => {
  assert.equal(Duration.parse('0:75:90').toSecondsString(), '4590.0');
});

test('ignores surrounding blanks', () => {
  assert.equal(Duration.parse(' 1:02:03 ').toSecondsString(), '3723.0');
});

test('adds exactly in either order', () => {
  const first = Duration.parse('1:00:00');
  const second = Duration.parse('2:30:15.500');
  assert.equal(first.plus(second).toSecondsString(), '12615.5');
  assert.equal(second.plus(first).milliseconds, first.plus(second).milliseconds);

  const third = Duration.parse('0:00:00.250');
  assert.equal(first.plus(second).plus(third).milliseconds, first.plus(second.plus(third)).milliseconds);
});

test('rejects malformed input', () => {
  for (const value of ['', '1:23', '1:2:3:4', 'a:00:00', '1:00:0x', '1:00:00.1.2', '-1:00:00', '1:00:00.', '1: 00:00']) {
    assert.throws(() => Duration.parse(value), DurationParseError, value);
  }
});

test('parse errors carry the value, column and cause', () => {
  try {
    Duration.parse('1:23', 'SecondDuration');
    assert.fail('expected a DurationParseError');
  } catch (error) {
    assert.ok(error instanceof DurationParseError);
    assert.equal(error.value, '1:23');
    assert.equal(error.column, 'SecondDuration');
    assert.ok(error.cause instanceof Error);
    assert.equal(error.message, "Unable to parse duration '1:23': expected 3 colon-separated components but found 2");
  }
});
