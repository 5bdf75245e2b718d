import { DurationParseError } from './errors';
import type { RecordColumn } from './record';

const MS_PER_SECOND = 1000n;
const MS_PER_MINUTE = 60n * MS_PER_SECOND;
const MS_PER_HOUR = 60n * MS_PER_MINUTE;

const UNSIGNED_INTEGER = /^\d+$/;

function parseComponent(label: string, text: string): bigint {
  if (!UNSIGNED_INTEGER.test(text)) {
    throw new Error(`${label} component '${text}' is not an unsigned integer`);
  }
  return BigInt(text);
}

/**
 * Elapsed time held as an exact count of milliseconds. Unlike a time of day
 * it is not bounded to 24 hours.
 */
export class Duration {
  private constructor(readonly milliseconds: bigint) {}

  /**
   * Parses `H:MM:SS` or `H:MM:SS.fff`. Hours are unbounded; digits after the
   * decimal point are read as a whole number of milliseconds.
   */
  static parse(text: string, column: RecordColumn | null = null): Duration {
    try {
      const components = text.trim().split(':');
      if (components.length !== 3) {
        throw new Error(`expected 3 colon-separated components but found ${components.length}`);
      }
      const [hoursText = '', minutesText = '', secondsText = ''] = components;
      const secondsParts = secondsText.split('.');
      if (secondsParts.length > 2) {
        throw new Error(`seconds component '${secondsText}' has more than one decimal point`);
      }
      const [wholeSecondsText = '', millisecondsText] = secondsParts;

      const hours = parseComponent('hours', hoursText);
      const minutes = parseComponent('minutes', minutesText);
      const seconds = parseComponent('seconds', wholeSecondsText);
      const milliseconds = millisecondsText === undefined ? 0n : parseComponent('milliseconds', millisecondsText);

      return new Duration(hours * MS_PER_HOUR + minutes * MS_PER_MINUTE + seconds * MS_PER_SECOND + milliseconds);
    } catch (error) {
      throw new DurationParseError(text, error instanceof Error ? error : new Error(String(error)), column);
    }
  }

  plus(other: Duration): Duration {
    return new Duration(this.milliseconds + other.milliseconds);
  }

  /**
   * Decimal seconds with at least one fractional digit: `5012.0`, `12615.5`.
   */
  toSecondsString(): string {
    const whole = this.milliseconds / MS_PER_SECOND;
    const fraction = (this.milliseconds % MS_PER_SECOND).toString().padStart(3, '0').replace(/0+$/, '');
    return `${whole}.${fraction || '0'}`;
  }
}
