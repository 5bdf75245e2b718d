const MINUTE_MS = 60 * 1000;

/**
 * Read-only view of a time-zone database.
 */
export interface ZoneRules {
  /** UTC offset in minutes (east positive) in effect in `timeZone` at `epochMs`. */
  offsetMinutes(timeZone: string, epochMs: number): number;
}

function readPart(parts: Intl.DateTimeFormatPart[], type: Intl.DateTimeFormatPartTypes): number {
  const part = parts.find((entry) => entry.type === type);
  if (!part) {
    throw new Error(`Zone formatter did not produce a ${type} part`);
  }
  return Number.parseInt(part.value, 10);
}

/**
 * Zone rules backed by the ICU data bundled with the runtime. Formatters are
 * built once per zone.
 */
export class IntlZoneRules implements ZoneRules {
  private readonly formatters = new Map<string, Intl.DateTimeFormat>();

  offsetMinutes(timeZone: string, epochMs: number): number {
    const instant = Math.floor(epochMs / 1000) * 1000;
    const parts = this.formatter(timeZone).formatToParts(new Date(instant));
    const wallClockAsUtc = Date.UTC(
      readPart(parts, 'year'),
      readPart(parts, 'month') - 1,
      readPart(parts, 'day'),
      readPart(parts, 'hour'),
      readPart(parts, 'minute'),
      readPart(parts, 'second')
    );
    return Math.round((wallClockAsUtc - instant) / MINUTE_MS);
  }

  private formatter(timeZone: string): Intl.DateTimeFormat {
    let formatter = this.formatters.get(timeZone);
    if (!formatter) {
      formatter = new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
        hourCycle: 'h23'
      });
      this.formatters.set(timeZone, formatter);
    }
    return formatter;
  }
}

export const intlZoneRules: ZoneRules = new IntlZoneRules();
