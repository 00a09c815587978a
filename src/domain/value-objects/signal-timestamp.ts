const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(?:Z|([+-])(\d{2}):(\d{2}))?$/;

function daysInMonth(year: number, month: number): number {
  const lastDay = new Date(0);
  lastDay.setUTCFullYear(year, month, 0);
  return lastDay.getUTCDate();
}

/**
 * UTC instant that keeps the fractional-second digits it was parsed from,
 * down to nanoseconds, so "12:00:00.123456Z" is written back unchanged.
 * A `Date` view is available, truncated to milliseconds.
 */
export class SignalTimestamp {
  private constructor(
    private readonly epochSeconds: number,
    private readonly fraction: string,
  ) {}

  /**
   * Accepts `YYYY-MM-DDTHH:mm[:ss[.fraction]]` with an optional `Z` or
   * `±HH:MM` offset; text without a designator is read as UTC. Calendar
   * fields are range-checked, so Feb 30 or hour 25 is rejected, not rolled over.
   */
  static tryParse(input: unknown): SignalTimestamp | null {
    if (input instanceof SignalTimestamp) return input;
    if (input instanceof Date) {
      return Number.isNaN(input.getTime()) ? null : SignalTimestamp.fromDate(input);
    }
    if (typeof input !== 'string') return null;

    const match = TIMESTAMP_PATTERN.exec(input.trim());
    if (!match) return null;

    const [, year, month, day, hour, minute, second = '00', fraction = '', sign, offsetHours, offsetMinutes] =
      match;
    const y = Number(year);
    const mo = Number(month);
    const d = Number(day);
    const h = Number(hour);
    const mi = Number(minute);
    const s = Number(second);

    if (mo < 1 || mo > 12 || d < 1 || d > daysInMonth(y, mo)) return null;
    if (h > 23 || mi > 59 || s > 59) return null;

    let offset = 0;
    if (sign) {
      const oh = Number(offsetHours);
      const om = Number(offsetMinutes);
      if (oh > 23 || om > 59) return null;
      offset = (sign === '-' ? -1 : 1) * (oh * 60 + om);
    }

    const wallClock = new Date(0);
    wallClock.setUTCFullYear(y, mo - 1, d);
    wallClock.setUTCHours(h, mi, s, 0);

    return new SignalTimestamp(wallClock.getTime() / 1000 - offset * 60, fraction);
  }

  static parse(input: string): SignalTimestamp {
    const parsed = SignalTimestamp.tryParse(input);
    if (!parsed) {
      throw new RangeError(`Not an ISO-8601 date-time: ${input}`);
    }
    return parsed;
  }

  static fromDate(date: Date): SignalTimestamp {
    const millis = date.getTime();
    if (Number.isNaN(millis)) {
      throw new RangeError('Invalid Date');
    }
    const seconds = Math.floor(millis / 1000);
    const remainder = millis - seconds * 1000;
    return new SignalTimestamp(seconds, remainder === 0 ? '' : String(remainder).padStart(3, '0'));
  }

  toDate(): Date {
    return new Date(this.epochSeconds * 1000 + Number(this.fraction.padEnd(3, '0').slice(0, 3)));
  }

  equals(other: SignalTimestamp): boolean {
    return this.toString() === other.toString();
  }

  /** `2024-02-19T12:00:00Z`, with the fractional digits when there are any. */
  toString(): string {
    const wholeSeconds = new Date(this.epochSeconds * 1000).toISOString().replace(/\.\d{3}Z$/, '');
    return `${wholeSeconds}${this.fraction ? `.${this.fraction}` : ''}Z`;
  }

  toJSON(): string {
    return this.toString();
  }
}
