import { DurationParseError } from '../errors/rule-errors.js';

const MICROS_PER_SECOND = 1_000_000;
const SECONDS_PER_DAY = 86_400;
const MICROS_PER_DAY = SECONDS_PER_DAY * MICROS_PER_SECOND;

// "[D day[s], ][-][[HH:]MM:]SS[.ffffff]"
const DURATION_PATTERN =
  /^(?:(?<days>-?\d+) (?:days?, )?)?(?<sign>-?)(?:(?<hours>\d+):(?=\d+:\d+))?(?:(?<minutes>\d+):)?(?<seconds>\d+)(?:[.,](?<fraction>\d{1,6})\d{0,6})?$/;

export interface DurationParts {
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
  microseconds?: number;
}

/**
 * A signed span of time with microsecond resolution, normalized so that
 * `seconds` is in [0, 86400) and `microseconds` in [0, 1000000) while `days`
 * carries the sign.
 */
export class Duration {
  static readonly ZERO = new Duration(0);

  private constructor(readonly totalMicroseconds: number) {}

  static of(parts: DurationParts): Duration {
    const seconds =
      ((parts.days ?? 0) * SECONDS_PER_DAY) +
      ((parts.hours ?? 0) * 3600) +
      ((parts.minutes ?? 0) * 60) +
      (parts.seconds ?? 0);
    return Duration.ofMicroseconds(
      Math.round(seconds * MICROS_PER_SECOND) + (parts.microseconds ?? 0),
    );
  }

  static ofMicroseconds(total: number): Duration {
    if (!Number.isSafeInteger(total)) {
      throw new RangeError(`Duration out of range: ${total}µs`);
    }
    return total === 0 ? Duration.ZERO : new Duration(total);
  }

  /**
   * Parses a signed duration such as `"+3 days"`, `"-7 days"`,
   * `"1 day, 2:30:00"` or `"45:00"`. A bare day count is read as
   * `"N days, 0"`. Empty text is the zero duration.
   */
  static parse(text: string): Duration {
    const value = text.replace(/^\++/, '');
    if (value === '') return Duration.ZERO;

    const parsed =
      Duration.tryParse(value) ??
      (value.includes(',') ? null : Duration.tryParse(`${value}, 0`));
    if (!parsed) {
      throw new DurationParseError(text);
    }
    return parsed;
  }

  static tryParse(text: string): Duration | null {
    const groups = DURATION_PATTERN.exec(text)?.groups;
    if (!groups) return null;

    const days = Number(groups.days ?? '0');
    const clockMicros =
      (Number(groups.hours ?? '0') * 3600 +
        Number(groups.minutes ?? '0') * 60 +
        Number(groups.seconds)) *
        MICROS_PER_SECOND +
      Number((groups.fraction ?? '').padEnd(6, '0'));
    const signed = groups.sign === '-' ? -clockMicros : clockMicros;

    const total = days * MICROS_PER_DAY + signed;
    return Number.isSafeInteger(total) ? Duration.ofMicroseconds(total) : null;
  }

  get days(): number {
    return Math.floor(this.totalMicroseconds / MICROS_PER_DAY);
  }

  get seconds(): number {
    const rest = this.totalMicroseconds - this.days * MICROS_PER_DAY;
    return Math.floor(rest / MICROS_PER_SECOND);
  }

  get microseconds(): number {
    return (
      this.totalMicroseconds -
      this.days * MICROS_PER_DAY -
      this.seconds * MICROS_PER_SECOND
    );
  }

  /** Millisecond offset, rounded toward negative infinity. */
  get totalMilliseconds(): number {
    return Math.floor(this.totalMicroseconds / 1000);
  }

  addTo(instant: Date): Date {
    return new Date(instant.getTime() + this.totalMilliseconds);
  }

  equals(other: Duration): boolean {
    return this.totalMicroseconds === other.totalMicroseconds;
  }

  /** Canonical form, e.g. `"-1 day, 23:00:00"` or `"0:00:05.250000"`. */
  toString(): string {
    const hours = Math.floor(this.seconds / 3600);
    const minutes = Math.floor((this.seconds % 3600) / 60);
    const seconds = this.seconds % 60;

    let clock = `${hours}:${pad(minutes, 2)}:${pad(seconds, 2)}`;
    if (this.microseconds > 0) {
      clock += `.${pad(this.microseconds, 6)}`;
    }
    if (this.days === 0) return clock;

    const unit = Math.abs(this.days) === 1 ? 'day' : 'days';
    return `${this.days} ${unit}, ${clock}`;
  }
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}
