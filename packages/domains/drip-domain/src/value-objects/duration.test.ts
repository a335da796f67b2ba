import { describe, expect, it } from 'vitest';
import { DurationParseError } from '../errors/rule-errors.js';
import { Duration } from './duration.js';

describe('Duration.parse', () => {
  it('parses a day count with a clock component', () => {
    const duration = Duration.parse('1 day, 2:30:00');
    expect(duration.days).toBe(1);
    expect(duration.seconds).toBe(9000);
    expect(duration.toString()).toBe('1 day, 2:30:00');
  });

  it('reads a bare day count as days', () => {
    expect(Duration.parse('3 days').equals(Duration.of({ days: 3 }))).toBe(true);
    expect(Duration.parse('1 day').equals(Duration.of({ days: 1 }))).toBe(true);
  });

  it('reads a bare number as seconds', () => {
    expect(Duration.parse('12').totalMicroseconds).toBe(12_000_000);
  });

  it('strips a leading plus sign', () => {
    expect(Duration.parse('+3 days').equals(Duration.parse('3 days'))).toBe(true);
  });

  it('parses negative day counts', () => {
    const duration = Duration.parse('-7 days');
    expect(duration.days).toBe(-7);
    expect(duration.seconds).toBe(0);
    expect(duration.toString()).toBe('-7 days, 0:00:00');
  });

  it('parses a negative clock component', () => {
    expect(Duration.parse('-1:00:00').totalMilliseconds).toBe(-3_600_000);
  });

  it('treats empty text as the zero duration', () => {
    expect(Duration.parse('')).toBe(Duration.ZERO);
    expect(Duration.parse('+')).toBe(Duration.ZERO);
  });

  it('keeps fractional seconds to the microsecond', () => {
    const duration = Duration.parse('0:00:05.25');
    expect(duration.microseconds).toBe(250_000);
    expect(duration.toString()).toBe('0:00:05.250000');
  });

  it('parses minutes and seconds without hours', () => {
    expect(Duration.parse('45:00').equals(Duration.of({ minutes: 45 }))).toBe(true);
  });

  it('rejects text that is not a duration', () => {
    expect(() => Duration.parse('soon')).toThrow(DurationParseError);
    expect(() => Duration.parse('3 weeks')).toThrow(DurationParseError);
  });

  it('rejects surrounding whitespace', () => {
    expect(() => Duration.parse(' 3 days')).toThrow(DurationParseError);
    expect(() => Duration.parse('3 days ')).toThrow(DurationParseError);
  });

  it('does not retry text that already has a comma', () => {
    expect(() => Duration.parse('3 days, soon')).toThrow(
      'Could not parse duration "3 days, soon"',
    );
  });
});

describe('Duration canonical form', () => {
  it.each([
    '2 days, 4:05:06',
    '1 day',
    '-1 day, 23:00:00',
    '45:00',
    '0:00:00.000500',
    '-3 days',
  ])('re-parses the canonical form of "%s" to an equal duration', (text) => {
    const duration = Duration.parse(text);
    expect(Duration.parse(duration.toString()).equals(duration)).toBe(true);
  });

  it('normalizes negative spans so that days carry the sign', () => {
    const duration = Duration.of({ hours: -1 });
    expect(duration.days).toBe(-1);
    expect(duration.seconds).toBe(82_800);
    expect(duration.toString()).toBe('-1 day, 23:00:00');
  });
});

describe('Duration.addTo', () => {
  it('offsets an instant', () => {
    const start = new Date('2024-01-01T00:00:00Z');
    expect(Duration.parse('1 day, 12:00:00').addTo(start).toISOString()).toBe(
      '2024-01-02T12:00:00.000Z',
    );
    expect(Duration.parse('-7 days').addTo(start).toISOString()).toBe(
      '2023-12-25T00:00:00.000Z',
    );
  });
});
