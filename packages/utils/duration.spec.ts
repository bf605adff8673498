import { describe, it, expect } from 'vitest';
import { formatDuration, parseIsoDuration } from './duration.js';

describe('parseIsoDuration', () => {
  it.each([
    ['PT1H2M3S', 3723],
    ['PT45M', 2700],
    ['PT59S', 59],
    ['P1DT2H', 93600],
    ['PT1.6S', 2],
  ])('parses %s', (input, expected) => {
    expect(parseIsoDuration(input)).toBe(expected);
  });

  it.each([undefined, '', 'P0D', 'PT', 'P', '1:02:03', 'PT1X'])('returns undefined for %s', input => {
    expect(parseIsoDuration(input)).toBeUndefined();
  });
});

describe('formatDuration', () => {
  it('pads hours, minutes and seconds', () => {
    expect(formatDuration(3723)).toBe('01:02:03');
  });

  it('rounds fractional seconds', () => {
    expect(formatDuration(59.6)).toBe('00:01:00');
  });

  it('supports durations over a day', () => {
    expect(formatDuration(90000)).toBe('25:00:00');
  });

  it('clamps negative values', () => {
    expect(formatDuration(-5)).toBe('00:00:00');
  });
});
