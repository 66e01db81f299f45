import { describe, expect, it } from 'vitest';
import { formatTimestamp, toEpochSeconds } from '../../src/util/date.js';

describe('formatTimestamp', () => {
  it('formats local time with microsecond precision', () => {
    const date = new Date(2024, 2, 15, 13, 4, 5, 123); // Month is 0-indexed, so 2 = March
    expect(formatTimestamp(date)).toBe('2024-03-15 13:04:05.123000');
  });

  it('pads single-digit fields with zeros', () => {
    const date = new Date(2024, 0, 5, 1, 2, 3, 4);
    expect(formatTimestamp(date)).toBe('2024-01-05 01:02:03.004000');
  });

  it('sorts the same way the dates do', () => {
    const earlier = formatTimestamp(new Date(2024, 0, 5, 9, 59, 59, 999));
    const later = formatTimestamp(new Date(2024, 0, 5, 10, 0, 0, 0));
    expect(earlier < later).toBe(true);
  });
});

describe('toEpochSeconds', () => {
  it('keeps the millisecond fraction', () => {
    expect(toEpochSeconds(new Date(1500))).toBe(1.5);
  });
});
