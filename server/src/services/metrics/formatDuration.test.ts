import { formatDuration } from './formatDuration';

describe('formatDuration', () => {
  it.each<[number, string]>([
    [0, '0s'],
    [59_499, '59s'],
    [59_500, '1m 0s'],
    [125_000, '2m 5s'],
    [3_600_000, '1h 0m 0s'],
    [3_665_000, '1h 1m 5s'],
    [90_061_000, '25h 1m 1s'],
  ])('should format %dms as "%s"', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });

  it('should treat negative durations as zero', () => {
    expect(formatDuration(-5000)).toBe('0s');
  });
});
