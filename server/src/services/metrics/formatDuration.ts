/**
 * Render a duration as "Ns", "Nm Ns" or "Nh Nm Ns" after rounding to the nearest second.
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(Math.max(ms, 0) / 1000);
  const h = Math.floor(totalSeconds / 3600);
  const m = Math.floor(totalSeconds / 60) % 60;
  const s = totalSeconds % 60;

  if (h > 0) {
    return `${h}h ${m}m ${s}s`;
  }
  if (m > 0) {
    return `${m}m ${s}s`;
  }
  return `${s}s`;
}
