/** Digits inspected past the requested precision to detect an exact midpoint. */
const TIE_PROBE_DIGITS = 20;
const EXACT_HALF = '5'.padEnd(TIE_PROBE_DIGITS, '0');

/**
 * Fixed-point rendering with ties rounded to even, so 12.5 renders as "12" and
 * 0.125 as "0.12". `Number.prototype.toFixed` rounds ties away from zero.
 */
export function formatFixed(value: number, digits: number): string {
  const rounded = value.toFixed(digits);
  if (!Number.isFinite(value)) {
    return rounded;
  }

  const expanded = Math.abs(value).toFixed(digits + TIE_PROBE_DIGITS);
  if (expanded.slice(-TIE_PROBE_DIGITS) !== EXACT_HALF) {
    return rounded;
  }

  let truncated = expanded.slice(0, -TIE_PROBE_DIGITS);
  if (truncated.endsWith('.')) {
    truncated = truncated.slice(0, -1);
  }
  const lastDigit = Number(truncated.charAt(truncated.length - 1));
  if (lastDigit % 2 !== 0) {
    return rounded;
  }
  return value < 0 ? `-${truncated}` : truncated;
}
