/**
 * Render a number for a filter argument: at most six decimals, no
 * trailing zeros, no exponent.
 */
export function formatNumber(value: number): string {
  const rounded = Math.round(value * 1e6) / 1e6;
  return Object.is(rounded, -0) ? '0' : rounded.toFixed(6).replace(/\.?0+$/, '');
}

/**
 * Convert decibels to a linear amplitude factor.
 */
export function dbToLinear(gainDb: number): number {
  return Math.pow(10, gainDb / 20);
}
