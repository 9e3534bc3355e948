/**
 * numerator / denominator, or 0 when the denominator is 0.
 */
export function ratio(numerator: number, denominator: number): number {
  if (denominator === 0) return 0;
  return numerator / denominator;
}

/**
 * (numerator / denominator) * 100, or 0 when the denominator is 0.
 */
export function percentage(numerator: number, denominator: number): number {
  return ratio(numerator, denominator) * 100;
}

/**
 * Clamp a value into [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
