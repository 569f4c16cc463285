/**
 * Clamp a numeric input into [min, max], flooring fractions.
 * Non-finite input (NaN, undefined coerced) falls back to `fallback`.
 */
export function clampInt(
  value: number | undefined,
  min: number,
  max: number,
  fallback: number
): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(min, Math.min(max, Math.floor(value)));
}
