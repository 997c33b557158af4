/**
 * Small numeric helpers shared by the sizing and scoring code.
 */

export function sum(values: number[]): number {
  return values.reduce((total, v) => total + v, 0);
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return sum(values) / values.length;
}

/** Ratio that yields `fallback` instead of NaN/Infinity when the denominator is zero. */
export function safeRatio(numerator: number, denominator: number, fallback = 0): number {
  if (denominator === 0) return fallback;
  return numerator / denominator;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
