/**
 * Decimal rounding, half away from zero: 2.345 -> 2.35, -2.345 -> -2.35.
 * Every rounded figure the analytics report goes through this.
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  // Trim binary noise first so 0.285 * 100 rounds as 28.5, not 28.499999999999996
  const scaled = Number((Math.abs(value) * factor).toPrecision(15));
  const rounded = Math.round(scaled) / factor;
  return value < 0 && rounded !== 0 ? -rounded : rounded;
}

export function round2(value: number): number {
  return roundTo(value, 2);
}

export function round1(value: number): number {
  return roundTo(value, 1);
}
