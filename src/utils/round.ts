/**
 * Commercial (half away from zero) rounding for settlement amounts.
 *
 * Calculators keep full precision; rounding happens only when an amount is
 * presented (UF to 4 decimals, CLP to whole pesos).
 */

export const UF_DECIMALS = 4;
export const CLP_DECIMALS = 0;

/**
 * Rounds half away from zero to the given number of decimal places.
 *
 * @example
 * ```typescript
 * roundTo(37.90799999, 4)   // 37.908
 * roundTo(1402596.5, 0)     // 1402597
 * ```
 */
export function roundTo(value: number, decimals: number): number {
  if (!isFinite(value)) {
    return value;
  }
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new RangeError(`decimals must be a non-negative integer, received ${decimals}`);
  }

  const factor = Math.pow(10, decimals);
  const isNegative = value < 0;
  const scaled = (Math.abs(value) + Number.EPSILON) * factor;
  const result = Math.round(scaled) / factor;

  // avoid returning -0
  return isNegative && result !== 0 ? -result : result;
}

export const roundUf = (value: number): number => roundTo(value, UF_DECIMALS);

export const roundClp = (value: number): number => roundTo(value, CLP_DECIMALS);
