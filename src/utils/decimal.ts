import { Decimal } from 'decimal.js'

/**
 * Decimal helpers. Values are converted through their shortest decimal
 * representation (Number#toString) before rounding, so 1.005 rounds as
 * the decimal 1.005 and not as its binary neighbour 1.00499999...
 */

function toDecimal(value: number): Decimal {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot round non-finite value: ${value}`)
  }
  return new Decimal(value)
}

/** Half-up rounding (ties away from zero) to `places` decimal places. */
export function roundHalfUp(value: number, places: number): number {
  return toDecimal(value).toDecimalPlaces(places, Decimal.ROUND_HALF_UP).toNumber()
}

/** Fixed-point string with exactly `places` digits after the point. */
export function toFixedHalfUp(value: number, places: number): string {
  return toDecimal(value).toFixed(places, Decimal.ROUND_HALF_UP)
}

export function toPercentHalfUp(value: number, places: number): string {
  return `${toDecimal(value).times(100).toFixed(places, Decimal.ROUND_HALF_UP)}%`
}
