/**
 * Hedged Time-Weighted Return
 *
 *   V'_t = V_t × (1 − FX_t × (1 − h_t))
 *   TWR  = Π_{i=1}^{n−1} [(V'_i − C_i) / V'_{i−1}] − 1
 *   TWR_ann = (1 + TWR)^(365 / days) − 1      when days > 365
 *
 * The result is rounded half-up to 6 decimal places.
 */

import type { Logger } from 'pino'
import type { Period, Series } from './schemas.js'
import {
  InsufficientPeriodsError,
  NonFiniteResultError,
  ZeroDenominatorError,
} from '../utils/errors.js'
import { roundHalfUp, toFixedHalfUp, toPercentHalfUp } from '../utils/decimal.js'
import { createLogger } from '../utils/logger.js'

export const INTERNAL_PRECISION = 6
export const DISPLAY_PRECISION = 4
export const PERCENT_PRECISION = 2
export const DAYS_PER_YEAR = 365

type AdjustFn = (period: Period) => number

/**
 * Hedge-adjusted portfolio value. Equals V when FX = 0 or h = 1,
 * and V × h when FX = 1.
 */
export function calculateAdjustedValue(period: Period): number {
  return period.portfolioValue * (1 - period.hedgeRatio * (1 - period.hedgeFactor))
}

const unadjustedValue: AdjustFn = (period) => period.portfolioValue

export class HedgedReturnCalculator {
  private readonly log: Logger

  constructor(log?: Logger) {
    this.log = log ?? createLogger({ component: 'hedged-return' })
  }

  /**
   * Hedged TWR for a chronologically ordered series, as a decimal
   * (0.0543 for 5.43%). Annualized when `totalDays` exceeds 365.
   *
   * @throws InsufficientPeriodsError when fewer than two periods are given
   * @throws ZeroDenominatorError when a non-final adjusted value is zero
   * @throws NonFiniteResultError when the chain or annualization leaves the reals
   */
  calculate(periods: Series | null | undefined, totalDays: number): number {
    return this.chain(periods, totalDays, calculateAdjustedValue, 'hedged')
  }

  /** Same chain with the hedge adjustment switched off (V' = V). */
  calculateUnhedged(periods: Series | null | undefined, totalDays: number): number {
    return this.chain(periods, totalDays, unadjustedValue, 'unhedged')
  }

  formatForDisplay(value: number): string {
    return toFixedHalfUp(value, DISPLAY_PRECISION)
  }

  toPercentageString(value: number): string {
    return toPercentHalfUp(value, PERCENT_PRECISION)
  }

  private chain(
    periods: Series | null | undefined,
    totalDays: number,
    adjust: AdjustFn,
    mode: 'hedged' | 'unhedged'
  ): number {
    if (!periods || periods.length < 2) {
      throw new InsufficientPeriodsError(periods?.length ?? 0)
    }

    const adjusted = periods.map(adjust)

    let product = 1
    for (let i = 1; i < periods.length; i++) {
      const previous = adjusted[i - 1]
      // Guard before dividing; a zero final value is fine as a numerator.
      if (previous === 0) {
        throw new ZeroDenominatorError(i)
      }
      product *= (adjusted[i] - periods[i].cashFlow) / previous
    }

    if (!Number.isFinite(product)) {
      throw new NonFiniteResultError('chain', product)
    }

    let twr = product - 1
    const annualize = totalDays > DAYS_PER_YEAR
    if (annualize) {
      twr = Math.pow(1 + twr, DAYS_PER_YEAR / totalDays) - 1
      if (!Number.isFinite(twr)) {
        throw new NonFiniteResultError('annualization', twr)
      }
    }

    const rounded = roundHalfUp(twr, INTERNAL_PRECISION)
    this.log.debug(
      { mode, periodCount: periods.length, totalDays, annualized: annualize, raw: twr, twr: rounded },
      'TWR calculated'
    )
    return rounded
  }
}
