import type { Logger } from 'pino'
import { parseCalculationRequest } from './schemas.js'
import { DAYS_PER_YEAR, HedgedReturnCalculator } from './hedgedReturn.js'
import { handleAndLogError } from '../utils/errors.js'
import { createLogger } from '../utils/logger.js'

export interface HedgedReturnReport {
  /** Internal value, 6 decimal places. */
  twr: number
  /** Fixed 4-decimal string for charts and tables. */
  display: string
  /** 2-decimal percentage with trailing `%`. */
  percentage: string
  annualized: boolean
  hedged: boolean
  periodCount: number
  totalDays: number
}

export interface ReportOptions {
  hedged?: boolean
  logger?: Logger
}

/**
 * Validates an untrusted `{ periods, totalDays }` payload and runs it through
 * the calculator. Failures are logged once and rethrown as CategorizedError.
 */
export function buildReport(input: unknown, options: ReportOptions = {}): HedgedReturnReport {
  const { hedged = true } = options
  const log = options.logger ?? createLogger({ component: 'hedged-return-report' })
  const calculator = new HedgedReturnCalculator(log)

  try {
    const request = parseCalculationRequest(input)
    const twr = hedged
      ? calculator.calculate(request.periods, request.totalDays)
      : calculator.calculateUnhedged(request.periods, request.totalDays)

    return {
      twr,
      display: calculator.formatForDisplay(twr),
      percentage: calculator.toPercentageString(twr),
      annualized: request.totalDays > DAYS_PER_YEAR,
      hedged,
      periodCount: request.periods.length,
      totalDays: request.totalDays,
    }
  } catch (error) {
    throw handleAndLogError(error, { hedged }, 'buildReport', log)
  }
}
