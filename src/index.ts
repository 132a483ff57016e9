export {
  HedgedReturnCalculator,
  calculateAdjustedValue,
  INTERNAL_PRECISION,
  DISPLAY_PRECISION,
  PERCENT_PRECISION,
  DAYS_PER_YEAR,
} from './core/hedgedReturn.js'
export {
  PeriodSchema,
  SeriesSchema,
  CalculationRequestSchema,
  createPeriod,
  parseSeries,
  parseCalculationRequest,
} from './core/schemas.js'
export type { Period, Series, CalculationRequest } from './core/schemas.js'
export { buildReport } from './core/report.js'
export type { HedgedReturnReport, ReportOptions } from './core/report.js'
export { roundHalfUp, toFixedHalfUp, toPercentHalfUp } from './utils/decimal.js'
export {
  CategorizedError,
  CalculationError,
  InsufficientPeriodsError,
  ZeroDenominatorError,
  NonFiniteResultError,
  ErrorCategory,
  ErrorSeverity,
  isCalculationError,
  handleAndLogError,
} from './utils/errors.js'
export type { CalculationErrorKind, NonFiniteStage } from './utils/errors.js'
export { getConfig, loadConfig, resetConfig } from './utils/config.js'
export type { AppConfig } from './utils/config.js'
export { logger, createLogger } from './utils/logger.js'
