import type { Logger } from 'pino'
import { ZodError } from 'zod'

export enum ErrorCategory {
  VALIDATION = 'validation',
  CONFIGURATION = 'configuration',
  INTERNAL = 'internal'
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export interface CategorizedErrorOptions {
  context?: Record<string, unknown>
  cause?: Error
  retryable?: boolean
}

export class CategorizedError extends Error {
  public readonly category: ErrorCategory
  public readonly severity: ErrorSeverity
  public readonly context?: Record<string, unknown>
  public readonly retryable: boolean

  constructor(
    message: string,
    category: ErrorCategory,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    options: CategorizedErrorOptions = {}
  ) {
    super(message, { cause: options.cause })
    this.name = 'CategorizedError'
    this.category = category
    this.severity = severity
    this.context = options.context
    this.retryable = options.retryable ?? false
  }
}

export type CalculationErrorKind = 'InsufficientPeriods' | 'ZeroDenominator' | 'NonFiniteResult'

/**
 * Base class for input failures raised by the return calculation.
 * Never retryable: the same input always fails the same way.
 */
export abstract class CalculationError extends CategorizedError {
  abstract readonly kind: CalculationErrorKind

  constructor(message: string, context: Record<string, unknown>) {
    super(message, ErrorCategory.VALIDATION, ErrorSeverity.LOW, { context, retryable: false })
    this.name = new.target.name
  }
}

export class InsufficientPeriodsError extends CalculationError {
  readonly kind = 'InsufficientPeriods' as const
  readonly periodCount: number

  constructor(periodCount: number) {
    super('At least 2 periods required for TWR calculation', { periodCount })
    this.periodCount = periodCount
  }
}

export class ZeroDenominatorError extends CalculationError {
  readonly kind = 'ZeroDenominator' as const
  /** Index of the period whose return could not be computed. */
  readonly periodIndex: number
  /** Index of the period holding the zero adjusted value. */
  readonly denominatorIndex: number

  constructor(periodIndex: number) {
    super(`Zero adjusted portfolio value at period ${periodIndex - 1}`, {
      periodIndex,
      denominatorIndex: periodIndex - 1
    })
    this.periodIndex = periodIndex
    this.denominatorIndex = periodIndex - 1
  }
}

export type NonFiniteStage = 'chain' | 'annualization'

export class NonFiniteResultError extends CalculationError {
  readonly kind = 'NonFiniteResult' as const
  readonly stage: NonFiniteStage
  readonly value: number

  constructor(stage: NonFiniteStage, value: number) {
    super(`Non-finite return produced during ${stage}`, { stage, value: String(value) })
    this.stage = stage
    this.value = value
  }
}

export function isCalculationError(error: unknown): error is CalculationError {
  return error instanceof CalculationError
}

export function handleAndLogError(
  error: unknown,
  context: Record<string, unknown>,
  operation: string,
  log: Logger
): CategorizedError {
  const categorizedError = categorizeError(error, context, operation)

  log.error({
    operation,
    category: categorizedError.category,
    severity: categorizedError.severity,
    kind: isCalculationError(categorizedError) ? categorizedError.kind : undefined,
    message: categorizedError.message,
    context: categorizedError.context,
    cause: categorizedError.cause instanceof Error ? categorizedError.cause.message : undefined
  }, 'Operation failed')

  return categorizedError
}

function categorizeError(
  error: unknown,
  context: Record<string, unknown>,
  operation: string
): CategorizedError {
  if (error instanceof CategorizedError) {
    return error
  }

  if (error instanceof ZodError) {
    return new CategorizedError(
      `Validation error in ${operation}: ${error.issues.length} invalid field(s)`,
      ErrorCategory.VALIDATION,
      ErrorSeverity.LOW,
      {
        context: { ...context, issues: error.issues },
        cause: error
      }
    )
  }

  const message = error instanceof Error ? error.message : String(error)
  return new CategorizedError(
    `Internal error in ${operation}: ${message}`,
    ErrorCategory.INTERNAL,
    ErrorSeverity.HIGH,
    {
      context: { ...context, originalError: message },
      cause: error instanceof Error ? error : undefined
    }
  )
}
