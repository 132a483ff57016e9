import { z } from 'zod'

const finite = z.number().finite()

// Hedge ratio and factor are intended to lie in [0, 1] but are not range-checked;
// out-of-range values still produce a consistent adjusted value.
export const PeriodSchema = z.object({
  portfolioValue: finite.nonnegative(),
  cashFlow: finite,
  hedgeRatio: finite,
  hedgeFactor: finite,
})

export const SeriesSchema = z.array(PeriodSchema)

export const CalculationRequestSchema = z.object({
  periods: SeriesSchema,
  totalDays: z.number().int().positive(),
})

export type Period = Readonly<z.infer<typeof PeriodSchema>>
export type Series = ReadonlyArray<Period>

export interface CalculationRequest {
  readonly periods: Series
  readonly totalDays: number
}

function freezeSeries(periods: z.infer<typeof SeriesSchema>): Series {
  return Object.freeze(periods.map((p) => Object.freeze(p)))
}

export function createPeriod(input: unknown): Period {
  return Object.freeze(PeriodSchema.parse(input))
}

/**
 * Parses a chronologically ordered list of periods. Length is not checked
 * here; the calculator rejects series shorter than two.
 */
export function parseSeries(input: unknown): Series {
  return freezeSeries(SeriesSchema.parse(input))
}

export function parseCalculationRequest(input: unknown): CalculationRequest {
  const parsed = CalculationRequestSchema.parse(input)
  return Object.freeze({
    periods: freezeSeries(parsed.periods),
    totalDays: parsed.totalDays,
  })
}
