import { describe, it, expect, vi } from "vitest";
import { pino } from "pino";
import { z, ZodError } from "zod";
import {
  CategorizedError,
  ErrorCategory,
  ErrorSeverity,
  InsufficientPeriodsError,
  NonFiniteResultError,
  ZeroDenominatorError,
  handleAndLogError,
  isCalculationError,
} from "../../src/utils/errors.js";

describe("calculation errors", () => {
  it("describes insufficient periods", () => {
    const error = new InsufficientPeriodsError(1);

    expect(error.kind).toBe("InsufficientPeriods");
    expect(error.name).toBe("InsufficientPeriodsError");
    expect(error.message).toBe("At least 2 periods required for TWR calculation");
    expect(error.category).toBe(ErrorCategory.VALIDATION);
    expect(error.severity).toBe(ErrorSeverity.LOW);
    expect(error.retryable).toBe(false);
    expect(error.context).toEqual({ periodCount: 1 });
  });

  it("names the period holding the zero denominator", () => {
    const error = new ZeroDenominatorError(2);

    expect(error.kind).toBe("ZeroDenominator");
    expect(error.message).toBe("Zero adjusted portfolio value at period 1");
    expect(error.context).toEqual({ periodIndex: 2, denominatorIndex: 1 });
  });

  it("records the stage of a non-finite result", () => {
    const error = new NonFiniteResultError("annualization", Number.NaN);

    expect(error.kind).toBe("NonFiniteResult");
    expect(error.message).toBe("Non-finite return produced during annualization");
    expect(error.context).toEqual({ stage: "annualization", value: "NaN" });
  });

  it("recognises calculation errors", () => {
    expect(isCalculationError(new ZeroDenominatorError(1))).toBe(true);
    expect(isCalculationError(new CategorizedError("x", ErrorCategory.INTERNAL))).toBe(false);
    expect(isCalculationError(new Error("x"))).toBe(false);
  });
});

describe("handleAndLogError", () => {
  function silentLogger() {
    const log = pino({ level: "silent" });
    const error = vi.spyOn(log, "error");
    return { log, error };
  }

  it("passes categorized errors through and logs them once", () => {
    const { log, error: logError } = silentLogger();
    const original = new ZeroDenominatorError(2);

    const result = handleAndLogError(original, { hedged: true }, "buildReport", log);

    expect(result).toBe(original);
    expect(logError).toHaveBeenCalledTimes(1);
    expect(logError).toHaveBeenCalledWith(
      expect.objectContaining({
        operation: "buildReport",
        category: "validation",
        kind: "ZeroDenominator",
      }),
      "Operation failed",
    );
  });

  it("categorizes zod failures as validation errors", () => {
    const { log } = silentLogger();
    const parsed = z.object({ n: z.number() }).safeParse({ n: "x" });
    const zodError = parsed.success ? undefined : parsed.error;
    expect(zodError).toBeInstanceOf(ZodError);

    const result = handleAndLogError(zodError, {}, "parse", log);

    expect(result.category).toBe(ErrorCategory.VALIDATION);
    expect(result.message).toBe("Validation error in parse: 1 invalid field(s)");
    expect(result.cause).toBe(zodError);
  });

  it("categorizes anything else as internal", () => {
    const { log } = silentLogger();
    const boom = new Error("boom");

    const fromError = handleAndLogError(boom, { step: 1 }, "op", log);
    const fromString = handleAndLogError("oops", {}, "op", log);

    expect(fromError.category).toBe(ErrorCategory.INTERNAL);
    expect(fromError.severity).toBe(ErrorSeverity.HIGH);
    expect(fromError.message).toBe("Internal error in op: boom");
    expect(fromError.cause).toBe(boom);
    expect(fromError.context).toEqual({ step: 1, originalError: "boom" });
    expect(fromString.message).toBe("Internal error in op: oops");
    expect(fromString.cause).toBeUndefined();
  });
});
