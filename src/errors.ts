/**
 * Error taxonomy shared by the calculation engine and the HTTP layer.
 *
 * Every engine failure carries a stable `errorCode` and the HTTP status the
 * service answers with, so routes can reply `{ errorCode, errorMessage }`
 * without inspecting messages.
 */
export abstract class CalcError extends Error {
  abstract readonly errorCode: string;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  /** Extra fields merged into the error reply body. */
  details(): Record<string, unknown> {
    return {};
  }
}

/** Malformed build, spread, move or context; never silently corrected. */
export class ValidationError extends CalcError {
  readonly errorCode = "VALIDATION_FAILED";
  readonly statusCode = 400;
}

/** A recognized move/item/ability interaction the engine does not model. */
export class UnsupportedMechanicError extends CalcError {
  readonly errorCode = "UNSUPPORTED_MECHANIC";
  readonly statusCode = 422;
}

/**
 * A well-formed optimization request with no answer in the legal
 * allocation space. Carries the per-constraint diagnostic.
 */
export class InfeasibleSpreadError<TDiagnostic = unknown> extends CalcError {
  readonly errorCode = "INFEASIBLE_SPREAD";
  readonly statusCode = 422;

  constructor(
    message: string,
    readonly diagnostic: TDiagnostic,
  ) {
    super(message);
  }

  override details(): Record<string, unknown> {
    return { diagnostic: this.diagnostic };
  }
}
