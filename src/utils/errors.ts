export class GuardianError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed reading or request. The caller discards it and moves on. */
export class InvalidInputError extends GuardianError {
  constructor(message: string, code: string = "INVALID_INPUT") {
    super(code, message);
  }
}

export class InvalidStopError extends InvalidInputError {
  readonly entryPrice: number;
  readonly stopPrice: number;

  constructor(entryPrice: number, stopPrice: number) {
    super(
      `Stop ${stopPrice} gives no risk per unit against entry ${entryPrice}`,
      "INVALID_STOP"
    );
    this.entryPrice = entryPrice;
    this.stopPrice = stopPrice;
  }
}

/** Not enough trade history for the requested statistic; triggers a fallback. */
export class InsufficientDataError extends GuardianError {
  readonly available: number;
  readonly required: number;

  constructor(available: number, required: number) {
    super(
      "INSUFFICIENT_DATA",
      `${available} trades recorded, ${required} required`
    );
    this.available = available;
    this.required = required;
  }
}

export class ComponentFailure extends GuardianError {
  readonly stage: string;
  readonly underlying: unknown;

  constructor(stage: string, cause: unknown) {
    super(
      "COMPONENT_FAILURE",
      `${stage} failed: ${cause instanceof Error ? cause.message : String(cause)}`
    );
    this.stage = stage;
    this.underlying = cause;
  }
}

export class ConfigValidationError extends GuardianError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_CONFIG", `Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}
