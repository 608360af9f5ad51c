/** No parseable JSON object could be found in a model reply. */
export class ExtractionError extends Error {
  constructor(message = "Could not extract JSON object from model output") {
    super(message);
    this.name = "ExtractionError";
  }
}

/** A parsed reply does not satisfy the rating schema. */
export class RatingValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Rating failed validation: ${issues.join("; ")}`);
    this.name = "RatingValidationError";
    this.issues = issues;
  }
}

export class AdapterTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = "AdapterTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}
