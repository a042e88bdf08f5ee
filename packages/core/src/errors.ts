/**
 * Thrown when a model configuration's weights do not add up to 1.
 * Raised once, when a predictor is created, never per prediction.
 */
export class InvalidWeightConfigurationError extends Error {
  readonly sum: number;

  constructor(sum: number) {
    super(`Model weights must sum to 1 (got ${sum})`);
    this.name = "InvalidWeightConfigurationError";
    this.sum = sum;
  }
}
