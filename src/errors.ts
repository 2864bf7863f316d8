export class InvalidInputError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = "InvalidInputError";
    this.field = field;
  }
}

/**
 * Raised when an `asin` argument drifts outside [-1, 1] by more than rounding
 * noise, or is not finite.
 */
export class NumericDomainError extends Error {
  readonly value: number;

  constructor(operation: string, value: number) {
    super(`${operation} argument out of domain: ${value}`);
    this.name = "NumericDomainError";
    this.value = value;
  }
}
