import { CONSTANTS } from "./constants.js";
import { NumericDomainError } from "./errors.js";

const { RAD } = CONSTANTS;

// Rounding slack tolerated before an asin argument counts as out of domain.
const ASIN_EPSILON = 1e-12;

export function toRadians(degrees: number): number {
  return degrees * RAD;
}

export function toDegrees(radians: number): number {
  return radians / RAD;
}

/**
 * `Math.asin` that clamps arguments within rounding noise of [-1, 1] and
 * throws `NumericDomainError` for anything further out instead of returning NaN.
 */
export function guardedAsin(x: number): number {
  if (!Number.isFinite(x) || Math.abs(x) > 1 + ASIN_EPSILON) {
    throw new NumericDomainError("asin", x);
  }
  return Math.asin(Math.max(-1, Math.min(1, x)));
}
