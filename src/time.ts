import { CONSTANTS } from "./constants.js";
import { instantSchema, parseOrThrow } from "./validation.js";
import type { Instant } from "./validation.js";

const { DAY_MS, J1970, J2000 } = CONSTANTS;

export function toMillis(instant: Instant): number {
  const parsed = parseOrThrow(instantSchema, instant, "instant");
  return typeof parsed === "number" ? parsed : parsed.getTime();
}

export function toJulianDay(instant: Instant): number {
  return toMillis(instant) / DAY_MS - 0.5 + J1970;
}

/** Fractional days since 2000-01-01 12:00 UTC. */
export function daysSinceJ2000(instant: Instant): number {
  return toJulianDay(instant) - J2000;
}
