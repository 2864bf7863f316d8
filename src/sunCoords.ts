import { CONSTANTS } from "./constants.js";
import { guardedAsin } from "./angles.js";

const {
  RAD,
  OBLIQUITY,
  PERIHELION,
  MEAN_ANOMALY_AT_EPOCH,
  MEAN_ANOMALY_RATE,
  CENTER_1,
  CENTER_2,
  CENTER_3,
} = CONSTANTS;

export interface EquatorialCoordinates {
  declination: number;
  rightAscension: number;
}

/**
 * Solar mean anomaly for `d` days since J2000, in radians. Not reduced to
 * [0, 2π); everything downstream is periodic.
 */
export function meanAnomaly(d: number): number {
  return RAD * (MEAN_ANOMALY_AT_EPOCH + MEAN_ANOMALY_RATE * d);
}

/**
 * Apparent ecliptic longitude of the Sun from its mean anomaly: equation of
 * center plus the perihelion, turned 180° to look from Earth.
 */
export function eclipticLongitude(M: number): number {
  const center =
    RAD * (CENTER_1 * Math.sin(M) + CENTER_2 * Math.sin(2 * M) + CENTER_3 * Math.sin(3 * M));
  return M + center + PERIHELION + Math.PI;
}

export function declination(l: number, b: number): number {
  return guardedAsin(
    Math.sin(b) * Math.cos(OBLIQUITY) + Math.cos(b) * Math.sin(OBLIQUITY) * Math.sin(l),
  );
}

export function rightAscension(l: number, b: number): number {
  return Math.atan2(
    Math.sin(l) * Math.cos(OBLIQUITY) - Math.tan(b) * Math.sin(OBLIQUITY),
    Math.cos(l),
  );
}

export function sunEquatorialCoordinates(d: number): EquatorialCoordinates {
  const L = eclipticLongitude(meanAnomaly(d));
  // the Sun sits on the ecliptic
  return {
    declination: declination(L, 0),
    rightAscension: rightAscension(L, 0),
  };
}
