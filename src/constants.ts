const RAD = Math.PI / 180;

/**
 * Fixed parameters of the low-precision solar model. Angles are radians unless
 * the name says otherwise.
 */
export const CONSTANTS = Object.freeze({
  RAD,
  DAY_MS: 1000 * 60 * 60 * 24,
  J1970: 2440588,
  J2000: 2451545,
  OBLIQUITY: RAD * 23.4397,
  PERIHELION: RAD * 102.9372,

  // Mean anomaly (degrees, degrees per day)
  MEAN_ANOMALY_AT_EPOCH: 357.5291,
  MEAN_ANOMALY_RATE: 0.98560028,

  // Equation of center (degrees)
  CENTER_1: 1.9148,
  CENTER_2: 0.02,
  CENTER_3: 0.0003,

  // Sidereal time (degrees, degrees per day)
  SIDEREAL_AT_EPOCH: 280.16,
  SIDEREAL_RATE: 360.9856235,
});

export type Constants = typeof CONSTANTS;
