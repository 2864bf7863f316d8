import { CONSTANTS } from "./constants.js";
import { guardedAsin, toDegrees } from "./angles.js";
import { daysSinceJ2000 } from "./time.js";
import { sunEquatorialCoordinates } from "./sunCoords.js";
import { geoCoordinateSchema, parseOrThrow } from "./validation.js";
import type { Instant } from "./validation.js";

const { RAD, SIDEREAL_AT_EPOCH, SIDEREAL_RATE } = CONSTANTS;

export interface SunPosition {
  /** Radians; 0 south, π/2 west, -π/2 east, π north. */
  azimuth: number;
  /** Radians above the horizon. */
  altitude: number;
}

/**
 * Local sidereal time in radians.
 * @param lw Observer longitude, positive west, in radians
 */
export function siderealTime(d: number, lw: number): number {
  return RAD * (SIDEREAL_AT_EPOCH + SIDEREAL_RATE * d) - lw;
}

export function hourAngle(d: number, lw: number, rightAscension: number): number {
  return siderealTime(d, lw) - rightAscension;
}

export function azimuth(H: number, phi: number, dec: number): number {
  const az = Math.atan2(Math.sin(H), Math.cos(H) * Math.sin(phi) - Math.tan(dec) * Math.cos(phi));
  return az === -Math.PI ? Math.PI : az;
}

export function altitude(H: number, phi: number, dec: number): number {
  return guardedAsin(Math.sin(phi) * Math.sin(dec) + Math.cos(phi) * Math.cos(dec) * Math.cos(H));
}

export function getPosition(date: Instant, lat: number, lng: number): SunPosition {
  const { latitude, longitude } = parseOrThrow(
    geoCoordinateSchema,
    { latitude: lat, longitude: lng },
    "observer",
  );

  // Sidereal time wants longitude positive west.
  const lw = RAD * -longitude;
  const phi = RAD * latitude;
  const d = daysSinceJ2000(date);

  const { declination, rightAscension } = sunEquatorialCoordinates(d);
  const H = hourAngle(d, lw, rightAscension);

  return {
    azimuth: azimuth(H, phi, declination),
    altitude: altitude(H, phi, declination),
  };
}

export function getPositionDegrees(date: Instant, lat: number, lng: number): SunPosition {
  const pos = getPosition(date, lat, lng);
  return {
    azimuth: toDegrees(pos.azimuth),
    altitude: toDegrees(pos.altitude),
  };
}
