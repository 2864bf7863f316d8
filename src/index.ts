export { getPosition, getPositionDegrees, siderealTime, hourAngle, azimuth, altitude } from "./position.js";
export type { SunPosition } from "./position.js";

export {
  meanAnomaly,
  eclipticLongitude,
  declination,
  rightAscension,
  sunEquatorialCoordinates,
} from "./sunCoords.js";
export type { EquatorialCoordinates } from "./sunCoords.js";

export { toJulianDay, daysSinceJ2000 } from "./time.js";
export type { Instant, GeoCoordinate } from "./validation.js";

export { toRadians, toDegrees, guardedAsin } from "./angles.js";
export { CONSTANTS } from "./constants.js";
export type { Constants } from "./constants.js";

export { InvalidInputError, NumericDomainError } from "./errors.js";
