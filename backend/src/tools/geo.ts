import { ValidationError } from "../errors";

const EARTH_RADIUS_M = 6_371_000;

export function assertLatitude(field: string, value: number) {
  if (!Number.isFinite(value) || value < -90 || value > 90) {
    throw new ValidationError(field, `must be between -90 and 90 (got ${value})`);
  }
}

export function assertLongitude(field: string, value: number) {
  if (!Number.isFinite(value) || value < -180 || value > 180) {
    throw new ValidationError(field, `must be between -180 and 180 (got ${value})`);
  }
}

export function assertCoordinates(latitude: number, longitude: number, prefix = "") {
  assertLatitude(prefix ? `${prefix}_lat` : "latitude", latitude);
  assertLongitude(prefix ? `${prefix}_lon` : "longitude", longitude);
}

/** Great-circle distance in metres. */
export function haversineMeters(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const rad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = rad(lat2 - lat1);
  const dLon = rad(lon2 - lon1);
  const a = Math.sin(dLat / 2) ** 2 + Math.cos(rad(lat1)) * Math.cos(rad(lat2)) * Math.sin(dLon / 2) ** 2;
  return EARTH_RADIUS_M * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

export const round = (value: number, digits = 2) => {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
};
