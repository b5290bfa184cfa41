/**
 * Geodesy
 * Great-circle distance and forward bearing on a spherical Earth
 */

import type { GeoPoint } from '../core/types.js';

export const EARTH_RADIUS_KM = 6371;
export const KM_TO_NM = 0.539957;

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

/**
 * Haversine distance in nautical miles
 */
export function distanceNM(p1: GeoPoint, p2: GeoPoint): number {
  const dLat = toRadians(p2.latitude - p1.latitude);
  const dLon = toRadians(p2.longitude - p1.longitude);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(p1.latitude)) *
      Math.cos(toRadians(p2.latitude)) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);

  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_KM * c * KM_TO_NM;
}

/**
 * Forward azimuth from p1 toward p2, in [0, 360)
 */
export function bearingDeg(p1: GeoPoint, p2: GeoPoint): number {
  const dLon = toRadians(p2.longitude - p1.longitude);
  const lat1 = toRadians(p1.latitude);
  const lat2 = toRadians(p2.latitude);

  const y = Math.sin(dLon) * Math.cos(lat2);
  const x = Math.cos(lat1) * Math.sin(lat2) - Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLon);

  return normalizeHeading(toDegrees(Math.atan2(y, x)));
}

/**
 * Wrap any angle into [0, 360)
 */
export function normalizeHeading(degrees: number): number {
  const wrapped = ((degrees % 360) + 360) % 360;
  // -1e-15 % 360 + 360 rounds to exactly 360
  return wrapped >= 360 ? 0 : wrapped;
}
