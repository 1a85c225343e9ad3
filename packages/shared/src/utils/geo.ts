import type { Position } from '../types/route.js';

const EARTH_RADIUS_NM = 3440.065;
const DEG_TO_RAD = Math.PI / 180;

/** Nautical miles per degree of latitude */
export const NM_PER_DEG_LAT = 60.007;

/** Convert degrees to radians */
export function toRadians(degrees: number): number {
  return degrees * DEG_TO_RAD;
}

/**
 * Normalize heading to 0-360 range
 */
export function normalizeHeading(heading: number): number {
  return ((heading % 360) + 360) % 360;
}

/**
 * Move a position by a short distance along a bearing, treating the
 * earth as locally flat. Good enough for a few miles of holding leg.
 */
export function offsetFlat(
  start: Position,
  bearingDeg: number,
  distanceNm: number
): Position {
  const bearing = toRadians(bearingDeg);
  const dLat = (distanceNm / NM_PER_DEG_LAT) * Math.cos(bearing);
  const dLon =
    ((distanceNm / NM_PER_DEG_LAT) * Math.sin(bearing)) /
    Math.cos(toRadians(start.lat));

  return { lat: start.lat + dLat, lon: start.lon + dLon };
}

/**
 * Stereographic projection: lat/lon → plane coordinates
 * Returns coordinates in nautical miles from center (y north)
 */
export function stereographicProject(
  position: Position,
  center: Position
): { x: number; y: number } {
  const lat = toRadians(position.lat);
  const lon = toRadians(position.lon);
  const lat0 = toRadians(center.lat);
  const lon0 = toRadians(center.lon);

  const cosLat = Math.cos(lat);
  const sinLat = Math.sin(lat);
  const cosLat0 = Math.cos(lat0);
  const sinLat0 = Math.sin(lat0);
  const dLon = lon - lon0;
  const cosDLon = Math.cos(dLon);

  const k =
    (2 * EARTH_RADIUS_NM) /
    (1 + sinLat0 * sinLat + cosLat0 * cosLat * cosDLon);

  const x = k * cosLat * Math.sin(dLon);
  const y = k * (cosLat0 * sinLat - sinLat0 * cosLat * cosDLon);

  return { x, y };
}
