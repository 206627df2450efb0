import type { GpxPoint } from './types.js';

export const EARTH_RADIUS_METERS = 6371000;

/**
 * Calculate 2D distance between two points using Haversine formula
 * Returns distance in meters
 */
export function haversineDistance(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): number {
  const φ1 = lat1 * Math.PI / 180;
  const φ2 = lat2 * Math.PI / 180;
  const Δφ = (lat2 - lat1) * Math.PI / 180;
  const Δλ = (lon2 - lon1) * Math.PI / 180;

  const a = Math.sin(Δφ / 2) ** 2 +
            Math.cos(φ1) * Math.cos(φ2) * Math.sin(Δλ / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_METERS * c;
}

/**
 * Calculate distance between two GpxPoints (2D, ignoring elevation)
 */
export function pointToPointDistance(p1: GpxPoint, p2: GpxPoint): number {
  return haversineDistance(p1.lat, p1.lon, p2.lat, p2.lon);
}

/**
 * Total length of a point sequence, summing each consecutive leg.
 * Fewer than two points have no length.
 */
export function trackDistance(points: readonly GpxPoint[]): number {
  let total = 0;
  for (let i = 1; i < points.length; i++) {
    total += pointToPointDistance(points[i - 1], points[i]);
  }
  return total;
}
