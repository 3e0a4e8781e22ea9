import { distance, point } from '@turf/turf';

/**
 * Latitude/longitude in decimal degrees
 */
export interface LatLng {
  latitude: number;
  longitude: number;
}

/**
 * Geodesic distance provider, in kilometers
 */
export type DistanceFn = (from: LatLng, to: LatLng) => number;

/**
 * Great-circle distance in kilometers
 */
export const greatCircleDistanceKm: DistanceFn = (from, to) =>
  distance(point([from.longitude, from.latitude]), point([to.longitude, to.latitude]), {
    units: 'kilometers',
  });
