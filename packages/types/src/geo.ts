/**
 * Geographic utility types.
 */

/** A WGS84 position in degrees, keyed the way the routing service keys it */
export interface Coordinate {
  lat: number;
  lon: number;
}
