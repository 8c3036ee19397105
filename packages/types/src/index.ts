/**
 * @valroute/types
 *
 * Shared model types for the routing service client.
 *
 * - Enums: Wire values of the service's enumerations
 * - Request: Locations, costing and the route/matrix/trace requests
 * - Response: Trips, legs, maneuvers and matrices
 * - Geo: Coordinates and bounding boxes
 */

export * from "./enums.js";
export * from "./request.js";
export * from "./response.js";
export * from "./geo.js";
