/**
 * Request serialization: camelCase models to the service's snake_case JSON.
 *
 * Model field names are the camelCase spelling of the wire keys, so the
 * rename is mechanical. Nested models are serialized explicitly; opaque
 * values (e.g. transit mode filters) are passed through untouched.
 */

import type {
  CostingModel,
  CostingOptions,
  DirectionsOptions,
  Location,
  MapMatchingRequest,
  MatrixRequest,
  RouteRequest,
  TraceOptions,
} from "@valroute/types";

export type WireObject = Record<string, unknown>;

export function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (c) => "_" + c.toLowerCase());
}

/** Shallow copy with snake_case keys, dropping undefined values */
export function snakeKeys(value: object): WireObject {
  const out: WireObject = {};
  for (const [key, field] of Object.entries(value)) {
    if (field === undefined) continue;
    out[toSnakeCase(key)] = field;
  }
  return out;
}

// ---------------------------------------------------------------------------
// Models
// ---------------------------------------------------------------------------

export function serializeLocation(location: Location): WireObject {
  const { displayLat, displayLon, searchFilter, ...rest } = location;
  const wire = snakeKeys(rest);
  // The display position is only meaningful as a pair
  if (displayLat !== undefined && displayLon !== undefined) {
    wire["display_lat"] = displayLat;
    wire["display_lon"] = displayLon;
  }
  if (searchFilter) {
    wire["search_filter"] = snakeKeys(searchFilter);
  }
  return wire;
}

/** Costing options are keyed by the costing model they apply to */
export function serializeCostingOptions(
  costing: CostingModel,
  options: CostingOptions,
): WireObject {
  return { [costing]: snakeKeys(options) };
}

/**
 * Directions options. Shape format and banner/voice instructions only
 * exist in the OSRM-compatible output, so they are dropped for every
 * other format and defaulted (polyline6, true, true) for OSRM.
 */
export function serializeDirectionsOptions(options: DirectionsOptions): WireObject {
  const { shapeFormat, bannerInstructions, voiceInstructions, ...rest } = options;
  const wire = snakeKeys(rest);
  if (options.format === "osrm") {
    wire["shape_format"] = shapeFormat ?? "polyline6";
    wire["banner_instructions"] = bannerInstructions ?? true;
    wire["voice_instructions"] = voiceInstructions ?? true;
  }
  return wire;
}

export function serializeTraceOptions(options: TraceOptions): WireObject {
  return snakeKeys(options);
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export function serializeRouteRequest(request: RouteRequest): WireObject {
  const { locations, costingOptions, directionsOptions, excludeLocations, ...rest } = request;
  const wire = snakeKeys(rest);
  wire["locations"] = locations.map(serializeLocation);
  if (costingOptions) {
    wire["costing_options"] = serializeCostingOptions(request.costing, costingOptions);
  }
  if (excludeLocations) {
    wire["exclude_locations"] = excludeLocations.map(serializeLocation);
  }
  // Route requests take directions options at the top level
  return directionsOptions ? { ...wire, ...serializeDirectionsOptions(directionsOptions) } : wire;
}

export function serializeMatrixRequest(request: MatrixRequest): WireObject {
  const { sources, targets, costingOptions, ...rest } = request;
  const wire = snakeKeys(rest);
  wire["sources"] = sources.map(serializeLocation);
  if (targets) {
    wire["targets"] = targets.map(serializeLocation);
  }
  if (costingOptions) {
    wire["costing_options"] = serializeCostingOptions(request.costing, costingOptions);
  }
  return wire;
}

export function serializeMapMatchingRequest(request: MapMatchingRequest): WireObject {
  const {
    shape,
    encodedPolyline,
    costingOptions,
    directionsOptions,
    traceOptions,
    beginTime,
    durations,
    ...rest
  } = request;
  const wire = snakeKeys(rest);

  if (shape) {
    wire["shape"] = shape.map(serializeLocation);
  } else if (encodedPolyline !== undefined) {
    wire["encoded_polyline"] = encodedPolyline;
  } else {
    throw new TypeError("A map-matching request needs either shape or encodedPolyline");
  }

  if (costingOptions) {
    wire["costing_options"] = serializeCostingOptions(request.costing, costingOptions);
  }
  if (directionsOptions) {
    wire["directions_options"] = serializeDirectionsOptions(directionsOptions);
  }
  if (traceOptions) {
    wire["trace_options"] = serializeTraceOptions(traceOptions);
  }
  // Timing is only usable when both the start and the intervals are known
  if (beginTime !== undefined && durations !== undefined) {
    wire["begin_time"] = beginTime;
    wire["durations"] = durations;
  }
  return wire;
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

/**
 * A trace point for map matching. The timestamp is given in milliseconds
 * (as `Date.now()` returns it) and sent as whole seconds.
 */
export function traceLocation(
  coordinate: { lat: number; lon: number },
  timestampMs: number,
  options: Omit<Location, "lat" | "lon" | "time"> = {},
): Location {
  return {
    ...options,
    lat: coordinate.lat,
    lon: coordinate.lon,
    time: Math.trunc(timestampMs / 1000),
  };
}
