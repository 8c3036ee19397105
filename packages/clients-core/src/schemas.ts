/**
 * Response schemas.
 *
 * Each schema validates the service's snake_case JSON and transforms it
 * into the camelCase model from @valroute/types. Unknown keys are dropped.
 */

import { z } from "zod";
import {
  ManeuverType,
  type Lane,
  type Leg,
  type Maneuver,
  type MatrixElement,
  type MatrixResponse,
  type ResponseLocation,
  type ServiceErrorBody,
  type Sign,
  type SignElement,
  type StatusResponse,
  type Summary,
  type TransitInfo,
  type TransitStop,
  type TravelMode,
  type TravelType,
  type Trip,
  type TripResponse,
} from "@valroute/types";
import { ValhallaResponseError } from "./errors.js";

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

const traceTypeSchema = z.enum(["break", "via", "through", "break_through"]);
const sideOfStreetSchema = z.enum(["left", "right", "both"]);
const travelModeSchema = z.enum(["drive", "pedestrian", "bicycle", "transit"]);

const vehicleTypeSchema = z.enum(["car", "motorcycle", "bus", "tractor_trailer", "motor_scooter"]);
const pedestrianTypeSchema = z.enum(["foot", "wheelchair", "segway"]);
const bicycleTypeSchema = z.enum(["road", "cross", "hybrid", "mountain"]);
const transitTypeSchema = z.enum([
  "tram",
  "metro",
  "rail",
  "bus",
  "ferry",
  "cable_car",
  "gondola",
  "funicular",
]);

/** The travel type's allowed values depend on the travel mode */
function toTravelType(mode: TravelMode, type: string): TravelType | undefined {
  switch (mode) {
    case "drive": {
      const parsed = vehicleTypeSchema.safeParse(type);
      return parsed.success ? { mode, type: parsed.data } : undefined;
    }
    case "pedestrian": {
      const parsed = pedestrianTypeSchema.safeParse(type);
      return parsed.success ? { mode, type: parsed.data } : undefined;
    }
    case "bicycle": {
      const parsed = bicycleTypeSchema.safeParse(type);
      return parsed.success ? { mode, type: parsed.data } : undefined;
    }
    case "transit": {
      const parsed = transitTypeSchema.safeParse(type);
      return parsed.success ? { mode, type: parsed.data } : undefined;
    }
  }
}

// ---------------------------------------------------------------------------
// Locations & summaries
// ---------------------------------------------------------------------------

export const responseLocationSchema = z
  .object({
    lat: z.number(),
    lon: z.number(),
    type: traceTypeSchema.optional(),
    original_index: z.number().int().optional(),
    side_of_street: sideOfStreetSchema.optional(),
    name: z.string().optional(),
    street: z.string().optional(),
    city: z.string().optional(),
    state: z.string().optional(),
    postal_code: z.string().optional(),
    country: z.string().optional(),
    date_time: z.string().optional(),
  })
  .transform(
    (l): ResponseLocation => ({
      lat: l.lat,
      lon: l.lon,
      type: l.type,
      originalIndex: l.original_index,
      sideOfStreet: l.side_of_street,
      name: l.name,
      street: l.street,
      city: l.city,
      state: l.state,
      postalCode: l.postal_code,
      country: l.country,
      dateTime: l.date_time,
    }),
  );

export const summarySchema = z
  .object({
    time: z.number(),
    length: z.number(),
    has_toll: z.boolean().default(false),
    has_ferry: z.boolean().default(false),
    has_highway: z.boolean().default(false),
    has_time_restrictions: z.boolean().default(false),
    min_lat: z.number(),
    min_lon: z.number(),
    max_lat: z.number(),
    max_lon: z.number(),
    cost: z.number().optional(),
  })
  .transform(
    (s): Summary => ({
      time: s.time,
      length: s.length,
      hasToll: s.has_toll,
      hasFerry: s.has_ferry,
      hasHighway: s.has_highway,
      hasTimeRestrictions: s.has_time_restrictions,
      minLat: s.min_lat,
      minLon: s.min_lon,
      maxLat: s.max_lat,
      maxLon: s.max_lon,
      cost: s.cost,
    }),
  );

// ---------------------------------------------------------------------------
// Maneuvers
// ---------------------------------------------------------------------------

const signElementSchema = z
  .object({
    text: z.string(),
    consecutive_count: z.number().int().default(0),
  })
  .transform((e): SignElement => ({ text: e.text, consecutiveCount: e.consecutive_count }));

const signSchema = z
  .object({
    exit_number_elements: z.array(signElementSchema).optional(),
    exit_branch_elements: z.array(signElementSchema).optional(),
    exit_toward_elements: z.array(signElementSchema).optional(),
    exit_name_elements: z.array(signElementSchema).optional(),
  })
  .transform(
    (s): Sign => ({
      exitNumberElements: s.exit_number_elements,
      exitBranchElements: s.exit_branch_elements,
      exitTowardElements: s.exit_toward_elements,
      exitNameElements: s.exit_name_elements,
    }),
  );

const laneSchema = z
  .object({
    directions: z.number().int(),
    active: z.number().int().optional(),
    valid: z.number().int().optional(),
  })
  .transform((l): Lane => ({ directions: l.directions, active: l.active, valid: l.valid }));

const transitStopSchema = z
  .object({
    type: z.union([z.literal(0), z.literal(1)]),
    name: z.string(),
    arrival_time: z.string(),
    departure_time: z.string(),
    assumed_schedule: z.boolean(),
    lat: z.number(),
    lon: z.number(),
  })
  .transform(
    (s): TransitStop => ({
      type: s.type === 0 ? "stop" : "station",
      name: s.name,
      arrivalTime: s.arrival_time,
      departureTime: s.departure_time,
      assumedSchedule: s.assumed_schedule,
      lat: s.lat,
      lon: s.lon,
    }),
  );

const transitInfoSchema = z
  .object({
    onestop_id: z.string(),
    short_name: z.string(),
    long_name: z.string(),
    headsign: z.string(),
    color: z.number().int(),
    text_color: z.number().int(),
    description: z.string(),
    operator_onestop_id: z.string(),
    operator_name: z.string(),
    operator_url: z.string(),
    transit_stops: z.array(transitStopSchema),
  })
  .transform(
    (t): TransitInfo => ({
      onestopId: t.onestop_id,
      shortName: t.short_name,
      longName: t.long_name,
      headsign: t.headsign,
      color: t.color,
      textColor: t.text_color,
      description: t.description,
      operatorOnestopId: t.operator_onestop_id,
      operatorName: t.operator_name,
      operatorUrl: t.operator_url,
      transitStops: t.transit_stops,
    }),
  );

export const maneuverSchema = z
  .object({
    type: z.nativeEnum(ManeuverType),
    instruction: z.string().optional(),
    verbal_succinct_transition_instruction: z.string().optional(),
    verbal_pre_transition_instruction: z.string().optional(),
    verbal_post_transition_instruction: z.string().optional(),
    street_names: z.array(z.string()).default([]),
    begin_street_names: z.array(z.string()).optional(),
    time: z.number(),
    length: z.number(),
    cost: z.number().optional(),
    begin_shape_index: z.number().int(),
    end_shape_index: z.number().int(),
    verbal_multi_cue: z.boolean().default(false),
    travel_mode: travelModeSchema,
    travel_type: z.string(),
    toll: z.boolean().default(false),
    highway: z.boolean().default(false),
    ferry: z.boolean().default(false),
    sign: signSchema.optional(),
    roundabout_exit_count: z.number().int().optional(),
    depart_instruction: z.string().optional(),
    verbal_depart_instruction: z.string().optional(),
    arrive_instruction: z.string().optional(),
    verbal_arrive_instruction: z.string().optional(),
    transit_info: transitInfoSchema.optional(),
    bearing_before: z.number().optional(),
    bearing_after: z.number().optional(),
    lanes: z.array(laneSchema).optional(),
  })
  .transform((m, ctx): Maneuver => {
    const travelType = toTravelType(m.travel_mode, m.travel_type);
    if (!travelType) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["travel_type"],
        message: `"${m.travel_type}" is not a ${m.travel_mode} travel type`,
      });
      return z.NEVER;
    }
    return {
      type: m.type,
      instruction: m.instruction,
      verbalSuccinctTransitionInstruction: m.verbal_succinct_transition_instruction,
      verbalPreTransitionInstruction: m.verbal_pre_transition_instruction,
      verbalPostTransitionInstruction: m.verbal_post_transition_instruction,
      streetNames: m.street_names,
      beginStreetNames: m.begin_street_names,
      time: m.time,
      length: m.length,
      cost: m.cost,
      beginShapeIndex: m.begin_shape_index,
      endShapeIndex: m.end_shape_index,
      verbalMultiCue: m.verbal_multi_cue,
      travelMode: m.travel_mode,
      travelType,
      toll: m.toll,
      highway: m.highway,
      ferry: m.ferry,
      sign: m.sign,
      roundaboutExitCount: m.roundabout_exit_count,
      departInstruction: m.depart_instruction,
      verbalDepartInstruction: m.verbal_depart_instruction,
      arriveInstruction: m.arrive_instruction,
      verbalArriveInstruction: m.verbal_arrive_instruction,
      transitInfo: m.transit_info,
      bearingBefore: m.bearing_before,
      bearingAfter: m.bearing_after,
      lanes: m.lanes,
    };
  });

// ---------------------------------------------------------------------------
// Trips
// ---------------------------------------------------------------------------

export const legSchema = z
  .object({
    maneuvers: z.array(maneuverSchema).optional(),
    summary: summarySchema.optional(),
    shape: z.string().optional(),
  })
  .transform((l): Leg => ({ maneuvers: l.maneuvers, summary: l.summary, shape: l.shape }));

export const tripSchema = z
  .object({
    status: z.number().int(),
    status_message: z.string(),
    units: z.string(),
    language: z.string(),
    summary: summarySchema.optional(),
    legs: z.array(legSchema).optional(),
    locations: z.array(responseLocationSchema).optional(),
  })
  .transform(
    (t): Trip => ({
      status: t.status,
      statusMessage: t.status_message,
      units: t.units,
      language: t.language,
      summary: t.summary,
      legs: t.legs,
      locations: t.locations,
    }),
  );

export const tripResponseSchema = z
  .object({
    trip: tripSchema,
    alternates: z.array(z.object({ trip: tripSchema })).optional(),
    id: z.string().optional(),
  })
  .transform((r): TripResponse => ({ trip: r.trip, alternates: r.alternates, id: r.id }));

// ---------------------------------------------------------------------------
// Matrix
// ---------------------------------------------------------------------------

/** Unreachable pairs come back either as null or with null time/distance */
const matrixElementSchema = z
  .object({
    time: z.number().nullable(),
    distance: z.number().nullable(),
    from_index: z.number().int().optional(),
    to_index: z.number().int().optional(),
    to_edge_distance: z.number().optional(),
    from_edge_distance: z.number().optional(),
  })
  .nullable()
  .transform((e): MatrixElement | null => {
    if (e === null || e.time === null || e.distance === null) return null;
    return {
      time: e.time,
      distance: e.distance,
      fromIndex: e.from_index,
      toIndex: e.to_index,
      toEdgeDistance: e.to_edge_distance,
      fromEdgeDistance: e.from_edge_distance,
    };
  });

const warningSchema = z
  .union([z.string(), z.object({ code: z.number().optional(), text: z.string() })])
  .transform((w) => (typeof w === "string" ? w : w.text));

export const matrixResponseSchema = z
  .object({
    sources: z.array(responseLocationSchema),
    targets: z.array(responseLocationSchema),
    sources_to_targets: z.array(z.array(matrixElementSchema)),
    targets_to_sources: z.array(z.array(matrixElementSchema)).optional(),
    units: z.string(),
    shape: z.string().optional(),
    warnings: z.array(warningSchema).optional(),
    id: z.string().optional(),
  })
  .transform(
    (m): MatrixResponse => ({
      sources: m.sources,
      targets: m.targets,
      sourcesToTargets: m.sources_to_targets,
      targetsToSources: m.targets_to_sources,
      units: m.units,
      shape: m.shape,
      warnings: m.warnings,
      id: m.id,
    }),
  );

// ---------------------------------------------------------------------------
// Status / errors
// ---------------------------------------------------------------------------

export const statusResponseSchema = z
  .object({
    version: z.string(),
    tileset_last_modified: z.number().optional(),
    available_actions: z.array(z.string()).optional(),
    has_tiles: z.boolean().optional(),
  })
  .transform(
    (s): StatusResponse => ({
      version: s.version,
      tilesetLastModified: s.tileset_last_modified,
      availableActions: s.available_actions,
      hasTiles: s.has_tiles,
    }),
  );

export const serviceErrorSchema = z
  .object({
    error_code: z.number().int().optional(),
    error: z.string(),
    status_code: z.number().int().optional(),
    status: z.string().optional(),
  })
  .transform(
    (e): ServiceErrorBody => ({
      errorCode: e.error_code,
      error: e.error,
      statusCode: e.status_code,
      status: e.status,
    }),
  );

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Validate a response body.
 * @throws {ValhallaResponseError} listing every issue found
 */
export function parseResponse<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  action: string,
): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
    }));
    const first = issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join(".")}` : "";
    throw new ValhallaResponseError(
      `Unexpected ${action} response${where}: ${first?.message ?? "invalid body"}`,
      issues,
    );
  }
  return result.data;
}
