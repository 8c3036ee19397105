// Codec
export { PRECISION_5, PRECISION_6, decodePolyline, encodePolyline } from "./polyline.js";
export { precisionForShapeFormat, decodeLegShape, decodeTripShape, encodeTrace } from "./shape.js";
export { laneDirections, describeLaneDirections } from "./lanes.js";
export {
  isTraceAttribute,
  listTraceAttributes,
  includeAllAttributes,
  excludeAllAttributes,
} from "./filters.js";

// Wire format
export {
  type WireObject,
  toSnakeCase,
  snakeKeys,
  serializeLocation,
  serializeCostingOptions,
  serializeDirectionsOptions,
  serializeTraceOptions,
  serializeRouteRequest,
  serializeMatrixRequest,
  serializeMapMatchingRequest,
  traceLocation,
} from "./serialize.js";
export {
  responseLocationSchema,
  summarySchema,
  maneuverSchema,
  legSchema,
  tripSchema,
  tripResponseSchema,
  matrixResponseSchema,
  statusResponseSchema,
  serviceErrorSchema,
  parseResponse,
} from "./schemas.js";

// Errors
export {
  MalformedPolylineError,
  ValhallaConfigError,
  ValhallaRequestError,
  ValhallaResponseError,
  type ResponseIssue,
} from "./errors.js";

// Base
export {
  BaseClient,
  type ClientConfig,
  type HttpMethod,
  type Logger,
  type RequestParams,
} from "./baseClient.js";
export { clientConfigFromEnv } from "./config.js";

// Domain clients
export { RouteClient } from "./routeClient.js";
export { MatrixClient } from "./matrixClient.js";
export { MapMatchingClient } from "./mapMatchingClient.js";
export { StatusClient } from "./statusClient.js";
export { ValhallaClient } from "./valhallaClient.js";

// Models
export * from "@valroute/types";
