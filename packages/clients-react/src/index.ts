// Context
export {
  ValhallaContext,
  useValhallaContext,
  type ValhallaContextValue,
} from "./context/ValhallaContext.js";
export { ValhallaProvider, type ValhallaProviderProps } from "./context/ValhallaProvider.js";

// Client hooks
export {
  useValhallaClient,
  useRouteClient,
  useMatrixClient,
  useMapMatchingClient,
  useStatusClient,
} from "./hooks/useClients.js";

// API hooks: Routes
export { useRoute, useOptimizedRoute } from "./hooks/useRoutes.js";

// API hooks: Matrix
export { useMatrix } from "./hooks/useMatrix.js";

// API hooks: Map matching
export { useTraceRoute } from "./hooks/useMapMatching.js";

// API hooks: Status
export { useStatus } from "./hooks/useStatus.js";

// Geometry
export { useDecodedShape, useTripShape } from "./hooks/useShape.js";

// Query utilities
export {
  type Remote,
  type Signature,
  type RemoteQueryOptions,
  queryKeyFor,
  useRemote,
  useDataMutation,
  invalidateQueriesContaining,
} from "./utils/query.utils.js";
export { QUERY_KEYS } from "./utils/queryKeys.js";

// Re-export core types for convenience
export type {
  ClientConfig,
  Coordinate,
  Location,
  CostingModel,
  CostingOptions,
  DirectionsOptions,
  RouteRequest,
  RouteResponse,
  MatrixRequest,
  MatrixResponse,
  MapMatchingRequest,
  MapMatchingResponse,
  StatusResponse,
  Trip,
  Leg,
  Maneuver,
} from "@valroute/clients-core";
