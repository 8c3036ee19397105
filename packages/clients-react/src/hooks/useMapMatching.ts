import type { MapMatchingRequest, MapMatchingResponse } from "@valroute/clients-core";
import { useMapMatchingClient } from "./useClients.js";
import { useDataMutation } from "../utils/query.utils.js";
import { QUERY_KEYS } from "../utils/queryKeys.js";

/**
 * Mutation hook for matching a GPS trace. Only trace_route queries are
 * invalidated when it settles; route, matrix and status results stay cached.
 *
 * Usage:
 *   const traceRoute = useTraceRoute();
 *   traceRoute.mutate({ encodedPolyline: encodeTrace(points), costing: "auto" });
 *   // traceRoute.data: the matched trip
 */
export function useTraceRoute() {
  const client = useMapMatchingClient();

  return useDataMutation<MapMatchingResponse, MapMatchingRequest>({
    invalidates: QUERY_KEYS.traceRoute,
    mutationFn: async (request) => client.traceRoute(request),
  });
}
