import type { RouteRequest, RouteResponse } from "@valroute/clients-core";
import { useRouteClient } from "./useClients.js";
import { useRemote, type Remote } from "../utils/query.utils.js";
import { QUERY_KEYS } from "../utils/queryKeys.js";

/**
 * Fetch a route. The query stays idle while `request` is undefined.
 *
 * Usage:
 *   const route = useRoute({ locations, costing: "bicycle" });
 *   // route.data?.trip.legs: the parsed legs
 *   // route.isLoading: loading state
 */
export function useRoute(request: RouteRequest | undefined): Remote<RouteResponse> {
  const client = useRouteClient();

  return useRemote<RouteResponse>(
    async () => {
      if (!request) throw new Error("useRoute ran without a request");
      return client.route(request);
    },
    { keys: QUERY_KEYS.route, params: { request } },
    { enabled: request !== undefined },
  );
}

/** Fetch a route that visits the locations in the cheapest order */
export function useOptimizedRoute(request: RouteRequest | undefined): Remote<RouteResponse> {
  const client = useRouteClient();

  return useRemote<RouteResponse>(
    async () => {
      if (!request) throw new Error("useOptimizedRoute ran without a request");
      return client.optimizedRoute(request);
    },
    { keys: QUERY_KEYS.optimizedRoute, params: { request } },
    { enabled: request !== undefined },
  );
}
