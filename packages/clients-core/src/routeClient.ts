import type { RouteRequest, RouteResponse } from "@valroute/types";
import { BaseClient, type ClientConfig } from "./baseClient.js";
import { tripResponseSchema } from "./schemas.js";
import { serializeRouteRequest } from "./serialize.js";

export class RouteClient {
  private client: BaseClient;

  constructor(config: ClientConfig | BaseClient) {
    this.client = config instanceof BaseClient ? config : new BaseClient(config);
  }

  /** Route through the locations in the order given */
  public async route(request: RouteRequest): Promise<RouteResponse> {
    return this.client.send(
      { path: "route", body: serializeRouteRequest(request) },
      tripResponseSchema,
    );
  }

  /**
   * Route through the locations in the cheapest order. The first and
   * last locations stay in place.
   */
  public async optimizedRoute(request: RouteRequest): Promise<RouteResponse> {
    return this.client.send(
      { path: "optimized_route", body: serializeRouteRequest(request) },
      tripResponseSchema,
    );
  }
}
