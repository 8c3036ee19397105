import type { MapMatchingRequest, MapMatchingResponse } from "@valroute/types";
import { BaseClient, type ClientConfig } from "./baseClient.js";
import { tripResponseSchema } from "./schemas.js";
import { serializeMapMatchingRequest } from "./serialize.js";

export class MapMatchingClient {
  private client: BaseClient;

  constructor(config: ClientConfig | BaseClient) {
    this.client = config instanceof BaseClient ? config : new BaseClient(config);
  }

  /** Snap a GPS trace to the road network and return it as a trip */
  public async traceRoute(request: MapMatchingRequest): Promise<MapMatchingResponse> {
    // Serialized before sending so a request without a trace fails fast
    const body = serializeMapMatchingRequest(request);
    return this.client.send({ path: "trace_route", body }, tripResponseSchema);
  }
}
