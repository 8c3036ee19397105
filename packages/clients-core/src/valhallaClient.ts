import { BaseClient, type ClientConfig } from "./baseClient.js";
import { MapMatchingClient } from "./mapMatchingClient.js";
import { MatrixClient } from "./matrixClient.js";
import { RouteClient } from "./routeClient.js";
import { StatusClient } from "./statusClient.js";

/**
 * Every service action behind one configuration. The domain clients share
 * a single transport, so `setToken` reaches all of them.
 */
export class ValhallaClient {
  public readonly routes: RouteClient;
  public readonly matrix: MatrixClient;
  public readonly mapMatching: MapMatchingClient;
  public readonly status: StatusClient;
  private transport: BaseClient;

  constructor(config: ClientConfig) {
    this.transport = new BaseClient(config);
    this.routes = new RouteClient(this.transport);
    this.matrix = new MatrixClient(this.transport);
    this.mapMatching = new MapMatchingClient(this.transport);
    this.status = new StatusClient(this.transport);
  }

  public setToken(token: string | undefined): void {
    this.transport.setToken(token);
  }
}
