import type { StatusResponse } from "@valroute/types";
import { BaseClient, type ClientConfig } from "./baseClient.js";
import { statusResponseSchema } from "./schemas.js";

export class StatusClient {
  private client: BaseClient;

  constructor(config: ClientConfig | BaseClient) {
    this.client = config instanceof BaseClient ? config : new BaseClient(config);
  }

  /** Service version, plus tileset details when verbose */
  public async status(options: { verbose?: boolean } = {}): Promise<StatusResponse> {
    return this.client.send(
      { path: "status", body: options.verbose ? { verbose: true } : undefined },
      statusResponseSchema,
    );
  }
}
