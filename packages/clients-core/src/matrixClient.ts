import type { MatrixRequest, MatrixResponse } from "@valroute/types";
import { BaseClient, type ClientConfig } from "./baseClient.js";
import { matrixResponseSchema } from "./schemas.js";
import { serializeMatrixRequest } from "./serialize.js";

export class MatrixClient {
  private client: BaseClient;

  constructor(config: ClientConfig | BaseClient) {
    this.client = config instanceof BaseClient ? config : new BaseClient(config);
  }

  /** Time and distance from every source to every target */
  public async sourcesToTargets(request: MatrixRequest): Promise<MatrixResponse> {
    return this.client.send(
      { path: "sources_to_targets", body: serializeMatrixRequest(request) },
      matrixResponseSchema,
    );
  }
}
