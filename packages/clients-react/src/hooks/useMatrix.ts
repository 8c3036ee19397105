import type { MatrixRequest, MatrixResponse } from "@valroute/clients-core";
import { useMatrixClient } from "./useClients.js";
import { useRemote, type Remote } from "../utils/query.utils.js";
import { QUERY_KEYS } from "../utils/queryKeys.js";

/** Fetch a time/distance matrix; idle while `request` is undefined */
export function useMatrix(request: MatrixRequest | undefined): Remote<MatrixResponse> {
  const client = useMatrixClient();

  return useRemote<MatrixResponse>(
    async () => {
      if (!request) throw new Error("useMatrix ran without a request");
      return client.sourcesToTargets(request);
    },
    { keys: QUERY_KEYS.matrix, params: { request } },
    { enabled: request !== undefined },
  );
}
