import type { StatusResponse } from "@valroute/clients-core";
import { useStatusClient } from "./useClients.js";
import { useRemote, type Remote } from "../utils/query.utils.js";
import { QUERY_KEYS } from "../utils/queryKeys.js";

/** Fetch service status */
export function useStatus(options: { verbose?: boolean } = {}): Remote<StatusResponse> {
  const client = useStatusClient();
  const verbose = options.verbose ?? false;

  return useRemote<StatusResponse>(
    async () => client.status({ verbose }),
    { keys: QUERY_KEYS.status, params: { verbose } },
  );
}
