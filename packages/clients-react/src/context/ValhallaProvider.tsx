import React, { useMemo } from "react";
import { QueryClient, QueryClientProvider } from "@tanstack/react-query";
import { ValhallaClient, type ClientConfig } from "@valroute/clients-core";
import { ValhallaContext, type ValhallaContextValue } from "./ValhallaContext.js";

const defaultQueryClient = new QueryClient({
  defaultOptions: {
    queries: {
      staleTime: 5 * 60 * 1000, // 5 minutes
      retry: 1,
    },
  },
});

export interface ValhallaProviderProps {
  config: ClientConfig;
  queryClient?: QueryClient;
  children: React.ReactNode;
}

/**
 * Creates one `ValhallaClient` for the subtree. A new client is built only
 * when the `config` object changes, so pass a stable config.
 */
export function ValhallaProvider({
  config,
  queryClient,
  children,
}: ValhallaProviderProps): React.ReactElement {
  const contextValue: ValhallaContextValue = useMemo(
    () => ({ config, client: new ValhallaClient(config) }),
    [config],
  );

  return (
    <ValhallaContext.Provider value={contextValue}>
      <QueryClientProvider client={queryClient ?? defaultQueryClient}>{children}</QueryClientProvider>
    </ValhallaContext.Provider>
  );
}
