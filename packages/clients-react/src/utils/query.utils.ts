import { useCallback, useMemo } from "react";
import {
  type QueryClient,
  type QueryKey,
  type QueryObserverResult,
  type RefetchOptions,
  type UseQueryOptions,
  useMutation,
  useQuery,
  useQueryClient,
  type MutationFunction,
} from "@tanstack/react-query";

// ---------------------------------------------------------------------------
// Remote
// ---------------------------------------------------------------------------

export interface Remote<T> {
  /** The resolved data, or undefined while loading */
  data: T | undefined;
  /** True while the initial fetch is in progress */
  isLoading: boolean;
  /** The error if the query failed, otherwise undefined */
  error: Error | undefined;
  refetch: (options?: RefetchOptions) => Promise<QueryObserverResult<T, Error>>;
}

export interface Signature {
  keys: string[];
  params?: Record<string, unknown>;
}

export function queryKeyFor(signature: Signature): QueryKey {
  return signature.params ? [...signature.keys, signature.params] : signature.keys;
}

// ---------------------------------------------------------------------------
// useRemote: the data-fetching hook behind every query hook
// ---------------------------------------------------------------------------

export type RemoteQueryOptions<T> = Omit<UseQueryOptions<T>, "queryKey" | "queryFn">;

export function useRemote<T>(
  queryFn: () => Promise<T>,
  signature: Signature,
  options?: RemoteQueryOptions<T>,
): Remote<T> {
  const memoizedQueryFn = useCallback(() => queryFn(), [queryFn]);

  const queryKey: QueryKey = useMemo(
    () => queryKeyFor(signature),
    [signature.keys, signature.params],
  );

  const query = useQuery<T>({
    queryKey,
    queryFn: memoizedQueryFn,
    ...options,
  });

  return useMemo(
    () => ({
      data: query.data,
      isLoading: query.isLoading,
      error: query.error ?? undefined,
      refetch: query.refetch,
    }),
    [query.data, query.isLoading, query.error, query.refetch],
  );
}

// ---------------------------------------------------------------------------
// Invalidation
// ---------------------------------------------------------------------------

/** Invalidate every cached query whose key mentions one of `queryKeys` */
export function invalidateQueriesContaining(queryClient: QueryClient, queryKeys: string[]): void {
  const matchingKeys = queryClient
    .getQueryCache()
    .getAll()
    .map((q) => q.queryKey)
    .filter((key) => key.some((k) => typeof k === "string" && queryKeys.includes(k)));

  for (const key of matchingKeys) {
    void queryClient.invalidateQueries({ queryKey: key, exact: true });
  }
}

// ---------------------------------------------------------------------------
// useDataMutation
// ---------------------------------------------------------------------------

/** A mutation that invalidates the queries under `invalidates` once it settles */
export function useDataMutation<TResponse, TVariables>(params: {
  invalidates: string[];
  mutationFn: MutationFunction<TResponse, TVariables>;
}) {
  const queryClient = useQueryClient();

  return useMutation<TResponse, Error, TVariables>({
    mutationFn: params.mutationFn,
    onSettled: () => {
      invalidateQueriesContaining(queryClient, params.invalidates);
    },
  });
}
