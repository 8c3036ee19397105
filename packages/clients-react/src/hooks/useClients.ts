import type {
  RouteClient,
  MatrixClient,
  MapMatchingClient,
  StatusClient,
  ValhallaClient,
} from "@valroute/clients-core";
import { useValhallaContext } from "../context/ValhallaContext.js";

/** The provider's client; `setToken` on it reaches every hook below */
export function useValhallaClient(): ValhallaClient {
  return useValhallaContext().client;
}

export function useRouteClient(): RouteClient {
  return useValhallaContext().client.routes;
}

export function useMatrixClient(): MatrixClient {
  return useValhallaContext().client.matrix;
}

export function useMapMatchingClient(): MapMatchingClient {
  return useValhallaContext().client.mapMatching;
}

export function useStatusClient(): StatusClient {
  return useValhallaContext().client.status;
}
