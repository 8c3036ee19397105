import { createContext, useContext } from "react";
import type { ClientConfig, ValhallaClient } from "@valroute/clients-core";

export interface ValhallaContextValue {
  config: ClientConfig;
  /** One client per provider; every hook below it shares its transport */
  client: ValhallaClient;
}

export const ValhallaContext = createContext<ValhallaContextValue | undefined>(undefined);

export function useValhallaContext(): ValhallaContextValue {
  const ctx = useContext(ValhallaContext);
  if (!ctx) {
    throw new Error("useValhallaContext must be used within a ValhallaProvider");
  }
  return ctx;
}
