import { z } from "zod";
import type { ClientConfig } from "./baseClient.js";
import { ValhallaConfigError } from "./errors.js";

const envSchema = z.object({
  VALHALLA_URL: z.string({ required_error: "VALHALLA_URL is not set" }).min(1, "VALHALLA_URL is empty"),
  VALHALLA_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  VALHALLA_TOKEN: z.string().min(1).optional(),
  VALHALLA_RETRIES: z.coerce.number().int().nonnegative().optional(),
  VALHALLA_METHOD: z
    .string()
    .transform((m) => m.toLowerCase())
    .pipe(z.enum(["post", "get"]))
    .optional(),
  VALHALLA_DEBUG: z
    .string()
    .transform((v) => v === "1" || v.toLowerCase() === "true")
    .optional(),
});

/**
 * Client configuration from environment variables.
 * @throws {ValhallaConfigError} when VALHALLA_URL is missing or a value is invalid
 */
export function clientConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): ClientConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue?.path.join(".") ?? "environment";
    throw new ValhallaConfigError(`Invalid ${name}: ${issue?.message ?? "invalid value"}`);
  }
  const vars = parsed.data;
  return {
    baseUrl: vars.VALHALLA_URL,
    timeout: vars.VALHALLA_TIMEOUT_MS,
    token: vars.VALHALLA_TOKEN,
    retries: vars.VALHALLA_RETRIES,
    method: vars.VALHALLA_METHOD,
    debug: vars.VALHALLA_DEBUG,
  };
}
