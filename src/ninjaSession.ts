// src/ninjaSession.ts
import type { Command } from "commander";
import { loadConfig, type ConfigOverrides, type NinjaConfig } from "./config";
import { createNinjaClient, NinjaApi } from "./ninjaApi";
import { getAccessToken } from "./ninjaToken";

export type ConnectionOptions = {
  clientId?: string;
  secretPath?: string;
  region?: string;
  host?: string;
  scope?: string;
};

export interface NinjaSession {
  config: NinjaConfig;
  api: NinjaApi;
}

/** Options every API script accepts; unset ones fall back to NINJA_* env vars. */
export function addConnectionOptions(program: Command): Command {
  return program
    .option("--client-id <id>", "API client id (NINJA_CLIENT_ID)")
    .option("--secret-path <file>", "file holding the client secret (NINJA_CLIENT_SECRET_PATH)")
    .option("--region <region>", "instance sub-domain: app, us2, eu, ca, oc (NINJA_REGION)")
    .option("--host <host>", "instance host (NINJA_HOST)")
    .option("--scope <scope>", "OAuth scope (NINJA_SCOPE)");
}

/**
 * Load configuration and authenticate. Throws ValidationError before any
 * request when settings are missing, AuthenticationError when the token
 * request fails.
 */
export async function openSession(
  connection: ConnectionOptions,
  extra: Pick<ConfigOverrides, "filter" | "outputPath"> = {}
): Promise<NinjaSession> {
  const config = await loadConfig({ ...connection, ...extra });

  console.log(`Authenticating against ${config.region}.${config.host}...`);
  const token = await getAccessToken(config);

  return { config, api: new NinjaApi(createNinjaClient(config, token)) };
}

export function reportFatal(err: unknown): never {
  const message = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  console.error("Error:", message);
  process.exit(1);
}
