// src/config.ts
import * as dotenv from "dotenv";
import fs from "fs-extra";
import { ValidationError } from "./errors";

dotenv.config();

export const DEFAULT_REGION = "app";
export const DEFAULT_HOST = "ninjarmm.com";
export const DEFAULT_SCOPE = "monitoring management";

// "us" is the name people use; the tenant actually lives on app.ninjarmm.com
const REGION_ALIASES: Record<string, string> = {
  us: "app",
};

const REGION_PATTERN = /^[a-z0-9-]+$/;

export interface NinjaConfig {
  clientId: string;
  clientSecret: string;
  region: string;
  host: string;
  scope: string;
  filter?: string;
  outputPath?: string;
}

/**
 * Values collected from the command line. Anything left undefined falls
 * back to the environment (and .env).
 */
export interface ConfigOverrides {
  clientId?: string;
  secretPath?: string;
  region?: string;
  host?: string;
  scope?: string;
  filter?: string;
  outputPath?: string;
}

function requireValue(name: string, value: string | undefined): string {
  if (!value || !value.trim()) {
    throw new ValidationError(`Missing required setting: ${name}`);
  }
  return value.trim();
}

export function normalizeRegion(region: string): string {
  const key = region.trim().toLowerCase();
  const mapped = REGION_ALIASES[key] ?? key;
  if (!REGION_PATTERN.test(mapped)) {
    throw new ValidationError(`Invalid region: ${region}`);
  }
  return mapped;
}

/**
 * Read the client secret. The secret file (created and ACL'd for the
 * account that runs the scripts) wins; a raw secret in the environment is
 * still accepted but flagged.
 */
export async function readClientSecret(
  secretPath: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): Promise<string> {
  if (secretPath) {
    if (!(await fs.pathExists(secretPath))) {
      throw new ValidationError(`Client secret file not found: ${secretPath}`);
    }
    const secret = (await fs.readFile(secretPath, "utf8")).trim();
    return requireValue(`client secret (${secretPath})`, secret);
  }

  const raw = env.NINJA_CLIENT_SECRET;
  if (raw && raw.trim()) {
    console.warn(
      "⚠️  Using NINJA_CLIENT_SECRET from the environment. Store the secret in a protected file and pass its path instead."
    );
    return raw.trim();
  }

  throw new ValidationError(
    "Missing client secret: pass --secret-path or set NINJA_CLIENT_SECRET_PATH"
  );
}

export async function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<NinjaConfig> {
  const clientId = requireValue(
    "client id (--client-id or NINJA_CLIENT_ID)",
    overrides.clientId ?? env.NINJA_CLIENT_ID
  );
  const clientSecret = await readClientSecret(
    overrides.secretPath ?? env.NINJA_CLIENT_SECRET_PATH,
    env
  );

  return {
    clientId,
    clientSecret,
    region: normalizeRegion(overrides.region ?? env.NINJA_REGION ?? DEFAULT_REGION),
    host: (overrides.host ?? env.NINJA_HOST ?? DEFAULT_HOST).trim(),
    scope: (overrides.scope ?? env.NINJA_SCOPE ?? DEFAULT_SCOPE).trim(),
    filter: overrides.filter,
    outputPath: overrides.outputPath,
  };
}

export function baseUrlFor(config: Pick<NinjaConfig, "region" | "host">): string {
  return `https://${config.region}.${config.host}`;
}
