// src/ninjaToken.ts
import axios, { type AxiosInstance } from "axios";
import { baseUrlFor, type NinjaConfig } from "./config";
import { AuthenticationError, describeRequestError } from "./errors";

interface TokenResponse {
  access_token: string;
  expires_in?: number;
  token_type?: string;
}

function isTokenResponse(data: unknown): data is TokenResponse {
  return (
    typeof data === "object" &&
    data !== null &&
    "access_token" in data &&
    typeof data.access_token === "string" &&
    data.access_token.length > 0
  );
}

export function tokenUrlFor(config: NinjaConfig): string {
  return `${baseUrlFor(config)}/oauth/token`;
}

/**
 * Client-credentials grant. Any failure here is fatal for the run, so it
 * always surfaces as an AuthenticationError.
 */
export async function getAccessToken(
  config: NinjaConfig,
  http: AxiosInstance = axios
): Promise<string> {
  const body = new URLSearchParams({
    grant_type: "client_credentials",
    client_id: config.clientId,
    client_secret: config.clientSecret,
    scope: config.scope,
  });

  let data: unknown;
  try {
    const res = await http.post(tokenUrlFor(config), body.toString(), {
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
    });
    data = res.data;
  } catch (err) {
    throw new AuthenticationError(
      `OAuth token request failed: ${describeRequestError(err)}`
    );
  }

  if (!isTokenResponse(data)) {
    throw new AuthenticationError("OAuth token response did not include an access_token");
  }

  return data.access_token;
}
