// src/errors.ts
import { isAxiosError } from "axios";

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class AuthenticationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuthenticationError";
  }
}

function renderBody(data: unknown): string {
  if (data === undefined || data === null || data === "") return "";
  if (typeof data === "string") return data;
  return JSON.stringify(data);
}

/**
 * One-line diagnostic for anything thrown by a request.
 * Axios errors with a response become "<status> <statusText> - <body>".
 */
export function describeRequestError(err: unknown): string {
  if (isAxiosError(err)) {
    const res = err.response;
    if (!res) return err.message;

    const head = [res.status, res.statusText].filter(Boolean).join(" ");
    const body = renderBody(res.data);
    return body ? `${head} - ${body}` : head;
  }

  if (err instanceof Error) return err.message;
  return String(err);
}
