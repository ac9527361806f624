/**
 * Shared CLI helper functions: config loading, signed admin requests, argument parsers.
 */

import { InvalidArgumentError } from "commander";
import { Authenticator, requestScope } from "../auth/authenticator.js";
import { loadConfig, type ConfigFile } from "../config.js";

/** Load config from the global --config option. */
export function loadConfigFromOpts(configPath?: string): ConfigFile {
  return loadConfig(configPath);
}

/** Base URL of the running orchestrator, from `--url` or the config's server section. */
export function resolveBaseUrl(config: ConfigFile, url?: string): string {
  if (url) return url.replace(/\/+$/, "");
  const host = config.server.host === "0.0.0.0" || config.server.host === "::" ? "127.0.0.1" : config.server.host;
  return `http://${host}:${config.server.port}`;
}

export function authenticatorFor(config: ConfigFile): Authenticator {
  return new Authenticator({
    secret: config.auth.secret,
    maxSkewMs: config.auth.max_skew_ms,
    signatureHeader: config.auth.signature_header,
    timestampHeader: config.auth.timestamp_header,
  });
}

export interface SignedRequestOptions {
  method: "GET" | "POST";
  path: string;
  body?: unknown;
  url?: string;
}

/**
 * Send an HMAC-signed request to the orchestrator API and return the parsed
 * JSON body. The signature covers method and path, as the session and admin
 * routes require. Non-2xx responses throw with the server's error message.
 */
export async function signedRequest(config: ConfigFile, options: SignedRequestOptions): Promise<unknown> {
  const body = options.body === undefined ? "" : JSON.stringify(options.body);
  const headers: Record<string, string> = {
    ...authenticatorFor(config).sign(body, requestScope(options.method, options.path)),
  };
  if (body) headers["content-type"] = "application/json";

  const response = await fetch(`${resolveBaseUrl(config, options.url)}${options.path}`, {
    method: options.method,
    headers,
    body: body || undefined,
  });
  const text = await response.text();
  let parsed: unknown = null;
  if (text) {
    try {
      parsed = JSON.parse(text);
    } catch {
      parsed = text;
    }
  }
  if (!response.ok) {
    throw new Error(`HTTP ${response.status}: ${describeError(parsed)}`);
  }
  return parsed;
}

function describeError(body: unknown): string {
  if (typeof body === "object" && body !== null && "error" in body && typeof body.error === "string") {
    return body.error;
  }
  return typeof body === "string" && body ? body : "request failed";
}

/** Parse and validate a tier number from CLI input. */
export function parseTier(value: string): number {
  const num = parseInt(value, 10);
  if (isNaN(num) || num < 1 || String(num) !== value.trim()) {
    throw new InvalidArgumentError("Tier must be a positive integer.");
  }
  return num;
}

/** Parse and validate a non-negative pool size from CLI input. */
export function parseSize(value: string): number {
  const num = parseInt(value, 10);
  if (isNaN(num) || num < 0 || String(num) !== value.trim()) {
    throw new InvalidArgumentError("Size must be a non-negative integer.");
  }
  return num;
}
