/**
 * Request authentication: HMAC-SHA256 with a freshness window.
 *
 * Escalation requests sign `timestamp:body`. Every other signed route also
 * binds the request target (`timestamp:METHOD path:body`), so a signature
 * captured from one route cannot be replayed against another. The signature
 * is checked before the timestamp so a forged request learns nothing about
 * the server clock.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import { BadSignatureError, StaleRequestError } from "../errors.js";

export interface AuthOptions {
  secret: string;
  /** Maximum allowed distance between the request timestamp and server time. */
  maxSkewMs: number;
  signatureHeader: string;
  timestampHeader: string;
}

export interface SignedRequest {
  signature: string | undefined;
  timestamp: string | undefined;
  body: string;
  /** Request target from {@link requestScope}; omitted for escalation requests. */
  scope?: string;
}

/** `METHOD path`, where path includes the query string as sent. */
export function requestScope(method: string, path: string): string {
  return `${method.toUpperCase()} ${path}`;
}

/** Hex HMAC-SHA256 of `${timestamp}:${body}`, or `${timestamp}:${scope}:${body}` when scoped. */
export function signPayload(secret: string, timestamp: string, body: string, scope?: string): string {
  const message = scope === undefined ? `${timestamp}:${body}` : `${timestamp}:${scope}:${body}`;
  return createHmac("sha256", secret).update(message, "utf8").digest("hex");
}

/**
 * Parse a request timestamp: integer epoch seconds, or an ISO-8601 date.
 * Returns epoch milliseconds, or null when unparseable.
 */
export function parseTimestamp(value: string): number | null {
  if (/^\d+$/.test(value)) return Number(value) * 1000;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

export class Authenticator {
  private readonly options: AuthOptions;
  private readonly now: () => number;

  constructor(options: AuthOptions, now: () => number = Date.now) {
    this.options = options;
    this.now = now;
  }

  get signatureHeader(): string {
    return this.options.signatureHeader;
  }

  get timestampHeader(): string {
    return this.options.timestampHeader;
  }

  /** Throws {@link BadSignatureError} or {@link StaleRequestError}. */
  verify(request: SignedRequest): void {
    const { signature, timestamp, body, scope } = request;
    if (!signature || !timestamp) {
      throw new BadSignatureError("Missing signature or timestamp header");
    }
    const expected = Buffer.from(signPayload(this.options.secret, timestamp, body, scope), "hex");
    const supplied = Buffer.from(signature.trim().toLowerCase(), "hex");
    if (supplied.length !== expected.length || !timingSafeEqual(supplied, expected)) {
      throw new BadSignatureError();
    }

    const sentAt = parseTimestamp(timestamp);
    if (sentAt === null) {
      throw new BadSignatureError("Unparseable request timestamp");
    }
    const skew = Math.abs(this.now() - sentAt);
    if (skew > this.options.maxSkewMs) {
      throw new StaleRequestError(skew, this.options.maxSkewMs);
    }
  }

  /** Headers that authenticate `body` (sent to `scope`, when given) now. */
  sign(body: string, scope?: string): Record<string, string> {
    const timestamp = String(Math.floor(this.now() / 1000));
    return {
      [this.options.signatureHeader]: signPayload(this.options.secret, timestamp, body, scope),
      [this.options.timestampHeader]: timestamp,
    };
  }
}
