// Error taxonomy shared by every component and mapped onto HTTP responses by the server.

export type ErrorCode =
  | "BadSignature"
  | "StaleRequest"
  | "PoolExhausted"
  | "InvalidTransition"
  | "NotFound"
  | "ScorerUnavailable"
  | "Deferred"
  | "ValidationError"
  | "CreationFailed"
  | "RateLimited";

export class OrchestratorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `${code}Error`;
    this.code = code;
  }
}

export class BadSignatureError extends OrchestratorError {
  constructor(message = "Request signature is missing or invalid") {
    super("BadSignature", message);
  }
}

export class StaleRequestError extends OrchestratorError {
  readonly skewMs: number;

  constructor(skewMs: number, maxSkewMs: number) {
    super("StaleRequest", `Request timestamp is ${skewMs}ms away from server time (max ${maxSkewMs}ms)`);
    this.skewMs = skewMs;
  }
}

export class PoolExhaustedError extends OrchestratorError {
  readonly tier: number;

  constructor(tier: number) {
    super("PoolExhausted", `No eligible unit available at tier ${tier}`);
    this.tier = tier;
  }
}

export class InvalidTransitionError extends OrchestratorError {
  constructor(message: string) {
    super("InvalidTransition", message);
  }
}

export class NotFoundError extends OrchestratorError {
  readonly kind: "unit" | "session" | "tier";
  readonly id: string;

  constructor(kind: "unit" | "session" | "tier", id: string | number) {
    super("NotFound", `${kind} '${id}' not found`);
    this.kind = kind;
    this.id = String(id);
  }
}

export class ScorerUnavailableError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super("ScorerUnavailable", message, { cause });
  }
}

export class DeferredError extends OrchestratorError {
  constructor(message: string) {
    super("Deferred", message);
  }
}

export class RateLimitedError extends OrchestratorError {
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number) {
    super("RateLimited", `Too many requests; retry in ${retryAfterSeconds}s`);
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class ValidationError extends OrchestratorError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("ValidationError", message);
    this.issues = issues;
  }
}

export class CreationFailedError extends OrchestratorError {
  readonly tier: number;

  constructor(tier: number, message: string, cause?: unknown) {
    super("CreationFailed", message, { cause });
    this.tier = tier;
  }
}

/** Narrow an unknown thrown value to the orchestrator taxonomy. */
export function isOrchestratorError(err: unknown, code?: ErrorCode): err is OrchestratorError {
  return err instanceof OrchestratorError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
