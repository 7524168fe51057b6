/**
 * Shared internal utilities for sale handlers.
 * Not re-exported; consumed only by sibling handler modules and the gateway.
 */
import type { SalePluginConfig } from "../../config.js";
import { ErrorCode, ERROR_CODE_DESCRIPTIONS, type ErrorResponse } from "../../errors/codes.js";
import type { GatewayRequestHandlerOptions } from "../../gateway/types.js";
import { normalizeAccountId, requireFunds } from "../validators.js";
import type { Coin } from "../types.js";

// ---- Error formatting ----

/**
 * Strip paths, URLs and environment assignments before anything reaches a response.
 */
function redactSensitiveInfo(message: string): string {
  let redacted = message;
  redacted = redacted.replace(/\/[a-zA-Z0-9_.-]+\/[a-zA-Z0-9_.\-/]+/g, "[PATH]");
  redacted = redacted.replace(/[A-Z]:\\[a-zA-Z0-9_\-.\\]+/g, "[PATH]");
  redacted = redacted.replace(/https?:\/\/[^\s]+/g, "[URL]");
  redacted = redacted.replace(/[A-Z_]+=[^\s]+/g, "[ENV]");
  return redacted;
}

const VALID_ERROR_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCode));

function toErrorCode(value: string): ErrorCode | undefined {
  return Object.values(ErrorCode).find((code) => code === value);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function formatGatewayError(err: unknown, fallback = ErrorCode.E_INTERNAL): ErrorCode {
  const redactedMessage = redactSensitiveInfo(errorMessage(err));

  if (redactedMessage.startsWith("E_")) {
    const match = redactedMessage.match(/^(E_[A-Z_]+)/);
    if (match && VALID_ERROR_CODES.has(match[1])) {
      return toErrorCode(match[1]) ?? fallback;
    }
  }

  const normalized = redactedMessage.toLowerCase();

  if (normalized.includes("actorid is required")) {
    return ErrorCode.E_AUTH_REQUIRED;
  }
  if (
    normalized.includes("access denied") ||
    normalized.includes("forbidden") ||
    normalized.includes("not allowed") ||
    normalized.includes("mismatch")
  ) {
    return ErrorCode.E_FORBIDDEN;
  }
  if (normalized.includes("not found")) {
    return ErrorCode.E_NOT_FOUND;
  }
  if (normalized.includes("already") || normalized.includes("transition")) {
    return ErrorCode.E_CONFLICT;
  }
  if (
    normalized.includes("invalid") ||
    normalized.includes("must") ||
    normalized.includes("required")
  ) {
    return ErrorCode.E_INVALID_ARGUMENT;
  }
  if (normalized.includes("timeout")) {
    return ErrorCode.E_TIMEOUT;
  }
  if (normalized.includes("unavailable") || normalized.includes("busy")) {
    return ErrorCode.E_UNAVAILABLE;
  }
  return fallback;
}

/**
 * Coded errors carry their own message as `details.reason`; anything else is reported
 * with the generic description only.
 */
export function formatGatewayErrorResponse(
  err: unknown,
  fallback = ErrorCode.E_INTERNAL,
): ErrorResponse {
  const code = formatGatewayError(err, fallback);
  const message = ERROR_CODE_DESCRIPTIONS[code] ?? "An internal error occurred.";
  const raw = redactSensitiveInfo(errorMessage(err));
  const prefix = `${code}: `;
  if (raw.startsWith(prefix)) {
    return { error: code, message, details: { reason: raw.slice(prefix.length) } };
  }
  return { error: code, message };
}

// ---- Access control ----

const DEFAULT_READ_SCOPES = ["operator.read", "operator.write"];
const DEFAULT_WRITE_SCOPES = ["operator.write"];

export function assertAccess(
  opts: GatewayRequestHandlerOptions,
  config: SalePluginConfig,
  action: "read" | "write",
) {
  const access = config.access;
  if (access.mode === "open") return;

  const client = opts.client?.connect;
  if (!client) throw new Error("sale access denied: client missing");

  if (access.allowClientIds && access.allowClientIds.length > 0) {
    if (!access.allowClientIds.includes(client.client.id)) {
      throw new Error("sale access denied: client not allowed");
    }
  }

  if (access.allowRoles && access.allowRoles.length > 0) {
    if (!client.role || !access.allowRoles.includes(client.role)) {
      throw new Error("sale access denied: role not allowed");
    }
  }

  if (access.allowScopes && access.allowScopes.length > 0) {
    const scopes = client.scopes ?? [];
    const match = access.allowScopes.some((scope) => scopes.includes(scope));
    if (!match) {
      throw new Error("sale access denied: scope not allowed");
    }
  }

  const requiredScopes =
    action === "read"
      ? (access.readScopes ?? DEFAULT_READ_SCOPES)
      : (access.writeScopes ?? DEFAULT_WRITE_SCOPES);
  if (requiredScopes.length > 0) {
    const scopes = client.scopes ?? [];
    const match = requiredScopes.some((scope) => scopes.includes(scope));
    if (!match) {
      throw new Error(`sale access denied: missing ${action} scope`);
    }
  }
}

// ---- Actor resolution ----

export function resolveActorId(
  opts: GatewayRequestHandlerOptions,
  config: SalePluginConfig,
  input: Record<string, unknown>,
): string | undefined {
  const actorSource = config.access.actorSource ?? "param";
  const actorParam = typeof input.actorId === "string" ? input.actorId.trim() : "";
  const clientActor = opts.client?.connect?.client?.id?.trim() ?? "";

  if (actorSource === "param") {
    return actorParam || undefined;
  }
  if (actorSource === "client") {
    return clientActor || undefined;
  }
  if (actorParam && clientActor && actorParam !== clientActor) {
    throw new Error("actorId mismatch between params and client");
  }
  return actorParam || clientActor || undefined;
}

/**
 * Resolve the caller. Owner checks and buyer identity both hang off this value, so
 * with `requireActor` off an anonymous caller resolves to "" and fails every owner check.
 */
export function requireActorId(
  opts: GatewayRequestHandlerOptions,
  config: SalePluginConfig,
  input: Record<string, unknown>,
): string {
  const actorId = resolveActorId(opts, config, input);
  if (!actorId) {
    if (!config.access.requireActor) return "";
    throw new Error("actorId is required for sale access");
  }
  return normalizeAccountId(actorId, "actorId");
}

// ---- Params ----

export function readParams(opts: GatewayRequestHandlerOptions): Record<string, unknown> {
  return opts.params ?? {};
}

/** Funds attached to the call (`params.funds`). */
export function readFunds(input: Record<string, unknown>): Coin[] {
  return requireFunds(input.funds, "funds");
}

/** Buyer operations need a concrete identity even when `requireActor` is off. */
export function requireBuyerId(
  opts: GatewayRequestHandlerOptions,
  config: SalePluginConfig,
  input: Record<string, unknown>,
): string {
  const buyer = requireActorId(opts, config, input);
  if (!buyer) throw new Error("actorId is required to identify the buyer");
  return buyer;
}
