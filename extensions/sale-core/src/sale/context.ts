import { randomUUID } from "node:crypto";
import type { SalePluginConfig } from "../config.js";
import { conflict, forbidden, invalidArgument } from "../errors/codes.js";
import type { SaleStateStore } from "../state/store.js";
import { createRatesSplitter, type FundsSplitter } from "./funds.js";
import type { AuditEvent, AuditEventKind, SaleConfiguration, SaleMessage, SaleResponse } from "./types.js";
import { normalizeAccountId } from "./validators.js";

/**
 * Checks that an item source can execute mint/transfer/burn commands before the engine
 * starts pointing at it.
 */
export interface ItemSourceVerifier {
  verify(itemSource: string): boolean | Promise<boolean>;
}

/** Accepts any well-formed address. */
export const addressOnlyVerifier: ItemSourceVerifier = {
  verify: (itemSource) => {
    normalizeAccountId(itemSource, "itemSource");
    return true;
  },
};

export type EngineContext = {
  store: SaleStateStore;
  config: SalePluginConfig;
  splitter: FundsSplitter;
  verifier: ItemSourceVerifier;
  /** Unix milliseconds. */
  now: () => number;
};

export type EngineContextOptions = {
  splitter?: FundsSplitter;
  verifier?: ItemSourceVerifier;
  now?: () => number;
};

export function createEngineContext(
  store: SaleStateStore,
  config: SalePluginConfig,
  options: EngineContextOptions = {},
): EngineContext {
  return {
    store,
    config,
    splitter: options.splitter ?? createRatesSplitter(config.rates),
    verifier: options.verifier ?? addressOnlyVerifier,
    now: options.now ?? Date.now,
  };
}

export function isoAt(ms: number): string {
  return new Date(ms).toISOString();
}

export function requireConfiguration(ctx: EngineContext): SaleConfiguration {
  const configuration = ctx.store.getConfiguration();
  if (!configuration) throw conflict("sale engine is not initialized");
  return configuration;
}

export function assertOwner(configuration: SaleConfiguration, actorId: string) {
  if (!actorId) throw forbidden("owner actorId is required");
  if (actorId !== configuration.owner) throw forbidden("actor is not the contract owner");
}

export async function assertItemSource(ctx: EngineContext, itemSource: string): Promise<string> {
  const normalized = normalizeAccountId(itemSource, "itemSource");
  if (!(await ctx.verifier.verify(normalized))) {
    throw invalidArgument("itemSource is not a valid item collection");
  }
  return normalized;
}

export function recordAudit(
  ctx: EngineContext,
  kind: AuditEventKind,
  refId: string,
  actor?: string,
  details?: Record<string, unknown>,
) {
  const event: AuditEvent = {
    id: randomUUID(),
    kind,
    refId,
    actor: actor || undefined,
    timestamp: isoAt(ctx.now()),
    details,
  };
  ctx.store.appendAuditEvent(event);
}

export function buildResponse(
  action: string,
  messages: SaleMessage[] = [],
  attributes: Record<string, string> = {},
): SaleResponse {
  return { action, messages, attributes: { action, ...attributes } };
}
