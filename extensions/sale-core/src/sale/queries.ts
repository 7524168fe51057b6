import type { EngineContext } from "./context.js";
import { satisfiedEndRules } from "./end-conditions.js";
import { derivePhase, resolveOutcome } from "./lifecycle.js";
import type {
  AuditEvent,
  Purchase,
  SaleConfiguration,
  SaleOutcome,
  SalePhase,
  SaleState,
} from "./types.js";

export type SaleStatus = {
  phase: SalePhase;
  state: SaleState | null;
  availableCount: number;
  saleConducted: boolean;
  /** Buyers whose purchases are still waiting for refund or delivery. */
  pendingBuyers: number;
  outstandingProceeds: string;
  /** Path the sale takes (or will take) once ended. */
  outcome?: SaleOutcome;
  endRules: string[];
};

export function getSaleStatus(ctx: EngineContext): SaleStatus {
  const state = ctx.store.getSaleState();
  const now = ctx.now();
  const status: SaleStatus = {
    phase: derivePhase(state, now),
    state: state ?? null,
    availableCount: ctx.store.getAvailableCount(),
    saleConducted: ctx.store.getSaleConducted(),
    pendingBuyers: ctx.store.countPurchaseEntries(),
    outstandingProceeds: "0",
    endRules: [],
  };
  if (!state) return status;
  status.outstandingProceeds = (BigInt(state.amountToSend) - BigInt(state.amountTransferred)).toString();
  status.endRules = satisfiedEndRules({ state, now });
  if (status.phase !== "active") status.outcome = resolveOutcome(state);
  return status;
}

export function getConfiguration(ctx: EngineContext): SaleConfiguration | null {
  return ctx.store.getConfiguration() ?? null;
}

export type AvailableItemsPage = {
  tokenIds: string[];
  nextCursor?: string;
};

export function getAvailableItems(
  ctx: EngineContext,
  input: { startAfter?: string; limit?: number } = {},
): AvailableItemsPage {
  const { defaultQueryLimit, maxQueryLimit } = ctx.config.limits;
  const limit = Math.min(input.limit ?? defaultQueryLimit, maxQueryLimit);
  const tokenIds = ctx.store
    .listTokens({ startAfter: input.startAfter, limit })
    .map((token) => token.tokenId);
  const page: AvailableItemsPage = { tokenIds };
  if (tokenIds.length === limit && limit > 0) page.nextCursor = tokenIds[tokenIds.length - 1];
  return page;
}

export function isItemAvailable(ctx: EngineContext, tokenId: string): boolean {
  return ctx.store.hasToken(tokenId);
}

export function getPurchases(ctx: EngineContext, buyer: string): Purchase[] {
  return ctx.store.getPurchases(buyer) ?? [];
}

export function queryAudit(ctx: EngineContext, limit?: number): AuditEvent[] {
  const { defaultQueryLimit, maxQueryLimit } = ctx.config.limits;
  return ctx.store.readAuditEvents(Math.min(limit ?? defaultQueryLimit, maxQueryLimit));
}
