import { conflict, notFound, quotaExceeded } from "../errors/codes.js";
import {
  buildResponse,
  type EngineContext,
  isoAt,
  recordAudit,
  requireConfiguration,
} from "./context.js";
import { satisfiedEndRules } from "./end-conditions.js";
import { mergePayments } from "./funds.js";
import { assertPhaseTransition, decideOutcome, derivePhase, isSaleOver, resolveOutcome } from "./lifecycle.js";
import { checkedAdd, checkedSub, toUint } from "./math.js";
import type {
  ItemBurnMessage,
  ItemTransferMessage,
  PaymentMessage,
  PurchaseLedgerEntry,
  SaleConfiguration,
  SaleMessage,
  SaleResponse,
  SaleState,
} from "./types.js";
import { optionalNonNegativeInt } from "./validators.js";

/** Work size for one settlement call, clamped to the hard ceiling. */
export function resolveBatchLimit(ctx: EngineContext, input?: number): number {
  const limit = optionalNonNegativeInt(input, "limit");
  if (limit === 0) throw quotaExceeded("batch limit must be at least 1");
  const { defaultBatchSize, maxBatchSize } = ctx.config.limits;
  return Math.min(limit ?? defaultBatchSize, maxBatchSize);
}

function refundEntry(
  ctx: EngineContext,
  configuration: SaleConfiguration,
  state: SaleState,
  entry: PurchaseLedgerEntry,
): SaleMessage[] {
  const price = toUint(state.price.amount, "price");
  let total = 0n;
  const burns: ItemBurnMessage[] = [];
  for (const purchase of entry.purchases) {
    total = checkedAdd(total, checkedAdd(price, toUint(purchase.taxAmount, "tax")), "refund");
    burns.push({ kind: "item_burn", itemSource: configuration.itemSource, tokenId: purchase.tokenId });
  }
  ctx.store.removePurchases(entry.purchaser);
  const messages: SaleMessage[] = [];
  // A zero refund still clears the entry.
  if (total > 0n) {
    messages.push({
      kind: "payment",
      purpose: "refund",
      recipient: entry.purchaser,
      amount: [{ denom: state.price.denom, amount: total.toString() }],
    });
  }
  messages.push(...burns);
  return messages;
}

function burnUnsold(
  ctx: EngineContext,
  configuration: SaleConfiguration,
  limit: number,
): ItemBurnMessage[] {
  const tokens = ctx.store.listTokens({ limit });
  for (const token of tokens) ctx.store.removeToken(token.tokenId);
  if (tokens.length > 0) {
    ctx.store.setAvailableCount(Math.max(0, ctx.store.getAvailableCount() - tokens.length));
  }
  return tokens.map((token) => ({
    kind: "item_burn",
    itemSource: configuration.itemSource,
    tokenId: token.tokenId,
  }));
}

type StepResult = {
  messages: SaleMessage[];
  step: string;
  attributes: Record<string, string>;
};

function refundStep(
  ctx: EngineContext,
  configuration: SaleConfiguration,
  state: SaleState,
  limit: number,
): StepResult {
  const entries = ctx.store.listPurchaseEntries(limit);
  const messages: SaleMessage[] = [];
  for (const entry of entries) messages.push(...refundEntry(ctx, configuration, state, entry));
  const burns = burnUnsold(ctx, configuration, limit);
  messages.push(...burns);
  if (entries.length > 0) {
    recordAudit(ctx, "refund_issued", state.saleId, undefined, {
      buyers: entries.map((entry) => entry.purchaser),
    });
  }
  if (burns.length > 0) {
    recordAudit(ctx, "items_burned", state.saleId, undefined, { count: burns.length });
  }
  return {
    messages,
    step: "refund",
    attributes: { refunded_buyers: String(entries.length), burned: String(burns.length) },
  };
}

function settleStep(
  ctx: EngineContext,
  configuration: SaleConfiguration,
  state: SaleState,
  limit: number,
): StepResult {
  const outstanding = checkedSub(
    toUint(state.amountToSend, "amountToSend"),
    toUint(state.amountTransferred, "amountTransferred"),
    "outstanding proceeds",
  );
  if (outstanding > 0n) {
    const payment: PaymentMessage = {
      kind: "payment",
      purpose: "proceeds",
      recipient: state.recipient.address,
      amount: [{ denom: state.price.denom, amount: outstanding.toString() }],
    };
    if (state.recipient.msg) payment.msg = state.recipient.msg;
    state.amountTransferred = state.amountToSend;
    recordAudit(ctx, "proceeds_forwarded", state.saleId, undefined, {
      recipient: state.recipient.address,
      amount: outstanding.toString(),
    });
    return {
      messages: [payment],
      step: "transfer_proceeds",
      attributes: { proceeds: `${outstanding}${state.price.denom}` },
    };
  }

  const entries = ctx.store.listPurchaseEntries(limit);
  if (entries.length > 0) {
    const transfers: ItemTransferMessage[] = [];
    const splits: PaymentMessage[] = [];
    for (const entry of entries) {
      for (const purchase of entry.purchases) {
        transfers.push({
          kind: "item_transfer",
          itemSource: configuration.itemSource,
          tokenId: purchase.tokenId,
          recipient: entry.purchaser,
        });
        splits.push(...purchase.messages);
      }
      ctx.store.removePurchases(entry.purchaser);
    }
    state.itemsDelivered = checkedAdd(
      toUint(state.itemsDelivered, "itemsDelivered"),
      BigInt(transfers.length),
      "itemsDelivered",
    ).toString();
    recordAudit(ctx, "items_delivered", state.saleId, undefined, {
      buyers: entries.map((entry) => entry.purchaser),
      count: transfers.length,
    });
    return {
      messages: [...transfers, ...mergePayments(splits)],
      step: "transfer_tokens",
      attributes: { delivered: String(transfers.length) },
    };
  }

  const burns = burnUnsold(ctx, configuration, limit);
  if (burns.length > 0) {
    recordAudit(ctx, "items_burned", state.saleId, undefined, { count: burns.length });
  }
  return { messages: burns, step: "burn_tokens", attributes: { burned: String(burns.length) } };
}

/**
 * Drain loop step. Ends the sale on the first effective call and runs one bounded batch of
 * settlement work; callers repeat until `done` is `"true"`.
 */
export async function endSale(
  ctx: EngineContext,
  actorId: string,
  limit?: number,
): Promise<SaleResponse> {
  const batch = resolveBatchLimit(ctx, limit);
  let response = buildResponse("end_sale");
  await ctx.store.runInTransaction(() => {
    const current = ctx.store.getSaleState();
    if (!current) {
      response = buildResponse("end_sale", [], { done: "true" });
      return;
    }
    const configuration = requireConfiguration(ctx);
    const now = ctx.now();
    const state: SaleState = { ...current };

    if (state.endedAt === undefined) {
      const rules = satisfiedEndRules({ state, now });
      const byOwner = actorId !== "" && actorId === configuration.owner;
      const soldOut = ctx.store.getAvailableCount() === 0;
      if (!byOwner && rules.length === 0 && !soldOut) {
        response = buildResponse("end_sale", [], { done: "false", ended: "false" });
        return;
      }
      assertPhaseTransition(derivePhase(state, now), "draining");
      state.endedAt = isoAt(now);
      state.outcome = decideOutcome(state);
      recordAudit(ctx, "sale_ended", state.saleId, actorId, {
        outcome: state.outcome,
        rules,
        byOwner,
        soldOut,
      });
    }

    const outcome = resolveOutcome(state);
    const result =
      outcome === "refund"
        ? refundStep(ctx, configuration, state, batch)
        : settleStep(ctx, configuration, state, batch);

    const done = ctx.store.countPurchaseEntries() === 0 && ctx.store.countTokens() === 0;
    if (done) {
      ctx.store.clearSaleState();
      ctx.store.setAvailableCount(0);
      recordAudit(ctx, "sale_cleared", state.saleId, actorId, {
        outcome,
        amountSold: state.amountSold,
        itemsDelivered: state.itemsDelivered,
      });
    } else {
      state.updatedAt = isoAt(now);
      ctx.store.saveSaleState(state);
    }
    response = buildResponse("end_sale", result.messages, {
      ...result.attributes,
      outcome,
      step: result.step,
      done: String(done),
    });
  });
  return response;
}

/** One buyer's refund on the refund path, outside the batch order. */
export async function claimRefund(ctx: EngineContext, buyer: string): Promise<SaleResponse> {
  let response = buildResponse("claim_refund");
  await ctx.store.runInTransaction(() => {
    const state = ctx.store.getSaleState();
    if (!state) throw notFound("no sale is in progress");
    if (!isSaleOver(state, ctx.now())) throw conflict("sale has not ended");
    if (resolveOutcome(state) !== "refund") throw conflict("minimum tokens sold, no refunds");
    const purchases = ctx.store.getPurchases(buyer);
    if (!purchases || purchases.length === 0) throw notFound("no purchases for this buyer");

    const configuration = requireConfiguration(ctx);
    const messages = refundEntry(ctx, configuration, state, { purchaser: buyer, purchases });
    recordAudit(ctx, "refund_issued", state.saleId, buyer, { buyers: [buyer] });
    response = buildResponse("claim_refund", messages, {
      purchaser: buyer,
      refunded_tokens: String(purchases.length),
    });
  });
  return response;
}
