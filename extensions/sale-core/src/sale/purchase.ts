import { conflict, insufficientFunds, notFound, quotaExceeded } from "../errors/codes.js";
import { buildResponse, type EngineContext, isoAt, recordAudit } from "./context.js";
import { computeTaxAmount } from "./funds.js";
import { isSaleOver } from "./lifecycle.js";
import { amountOf, checkedAdd, checkedMul, deductFunds, toUint } from "./math.js";
import type { Coin, Purchase, SaleMessage, SaleResponse, SaleState } from "./types.js";
import { normalizeAccountId, optionalPositiveInt, requireFunds, requireTokenId } from "./validators.js";

type PickContext = {
  state: SaleState;
  /** How many more items this buyer may hold. Always > 0. */
  allowance: number;
};

type ItemPicker = (pick: PickContext) => string[];

/**
 * Shared purchase path. Every check runs before the first write so a rejected call leaves
 * the registry, ledger and counters untouched.
 */
async function executePurchase(
  ctx: EngineContext,
  buyer: string,
  funds: Coin[],
  action: string,
  pickItems: ItemPicker,
): Promise<SaleResponse> {
  const purchaser = normalizeAccountId(buyer, "buyer");
  const paidFunds = requireFunds(funds);
  let response = buildResponse(action);
  await ctx.store.runInTransaction(async () => {
    const state = ctx.store.getSaleState();
    if (!state) throw notFound("no sale is in progress");
    const now = ctx.now();
    if (now < state.startTime) throw conflict("sale has not started");
    if (isSaleOver(state, now)) throw conflict("sale has ended");

    const existing = ctx.store.getPurchases(purchaser) ?? [];
    const allowance = state.maxAmountPerWallet - existing.length;
    if (allowance <= 0) throw quotaExceeded("purchase limit reached for this wallet");

    const tokenIds = pickItems({ state, allowance });
    const count = BigInt(tokenIds.length);
    const { denom } = state.price;
    const price = toUint(state.price.amount, "price");
    const paid = amountOf(paidFunds, denom);

    const base = checkedMul(price, count, "purchase cost");
    if (paid < base) throw insufficientFunds(`payment does not cover ${base}${denom}`);

    const split = await ctx.splitter.split({ payer: purchaser, amount: state.price });
    const tax = computeTaxAmount(split, state.price);
    const totalTax = checkedMul(tax, count, "purchase tax");
    const required = checkedAdd(base, totalTax, "purchase cost");
    if (paid < required) {
      throw insufficientFunds(`payment does not cover ${required}${denom} including tax`);
    }
    const remainder = toUint(split.remainder.amount, "remainder");
    const proceeds = checkedMul(remainder, count, "proceeds");
    const amountSold = checkedAdd(BigInt(state.amountSold), count, "amountSold");
    const amountToSend = checkedAdd(BigInt(state.amountToSend), proceeds, "amountToSend");
    const leftover = deductFunds(paidFunds, { denom, amount: required.toString() });

    const purchasedAt = isoAt(now);
    const recorded: Purchase[] = tokenIds.map((tokenId) => ({
      tokenId,
      taxAmount: tax.toString(),
      messages: split.messages.map((message) => ({ ...message, amount: [...message.amount] })),
      purchaser,
      purchasedAt,
    }));
    for (const tokenId of tokenIds) ctx.store.removeToken(tokenId);
    ctx.store.setAvailableCount(ctx.store.getAvailableCount() - tokenIds.length);
    ctx.store.savePurchases(purchaser, [...existing, ...recorded]);
    ctx.store.saveSaleState({
      ...state,
      amountSold: amountSold.toString(),
      amountToSend: amountToSend.toString(),
      updatedAt: purchasedAt,
    });

    const messages: SaleMessage[] = [];
    if (leftover.length > 0) {
      messages.push({
        kind: "payment",
        purpose: "overpayment_refund",
        recipient: purchaser,
        amount: leftover,
      });
    }
    recordAudit(ctx, "purchase_recorded", state.saleId, purchaser, {
      tokenIds,
      paid: required.toString(),
      tax: totalTax.toString(),
    });
    response = buildResponse(action, messages, {
      purchaser,
      number_of_tokens_purchased: String(tokenIds.length),
      token_ids: tokenIds.join(","),
      tax_amount: totalTax.toString(),
      amount_paid: `${required}${denom}`,
    });
  });
  return response;
}

/**
 * Buy up to `count` items, lowest identifiers first. Without a count the buyer takes their
 * whole remaining allowance. Fewer items than requested is fine; none at all is not.
 */
export async function purchase(
  ctx: EngineContext,
  buyer: string,
  count: number | undefined,
  funds: Coin[],
): Promise<SaleResponse> {
  const requested = optionalPositiveInt(count, "count");
  return executePurchase(ctx, buyer, funds, "purchase", ({ allowance }) => {
    const wanted = Math.min(requested ?? allowance, allowance);
    const tokenIds = ctx.store.listTokens({ limit: wanted }).map((token) => token.tokenId);
    if (tokenIds.length === 0) throw conflict("all tokens purchased");
    return tokenIds;
  });
}

export async function purchaseByTokenId(
  ctx: EngineContext,
  buyer: string,
  tokenId: string,
  funds: Coin[],
): Promise<SaleResponse> {
  const wantedId = requireTokenId(tokenId);
  return executePurchase(ctx, buyer, funds, "purchase", () => {
    if (!ctx.store.hasToken(wantedId)) throw notFound(`token ${wantedId} is not available`);
    return [wantedId];
  });
}
