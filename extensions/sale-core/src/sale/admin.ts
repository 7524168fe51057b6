import { randomUUID } from "node:crypto";
import { conflict, forbidden, invalidArgument, quotaExceeded } from "../errors/codes.js";
import {
  assertItemSource,
  assertOwner,
  buildResponse,
  type EngineContext,
  isoAt,
  recordAudit,
  requireConfiguration,
} from "./context.js";
import { assertPhaseTransition, derivePhase } from "./lifecycle.js";
import { toUint } from "./math.js";
import type {
  Coin,
  ItemMintMessage,
  MintRecord,
  Recipient,
  SaleConfiguration,
  SaleResponse,
  SaleState,
} from "./types.js";
import {
  normalizeAccountId,
  optionalNonNegativeInt,
  optionalPositiveInt,
  requireCoin,
  requireMintRecords,
  requirePositiveInt,
  requireRecipient,
  requireUint128String,
} from "./validators.js";

export type InstantiateInput = {
  itemSource: string;
  canMintAfterSale: boolean;
  owner?: string;
};

export async function instantiate(
  ctx: EngineContext,
  actorId: string,
  input: InstantiateInput,
): Promise<SaleResponse> {
  const owner = normalizeAccountId(input.owner ?? actorId, "owner");
  if (typeof input.canMintAfterSale !== "boolean") {
    throw invalidArgument("canMintAfterSale must be a boolean");
  }
  const itemSource = await assertItemSource(ctx, input.itemSource);

  let response = buildResponse("instantiate");
  await ctx.store.runInTransaction(() => {
    if (ctx.store.getConfiguration()) throw conflict("sale engine is already initialized");
    const now = isoAt(ctx.now());
    const configuration: SaleConfiguration = {
      itemSource,
      canMintAfterSale: input.canMintAfterSale,
      owner,
      createdAt: now,
      updatedAt: now,
    };
    ctx.store.saveConfiguration(configuration);
    ctx.store.setSaleConducted(false);
    ctx.store.setAvailableCount(0);
    recordAudit(ctx, "config_initialized", itemSource, actorId, {
      owner,
      canMintAfterSale: input.canMintAfterSale,
    });
    response = buildResponse("instantiate", [], { owner, item_source: itemSource });
  });
  return response;
}

export async function updateItemSource(
  ctx: EngineContext,
  actorId: string,
  address: string,
): Promise<SaleResponse> {
  const configuration = requireConfiguration(ctx);
  assertOwner(configuration, actorId);
  const itemSource = await assertItemSource(ctx, address);

  let response = buildResponse("update_token_contract");
  await ctx.store.runInTransaction(() => {
    const current = requireConfiguration(ctx);
    assertOwner(current, actorId);
    if (ctx.store.getAvailableCount() !== 0) {
      throw forbidden("item source cannot change while items are held in escrow");
    }
    if (ctx.store.getSaleState()) {
      throw conflict("item source cannot change while a sale is in progress");
    }
    ctx.store.saveConfiguration({ ...current, itemSource, updatedAt: isoAt(ctx.now()) });
    recordAudit(ctx, "item_source_updated", itemSource, actorId, {
      previous: current.itemSource,
    });
    response = buildResponse("update_token_contract", [], { item_source: itemSource });
  });
  return response;
}

export async function mint(
  ctx: EngineContext,
  actorId: string,
  input: MintRecord[],
): Promise<SaleResponse> {
  const records = requireMintRecords(input);
  const limit = ctx.config.limits.maxMintBatch;
  if (records.length > limit) {
    throw quotaExceeded(`too many mint messages, limit is ${limit}`);
  }
  if (records.length === 0) throw invalidArgument("tokens must not be empty");
  const seen = new Set<string>();
  for (const record of records) {
    if (seen.has(record.tokenId)) throw conflict(`duplicate tokenId ${record.tokenId} in batch`);
    seen.add(record.tokenId);
  }

  let response = buildResponse("mint");
  await ctx.store.runInTransaction(() => {
    const configuration = requireConfiguration(ctx);
    assertOwner(configuration, actorId);
    // Minting is only allowed while no sale is ongoing.
    if (ctx.store.getSaleState()) throw conflict("sale already started");
    if (!configuration.canMintAfterSale && ctx.store.getSaleConducted()) {
      throw conflict("cannot mint after a sale has been conducted");
    }
    for (const record of records) {
      if (ctx.store.hasToken(record.tokenId)) {
        throw conflict(`token ${record.tokenId} is already available`);
      }
    }

    const engineAddress = ctx.config.engine.address;
    const registeredAt = isoAt(ctx.now());
    const messages: ItemMintMessage[] = [];
    let registered = 0;
    for (const record of records) {
      const owner = record.owner ?? engineAddress;
      // Only items owned by the engine are escrowed for sale; others pass straight through.
      if (owner === engineAddress) {
        ctx.store.saveToken({ tokenId: record.tokenId, available: true, registeredAt });
        registered += 1;
      }
      const message: ItemMintMessage = {
        kind: "item_mint",
        itemSource: configuration.itemSource,
        tokenId: record.tokenId,
        owner,
      };
      if (record.tokenUri) message.tokenUri = record.tokenUri;
      if (record.extension) message.extension = record.extension;
      messages.push(message);
    }
    const available = ctx.store.getAvailableCount() + registered;
    ctx.store.setAvailableCount(available);
    recordAudit(ctx, "items_minted", configuration.itemSource, actorId, {
      minted: records.length,
      registered,
    });
    response = buildResponse("mint", messages, {
      minted: String(records.length),
      registered: String(registered),
      available: String(available),
    });
  });
  return response;
}

export type OpenSaleInput = {
  startTime?: number;
  endTime: number;
  price: Coin;
  minTokensSold: string;
  maxAmountPerWallet?: number;
  recipient: Recipient;
  targetPercentageSold?: number;
  maxDurationMs?: number;
};

export async function openSale(
  ctx: EngineContext,
  actorId: string,
  input: OpenSaleInput,
): Promise<SaleResponse> {
  const configuration = requireConfiguration(ctx);
  assertOwner(configuration, actorId);

  const endTime = requirePositiveInt(input.endTime, "endTime");
  const price = requireCoin(input.price, "price");
  const minTokensSold = requireUint128String(input.minTokensSold, "minTokensSold");
  const recipient = requireRecipient(input.recipient);
  const targetPercentageSold = optionalPositiveInt(
    input.targetPercentageSold,
    "targetPercentageSold",
    { max: 100 },
  );
  const maxDurationMs = optionalPositiveInt(input.maxDurationMs, "maxDurationMs");
  const maxAmountPerWallet =
    optionalPositiveInt(input.maxAmountPerWallet, "maxAmountPerWallet") ??
    ctx.config.limits.defaultMaxPerWallet;

  const now = ctx.now();
  // Without an explicit start the sale starts now.
  const startTime = optionalNonNegativeInt(input.startTime, "startTime") ?? now;
  if (startTime < now) throw invalidArgument("startTime must not be in the past");
  if (endTime <= startTime) throw invalidArgument("endTime must be after startTime");
  if (toUint(price.amount, "price") === 0n) throw invalidArgument("price must be positive");

  let response = buildResponse("start_sale");
  await ctx.store.runInTransaction(() => {
    assertOwner(requireConfiguration(ctx), actorId);
    if (ctx.store.getSaleState()) throw conflict("sale already started");
    assertPhaseTransition(derivePhase(undefined, now), "active");

    const stamp = isoAt(now);
    const state: SaleState = {
      saleId: randomUUID(),
      startTime,
      endTime,
      price,
      minTokensSold,
      maxAmountPerWallet,
      amountSold: "0",
      amountToSend: "0",
      amountTransferred: "0",
      itemsDelivered: "0",
      totalTokens: String(ctx.store.getAvailableCount()),
      recipient,
      createdAt: stamp,
      updatedAt: stamp,
    };
    if (targetPercentageSold !== undefined) state.targetPercentageSold = targetPercentageSold;
    if (maxDurationMs !== undefined) state.maxDurationMs = maxDurationMs;

    ctx.store.saveSaleState(state);
    ctx.store.setSaleConducted(true);
    recordAudit(ctx, "sale_opened", state.saleId, actorId, {
      startTime,
      endTime,
      price,
      minTokensSold,
      maxAmountPerWallet,
    });
    response = buildResponse("start_sale", [], {
      sale_id: state.saleId,
      start_time: String(startTime),
      end_time: String(endTime),
      price: `${price.amount}${price.denom}`,
      min_tokens_sold: minTokensSold,
      max_amount_per_wallet: String(maxAmountPerWallet),
    });
  });
  return response;
}
