import type { GatewayRequestHandler, GatewayRequestHandlerOptions } from "../../gateway/types.js";
import type { EngineContext } from "../context.js";
import { purchase, purchaseByTokenId } from "../purchase.js";
import { getPurchases } from "../queries.js";
import { claimRefund } from "../settlement.js";
import {
  assertNonPayable,
  normalizeAccountId,
  optionalPositiveInt,
  requireTokenId,
} from "../validators.js";
import {
  assertAccess,
  formatGatewayErrorResponse,
  readFunds,
  readParams,
  requireBuyerId,
} from "./_shared.js";

export function createPurchaseHandler(ctx: EngineContext): GatewayRequestHandler {
  return async (opts: GatewayRequestHandlerOptions) => {
    const { respond } = opts;
    try {
      assertAccess(opts, ctx.config, "write");
      const input = readParams(opts);
      const buyer = requireBuyerId(opts, ctx.config, input);
      const count = optionalPositiveInt(input.count, "count");
      respond(true, await purchase(ctx, buyer, count, readFunds(input)));
    } catch (err) {
      respond(false, formatGatewayErrorResponse(err));
    }
  };
}

export function createPurchaseByTokenIdHandler(ctx: EngineContext): GatewayRequestHandler {
  return async (opts: GatewayRequestHandlerOptions) => {
    const { respond } = opts;
    try {
      assertAccess(opts, ctx.config, "write");
      const input = readParams(opts);
      const buyer = requireBuyerId(opts, ctx.config, input);
      const tokenId = requireTokenId(input.tokenId);
      respond(true, await purchaseByTokenId(ctx, buyer, tokenId, readFunds(input)));
    } catch (err) {
      respond(false, formatGatewayErrorResponse(err));
    }
  };
}

export function createClaimRefundHandler(ctx: EngineContext): GatewayRequestHandler {
  return async (opts: GatewayRequestHandlerOptions) => {
    const { respond } = opts;
    try {
      assertAccess(opts, ctx.config, "write");
      const input = readParams(opts);
      const buyer = requireBuyerId(opts, ctx.config, input);
      assertNonPayable(readFunds(input));
      respond(true, await claimRefund(ctx, buyer));
    } catch (err) {
      respond(false, formatGatewayErrorResponse(err));
    }
  };
}

export function createPurchasesGetHandler(ctx: EngineContext): GatewayRequestHandler {
  return (opts: GatewayRequestHandlerOptions) => {
    const { respond } = opts;
    try {
      assertAccess(opts, ctx.config, "read");
      const input = readParams(opts);
      const buyer = normalizeAccountId(input.buyer, "buyer");
      const purchases = getPurchases(ctx, buyer);
      respond(true, { buyer, purchases, count: purchases.length });
    } catch (err) {
      respond(false, formatGatewayErrorResponse(err));
    }
  };
}
