import type { GatewayRequestHandler, GatewayRequestHandlerOptions } from "../../gateway/types.js";
import { openSale } from "../admin.js";
import type { EngineContext } from "../context.js";
import { getSaleStatus } from "../queries.js";
import { endSale } from "../settlement.js";
import {
  assertNonPayable,
  optionalNonNegativeInt,
  optionalPositiveInt,
  requireCoin,
  requirePositiveInt,
  requireRecipient,
  requireUint128String,
} from "../validators.js";
import {
  assertAccess,
  formatGatewayErrorResponse,
  readFunds,
  readParams,
  requireActorId,
} from "./_shared.js";

export function createSaleOpenHandler(ctx: EngineContext): GatewayRequestHandler {
  return async (opts: GatewayRequestHandlerOptions) => {
    const { respond } = opts;
    try {
      assertAccess(opts, ctx.config, "write");
      const input = readParams(opts);
      const actorId = requireActorId(opts, ctx.config, input);
      assertNonPayable(readFunds(input));
      const result = await openSale(ctx, actorId, {
        startTime: optionalNonNegativeInt(input.startTime, "startTime"),
        endTime: requirePositiveInt(input.endTime, "endTime"),
        price: requireCoin(input.price, "price"),
        minTokensSold: requireUint128String(input.minTokensSold, "minTokensSold"),
        maxAmountPerWallet: optionalPositiveInt(input.maxAmountPerWallet, "maxAmountPerWallet"),
        recipient: requireRecipient(input.recipient),
        targetPercentageSold: optionalPositiveInt(input.targetPercentageSold, "targetPercentageSold", {
          max: 100,
        }),
        maxDurationMs: optionalPositiveInt(input.maxDurationMs, "maxDurationMs"),
      });
      respond(true, result);
    } catch (err) {
      respond(false, formatGatewayErrorResponse(err));
    }
  };
}

export function createSaleEndHandler(ctx: EngineContext): GatewayRequestHandler {
  return async (opts: GatewayRequestHandlerOptions) => {
    const { respond } = opts;
    try {
      assertAccess(opts, ctx.config, "write");
      const input = readParams(opts);
      const actorId = requireActorId(opts, ctx.config, input);
      assertNonPayable(readFunds(input));
      const limit = optionalNonNegativeInt(input.limit, "limit");
      respond(true, await endSale(ctx, actorId, limit));
    } catch (err) {
      respond(false, formatGatewayErrorResponse(err));
    }
  };
}

export function createSaleStateHandler(ctx: EngineContext): GatewayRequestHandler {
  return (opts: GatewayRequestHandlerOptions) => {
    const { respond } = opts;
    try {
      assertAccess(opts, ctx.config, "read");
      respond(true, getSaleStatus(ctx));
    } catch (err) {
      respond(false, formatGatewayErrorResponse(err));
    }
  };
}
