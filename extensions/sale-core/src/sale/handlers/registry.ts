import type { GatewayRequestHandler, GatewayRequestHandlerOptions } from "../../gateway/types.js";
import { mint } from "../admin.js";
import type { EngineContext } from "../context.js";
import { getAvailableItems, isItemAvailable } from "../queries.js";
import {
  assertNonPayable,
  optionalPositiveInt,
  optionalString,
  requireMintRecords,
  requireTokenId,
} from "../validators.js";
import {
  assertAccess,
  formatGatewayErrorResponse,
  readFunds,
  readParams,
  requireActorId,
} from "./_shared.js";

export function createMintHandler(ctx: EngineContext): GatewayRequestHandler {
  return async (opts: GatewayRequestHandlerOptions) => {
    const { respond } = opts;
    try {
      assertAccess(opts, ctx.config, "write");
      const input = readParams(opts);
      const actorId = requireActorId(opts, ctx.config, input);
      assertNonPayable(readFunds(input));
      respond(true, await mint(ctx, actorId, requireMintRecords(input.tokens)));
    } catch (err) {
      respond(false, formatGatewayErrorResponse(err));
    }
  };
}

export function createAvailableItemsHandler(ctx: EngineContext): GatewayRequestHandler {
  return (opts: GatewayRequestHandlerOptions) => {
    const { respond } = opts;
    try {
      assertAccess(opts, ctx.config, "read");
      const input = readParams(opts);
      const page = getAvailableItems(ctx, {
        startAfter: optionalString(input.startAfter, "startAfter"),
        limit: optionalPositiveInt(input.limit, "limit"),
      });
      respond(true, page);
    } catch (err) {
      respond(false, formatGatewayErrorResponse(err));
    }
  };
}

export function createIsItemAvailableHandler(ctx: EngineContext): GatewayRequestHandler {
  return (opts: GatewayRequestHandlerOptions) => {
    const { respond } = opts;
    try {
      assertAccess(opts, ctx.config, "read");
      const tokenId = requireTokenId(readParams(opts).tokenId);
      respond(true, { tokenId, available: isItemAvailable(ctx, tokenId) });
    } catch (err) {
      respond(false, formatGatewayErrorResponse(err));
    }
  };
}
