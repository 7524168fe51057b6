import type { GatewayRequestHandler, GatewayRequestHandlerOptions } from "../../gateway/types.js";
import { instantiate, updateItemSource } from "../admin.js";
import type { EngineContext } from "../context.js";
import { getConfiguration } from "../queries.js";
import {
  assertNonPayable,
  normalizeAccountId,
  optionalBoolean,
  requireString,
} from "../validators.js";
import {
  assertAccess,
  formatGatewayErrorResponse,
  readFunds,
  readParams,
  requireActorId,
} from "./_shared.js";

export function createConfigInitHandler(ctx: EngineContext): GatewayRequestHandler {
  return async (opts: GatewayRequestHandlerOptions) => {
    const { respond } = opts;
    try {
      assertAccess(opts, ctx.config, "write");
      const input = readParams(opts);
      const actorId = requireActorId(opts, ctx.config, input);
      assertNonPayable(readFunds(input));
      const owner =
        input.owner === undefined || input.owner === null
          ? undefined
          : normalizeAccountId(input.owner, "owner");
      const result = await instantiate(ctx, actorId, {
        itemSource: requireString(input.itemSource, "itemSource"),
        canMintAfterSale: optionalBoolean(input.canMintAfterSale, "canMintAfterSale") ?? false,
        owner,
      });
      respond(true, result);
    } catch (err) {
      respond(false, formatGatewayErrorResponse(err));
    }
  };
}

export function createConfigGetHandler(ctx: EngineContext): GatewayRequestHandler {
  return (opts: GatewayRequestHandlerOptions) => {
    const { respond } = opts;
    try {
      assertAccess(opts, ctx.config, "read");
      respond(true, { configuration: getConfiguration(ctx) });
    } catch (err) {
      respond(false, formatGatewayErrorResponse(err));
    }
  };
}

export function createUpdateItemSourceHandler(ctx: EngineContext): GatewayRequestHandler {
  return async (opts: GatewayRequestHandlerOptions) => {
    const { respond } = opts;
    try {
      assertAccess(opts, ctx.config, "write");
      const input = readParams(opts);
      const actorId = requireActorId(opts, ctx.config, input);
      assertNonPayable(readFunds(input));
      const result = await updateItemSource(ctx, actorId, requireString(input.address, "address"));
      respond(true, result);
    } catch (err) {
      respond(false, formatGatewayErrorResponse(err));
    }
  };
}
