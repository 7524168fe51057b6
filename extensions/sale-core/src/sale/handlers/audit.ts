import type { GatewayRequestHandler, GatewayRequestHandlerOptions } from "../../gateway/types.js";
import type { EngineContext } from "../context.js";
import { queryAudit } from "../queries.js";
import { optionalPositiveInt } from "../validators.js";
import { assertAccess, formatGatewayErrorResponse, readParams } from "./_shared.js";

export function createAuditQueryHandler(ctx: EngineContext): GatewayRequestHandler {
  return (opts: GatewayRequestHandlerOptions) => {
    const { respond } = opts;
    try {
      assertAccess(opts, ctx.config, "read");
      const limit = optionalPositiveInt(readParams(opts).limit, "limit");
      const events = queryAudit(ctx, limit);
      respond(true, { events, count: events.length });
    } catch (err) {
      respond(false, formatGatewayErrorResponse(err));
    }
  };
}
