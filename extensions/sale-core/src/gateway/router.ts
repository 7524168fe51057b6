import { notFound } from "../errors/codes.js";
import { formatGatewayErrorResponse } from "../sale/handlers/_shared.js";
import type {
  GatewayClient,
  GatewayRequestHandler,
  GatewayRespond,
  SaleLogger,
} from "./types.js";

export type GatewayCallResult = {
  ok: boolean;
  payload: unknown;
};

function describeFailure(payload: unknown): string {
  if (payload && typeof payload === "object" && "error" in payload) {
    return String(payload.error);
  }
  return "unknown";
}

function describeAction(payload: unknown): string | undefined {
  if (payload && typeof payload === "object" && "action" in payload) {
    return typeof payload.action === "string" ? payload.action : undefined;
  }
  return undefined;
}

/**
 * In-process dispatcher for `sale.*` methods. Calls run one at a time in arrival order,
 * so each call observes exactly the state committed by the previous one.
 */
export class SaleGateway {
  private readonly methods = new Map<string, GatewayRequestHandler>();
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly logger: SaleLogger) {}

  registerGatewayMethod(method: string, handler: GatewayRequestHandler) {
    if (this.methods.has(method)) {
      throw new Error(`gateway method already registered: ${method}`);
    }
    this.methods.set(method, handler);
    this.logger.debug?.(`registered ${method}`);
  }

  listMethods(): string[] {
    return [...this.methods.keys()].sort();
  }

  /** Queue `fn` behind every call already accepted. */
  enqueue<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  call(
    method: string,
    params: Record<string, unknown> = {},
    client?: GatewayClient,
  ): Promise<GatewayCallResult> {
    return this.enqueue(() => this.dispatch(method, params, client));
  }

  private async dispatch(
    method: string,
    params: Record<string, unknown>,
    client: GatewayClient | undefined,
  ): Promise<GatewayCallResult> {
    const handler = this.methods.get(method);
    if (!handler) {
      this.logger.warn(`${method}: unknown method`);
      return { ok: false, payload: formatGatewayErrorResponse(notFound(`unknown method ${method}`)) };
    }

    let result: GatewayCallResult | undefined;
    const respond: GatewayRespond = (ok, payload) => {
      // First answer wins.
      if (!result) result = { ok, payload };
    };
    try {
      await handler({ method, params, client, respond });
    } catch (err) {
      respond(false, formatGatewayErrorResponse(err));
    }
    const settled = result ?? {
      ok: false,
      payload: formatGatewayErrorResponse(new Error(`${method} did not respond`)),
    };

    if (settled.ok) {
      const action = describeAction(settled.payload);
      if (action) {
        this.logger.info(`${method}: ${action}`);
      } else {
        this.logger.debug?.(`${method}: ok`);
      }
    } else {
      this.logger.warn(`${method} failed: ${describeFailure(settled.payload)}`);
    }
    return settled;
  }
}
