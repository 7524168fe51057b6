/**
 * Sale Core
 *
 * Escrow engine for a time-boxed, quantity-limited item sale:
 * - Registers `sale.*` gateway methods (open, mint, purchase, end/settle, queries)
 * - Settlement is batched; callers repeat `sale.end` until it reports `done`
 * - Outbound item and payment commands are returned in each response's `messages`
 */

import { resolveConfig, type SalePluginConfig } from "./config.js";
import { createSaleFacade, type SaleFacade } from "./facade.js";
import { SaleGateway } from "./gateway/router.js";
import type {
  GatewayRequestHandler,
  SaleLogger,
  SalePluginDefinition,
} from "./gateway/types.js";
import { createDefaultLogger } from "./logging.js";
import { createEngineContext, type EngineContext, type EngineContextOptions } from "./sale/context.js";
import {
  createAuditQueryHandler,
  createAvailableItemsHandler,
  createClaimRefundHandler,
  createConfigGetHandler,
  createConfigInitHandler,
  createIsItemAvailableHandler,
  createMintHandler,
  createPurchaseByTokenIdHandler,
  createPurchaseHandler,
  createPurchasesGetHandler,
  createSaleEndHandler,
  createSaleOpenHandler,
  createSaleStateHandler,
  createUpdateItemSourceHandler,
} from "./sale/handlers/index.js";
import { SaleStateStore } from "./state/store.js";

export type { SalePluginConfig } from "./config.js";
export { resolveConfig, DEFAULT_CONFIG } from "./config.js";
export { ErrorCode, type ErrorResponse } from "./errors/codes.js";
export type { FacadeResult, SaleFacade } from "./facade.js";
export { createSaleFacade } from "./facade.js";
export { SaleGateway, type GatewayCallResult } from "./gateway/router.js";
export type * from "./gateway/types.js";
export { createDefaultLogger, silentLogger } from "./logging.js";
export type { ItemSourceVerifier } from "./sale/context.js";
export { createRatesSplitter, noopSplitter, type FundsSplitter } from "./sale/funds.js";
export type { SaleStatus } from "./sale/queries.js";
export type * from "./sale/types.js";

type MethodRegistrar = {
  registerGatewayMethod: (method: string, handler: GatewayRequestHandler) => void;
};

export function registerSaleMethods(registrar: MethodRegistrar, ctx: EngineContext) {
  registrar.registerGatewayMethod("sale.config.init", createConfigInitHandler(ctx));
  registrar.registerGatewayMethod("sale.config.get", createConfigGetHandler(ctx));
  registrar.registerGatewayMethod(
    "sale.config.updateItemSource",
    createUpdateItemSourceHandler(ctx),
  );

  registrar.registerGatewayMethod("sale.open", createSaleOpenHandler(ctx));
  registrar.registerGatewayMethod("sale.mint", createMintHandler(ctx));
  registrar.registerGatewayMethod("sale.purchase", createPurchaseHandler(ctx));
  registrar.registerGatewayMethod("sale.purchaseByTokenId", createPurchaseByTokenIdHandler(ctx));
  registrar.registerGatewayMethod("sale.claimRefund", createClaimRefundHandler(ctx));
  registrar.registerGatewayMethod("sale.end", createSaleEndHandler(ctx));

  registrar.registerGatewayMethod("sale.state", createSaleStateHandler(ctx));
  registrar.registerGatewayMethod("sale.items.available", createAvailableItemsHandler(ctx));
  registrar.registerGatewayMethod("sale.items.isAvailable", createIsItemAvailableHandler(ctx));
  registrar.registerGatewayMethod("sale.purchases.get", createPurchasesGetHandler(ctx));
  registrar.registerGatewayMethod("sale.audit.query", createAuditQueryHandler(ctx));
}

export type SaleCoreOptions = EngineContextOptions & {
  stateDir: string;
  config?: Record<string, unknown>;
  logger?: SaleLogger;
};

export type SaleCore = {
  config: SalePluginConfig;
  store: SaleStateStore;
  gateway: SaleGateway;
  facade: SaleFacade;
  close: () => void;
};

/** Standalone engine: store, gateway with every `sale.*` method, and the typed facade. */
export function createSaleCore(options: SaleCoreOptions): SaleCore {
  const logger = options.logger ?? createDefaultLogger();
  const config = resolveConfig(options.config);
  const store = new SaleStateStore(options.stateDir, config);
  const ctx = createEngineContext(store, config, options);
  const gateway = new SaleGateway(logger);
  registerSaleMethods(gateway, ctx);
  logger.info(`Sale Core engine initialized (${config.store.mode} store)`);
  return {
    config,
    store,
    gateway,
    facade: createSaleFacade(ctx, gateway),
    close: () => store.close(),
  };
}

const plugin: SalePluginDefinition = {
  id: "sale-core",
  name: "Sale Core",
  description: "Time-boxed item sale with escrow and batched settlement (sale.*)",
  version: "0.1.0",

  register(api) {
    const config = resolveConfig(api.pluginConfig);
    const store = new SaleStateStore(api.resolveStateDir(), config);
    const ctx = createEngineContext(store, config);
    // The host dispatches requests itself; a private queue keeps them serialized.
    const queue = new SaleGateway(api.logger);
    registerSaleMethods(
      {
        registerGatewayMethod: (method, handler) =>
          api.registerGatewayMethod(method, (opts) =>
            queue.enqueue(async () => {
              await handler(opts);
            }),
          ),
      },
      ctx,
    );
    api.logger.info("Sale Core engine initialized");
  },
};

export default plugin;
