/**
 * Sale handlers barrel: re-exports all handler factories.
 */

export {
  createConfigGetHandler,
  createConfigInitHandler,
  createUpdateItemSourceHandler,
} from "./config.js";
export { createSaleEndHandler, createSaleOpenHandler, createSaleStateHandler } from "./sale.js";
export {
  createClaimRefundHandler,
  createPurchaseByTokenIdHandler,
  createPurchaseHandler,
  createPurchasesGetHandler,
} from "./purchase.js";
export {
  createAvailableItemsHandler,
  createIsItemAvailableHandler,
  createMintHandler,
} from "./registry.js";
export { createAuditQueryHandler } from "./audit.js";
