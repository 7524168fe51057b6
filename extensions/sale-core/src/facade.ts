/**
 * Sale Core Facade
 *
 * Typed in-process API over the engine for trusted callers that do not go through the
 * gateway's access checks. Calls share the gateway queue, so they interleave with
 * `sale.*` requests in arrival order.
 */

import type { ErrorResponse } from "./errors/codes.js";
import type { SaleGateway } from "./gateway/router.js";
import {
  instantiate,
  mint,
  openSale,
  updateItemSource,
  type InstantiateInput,
  type OpenSaleInput,
} from "./sale/admin.js";
import type { EngineContext } from "./sale/context.js";
import { formatGatewayErrorResponse } from "./sale/handlers/_shared.js";
import { purchase, purchaseByTokenId } from "./sale/purchase.js";
import {
  getAvailableItems,
  getConfiguration,
  getPurchases,
  getSaleStatus,
  isItemAvailable,
  type AvailableItemsPage,
  type SaleStatus,
} from "./sale/queries.js";
import { claimRefund, endSale } from "./sale/settlement.js";
import type { Coin, MintRecord, Purchase, SaleConfiguration, SaleResponse } from "./sale/types.js";
import { normalizeAccountId } from "./sale/validators.js";

export type FacadeResult<T> =
  | { success: true; value: T }
  | { success: false; error: ErrorResponse };

export type DrainOptions = {
  limit?: number;
  /** Upper bound on EndSale calls in one drain. Default 1000. */
  maxSteps?: number;
};

export interface SaleFacade {
  instantiate(actorId: string, input: InstantiateInput): Promise<FacadeResult<SaleResponse>>;
  updateItemSource(actorId: string, address: string): Promise<FacadeResult<SaleResponse>>;
  mint(actorId: string, records: MintRecord[]): Promise<FacadeResult<SaleResponse>>;
  openSale(actorId: string, input: OpenSaleInput): Promise<FacadeResult<SaleResponse>>;
  purchase(buyer: string, funds: Coin[], count?: number): Promise<FacadeResult<SaleResponse>>;
  purchaseByTokenId(
    buyer: string,
    tokenId: string,
    funds: Coin[],
  ): Promise<FacadeResult<SaleResponse>>;
  claimRefund(buyer: string): Promise<FacadeResult<SaleResponse>>;
  endSale(actorId: string, limit?: number): Promise<FacadeResult<SaleResponse>>;
  /** Repeat EndSale until the engine reports `done` or refuses to end the sale. */
  drain(actorId: string, options?: DrainOptions): Promise<FacadeResult<SaleResponse[]>>;

  getSaleStatus(): Promise<FacadeResult<SaleStatus>>;
  getConfiguration(): Promise<FacadeResult<SaleConfiguration | null>>;
  getAvailableItems(input?: {
    startAfter?: string;
    limit?: number;
  }): Promise<FacadeResult<AvailableItemsPage>>;
  isItemAvailable(tokenId: string): Promise<FacadeResult<boolean>>;
  getPurchases(buyer: string): Promise<FacadeResult<Purchase[]>>;
}

export function createSaleFacade(ctx: EngineContext, gateway: SaleGateway): SaleFacade {
  const invoke = async <T>(fn: () => T | Promise<T>): Promise<FacadeResult<T>> => {
    try {
      const value = await gateway.enqueue(async () => await fn());
      return { success: true, value };
    } catch (err) {
      return { success: false, error: formatGatewayErrorResponse(err) };
    }
  };
  const account = (value: string, field: string) => normalizeAccountId(value, field);

  const facade: SaleFacade = {
    instantiate: (actorId, input) =>
      invoke(() => instantiate(ctx, account(actorId, "actorId"), input)),
    updateItemSource: (actorId, address) =>
      invoke(() => updateItemSource(ctx, account(actorId, "actorId"), address)),
    mint: (actorId, records) => invoke(() => mint(ctx, account(actorId, "actorId"), records)),
    openSale: (actorId, input) => invoke(() => openSale(ctx, account(actorId, "actorId"), input)),
    purchase: (buyer, funds, count) =>
      invoke(() => purchase(ctx, account(buyer, "buyer"), count, funds)),
    purchaseByTokenId: (buyer, tokenId, funds) =>
      invoke(() => purchaseByTokenId(ctx, account(buyer, "buyer"), tokenId, funds)),
    claimRefund: (buyer) => invoke(() => claimRefund(ctx, account(buyer, "buyer"))),
    endSale: (actorId, limit) => invoke(() => endSale(ctx, account(actorId, "actorId"), limit)),

    async drain(actorId, options = {}) {
      const maxSteps = options.maxSteps ?? 1000;
      const responses: SaleResponse[] = [];
      for (let step = 0; step < maxSteps; step += 1) {
        const result = await facade.endSale(actorId, options.limit);
        if (!result.success) return result;
        responses.push(result.value);
        const { attributes } = result.value;
        if (attributes.done === "true" || attributes.ended === "false") break;
      }
      return { success: true, value: responses };
    },

    getSaleStatus: () => invoke(() => getSaleStatus(ctx)),
    getConfiguration: () => invoke(() => getConfiguration(ctx)),
    getAvailableItems: (input) => invoke(() => getAvailableItems(ctx, input)),
    isItemAvailable: (tokenId) => invoke(() => isItemAvailable(ctx, tokenId)),
    getPurchases: (buyer) => invoke(() => getPurchases(ctx, account(buyer, "buyer"))),
  };
  return facade;
}
