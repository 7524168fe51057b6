import type { SalePluginConfig } from "../config.js";
import type {
  AuditEvent,
  AvailableItemsFilter,
  Purchase,
  PurchaseLedgerEntry,
  SaleConfiguration,
  SaleState,
  TokenRecord,
} from "../sale/types.js";
import { SaleFileStore } from "./file-store.js";
import { SaleSqliteStore } from "./sqlite-store.js";
import type { SaleStore } from "./store-types.js";

export class SaleStateStore {
  private readonly store: SaleStore;

  constructor(stateDir: string, config: SalePluginConfig) {
    const fileStore = new SaleFileStore(stateDir);
    if (config.store.mode === "sqlite") {
      this.store = new SaleSqliteStore(stateDir, config, fileStore);
    } else {
      this.store = fileStore;
    }
  }

  getConfiguration(): SaleConfiguration | undefined {
    return this.store.getConfiguration();
  }

  saveConfiguration(config: SaleConfiguration): void {
    this.store.saveConfiguration(config);
  }

  getSaleState(): SaleState | undefined {
    return this.store.getSaleState();
  }

  saveSaleState(state: SaleState): void {
    this.store.saveSaleState(state);
  }

  clearSaleState(): void {
    this.store.clearSaleState();
  }

  getSaleConducted(): boolean {
    return this.store.getSaleConducted();
  }

  setSaleConducted(value: boolean): void {
    this.store.setSaleConducted(value);
  }

  getAvailableCount(): number {
    return this.store.getAvailableCount();
  }

  setAvailableCount(count: number): void {
    this.store.setAvailableCount(count);
  }

  hasToken(tokenId: string): boolean {
    return this.store.hasToken(tokenId);
  }

  saveToken(record: TokenRecord): void {
    this.store.saveToken(record);
  }

  removeToken(tokenId: string): void {
    this.store.removeToken(tokenId);
  }

  listTokens(filter?: AvailableItemsFilter): TokenRecord[] {
    return this.store.listTokens(filter);
  }

  countTokens(): number {
    return this.store.countTokens();
  }

  getPurchases(purchaser: string): Purchase[] | undefined {
    return this.store.getPurchases(purchaser);
  }

  savePurchases(purchaser: string, purchases: Purchase[]): void {
    this.store.savePurchases(purchaser, purchases);
  }

  removePurchases(purchaser: string): void {
    this.store.removePurchases(purchaser);
  }

  listPurchaseEntries(limit?: number): PurchaseLedgerEntry[] {
    return this.store.listPurchaseEntries(limit);
  }

  countPurchaseEntries(): number {
    return this.store.countPurchaseEntries();
  }

  appendAuditEvent(event: AuditEvent): void {
    this.store.appendAuditEvent(event);
  }

  readAuditEvents(limit?: number): AuditEvent[] {
    return this.store.readAuditEvents(limit);
  }

  close(): void {
    this.store.close?.();
  }

  async runInTransaction(fn: () => void | Promise<void>): Promise<void> {
    await this.store.runInTransaction(fn);
  }
}
