import type {
  AuditEvent,
  AvailableItemsFilter,
  Purchase,
  PurchaseLedgerEntry,
  SaleConfiguration,
  SaleState,
  TokenRecord,
} from "../sale/types.js";

export type SaleStore = {
  getConfiguration: () => SaleConfiguration | undefined;
  saveConfiguration: (config: SaleConfiguration) => void;
  getSaleState: () => SaleState | undefined;
  saveSaleState: (state: SaleState) => void;
  clearSaleState: () => void;
  getSaleConducted: () => boolean;
  setSaleConducted: (value: boolean) => void;
  getAvailableCount: () => number;
  setAvailableCount: (count: number) => void;
  hasToken: (tokenId: string) => boolean;
  saveToken: (record: TokenRecord) => void;
  removeToken: (tokenId: string) => void;
  /** Ascending by identifier, starting after `filter.startAfter`. */
  listTokens: (filter?: AvailableItemsFilter) => TokenRecord[];
  countTokens: () => number;
  getPurchases: (purchaser: string) => Purchase[] | undefined;
  /** Upsert; an existing buyer keeps their original ledger position. */
  savePurchases: (purchaser: string, purchases: Purchase[]) => void;
  removePurchases: (purchaser: string) => void;
  /** Ledger entries in insertion order. */
  listPurchaseEntries: (limit?: number) => PurchaseLedgerEntry[];
  countPurchaseEntries: () => number;
  appendAuditEvent: (event: AuditEvent) => void;
  readAuditEvents: (limit?: number) => AuditEvent[];
  hasAnyData?: () => boolean;
  close?: () => void;
  /** Run multiple writes atomically (SQLite: BEGIN/COMMIT/ROLLBACK; File: directory lock). */
  runInTransaction: (fn: () => void | Promise<void>) => Promise<void>;
};
