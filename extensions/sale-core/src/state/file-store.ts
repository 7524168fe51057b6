import {
  appendFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
  rmSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import type {
  AuditEvent,
  AvailableItemsFilter,
  Purchase,
  PurchaseLedgerEntry,
  SaleConfiguration,
  SaleState,
  TokenRecord,
} from "../sale/types.js";
import { runFileStoreTransaction } from "./file-store-transaction.js";
import type { SaleStore } from "./store-types.js";

type SaleFlags = {
  saleConducted: boolean;
  availableCount: number;
};

const DEFAULT_FLAGS: SaleFlags = { saleConducted: false, availableCount: 0 };

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export class SaleFileStore implements SaleStore {
  private readonly dir: string;

  constructor(stateDir: string) {
    this.dir = join(stateDir, "sale");
    if (!existsSync(this.dir)) mkdirSync(this.dir, { recursive: true });
  }

  private readMap<T>(fileName: string): Record<string, T> {
    const path = join(this.dir, fileName);
    if (!existsSync(path)) return {};
    return JSON.parse(readFileSync(path, "utf-8")) as Record<string, T>;
  }

  private writeMap<T>(fileName: string, data: Record<string, T>): void {
    const path = join(this.dir, fileName);
    writeFileSync(path, JSON.stringify(data, null, 2));
  }

  private readObject<T>(fileName: string): T | undefined {
    const path = join(this.dir, fileName);
    if (!existsSync(path)) return undefined;
    return JSON.parse(readFileSync(path, "utf-8")) as T;
  }

  private writeObject<T>(fileName: string, value: T): void {
    const path = join(this.dir, fileName);
    writeFileSync(path, JSON.stringify(value, null, 2));
  }

  private removeObject(fileName: string): void {
    rmSync(join(this.dir, fileName), { force: true });
  }

  private get configurationPath() {
    return "configuration.json";
  }

  getConfiguration(): SaleConfiguration | undefined {
    return this.readObject<SaleConfiguration>(this.configurationPath);
  }

  saveConfiguration(config: SaleConfiguration): void {
    this.writeObject(this.configurationPath, config);
  }

  private get saleStatePath() {
    return "sale-state.json";
  }

  getSaleState(): SaleState | undefined {
    return this.readObject<SaleState>(this.saleStatePath);
  }

  saveSaleState(state: SaleState): void {
    this.writeObject(this.saleStatePath, state);
  }

  clearSaleState(): void {
    this.removeObject(this.saleStatePath);
  }

  private get flagsPath() {
    return "flags.json";
  }

  private readFlags(): SaleFlags {
    return { ...DEFAULT_FLAGS, ...this.readObject<Partial<SaleFlags>>(this.flagsPath) };
  }

  getSaleConducted(): boolean {
    return this.readFlags().saleConducted;
  }

  setSaleConducted(value: boolean): void {
    this.writeObject(this.flagsPath, { ...this.readFlags(), saleConducted: value });
  }

  getAvailableCount(): number {
    return this.readFlags().availableCount;
  }

  setAvailableCount(count: number): void {
    this.writeObject(this.flagsPath, { ...this.readFlags(), availableCount: count });
  }

  private get registryPath() {
    return "registry.json";
  }

  hasToken(tokenId: string): boolean {
    return Object.hasOwn(this.readMap<TokenRecord>(this.registryPath), tokenId);
  }

  saveToken(record: TokenRecord): void {
    const map = this.readMap<TokenRecord>(this.registryPath);
    map[record.tokenId] = record;
    this.writeMap(this.registryPath, map);
  }

  removeToken(tokenId: string): void {
    const map = this.readMap<TokenRecord>(this.registryPath);
    if (!Object.hasOwn(map, tokenId)) return;
    delete map[tokenId];
    this.writeMap(this.registryPath, map);
  }

  listTokens(filter?: AvailableItemsFilter): TokenRecord[] {
    let tokens = Object.values(this.readMap<TokenRecord>(this.registryPath)).sort((a, b) =>
      compareIds(a.tokenId, b.tokenId),
    );
    const startAfter = filter?.startAfter;
    if (startAfter !== undefined) {
      tokens = tokens.filter((entry) => compareIds(entry.tokenId, startAfter) > 0);
    }
    if (filter?.limit !== undefined) {
      tokens = tokens.slice(0, Math.max(0, filter.limit));
    }
    return tokens;
  }

  countTokens(): number {
    return Object.keys(this.readMap<TokenRecord>(this.registryPath)).length;
  }

  private get purchasesPath() {
    return "purchases.json";
  }

  // Stored as an array: object keys that look like integers would lose insertion order.
  private readLedger(): PurchaseLedgerEntry[] {
    return this.readObject<PurchaseLedgerEntry[]>(this.purchasesPath) ?? [];
  }

  getPurchases(purchaser: string): Purchase[] | undefined {
    return this.readLedger().find((entry) => entry.purchaser === purchaser)?.purchases;
  }

  savePurchases(purchaser: string, purchases: Purchase[]): void {
    const ledger = this.readLedger();
    const existing = ledger.find((entry) => entry.purchaser === purchaser);
    if (existing) {
      existing.purchases = purchases;
    } else {
      ledger.push({ purchaser, purchases });
    }
    this.writeObject(this.purchasesPath, ledger);
  }

  removePurchases(purchaser: string): void {
    const ledger = this.readLedger();
    const next = ledger.filter((entry) => entry.purchaser !== purchaser);
    if (next.length === ledger.length) return;
    this.writeObject(this.purchasesPath, next);
  }

  listPurchaseEntries(limit?: number): PurchaseLedgerEntry[] {
    const ledger = this.readLedger();
    return limit === undefined ? ledger : ledger.slice(0, Math.max(0, limit));
  }

  countPurchaseEntries(): number {
    return this.readLedger().length;
  }

  private get auditLogPath() {
    return join(this.dir, "audit-log.jsonl");
  }

  appendAuditEvent(event: AuditEvent): void {
    appendFileSync(this.auditLogPath, JSON.stringify(event) + "\n");
  }

  readAuditEvents(limit = 100): AuditEvent[] {
    if (!existsSync(this.auditLogPath)) return [];
    const raw = readFileSync(this.auditLogPath, "utf-8").trim();
    if (!raw) return [];
    const lines = raw.split("\n");
    return lines.slice(-limit).map((line) => JSON.parse(line) as AuditEvent);
  }

  hasAnyData(): boolean {
    return (
      this.getConfiguration() !== undefined ||
      this.getSaleState() !== undefined ||
      existsSync(join(this.dir, this.flagsPath)) ||
      this.countTokens() > 0 ||
      this.countPurchaseEntries() > 0 ||
      (existsSync(this.auditLogPath) && statSync(this.auditLogPath).size > 0)
    );
  }

  async runInTransaction(fn: () => void | Promise<void>): Promise<void> {
    await runFileStoreTransaction(this.dir, fn);
  }
}
