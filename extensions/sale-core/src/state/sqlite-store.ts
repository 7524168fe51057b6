import { existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import Database from "better-sqlite3";
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
import type { SaleFileStore } from "./file-store.js";
import type { SaleStore } from "./store-types.js";

const configurationId = "configuration";
const saleStateId = "sale_state";
const saleConductedFlag = "sale_conducted";
const availableCountFlag = "available_count";

export class SaleSqliteStore implements SaleStore {
  private readonly db: Database.Database;

  constructor(stateDir: string, config: SalePluginConfig, fileFallback: SaleFileStore) {
    const dir = join(stateDir, "sale");
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    const dbPath = config.store.dbPath ?? join(dir, "sale.db");

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.ensureSchema();
    if (config.store.migrateFromFile ?? true) {
      this.maybeMigrateFromFile(fileFallback);
    }
  }

  private ensureSchema() {
    this.db.exec(
      "CREATE TABLE IF NOT EXISTS singletons (id TEXT PRIMARY KEY, data TEXT NOT NULL);" +
        "CREATE TABLE IF NOT EXISTS flags (id TEXT PRIMARY KEY, value TEXT NOT NULL);" +
        "CREATE TABLE IF NOT EXISTS registry (id TEXT PRIMARY KEY, data TEXT NOT NULL);" +
        "CREATE TABLE IF NOT EXISTS purchases (id TEXT PRIMARY KEY, seq INTEGER NOT NULL, data TEXT NOT NULL);" +
        "CREATE TABLE IF NOT EXISTS audit (seq INTEGER PRIMARY KEY AUTOINCREMENT, id TEXT NOT NULL, timestamp TEXT NOT NULL, data TEXT NOT NULL);" +
        "CREATE INDEX IF NOT EXISTS purchases_seq ON purchases(seq);" +
        "CREATE INDEX IF NOT EXISTS audit_ts ON audit(timestamp);",
    );
  }

  private countRows(table: string): number {
    const row = this.db.prepare(`SELECT COUNT(1) as count FROM ${table}`).get() as
      | { count: number }
      | undefined;
    return Number(row?.count ?? 0);
  }

  private isEmpty(): boolean {
    return (
      this.countRows("singletons") === 0 &&
      this.countRows("flags") === 0 &&
      this.countRows("registry") === 0 &&
      this.countRows("purchases") === 0 &&
      this.countRows("audit") === 0
    );
  }

  private maybeMigrateFromFile(fileStore: SaleFileStore) {
    if (!this.isEmpty() || !fileStore.hasAnyData()) {
      return;
    }

    const configuration = fileStore.getConfiguration();
    if (configuration) this.saveConfiguration(configuration);
    const state = fileStore.getSaleState();
    if (state) this.saveSaleState(state);
    this.setSaleConducted(fileStore.getSaleConducted());
    this.setAvailableCount(fileStore.getAvailableCount());
    for (const token of fileStore.listTokens()) this.saveToken(token);
    for (const entry of fileStore.listPurchaseEntries()) {
      this.savePurchases(entry.purchaser, entry.purchases);
    }
    for (const event of fileStore.readAuditEvents(1_000_000)) this.appendAuditEvent(event);
  }

  private getSingleton<T>(id: string): T | undefined {
    const row = this.db.prepare("SELECT data FROM singletons WHERE id = ?").get(id) as
      | { data: string }
      | undefined;
    return row ? (JSON.parse(row.data) as T) : undefined;
  }

  private upsertSingleton(id: string, value: unknown) {
    this.db
      .prepare(
        "INSERT INTO singletons (id, data) VALUES (?, ?) ON CONFLICT(id) DO UPDATE SET data = excluded.data",
      )
      .run(id, JSON.stringify(value));
  }

  private getFlag(id: string): string | undefined {
    const row = this.db.prepare("SELECT value FROM flags WHERE id = ?").get(id) as
      | { value: string }
      | undefined;
    return row?.value;
  }

  private setFlag(id: string, value: string) {
    this.db
      .prepare(
        "INSERT INTO flags (id, value) VALUES (?, ?) ON CONFLICT(id) DO UPDATE SET value = excluded.value",
      )
      .run(id, value);
  }

  getConfiguration(): SaleConfiguration | undefined {
    return this.getSingleton<SaleConfiguration>(configurationId);
  }

  saveConfiguration(config: SaleConfiguration): void {
    this.upsertSingleton(configurationId, config);
  }

  getSaleState(): SaleState | undefined {
    return this.getSingleton<SaleState>(saleStateId);
  }

  saveSaleState(state: SaleState): void {
    this.upsertSingleton(saleStateId, state);
  }

  clearSaleState(): void {
    this.db.prepare("DELETE FROM singletons WHERE id = ?").run(saleStateId);
  }

  getSaleConducted(): boolean {
    return this.getFlag(saleConductedFlag) === "true";
  }

  setSaleConducted(value: boolean): void {
    this.setFlag(saleConductedFlag, value ? "true" : "false");
  }

  getAvailableCount(): number {
    return Number(this.getFlag(availableCountFlag) ?? "0");
  }

  setAvailableCount(count: number): void {
    this.setFlag(availableCountFlag, String(count));
  }

  hasToken(tokenId: string): boolean {
    return this.db.prepare("SELECT 1 FROM registry WHERE id = ?").get(tokenId) !== undefined;
  }

  saveToken(record: TokenRecord): void {
    this.db
      .prepare(
        "INSERT INTO registry (id, data) VALUES (?, ?) ON CONFLICT(id) DO UPDATE SET data = excluded.data",
      )
      .run(record.tokenId, JSON.stringify(record));
  }

  removeToken(tokenId: string): void {
    this.db.prepare("DELETE FROM registry WHERE id = ?").run(tokenId);
  }

  listTokens(filter?: AvailableItemsFilter): TokenRecord[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (filter?.startAfter !== undefined) {
      clauses.push("id > ?");
      params.push(filter.startAfter);
    }
    let sql = "SELECT data FROM registry";
    if (clauses.length > 0) sql += ` WHERE ${clauses.join(" AND ")}`;
    sql += " ORDER BY id ASC";
    if (filter?.limit !== undefined) {
      sql += " LIMIT ?";
      params.push(Math.max(0, filter.limit));
    }
    const rows = this.db.prepare(sql).all(...params) as Array<{ data: string }>;
    return rows.map((row) => JSON.parse(row.data) as TokenRecord);
  }

  countTokens(): number {
    return this.countRows("registry");
  }

  getPurchases(purchaser: string): Purchase[] | undefined {
    const row = this.db.prepare("SELECT data FROM purchases WHERE id = ?").get(purchaser) as
      | { data: string }
      | undefined;
    return row ? (JSON.parse(row.data) as Purchase[]) : undefined;
  }

  savePurchases(purchaser: string, purchases: Purchase[]): void {
    const next = this.db.prepare("SELECT COALESCE(MAX(seq), 0) + 1 as seq FROM purchases").get() as {
      seq: number;
    };
    this.db
      .prepare(
        "INSERT INTO purchases (id, seq, data) VALUES (?, ?, ?) ON CONFLICT(id) DO UPDATE SET data = excluded.data",
      )
      .run(purchaser, next.seq, JSON.stringify(purchases));
  }

  removePurchases(purchaser: string): void {
    this.db.prepare("DELETE FROM purchases WHERE id = ?").run(purchaser);
  }

  listPurchaseEntries(limit?: number): PurchaseLedgerEntry[] {
    const rows = (
      limit === undefined
        ? this.db.prepare("SELECT id, data FROM purchases ORDER BY seq ASC").all()
        : this.db
            .prepare("SELECT id, data FROM purchases ORDER BY seq ASC LIMIT ?")
            .all(Math.max(0, limit))
    ) as Array<{ id: string; data: string }>;
    return rows.map((row) => ({
      purchaser: row.id,
      purchases: JSON.parse(row.data) as Purchase[],
    }));
  }

  countPurchaseEntries(): number {
    return this.countRows("purchases");
  }

  appendAuditEvent(event: AuditEvent): void {
    this.db
      .prepare("INSERT INTO audit (id, timestamp, data) VALUES (?, ?, ?)")
      .run(event.id, event.timestamp, JSON.stringify(event));
  }

  readAuditEvents(limit = 100): AuditEvent[] {
    const rows = this.db
      .prepare(
        "SELECT data FROM (SELECT seq, data FROM audit ORDER BY seq DESC LIMIT ?) ORDER BY seq ASC",
      )
      .all(limit) as Array<{ data: string }>;
    return rows.map((row) => JSON.parse(row.data) as AuditEvent);
  }

  hasAnyData(): boolean {
    return !this.isEmpty();
  }

  close(): void {
    this.db.close();
  }

  async runInTransaction(fn: () => void | Promise<void>): Promise<void> {
    if (this.db.inTransaction) {
      await fn();
      return;
    }
    this.db.exec("BEGIN");
    try {
      await fn();
      this.db.exec("COMMIT");
    } catch (err) {
      this.db.exec("ROLLBACK");
      throw err;
    }
  }
}
