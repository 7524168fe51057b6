/**
 * Plugin configuration types and defaults for sale-core.
 */

import { normalizeAccountId } from "./sale/validators.js";

export type StoreMode = "file" | "sqlite";

export type StoreConfig = {
  mode: StoreMode;
  dbPath?: string;
  migrateFromFile?: boolean;
};

export type AccessMode = "open" | "scoped" | "allowlist";
export type ActorSource = "param" | "client" | "either";

export type AccessConfig = {
  mode: AccessMode;
  allowClientIds?: string[];
  allowRoles?: string[];
  allowScopes?: string[];
  readScopes?: string[];
  writeScopes?: string[];
  requireActor?: boolean;
  actorSource?: ActorSource;
};

export type EngineConfig = {
  /** Identity of the engine itself. Items minted to it are held in escrow for sale. */
  address: string;
};

export type LimitsConfig = {
  maxMintBatch: number;
  defaultBatchSize: number;
  maxBatchSize: number;
  defaultMaxPerWallet: number;
  defaultQueryLimit: number;
  maxQueryLimit: number;
};

export type RateKind = "tax" | "royalty";

/**
 * A single split applied to the unit price.
 * Taxes are charged on top of the price; royalties are deducted from it.
 */
export type RateConfig = {
  kind: RateKind;
  recipient: string;
  /** Basis points of the unit price (10000 = 100%). */
  bps?: number;
  /** Flat amount in the price denom, decimal string. */
  flat?: string;
};

export type SalePluginConfig = {
  store: StoreConfig;
  access: AccessConfig;
  engine: EngineConfig;
  limits: LimitsConfig;
  rates: RateConfig[];
};

export const DEFAULT_CONFIG: SalePluginConfig = {
  store: {
    mode: "file",
    migrateFromFile: true,
  },
  access: {
    mode: "allowlist",
    allowClientIds: ["gateway-client"],
    requireActor: true,
    actorSource: "param",
  },
  engine: {
    address: "sale-engine",
  },
  limits: {
    maxMintBatch: 100,
    defaultBatchSize: 50,
    maxBatchSize: 100,
    defaultMaxPerWallet: 1,
    defaultQueryLimit: 50,
    maxQueryLimit: 100,
  },
  rates: [],
};

/** Merge user-supplied partial config with defaults. */
export function resolveConfig(raw?: Record<string, unknown>): SalePluginConfig {
  if (!raw) return { ...DEFAULT_CONFIG };
  const merge = <T extends Record<string, unknown>>(defaults: T, partial?: unknown): T => {
    if (!partial || typeof partial !== "object") return { ...defaults };
    return { ...defaults, ...(partial as Partial<T>) };
  };
  return {
    store: merge(DEFAULT_CONFIG.store, raw.store),
    access: merge(DEFAULT_CONFIG.access, raw.access),
    engine: resolveEngine(merge(DEFAULT_CONFIG.engine, raw.engine)),
    limits: merge(DEFAULT_CONFIG.limits, raw.limits),
    rates: Array.isArray(raw.rates) ? raw.rates.map(parseRate) : [...DEFAULT_CONFIG.rates],
  };
}

// Owners in mint records are normalized, so the engine's own address must be too.
function resolveEngine(engine: EngineConfig): EngineConfig {
  return { ...engine, address: normalizeAccountId(engine.address, "engine.address") };
}

function parseRate(entry: unknown, index: number): RateConfig {
  if (!entry || typeof entry !== "object") {
    throw new Error(`rates[${index}] must be an object`);
  }
  const record = entry as Record<string, unknown>;
  const kind = record.kind;
  if (kind !== "tax" && kind !== "royalty") {
    throw new Error(`rates[${index}].kind must be tax | royalty`);
  }
  if (typeof record.recipient !== "string" || record.recipient.trim().length === 0) {
    throw new Error(`rates[${index}].recipient is required`);
  }
  let bps: number | undefined;
  if (record.bps !== undefined) {
    if (
      typeof record.bps !== "number" ||
      !Number.isInteger(record.bps) ||
      record.bps < 0 ||
      record.bps > 10_000
    ) {
      throw new Error(`rates[${index}].bps must be an integer between 0 and 10000`);
    }
    bps = record.bps;
  }
  let flat: string | undefined;
  if (record.flat !== undefined) {
    if (typeof record.flat !== "string" || !/^\d+$/.test(record.flat)) {
      throw new Error(`rates[${index}].flat must be a decimal string`);
    }
    flat = record.flat;
  }
  if (bps === undefined && flat === undefined) {
    throw new Error(`rates[${index}] needs bps or flat`);
  }
  return { kind, recipient: record.recipient.trim(), bps, flat };
}
