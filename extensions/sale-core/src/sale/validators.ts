import { getAddress, isAddress } from "viem";
import { invalidArgument } from "../errors/codes.js";
import { MAX_UINT128 } from "./math.js";
import type { Coin, MintRecord, Recipient } from "./types.js";

const IDENTIFIER_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.:@/-]{0,127}$/;
const DENOM_PATTERN = /^[A-Za-z][A-Za-z0-9/:._-]{1,127}$/;

export function requireString(value: unknown, field: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw invalidArgument(`${field} is required`);
  }
  return value.trim();
}

export function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  return requireString(value, field);
}

/**
 * Normalize an account identity: EVM addresses are checksummed, anything else must be a
 * plain identifier (letters, digits and `_.:@/-`).
 */
export function normalizeAccountId(value: unknown, field = "address"): string {
  const raw = requireString(value, field);
  if (raw.startsWith("0x")) {
    if (!isAddress(raw, { strict: false })) {
      throw invalidArgument(`${field} is not a valid address`);
    }
    return getAddress(raw);
  }
  if (!IDENTIFIER_PATTERN.test(raw)) {
    throw invalidArgument(`${field} is not a valid address`);
  }
  return raw;
}

export function requireTokenId(value: unknown, field = "tokenId"): string {
  const raw = requireString(value, field);
  if (!IDENTIFIER_PATTERN.test(raw)) {
    throw invalidArgument(`${field} must be 1-128 identifier characters`);
  }
  return raw;
}

export function requireUint128String(value: unknown, field: string): string {
  const raw = typeof value === "number" && Number.isSafeInteger(value) ? String(value) : value;
  if (typeof raw !== "string" || !/^\d+$/.test(raw)) {
    throw invalidArgument(`${field} must be an unsigned integer string`);
  }
  const parsed = BigInt(raw);
  if (parsed > MAX_UINT128) {
    throw invalidArgument(`${field} exceeds the u128 range`);
  }
  return parsed.toString();
}

export function requirePositiveInt(
  value: unknown,
  field: string,
  opts: { min?: number; max?: number } = {},
): number {
  const min = opts.min ?? 1;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw invalidArgument(`${field} must be an integer >= ${min}`);
  }
  if (opts.max !== undefined && value > opts.max) {
    throw invalidArgument(`${field} must be <= ${opts.max}`);
  }
  return value;
}

export function optionalPositiveInt(
  value: unknown,
  field: string,
  opts: { min?: number; max?: number } = {},
): number | undefined {
  if (value === undefined || value === null) return undefined;
  return requirePositiveInt(value, field, opts);
}

export function optionalNonNegativeInt(value: unknown, field: string): number | undefined {
  return optionalPositiveInt(value, field, { min: 0 });
}

export function optionalBoolean(value: unknown, field: string): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") throw invalidArgument(`${field} must be a boolean`);
  return value;
}

export function requireCoin(value: unknown, field: string): Coin {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw invalidArgument(`${field} must be an object with denom and amount`);
  }
  const input = value as Record<string, unknown>;
  const denom = requireString(input.denom, `${field}.denom`);
  if (!DENOM_PATTERN.test(denom)) {
    throw invalidArgument(`${field}.denom is invalid`);
  }
  return { denom, amount: requireUint128String(input.amount, `${field}.amount`) };
}

/** Funds attached to a call. Missing means nothing was sent. */
export function requireFunds(value: unknown, field = "funds"): Coin[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw invalidArgument(`${field} must be an array of coins`);
  return value.map((entry, index) => requireCoin(entry, `${field}[${index}]`));
}

export function assertNonPayable(funds: Coin[]) {
  if (funds.some((coin) => BigInt(coin.amount) > 0n)) {
    throw invalidArgument("this operation does not accept funds");
  }
}

export function requireRecipient(value: unknown, field = "recipient"): Recipient {
  if (typeof value === "string") {
    return { address: normalizeAccountId(value, `${field}.address`) };
  }
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw invalidArgument(`${field} is required`);
  }
  const input = value as Record<string, unknown>;
  const address = normalizeAccountId(input.address, `${field}.address`);
  const msg = optionalString(input.msg, `${field}.msg`);
  return msg ? { address, msg } : { address };
}

export function requireMintRecords(value: unknown, field = "tokens"): MintRecord[] {
  if (!Array.isArray(value)) throw invalidArgument(`${field} must be an array`);
  return value.map((entry, index) => {
    if (!entry || typeof entry !== "object" || Array.isArray(entry)) {
      throw invalidArgument(`${field}[${index}] must be an object`);
    }
    const input = entry as Record<string, unknown>;
    const record: MintRecord = { tokenId: requireTokenId(input.tokenId, `${field}[${index}].tokenId`) };
    if (input.owner !== undefined && input.owner !== null) {
      record.owner = normalizeAccountId(input.owner, `${field}[${index}].owner`);
    }
    const tokenUri = optionalString(input.tokenUri, `${field}[${index}].tokenUri`);
    if (tokenUri) record.tokenUri = tokenUri;
    if (input.extension !== undefined) {
      if (!input.extension || typeof input.extension !== "object" || Array.isArray(input.extension)) {
        throw invalidArgument(`${field}[${index}].extension must be an object`);
      }
      record.extension = input.extension as Record<string, unknown>;
    }
    return record;
  });
}
