import { insufficientFunds, overflow } from "../errors/codes.js";
import type { Coin } from "./types.js";

export const MAX_UINT128 = (1n << 128n) - 1n;

function ensureRange(value: bigint, label: string): bigint {
  if (value < 0n || value > MAX_UINT128) {
    throw overflow(`${label} out of range`);
  }
  return value;
}

export function toUint(value: string, label = "amount"): bigint {
  if (!/^\d+$/.test(value)) {
    throw overflow(`${label} is not an unsigned integer`);
  }
  return ensureRange(BigInt(value), label);
}

export function checkedAdd(a: bigint, b: bigint, label = "addition"): bigint {
  return ensureRange(a + b, label);
}

export function checkedSub(a: bigint, b: bigint, label = "subtraction"): bigint {
  return ensureRange(a - b, label);
}

export function checkedMul(a: bigint, b: bigint, label = "multiplication"): bigint {
  return ensureRange(a * b, label);
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

/** Amount of `denom` carried by `funds`, summed across duplicate entries. */
export function amountOf(funds: Coin[], denom: string): bigint {
  let total = 0n;
  for (const coin of funds) {
    if (coin.denom === denom) total = checkedAdd(total, toUint(coin.amount), "funds");
  }
  return total;
}

export function hasCoins(funds: Coin[], required: Coin): boolean {
  return amountOf(funds, required.denom) >= toUint(required.amount);
}

/**
 * Remove `required` from `funds`, returning what is left with zero entries dropped.
 */
export function deductFunds(funds: Coin[], required: Coin): Coin[] {
  if (!hasCoins(funds, required)) {
    throw insufficientFunds(`funds do not cover ${required.amount}${required.denom}`);
  }
  let remaining = toUint(required.amount);
  const left: Coin[] = [];
  for (const coin of mergeCoins(funds)) {
    let amount = toUint(coin.amount);
    if (coin.denom === required.denom && remaining > 0n) {
      const taken = minBigInt(amount, remaining);
      amount -= taken;
      remaining -= taken;
    }
    if (amount > 0n) left.push({ denom: coin.denom, amount: amount.toString() });
  }
  return left;
}

/** Sum coins per denom, keeping first-seen denom order. */
export function mergeCoins(coins: Coin[]): Coin[] {
  const totals = new Map<string, bigint>();
  for (const coin of coins) {
    totals.set(coin.denom, checkedAdd(totals.get(coin.denom) ?? 0n, toUint(coin.amount), "funds"));
  }
  return [...totals.entries()].map(([denom, amount]) => ({ denom, amount: amount.toString() }));
}
