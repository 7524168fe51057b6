import type { RateConfig } from "../config.js";
import { insufficientFunds } from "../errors/codes.js";
import { checkedAdd, checkedMul, checkedSub, mergeCoins, toUint } from "./math.js";
import type { Coin, PaymentMessage } from "./types.js";

export type FundsSplitInput = {
  payer: string;
  amount: Coin;
};

/**
 * Result of splitting one unit price.
 * `messages` pay taxes and royalties; `remainder` is the net amount owed to the recipient.
 */
export type FundsSplit = {
  messages: PaymentMessage[];
  remainder: Coin;
};

/**
 * Pluggable tax/royalty computation. Consulted once per purchase call; it may return
 * different results between calls, so settlement only uses what was captured.
 */
export interface FundsSplitter {
  split(input: FundsSplitInput): FundsSplit | Promise<FundsSplit>;
}

/** Splitter that charges nothing and forwards the whole price. */
export const noopSplitter: FundsSplitter = {
  split: ({ amount }) => ({ messages: [], remainder: { ...amount } }),
};

function rateAmount(rate: RateConfig, price: bigint): bigint {
  if (rate.flat !== undefined) return toUint(rate.flat, "rate.flat");
  return checkedMul(price, BigInt(rate.bps ?? 0), "rate") / 10_000n;
}

/**
 * Rates-based splitter: royalties come out of the price, taxes are charged on top.
 */
export function createRatesSplitter(rates: RateConfig[]): FundsSplitter {
  return {
    split: ({ amount }) => {
      const price = toUint(amount.amount, "price");
      let deducted = 0n;
      const messages: PaymentMessage[] = [];
      for (const rate of rates) {
        const value = rateAmount(rate, price);
        if (value === 0n) continue;
        if (rate.kind === "royalty") deducted = checkedAdd(deducted, value, "royalty");
        messages.push({
          kind: "payment",
          purpose: "split",
          recipient: rate.recipient,
          amount: [{ denom: amount.denom, amount: value.toString() }],
        });
      }
      if (deducted > price) {
        throw insufficientFunds("royalties exceed the unit price");
      }
      return {
        messages,
        remainder: { denom: amount.denom, amount: (price - deducted).toString() },
      };
    },
  };
}

/**
 * Tax charged on top of `price`: everything the split pays out, minus what it deducted
 * from the price itself.
 */
export function computeTaxAmount(split: FundsSplit, price: Coin): bigint {
  const base = toUint(price.amount, "price");
  const remainder = toUint(split.remainder.amount, "remainder");
  if (split.remainder.denom !== price.denom) {
    throw insufficientFunds("split remainder must use the price denom");
  }
  const deducted = checkedSub(base, remainder, "split remainder");
  let paidOut = 0n;
  for (const message of split.messages) {
    for (const coin of message.amount) {
      // Buyers only pay in the price denom, so nothing else can be paid out later.
      if (coin.denom !== price.denom) {
        throw insufficientFunds("split payments must use the price denom");
      }
      paidOut = checkedAdd(paidOut, toUint(coin.amount), "split");
    }
  }
  return checkedSub(paidOut, deducted, "tax");
}

/** Merge payments so each recipient receives one message per purpose. */
export function mergePayments(messages: PaymentMessage[]): PaymentMessage[] {
  const byKey = new Map<string, PaymentMessage>();
  for (const message of messages) {
    const key = `${message.purpose}\u0000${message.recipient}\u0000${message.msg ?? ""}`;
    const existing = byKey.get(key);
    if (existing) {
      existing.amount = mergeCoins([...existing.amount, ...message.amount]);
    } else {
      byKey.set(key, { ...message, amount: mergeCoins(message.amount) });
    }
  }
  return [...byKey.values()];
}
