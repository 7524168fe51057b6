import type { SaleState } from "./types.js";

export type EndRuleContext = {
  state: SaleState;
  now: number;
};

export type EndRule = {
  name: string;
  satisfied: (ctx: EndRuleContext) => boolean;
};

export const saleExpired: EndRule = {
  name: "sale_expired",
  satisfied: ({ state, now }) => now >= state.endTime,
};

/** A zero minimum is treated as unset, otherwise any sale could be ended immediately. */
export const minimumSold: EndRule = {
  name: "minimum_sold",
  satisfied: ({ state }) => {
    const min = BigInt(state.minTokensSold);
    return min > 0n && BigInt(state.amountSold) >= min;
  },
};

export const targetPercentageSold: EndRule = {
  name: "target_percentage_sold",
  satisfied: ({ state }) => {
    if (state.targetPercentageSold === undefined) return false;
    const total = BigInt(state.totalTokens);
    if (total === 0n) return false;
    const soldPercentage = (BigInt(state.amountSold) * 100n) / total;
    return soldPercentage >= BigInt(state.targetPercentageSold);
  },
};

export const maxDurationReached: EndRule = {
  name: "max_duration_reached",
  satisfied: ({ state, now }) => {
    if (state.maxDurationMs === undefined) return false;
    return now - state.startTime >= state.maxDurationMs;
  },
};

export const endedFlag: EndRule = {
  name: "ended",
  satisfied: ({ state }) => state.endedAt !== undefined,
};

export const DEFAULT_END_RULES: readonly EndRule[] = [
  saleExpired,
  minimumSold,
  targetPercentageSold,
  maxDurationReached,
  endedFlag,
];

/** Names of the rules currently satisfied; empty when the sale may not end yet. */
export function satisfiedEndRules(
  ctx: EndRuleContext,
  rules: readonly EndRule[] = DEFAULT_END_RULES,
): string[] {
  return rules.filter((rule) => rule.satisfied(ctx)).map((rule) => rule.name);
}

export function endConditionMet(
  ctx: EndRuleContext,
  rules: readonly EndRule[] = DEFAULT_END_RULES,
): boolean {
  return rules.some((rule) => rule.satisfied(ctx));
}
