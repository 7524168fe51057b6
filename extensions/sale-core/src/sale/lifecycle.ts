import { conflict } from "../errors/codes.js";
import type { SaleOutcome, SalePhase, SaleState } from "./types.js";

/** True once the end time passed or settlement has begun. Purchases stop here. */
export function isSaleOver(state: SaleState, now: number): boolean {
  return state.endedAt !== undefined || now >= state.endTime;
}

export function derivePhase(state: SaleState | undefined, now: number): SalePhase {
  if (!state) return "no_sale";
  if (state.endedAt !== undefined) return "draining";
  if (now >= state.endTime) return "ended";
  return "active";
}

/** Which settlement path a sale takes given its current sold count. */
export function decideOutcome(state: SaleState): SaleOutcome {
  return BigInt(state.amountSold) < BigInt(state.minTokensSold) ? "refund" : "settle";
}

/** The path is fixed on the first effective end call and never re-evaluated. */
export function resolveOutcome(state: SaleState): SaleOutcome {
  return state.outcome ?? decideOutcome(state);
}

export function assertPhaseTransition(from: SalePhase, to: SalePhase) {
  const allowed: Record<SalePhase, SalePhase[]> = {
    no_sale: ["active"],
    active: ["ended", "draining"],
    ended: ["draining"],
    draining: ["draining", "no_sale"],
  };
  if (!allowed[from].includes(to)) {
    throw conflict(`invalid sale transition: ${from} -> ${to}`);
  }
}
