import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveConfig } from "../config.js";
import { SaleStateStore } from "../state/store.js";
import { instantiate, mint, openSale } from "./admin.js";
import { createEngineContext, type EngineContext } from "./context.js";
import { createRatesSplitter, type FundsSplitter } from "./funds.js";
import { purchase, purchaseByTokenId } from "./purchase.js";
import { getSaleStatus } from "./queries.js";
import { claimRefund, endSale } from "./settlement.js";
import type { SaleMessage } from "./types.js";

const T0 = 1_767_225_600_000;
const OWNER = "owner-1";

type Harness = {
  ctx: EngineContext;
  store: SaleStateStore;
  clock: { now: number };
};

function createHarness(
  dir: string,
  input: { mode?: "file" | "sqlite"; config?: Record<string, unknown>; splitter?: FundsSplitter } = {},
): Harness {
  const config = resolveConfig({ store: { mode: input.mode ?? "file" }, ...input.config });
  const store = new SaleStateStore(dir, config);
  const clock = { now: T0 };
  const ctx = createEngineContext(store, config, {
    splitter: input.splitter,
    now: () => clock.now,
  });
  return { ctx, store, clock };
}

async function setupSale(
  h: Harness,
  input: { tokens?: number; minTokensSold?: string; maxAmountPerWallet?: number } = {},
) {
  await instantiate(h.ctx, OWNER, { itemSource: "collection-1", canMintAfterSale: false });
  const count = input.tokens ?? 3;
  await mint(
    h.ctx,
    OWNER,
    Array.from({ length: count }, (_, index) => ({ tokenId: `t-${index + 1}` })),
  );
  await openSale(h.ctx, OWNER, {
    endTime: T0 + 1_000,
    price: { denom: "uusd", amount: "10" },
    minTokensSold: input.minTokensSold ?? "2",
    maxAmountPerWallet: input.maxAmountPerWallet,
    recipient: { address: "treasury" },
  });
}

function payments(messages: SaleMessage[], purpose: string) {
  return messages.flatMap((message) =>
    message.kind === "payment" && message.purpose === purpose
      ? [{ recipient: message.recipient, amount: message.amount }]
      : [],
  );
}

function tokenIds(messages: SaleMessage[], kind: "item_transfer" | "item_burn") {
  return messages.flatMap((message) =>
    message.kind === kind ? [message.tokenId] : [],
  );
}

describe("sale settlement", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "sale-settlement-test-"));
  });

  afterEach(async () => {
    if (tempDir) {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });

  it("refunds a buyer below the minimum and burns the rest later", async () => {
    for (const mode of ["file", "sqlite"] as const) {
      const h = createHarness(path.join(tempDir, mode), { mode });
      try {
        await setupSale(h, { minTokensSold: "2" });

        const first = await purchase(h.ctx, "buyer-a", 1, [{ denom: "uusd", amount: "10" }]);
        expect(first.attributes.number_of_tokens_purchased).toBe("1");
        expect(h.store.getSaleState()?.amountSold).toBe("1");

        await expect(
          purchase(h.ctx, "buyer-a", 1, [{ denom: "uusd", amount: "10" }]),
        ).rejects.toThrow("E_QUOTA_EXCEEDED: purchase limit reached for this wallet");

        h.clock.now = T0 + 1_000;
        const refund = await claimRefund(h.ctx, "buyer-a");
        expect(refund.messages).toEqual([
          {
            kind: "payment",
            purpose: "refund",
            recipient: "buyer-a",
            amount: [{ denom: "uusd", amount: "10" }],
          },
          { kind: "item_burn", itemSource: "collection-1", tokenId: "t-1" },
        ]);
        expect(h.store.listTokens().map((token) => token.tokenId)).toEqual(["t-2", "t-3"]);

        const drained = await endSale(h.ctx, "keeper");
        expect(tokenIds(drained.messages, "item_burn")).toEqual(["t-2", "t-3"]);
        expect(drained.attributes).toMatchObject({ outcome: "refund", done: "true" });
        expect(h.store.getSaleState()).toBeUndefined();
        expect(h.store.getAvailableCount()).toBe(0);
      } finally {
        h.store.close();
      }
    }
  });

  it("forwards proceeds once, delivers, then burns in bounded batches", async () => {
    const h = createHarness(tempDir);
    await setupSale(h, { minTokensSold: "1" });
    await purchase(h.ctx, "buyer-a", 1, [{ denom: "uusd", amount: "10" }]);
    h.clock.now = T0 + 1_000;

    const proceeds = await endSale(h.ctx, "keeper", 1);
    expect(proceeds.messages).toEqual([
      {
        kind: "payment",
        purpose: "proceeds",
        recipient: "treasury",
        amount: [{ denom: "uusd", amount: "10" }],
      },
    ]);
    expect(proceeds.attributes).toMatchObject({
      step: "transfer_proceeds",
      outcome: "settle",
      done: "false",
    });
    expect(h.store.getSaleState()?.amountTransferred).toBe("10");

    const delivery = await endSale(h.ctx, "keeper", 1);
    expect(payments(delivery.messages, "proceeds")).toEqual([]);
    expect(delivery.messages).toEqual([
      { kind: "item_transfer", itemSource: "collection-1", tokenId: "t-1", recipient: "buyer-a" },
    ]);
    expect(h.store.getSaleState()?.itemsDelivered).toBe("1");

    const firstBurn = await endSale(h.ctx, "keeper", 1);
    expect(tokenIds(firstBurn.messages, "item_burn")).toEqual(["t-2"]);
    expect(firstBurn.attributes.done).toBe("false");

    const lastBurn = await endSale(h.ctx, "keeper", 1);
    expect(tokenIds(lastBurn.messages, "item_burn")).toEqual(["t-3"]);
    expect(lastBurn.attributes.done).toBe("true");
    expect(h.store.getSaleState()).toBeUndefined();

    const after = await endSale(h.ctx, "keeper", 1);
    expect(after.messages).toEqual([]);
    expect(after.attributes).toEqual({ action: "end_sale", done: "true" });
    expect(getSaleStatus(h.ctx).phase).toBe("no_sale");
  });

  it("buys only what is left, refunds the surplus and conserves funds", async () => {
    const h = createHarness(tempDir, {
      splitter: createRatesSplitter([{ kind: "tax", recipient: "tax-office", bps: 1000 }]),
    });
    await setupSale(h, { minTokensSold: "1", maxAmountPerWallet: 10 });

    const bought = await purchase(h.ctx, "buyer-a", 5, [{ denom: "uusd", amount: "50" }]);
    expect(bought.attributes).toMatchObject({
      number_of_tokens_purchased: "3",
      tax_amount: "3",
      amount_paid: "33uusd",
    });
    expect(bought.messages).toEqual([
      {
        kind: "payment",
        purpose: "overpayment_refund",
        recipient: "buyer-a",
        amount: [{ denom: "uusd", amount: "17" }],
      },
    ]);

    h.clock.now = T0 + 1_000;
    const proceeds = await endSale(h.ctx, "keeper");
    const delivery = await endSale(h.ctx, "keeper");
    expect(delivery.attributes.done).toBe("true");
    expect(tokenIds(delivery.messages, "item_transfer")).toEqual(["t-1", "t-2", "t-3"]);

    const forwarded = payments(proceeds.messages, "proceeds");
    const taxes = payments(delivery.messages, "split");
    expect(forwarded).toEqual([{ recipient: "treasury", amount: [{ denom: "uusd", amount: "30" }] }]);
    expect(taxes).toEqual([{ recipient: "tax-office", amount: [{ denom: "uusd", amount: "3" }] }]);
    const total = (entries: Array<{ amount: Array<{ amount: string }> }>) =>
      entries.reduce((sum, entry) => sum + BigInt(entry.amount[0]?.amount ?? "0"), 0n);
    const returned = total(payments(bought.messages, "overpayment_refund"));
    expect(50n - returned).toBe(total(forwarded) + total(taxes));
  });

  it("leaves registry, ledger and counters untouched when a purchase is rejected", async () => {
    for (const mode of ["file", "sqlite"] as const) {
      const h = createHarness(path.join(tempDir, mode), {
        mode,
        splitter: createRatesSplitter([{ kind: "tax", recipient: "tax-office", bps: 1000 }]),
      });
      try {
        await setupSale(h, { maxAmountPerWallet: 2 });
        const expectUntouched = () => {
          expect(h.store.listTokens().map((token) => token.tokenId)).toEqual(["t-1", "t-2", "t-3"]);
          expect(h.store.getPurchases("buyer-a")).toBeUndefined();
          expect(h.store.getAvailableCount()).toBe(3);
          expect(h.store.getSaleState()).toMatchObject({ amountSold: "0", amountToSend: "0" });
        };

        await expect(
          purchase(h.ctx, "buyer-a", 2, [{ denom: "uusd", amount: "19" }]),
        ).rejects.toThrow("E_INSUFFICIENT_FUNDS: payment does not cover 20uusd");
        expectUntouched();

        await expect(
          purchase(h.ctx, "buyer-a", 2, [{ denom: "uusd", amount: "21" }]),
        ).rejects.toThrow("E_INSUFFICIENT_FUNDS: payment does not cover 22uusd including tax");
        expectUntouched();

        await expect(
          purchaseByTokenId(h.ctx, "buyer-a", "t-9", [{ denom: "uusd", amount: "11" }]),
        ).rejects.toThrow("E_NOT_FOUND: token t-9 is not available");
        expectUntouched();

        expect(h.store.readAuditEvents().map((event) => event.kind)).not.toContain(
          "purchase_recorded",
        );
      } finally {
        h.store.close();
      }
    }
  });

  it("rejects buying an item that was already sold", async () => {
    const h = createHarness(tempDir);
    await setupSale(h);
    await purchaseByTokenId(h.ctx, "buyer-b", "t-2", [{ denom: "uusd", amount: "10" }]);

    await expect(
      purchaseByTokenId(h.ctx, "buyer-a", "t-2", [{ denom: "uusd", amount: "10" }]),
    ).rejects.toThrow("E_NOT_FOUND: token t-2 is not available");
    expect(h.store.getPurchases("buyer-a")).toBeUndefined();
    expect(h.store.getPurchases("buyer-b")?.map((entry) => entry.tokenId)).toEqual(["t-2"]);
    expect(h.store.getSaleState()?.amountSold).toBe("1");
  });

  it("disburses the split captured at purchase time", async () => {
    let taxPerItem = 1n;
    const splitter: FundsSplitter = {
      split: ({ amount }) => ({
        messages: [
          {
            kind: "payment",
            purpose: "split",
            recipient: "tax-office",
            amount: [{ denom: amount.denom, amount: taxPerItem.toString() }],
          },
        ],
        remainder: amount,
      }),
    };
    const h = createHarness(tempDir, { splitter });
    await setupSale(h, { minTokensSold: "1" });
    await purchase(h.ctx, "buyer-a", 1, [{ denom: "uusd", amount: "11" }]);
    taxPerItem = 2n;
    await purchase(h.ctx, "buyer-b", 1, [{ denom: "uusd", amount: "12" }]);
    taxPerItem = 5n;

    h.clock.now = T0 + 1_000;
    await endSale(h.ctx, "keeper");
    const delivery = await endSale(h.ctx, "keeper");
    expect(payments(delivery.messages, "split")).toEqual([
      { recipient: "tax-office", amount: [{ denom: "uusd", amount: "3" }] },
    ]);
  });

  it("refunds price plus tax per buyer in ledger order", async () => {
    const h = createHarness(tempDir, {
      splitter: createRatesSplitter([{ kind: "tax", recipient: "tax-office", bps: 1000 }]),
    });
    await setupSale(h, { minTokensSold: "3" });
    await purchase(h.ctx, "buyer-b", 1, [{ denom: "uusd", amount: "11" }]);
    await purchase(h.ctx, "buyer-a", 1, [{ denom: "uusd", amount: "11" }]);
    h.clock.now = T0 + 1_000;

    const first = await endSale(h.ctx, "keeper", 1);
    expect(first.messages).toEqual([
      {
        kind: "payment",
        purpose: "refund",
        recipient: "buyer-b",
        amount: [{ denom: "uusd", amount: "11" }],
      },
      { kind: "item_burn", itemSource: "collection-1", tokenId: "t-1" },
      { kind: "item_burn", itemSource: "collection-1", tokenId: "t-3" },
    ]);
    expect(first.attributes.done).toBe("false");

    const second = await endSale(h.ctx, "keeper", 1);
    expect(second.messages).toEqual([
      {
        kind: "payment",
        purpose: "refund",
        recipient: "buyer-a",
        amount: [{ denom: "uusd", amount: "11" }],
      },
      { kind: "item_burn", itemSource: "collection-1", tokenId: "t-2" },
    ]);
    expect(second.attributes.done).toBe("true");
  });

  it("is a no-op until an end rule holds, unless the owner ends it", async () => {
    const h = createHarness(tempDir);
    await setupSale(h);

    const poke = await endSale(h.ctx, "keeper");
    expect(poke.messages).toEqual([]);
    expect(poke.attributes).toEqual({ action: "end_sale", done: "false", ended: "false" });
    expect(h.store.getSaleState()?.endedAt).toBeUndefined();

    const ended = await endSale(h.ctx, OWNER, 1);
    expect(ended.attributes.outcome).toBe("refund");
    expect(h.store.getSaleState()?.endedAt).toBe(new Date(T0).toISOString());
    await expect(
      purchase(h.ctx, "buyer-a", 1, [{ denom: "uusd", amount: "10" }]),
    ).rejects.toThrow("E_CONFLICT: sale has ended");
  });

  it("lets anyone end a sold-out sale", async () => {
    const h = createHarness(tempDir);
    await setupSale(h, { tokens: 1, minTokensSold: "2" });
    await purchase(h.ctx, "buyer-a", 1, [{ denom: "uusd", amount: "10" }]);

    const ended = await endSale(h.ctx, "keeper");
    expect(ended.attributes).toMatchObject({ outcome: "refund", done: "true" });
    expect(payments(ended.messages, "refund")).toEqual([
      { recipient: "buyer-a", amount: [{ denom: "uusd", amount: "10" }] },
    ]);
  });

  it("keeps the chosen path for the life of the sale", async () => {
    const h = createHarness(tempDir);
    await setupSale(h, { minTokensSold: "1" });
    await purchase(h.ctx, "buyer-a", 1, [{ denom: "uusd", amount: "10" }]);
    h.clock.now = T0 + 1_000;

    await endSale(h.ctx, "keeper", 1);
    expect(h.store.getSaleState()?.outcome).toBe("settle");
    await expect(claimRefund(h.ctx, "buyer-a")).rejects.toThrow(
      "E_CONFLICT: minimum tokens sold, no refunds",
    );
    await endSale(h.ctx, "keeper", 1);
    expect(h.store.getSaleState()?.outcome).toBe("settle");
  });

  it("validates refund claims", async () => {
    const h = createHarness(tempDir);
    await expect(claimRefund(h.ctx, "buyer-a")).rejects.toThrow(
      "E_NOT_FOUND: no sale is in progress",
    );
    await setupSale(h);
    await purchase(h.ctx, "buyer-a", 1, [{ denom: "uusd", amount: "10" }]);
    await expect(claimRefund(h.ctx, "buyer-a")).rejects.toThrow("E_CONFLICT: sale has not ended");
    h.clock.now = T0 + 1_000;
    await expect(claimRefund(h.ctx, "buyer-b")).rejects.toThrow(
      "E_NOT_FOUND: no purchases for this buyer",
    );
  });

  it("clamps batch sizes and rejects an empty batch", async () => {
    const h = createHarness(tempDir, { config: { limits: { maxBatchSize: 2 } } });
    await setupSale(h, { minTokensSold: "0" });
    h.clock.now = T0 + 1_000;

    await expect(endSale(h.ctx, "keeper", 0)).rejects.toThrow(
      "E_QUOTA_EXCEEDED: batch limit must be at least 1",
    );
    expect(h.store.getSaleState()?.endedAt).toBeUndefined();

    const first = await endSale(h.ctx, "keeper", 10);
    expect(tokenIds(first.messages, "item_burn")).toEqual(["t-1", "t-2"]);
    const second = await endSale(h.ctx, "keeper", 10);
    expect(tokenIds(second.messages, "item_burn")).toEqual(["t-3"]);
    expect(second.attributes.done).toBe("true");
  });

  it("reports pending work while draining", async () => {
    const h = createHarness(tempDir);
    await setupSale(h, { minTokensSold: "1" });
    await purchase(h.ctx, "buyer-a", 1, [{ denom: "uusd", amount: "10" }]);

    expect(getSaleStatus(h.ctx)).toMatchObject({
      phase: "active",
      availableCount: 2,
      pendingBuyers: 1,
      outstandingProceeds: "10",
      endRules: ["minimum_sold"],
    });

    h.clock.now = T0 + 1_000;
    await endSale(h.ctx, "keeper");
    const status = getSaleStatus(h.ctx);
    expect(status).toMatchObject({
      phase: "draining",
      outcome: "settle",
      outstandingProceeds: "0",
      pendingBuyers: 1,
    });
  });
});
