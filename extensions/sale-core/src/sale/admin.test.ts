import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { getAddress } from "viem";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveConfig } from "../config.js";
import { SaleStateStore } from "../state/store.js";
import { instantiate, mint, openSale, updateItemSource } from "./admin.js";
import { createEngineContext, type EngineContext, type ItemSourceVerifier } from "./context.js";
import { purchase, purchaseByTokenId } from "./purchase.js";
import { endSale } from "./settlement.js";

const T0 = 1_767_225_600_000;
const OWNER = "owner-1";

function createContext(
  dir: string,
  input: { config?: Record<string, unknown>; verifier?: ItemSourceVerifier } = {},
) {
  const config = resolveConfig({ ...input.config });
  const store = new SaleStateStore(dir, config);
  const clock = { now: T0 };
  const ctx = createEngineContext(store, config, {
    verifier: input.verifier,
    now: () => clock.now,
  });
  return { ctx, store, clock };
}

function saleInput(overrides: Partial<Parameters<typeof openSale>[2]> = {}) {
  return {
    endTime: T0 + 1_000,
    price: { denom: "uusd", amount: "10" },
    minTokensSold: "1",
    recipient: { address: "treasury" },
    ...overrides,
  };
}

async function initialize(ctx: EngineContext, canMintAfterSale = false) {
  await instantiate(ctx, OWNER, { itemSource: "collection-1", canMintAfterSale });
}

describe("sale administration", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "sale-admin-test-"));
  });

  afterEach(async () => {
    if (tempDir) {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });

  it("initializes once", async () => {
    const { ctx, store } = createContext(tempDir);
    const response = await instantiate(ctx, "deployer", {
      itemSource: "collection-1",
      canMintAfterSale: true,
      owner: OWNER,
    });
    expect(response.attributes).toEqual({
      action: "instantiate",
      owner: OWNER,
      item_source: "collection-1",
    });
    expect(store.getConfiguration()).toMatchObject({
      itemSource: "collection-1",
      canMintAfterSale: true,
      owner: OWNER,
    });
    await expect(initialize(ctx)).rejects.toThrow(
      "E_CONFLICT: sale engine is already initialized",
    );
  });

  it("registers only items owned by the engine", async () => {
    const { ctx, store } = createContext(tempDir);
    await initialize(ctx);
    const response = await mint(ctx, OWNER, [
      { tokenId: "t-1" },
      { tokenId: "t-2", owner: "collector" },
      { tokenId: "t-3", owner: "sale-engine", tokenUri: "ipfs://t-3" },
    ]);
    expect(response.messages).toEqual([
      { kind: "item_mint", itemSource: "collection-1", tokenId: "t-1", owner: "sale-engine" },
      { kind: "item_mint", itemSource: "collection-1", tokenId: "t-2", owner: "collector" },
      {
        kind: "item_mint",
        itemSource: "collection-1",
        tokenId: "t-3",
        owner: "sale-engine",
        tokenUri: "ipfs://t-3",
      },
    ]);
    expect(response.attributes).toMatchObject({ minted: "3", registered: "2", available: "2" });
    expect(store.listTokens().map((token) => token.tokenId)).toEqual(["t-1", "t-3"]);
    expect(store.getAvailableCount()).toBe(2);
  });

  it("escrows items minted to a hex engine address however it is cased", async () => {
    const engine = "0x00000000000000000000000000000000000000ab";
    const { ctx, store } = createContext(tempDir, { config: { engine: { address: engine } } });
    await initialize(ctx);
    const response = await mint(ctx, OWNER, [
      { tokenId: "t-1", owner: engine },
      { tokenId: "t-2" },
    ]);
    expect(response.attributes).toMatchObject({ minted: "2", registered: "2", available: "2" });
    expect(
      response.messages.map((message) => (message.kind === "item_mint" ? message.owner : "")),
    ).toEqual([getAddress(engine), getAddress(engine)]);
    expect(store.listTokens().map((token) => token.tokenId)).toEqual(["t-1", "t-2"]);
  });

  it("enforces mint authority, batch size and duplicates", async () => {
    const { ctx, store } = createContext(tempDir, { config: { limits: { maxMintBatch: 2 } } });
    await initialize(ctx);

    await expect(mint(ctx, "stranger", [{ tokenId: "t-1" }])).rejects.toThrow(
      "E_FORBIDDEN: actor is not the contract owner",
    );
    await expect(
      mint(ctx, OWNER, [{ tokenId: "t-1" }, { tokenId: "t-2" }, { tokenId: "t-3" }]),
    ).rejects.toThrow("E_QUOTA_EXCEEDED: too many mint messages, limit is 2");

    await mint(ctx, OWNER, [{ tokenId: "t-1" }]);
    await expect(mint(ctx, OWNER, [{ tokenId: "t-2" }, { tokenId: "t-1" }])).rejects.toThrow(
      "E_CONFLICT: token t-1 is already available",
    );
    expect(store.hasToken("t-2")).toBe(false);
    expect(store.getAvailableCount()).toBe(1);
  });

  it("blocks minting during a sale and after one unless allowed", async () => {
    for (const canMintAfterSale of [false, true]) {
      const { ctx, clock } = createContext(path.join(tempDir, String(canMintAfterSale)));
      await initialize(ctx, canMintAfterSale);
      await mint(ctx, OWNER, [{ tokenId: "t-1" }]);
      await openSale(ctx, OWNER, saleInput());
      await expect(mint(ctx, OWNER, [{ tokenId: "t-2" }])).rejects.toThrow(
        "E_CONFLICT: sale already started",
      );

      clock.now = T0 + 1_000;
      await endSale(ctx, "keeper");
      const next = mint(ctx, OWNER, [{ tokenId: "t-2" }]);
      if (canMintAfterSale) {
        await expect(next).resolves.toMatchObject({ attributes: { registered: "1" } });
      } else {
        await expect(next).rejects.toThrow(
          "E_CONFLICT: cannot mint after a sale has been conducted",
        );
      }
    }
  });

  it("validates sale parameters", async () => {
    const { ctx, store } = createContext(tempDir);
    await initialize(ctx);

    await expect(openSale(ctx, "stranger", saleInput())).rejects.toThrow(/^E_FORBIDDEN/);
    await expect(openSale(ctx, OWNER, saleInput({ endTime: T0 }))).rejects.toThrow(
      "E_INVALID_ARGUMENT: endTime must be after startTime",
    );
    await expect(openSale(ctx, OWNER, saleInput({ startTime: T0 - 1 }))).rejects.toThrow(
      "E_INVALID_ARGUMENT: startTime must not be in the past",
    );
    await expect(
      openSale(ctx, OWNER, saleInput({ price: { denom: "uusd", amount: "0" } })),
    ).rejects.toThrow("E_INVALID_ARGUMENT: price must be positive");
    expect(store.getSaleConducted()).toBe(false);

    const opened = await openSale(ctx, OWNER, saleInput());
    expect(opened.attributes).toMatchObject({
      start_time: String(T0),
      end_time: String(T0 + 1_000),
      max_amount_per_wallet: "1",
    });
    expect(store.getSaleState()).toMatchObject({
      amountSold: "0",
      amountToSend: "0",
      amountTransferred: "0",
      totalTokens: "0",
      maxAmountPerWallet: 1,
    });
    expect(store.getSaleConducted()).toBe(true);
    await expect(openSale(ctx, OWNER, saleInput())).rejects.toThrow(
      "E_CONFLICT: sale already started",
    );
  });

  it("rejects purchases before a scheduled start", async () => {
    const { ctx, clock } = createContext(tempDir);
    await initialize(ctx);
    await mint(ctx, OWNER, [{ tokenId: "t-1" }]);
    await openSale(ctx, OWNER, saleInput({ startTime: T0 + 100 }));

    await expect(
      purchaseByTokenId(ctx, "buyer-a", "t-1", [{ denom: "uusd", amount: "10" }]),
    ).rejects.toThrow("E_CONFLICT: sale has not started");
    clock.now = T0 + 100;
    await expect(
      purchaseByTokenId(ctx, "buyer-a", "t-1", [{ denom: "uusd", amount: "10" }]),
    ).resolves.toMatchObject({ attributes: { token_ids: "t-1" } });
  });

  it("moves the item source only while nothing is escrowed", async () => {
    const verifier: ItemSourceVerifier = { verify: (itemSource) => itemSource !== "broken" };
    const { ctx, store, clock } = createContext(tempDir, { verifier });
    await initialize(ctx);

    await expect(updateItemSource(ctx, OWNER, "broken")).rejects.toThrow(
      "E_INVALID_ARGUMENT: itemSource is not a valid item collection",
    );
    await mint(ctx, OWNER, [{ tokenId: "t-1" }]);
    await expect(updateItemSource(ctx, OWNER, "collection-2")).rejects.toThrow(
      "E_FORBIDDEN: item source cannot change while items are held in escrow",
    );

    await openSale(ctx, OWNER, saleInput());
    await purchase(ctx, "buyer-a", undefined, [{ denom: "uusd", amount: "10" }]);
    await expect(updateItemSource(ctx, OWNER, "collection-2")).rejects.toThrow(
      "E_CONFLICT: item source cannot change while a sale is in progress",
    );

    clock.now = T0 + 1_000;
    await endSale(ctx, "keeper");
    await endSale(ctx, "keeper");
    expect(store.getSaleState()).toBeUndefined();

    const moved = await updateItemSource(ctx, OWNER, "collection-2");
    expect(moved.attributes.item_source).toBe("collection-2");
    expect(store.getConfiguration()?.itemSource).toBe("collection-2");
  });
});
