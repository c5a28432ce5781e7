import { describe, it, expect, beforeEach, vi } from "vitest";
import type { AlpacaBar, AlpacaRestClient } from "../../utils/alpaca-client.js";
import { AdapterError } from "../../utils/errors.js";
import { AlpacaBrokerAdapter } from "../alpaca-broker.js";

function createMockClient() {
  return {
    getAccount: vi.fn().mockResolvedValue({
      equity: "30125.50",
      cash: "12000.00",
      buying_power: "24000.00",
      status: "ACTIVE",
    }),
    getPositions: vi.fn().mockResolvedValue([
      { symbol: "AAPL", qty: "10", side: "long", avg_entry_price: "180.00", current_price: "185.25" },
      { symbol: "TSLA", qty: "-4", side: "short", avg_entry_price: "250.00", current_price: "240.00" },
    ]),
    createOrder: vi.fn().mockResolvedValue({ id: "ord-1", status: "filled", filled_qty: "10", filled_avg_price: "185.30" }),
    cancelOrder: vi.fn().mockResolvedValue(undefined),
    getLatestTrades: vi.fn().mockResolvedValue(
      new Map([
        ["AAPL", { Price: 185.4 }],
        ["BAD", { Price: 0 }],
      ])
    ),
    getCalendar: vi.fn().mockResolvedValue([]),
    getBarsV2: vi.fn(async function* (): AsyncGenerator<AlpacaBar> {
      for (const close of [101, 102, 103, 104]) yield { ClosePrice: close };
    }),
  } satisfies AlpacaRestClient;
}

describe("AlpacaBrokerAdapter", () => {
  let client: ReturnType<typeof createMockClient>;
  let broker: AlpacaBrokerAdapter;

  beforeEach(() => {
    client = createMockClient();
    broker = new AlpacaBrokerAdapter(new Map([["ACC1", client]]), client, () => new Date("2026-03-10T15:00:00Z"));
  });

  it("parses account balances", async () => {
    expect(await broker.getAccountSnapshot("ACC1")).toEqual({
      equity: 30125.5,
      cash: 12000,
      buyingPower: 24000,
      status: "ACTIVE",
    });
  });

  it("signs short positions negative", async () => {
    expect(await broker.getPositions("ACC1")).toEqual([
      { symbol: "AAPL", quantity: 10, entryPrice: 180, currentPrice: 185.25 },
      { symbol: "TSLA", quantity: -4, entryPrice: 250, currentPrice: 240 },
    ]);
  });

  it("drops non-positive prices and skips the call for no symbols", async () => {
    const prices = await broker.getPrices(["AAPL", "BAD"]);
    expect([...prices]).toEqual([["AAPL", 185.4]]);

    expect((await broker.getPrices([])).size).toBe(0);
    expect(client.getLatestTrades).toHaveBeenCalledTimes(1);
  });

  it("submits a day market order with the client order id", async () => {
    const ack = await broker.submitOrder("ACC1", {
      symbol: "aapl",
      side: "buy",
      quantity: 10,
      type: "market",
      timeInForce: "day",
      clientOrderId: "ap-ACC1-1-1",
    });

    expect(client.createOrder).toHaveBeenCalledWith({
      symbol: "AAPL",
      qty: 10,
      side: "buy",
      type: "market",
      time_in_force: "day",
      client_order_id: "ap-ACC1-1-1",
    });
    expect(ack).toEqual({ orderId: "ord-1", status: "filled", filledQuantity: 10, filledAvgPrice: 185.3 });
  });

  it("maps working and terminal broker statuses", async () => {
    client.createOrder.mockResolvedValueOnce({ id: "ord-2", status: "new", filled_qty: "0", filled_avg_price: null });
    client.createOrder.mockResolvedValueOnce({ id: "ord-3", status: "canceled", filled_qty: "0", filled_avg_price: null });
    const order = {
      symbol: "AAPL",
      side: "buy",
      quantity: 1,
      type: "market",
      timeInForce: "day",
      clientOrderId: "x",
    } as const;

    expect(await broker.submitOrder("ACC1", order)).toMatchObject({ status: "accepted", filledAvgPrice: null });
    expect(await broker.submitOrder("ACC1", order)).toMatchObject({ status: "rejected" });
  });

  it("keeps the most recent daily closes", async () => {
    expect(await broker.getDailyCloses("AAPL", 3)).toEqual([102, 103, 104]);
    expect(client.getBarsV2).toHaveBeenCalledWith("AAPL", {
      start: "2026-03-04T15:00:00.000Z",
      timeframe: "1Day",
    });
  });

  it("refuses accounts it has no client for", async () => {
    await expect(broker.getAccountSnapshot("NOPE")).rejects.toBeInstanceOf(AdapterError);
  });

  it("rejects unparseable numbers", async () => {
    client.getAccount.mockResolvedValueOnce({ equity: "n/a", cash: "0", buying_power: "0", status: "ACTIVE" });
    await expect(broker.getAccountSnapshot("ACC1")).rejects.toThrow("Unparseable equity: n/a");
  });
});
