import type { AlpacaOrderJson, AlpacaRestClient } from "../utils/alpaca-client.js";
import { AdapterError, AdapterErrorCode } from "../utils/errors.js";
import type {
  AccountSnapshot,
  BrokerAdapter,
  BrokerPosition,
  OrderAck,
  OrderRequest,
  OrderStatus,
} from "./types.js";

function toNumber(value: string | null | undefined, field: string): number {
  const parsed = parseFloat(value ?? "");
  if (!Number.isFinite(parsed)) {
    throw new AdapterError({
      adapter: "broker",
      code: AdapterErrorCode.UNKNOWN,
      message: `Unparseable ${field}: ${String(value)}`,
    });
  }
  return parsed;
}

function toStatus(status: string): OrderStatus {
  switch (status) {
    case "filled":
      return "filled";
    case "rejected":
    case "canceled":
    case "expired":
    case "suspended":
      return "rejected";
    default:
      return "accepted";
  }
}

function toAck(order: AlpacaOrderJson): OrderAck {
  const filledQty = parseFloat(order.filled_qty);
  const avg = order.filled_avg_price === null ? NaN : parseFloat(order.filled_avg_price);
  return {
    orderId: order.id,
    status: toStatus(order.status),
    filledQuantity: Number.isFinite(filledQty) ? filledQty : 0,
    filledAvgPrice: Number.isFinite(avg) ? avg : null,
  };
}

/**
 * BrokerAdapter over one Alpaca client per account. Market data is read
 * through the data client, which any account's credentials can serve.
 */
export class AlpacaBrokerAdapter implements BrokerAdapter {
  constructor(
    private readonly clients: ReadonlyMap<string, AlpacaRestClient>,
    private readonly dataClient: AlpacaRestClient,
    private readonly now: () => Date = () => new Date()
  ) {}

  async getAccountSnapshot(accountId: string): Promise<AccountSnapshot> {
    const account = await this.clientFor(accountId).getAccount();
    return {
      equity: toNumber(account.equity, "equity"),
      cash: toNumber(account.cash, "cash"),
      buyingPower: toNumber(account.buying_power, "buying_power"),
      status: account.status,
    };
  }

  async getPositions(accountId: string): Promise<BrokerPosition[]> {
    const positions = await this.clientFor(accountId).getPositions();
    return positions.map((p) => {
      const qty = Math.abs(toNumber(p.qty, `${p.symbol}.qty`));
      return {
        symbol: p.symbol,
        quantity: p.side === "short" ? -qty : qty,
        entryPrice: toNumber(p.avg_entry_price, `${p.symbol}.avg_entry_price`),
        currentPrice: toNumber(p.current_price, `${p.symbol}.current_price`),
      };
    });
  }

  async getPrices(symbols: readonly string[]): Promise<Map<string, number>> {
    const prices = new Map<string, number>();
    if (symbols.length === 0) return prices;

    const trades = await this.dataClient.getLatestTrades([...symbols]);
    for (const [symbol, trade] of trades) {
      if (Number.isFinite(trade.Price) && trade.Price > 0) {
        prices.set(symbol, trade.Price);
      }
    }
    return prices;
  }

  async submitOrder(accountId: string, order: OrderRequest): Promise<OrderAck> {
    const placed = await this.clientFor(accountId).createOrder({
      symbol: order.symbol.toUpperCase(),
      qty: order.quantity,
      side: order.side,
      type: order.type,
      time_in_force: order.timeInForce,
      client_order_id: order.clientOrderId,
    });
    return toAck(placed);
  }

  async cancelOrder(accountId: string, orderId: string): Promise<void> {
    await this.clientFor(accountId).cancelOrder(orderId);
  }

  async getDailyCloses(symbol: string, days: number): Promise<number[]> {
    // Calendar days overshoot trading days; keep the last `days` bars.
    const start = new Date(this.now().getTime() - days * 2 * 86_400_000);
    const closes: number[] = [];
    for await (const bar of this.dataClient.getBarsV2(symbol, {
      start: start.toISOString(),
      timeframe: "1Day",
    })) {
      closes.push(bar.ClosePrice);
    }
    return closes.slice(-days);
  }

  private clientFor(accountId: string): AlpacaRestClient {
    const client = this.clients.get(accountId);
    if (!client) {
      throw new AdapterError({
        adapter: "broker",
        code: AdapterErrorCode.NOT_FOUND,
        message: `No Alpaca client for account ${accountId}`,
      });
    }
    return client;
  }
}
