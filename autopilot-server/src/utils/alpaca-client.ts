/**
 * Alpaca client factory, one client per managed account.
 *
 * @alpacahq/alpaca-trade-api ships incomplete TS definitions, so the
 * constructor is typed here against the subset of the REST and market-data
 * surface this project calls.
 */

import Alpaca from "@alpacahq/alpaca-trade-api";
import type { CalendarDay } from "../market/calendar.js";
import type { AlpacaCredentials } from "./config.js";
import { log } from "./logger.js";

export interface AlpacaAccountJson {
  equity: string;
  cash: string;
  buying_power: string;
  status: string;
}

export interface AlpacaPositionJson {
  symbol: string;
  qty: string;
  side: "long" | "short";
  avg_entry_price: string;
  current_price: string;
}

export interface AlpacaOrderJson {
  id: string;
  status: string;
  filled_qty: string;
  filled_avg_price: string | null;
}

export interface AlpacaCreateOrder {
  symbol: string;
  qty: number;
  side: "buy" | "sell";
  type: "market";
  time_in_force: "day";
  client_order_id: string;
}

export interface AlpacaTrade {
  Price: number;
}

export interface AlpacaBar {
  ClosePrice: number;
}

export interface AlpacaRestClient {
  getAccount(): Promise<AlpacaAccountJson>;
  getPositions(): Promise<AlpacaPositionJson[]>;
  createOrder(order: AlpacaCreateOrder): Promise<AlpacaOrderJson>;
  cancelOrder(orderId: string): Promise<unknown>;
  getLatestTrades(symbols: string[]): Promise<Map<string, AlpacaTrade>>;
  getCalendar(params: { start: string; end: string }): Promise<CalendarDay[]>;
  getBarsV2(
    symbol: string,
    options: { start: string; end?: string; timeframe: string; limit?: number }
  ): AsyncIterable<AlpacaBar>;
}

interface AlpacaClientOptions {
  keyId: string;
  secretKey: string;
  paper: boolean;
}

type AlpacaConstructor = new (options: AlpacaClientOptions) => AlpacaRestClient;

const AlpacaClient = Alpaca as unknown as AlpacaConstructor;

export function createAlpacaClient(accountId: string, credentials: AlpacaCredentials): AlpacaRestClient {
  log(`Initializing Alpaca client for ${accountId} (paper=${credentials.paper})`);
  return new AlpacaClient({
    keyId: credentials.keyId,
    secretKey: credentials.secretKey,
    paper: credentials.paper,
  });
}
