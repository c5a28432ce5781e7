import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ControlSurface } from "../control/surface.js";
import { unrealizedReturn } from "../risk/portfolio-risk.js";
import { logError } from "../utils/logger.js";

export function registerPositionTools(server: McpServer, surface: ControlSurface): void {
  server.tool(
    "get_positions",
    "Get open positions as of the last completed cycle, with market value and unrealized P&L",
    {
      account_id: z.string().optional().describe("Only this account. Omit for every account."),
    },
    async ({ account_id }) => {
      try {
        const accounts = surface
          .listAccounts()
          .filter((account) => account_id === undefined || account.id === account_id);
        if (account_id !== undefined && accounts.length === 0) {
          return {
            content: [{ type: "text" as const, text: `Unknown account ${account_id}` }],
          };
        }

        const result = accounts.flatMap((account) =>
          account.positions.map((p) => ({
            account_id: account.id,
            symbol: p.symbol,
            qty: p.quantity,
            side: p.quantity > 0 ? "long" : "short",
            market_value: (Math.abs(p.quantity) * p.currentPrice).toFixed(2),
            avg_entry_price: p.entryPrice.toFixed(2),
            current_price: p.currentPrice.toFixed(2),
            unrealized_pl: ((p.currentPrice - p.entryPrice) * p.quantity).toFixed(2),
            unrealized_plpc: (unrealizedReturn(p) * 100).toFixed(2),
            opened_at: p.openedAt.getTime() === 0 ? null : p.openedAt.toISOString(),
          }))
        );

        return {
          content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
        };
      } catch (err) {
        logError("get_positions", err);
        return {
          content: [
            {
              type: "text" as const,
              text: `Error reading positions: ${err instanceof Error ? err.message : String(err)}`,
            },
          ],
        };
      }
    }
  );
}
