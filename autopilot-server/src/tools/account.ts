import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { summarizeAccount } from "../control/account-summary.js";
import type { ControlSurface } from "../control/surface.js";
import { logError } from "../utils/logger.js";

export function registerAccountTools(server: McpServer, surface: ControlSurface): void {
  server.tool(
    "get_accounts",
    "Get every managed account as of the last completed cycle: equity, cash, daily P&L, exposure and circuit breaker status",
    {},
    async () => {
      try {
        const result = surface.listAccounts().map(summarizeAccount);

        return {
          content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
        };
      } catch (err) {
        logError("get_accounts", err);
        return {
          content: [
            {
              type: "text" as const,
              text: `Error reading accounts: ${err instanceof Error ? err.message : String(err)}`,
            },
          ],
        };
      }
    }
  );
}
