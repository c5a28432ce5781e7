import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ControlSurface } from "../control/surface.js";
import { logError } from "../utils/logger.js";

function text(value: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
  };
}

function failure(what: string, err: unknown) {
  logError(what, err);
  return {
    content: [
      {
        type: "text" as const,
        text: `Error in ${what}: ${err instanceof Error ? err.message : String(err)}`,
      },
    ],
  };
}

export function registerControlTools(server: McpServer, surface: ControlSurface): void {
  server.tool(
    "get_health",
    "Get process status, uptime, per-adapter connectivity and the last cycle time",
    {},
    async () => {
      try {
        return text(surface.getHealth());
      } catch (err) {
        return failure("get_health", err);
      }
    }
  );

  server.tool(
    "get_metrics",
    "Get per-account equity, daily P&L, exposure, trades today and rolling Sharpe/Sortino/VaR/drawdown",
    {},
    async () => {
      try {
        return text(surface.getMetrics());
      } catch (err) {
        return failure("get_metrics", err);
      }
    }
  );

  server.tool(
    "list_candidates",
    "List the most recent scored candidate symbols. For display only.",
    {},
    async () => {
      try {
        return text(surface.listCandidates());
      } catch (err) {
        return failure("list_candidates", err);
      }
    }
  );

  server.tool(
    "emergency_stop",
    "⚠️ DANGER: Halt trading on ALL accounts and stop the scheduler. Irreversible without a restart.",
    {
      reason: z.string().min(1).max(500).describe("Why trading is being halted"),
    },
    async ({ reason }) => {
      try {
        const ack = surface.triggerEmergencyStop(reason, "operator");
        return text({
          acknowledged: ack.acknowledged,
          accepted: ack.accepted,
          note: ack.accepted ? "emergency stop queued" : "an emergency stop was already in force",
          request: ack.request,
        });
      } catch (err) {
        return failure("emergency_stop", err);
      }
    }
  );

  server.tool(
    "reset_circuit_breaker",
    "Manually close an account's circuit breaker. Applied at the start of the next cycle.",
    {
      account_id: z.string().describe("Account whose breaker to reset"),
    },
    async ({ account_id }) => {
      try {
        return text(surface.requestBreakerReset(account_id));
      } catch (err) {
        return failure("reset_circuit_breaker", err);
      }
    }
  );
}
