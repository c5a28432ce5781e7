import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ControlSurface } from "../control/surface.js";
import { registerAccountTools } from "./account.js";
import { registerControlTools } from "./control.js";
import { registerPositionTools } from "./positions.js";

export function createMcpServer(surface: ControlSurface): McpServer {
  const server = new McpServer({
    name: "market-autopilot",
    version: "1.0.0",
  });

  registerAccountTools(server, surface);
  registerPositionTools(server, surface);
  registerControlTools(server, surface);

  return server;
}
