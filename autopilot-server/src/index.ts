#!/usr/bin/env node
import type { Server } from "node:http";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createAutopilot } from "./autopilot.js";
import { createHttpApp, startHttpServer, stopHttpServer } from "./control/http.js";
import { createMcpServer } from "./tools/server.js";
import { loadConfig, resolveCredentials } from "./utils/config.js";
import { ConfigError } from "./utils/errors.js";
import { describeError, log, logError } from "./utils/logger.js";

const DEFAULT_CONFIG_PATH = "config/autopilot.json";

async function main() {
  const configPath = process.env.AUTOPILOT_CONFIG ?? DEFAULT_CONFIG_PATH;
  const config = loadConfig(configPath);
  const credentials = resolveCredentials(config);
  log(
    `Loaded ${configPath}: ${config.accounts.length} account(s) ` +
      config.accounts.map((a) => `${a.id}(paper=${a.paper})`).join(", ")
  );

  const { scheduler, surface, alerts } = createAutopilot(config, credentials);

  let http: Server | null = null;
  if (config.monitoring.httpEnabled) {
    http = await startHttpServer(createHttpApp(surface), config.monitoring.httpPort, config.monitoring.httpHost);
  }

  const mcp = config.monitoring.mcpStdioEnabled ? createMcpServer(surface) : null;
  if (mcp) {
    await mcp.connect(new StdioServerTransport());
    log("MCP control tools available on stdio");
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => scheduler.requestShutdown(`received ${signal}`));
  }

  alerts.send("lifecycle:online", "info", `Market Autopilot online\nAccounts: ${config.accounts.map((a) => a.id).join(", ")}`);

  const final = await scheduler.run();
  log(`Final report: ${JSON.stringify(surface.getDailyReport(), null, 2)}`);
  log(`Stopped: ${final.phase === "STOPPED" ? final.reason : final.phase}`);

  if (http) await stopHttpServer(http);
  if (mcp) await mcp.close();
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    logError(`Invalid configuration: ${error.message}`);
  } else {
    logError(`Fatal error: ${describeError(error)}`);
  }
  process.exit(1);
});
