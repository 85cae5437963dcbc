import "dotenv/config";
import { createMcpServer } from "./server.js";
import { createHttpTransport } from "./transport.js";
import { YouTrackService } from "./services/youtrack.js";
import { createDefaultTools } from "./tools/registry.js";
import { createLogger } from "./logger.js";
import { parseConfig } from "./config.js";
import type { McpToolContext } from "./tools/types.js";

const log = createLogger("mcp-server");

async function main() {
  const config = parseConfig();

  log.info("Starting YouTrack time tracking MCP server...");
  log.info(`Configuration: PORT=${config.PORT}, HOST=${config.HOST}, YOUTRACK_URL=${config.YOUTRACK_URL}`);
  if (config.YOUTRACK_DEFAULT_PROJECT_KEY) {
    log.info(`Bare issue numbers resolve to project ${config.YOUTRACK_DEFAULT_PROJECT_KEY}`);
  }

  const youtrackService = new YouTrackService({
    baseUrl: config.YOUTRACK_URL,
    token: config.YOUTRACK_API_TOKEN,
    timeoutMs: config.YOUTRACK_REQUEST_TIMEOUT_MS,
  });

  const toolContext: McpToolContext = {
    services: { youtrack: youtrackService },
    defaultProjectKey: config.YOUTRACK_DEFAULT_PROJECT_KEY,
    logger: createLogger("tools"),
  };

  const tools = createDefaultTools();
  const app = createHttpTransport(
    () => createMcpServer({ tools, context: toolContext }),
    { mcpPath: config.MCP_PATH, checkReady: () => youtrackService.checkConnection() },
  );

  const server = app.listen(config.PORT, config.HOST, () => {
    log.info(`MCP Server listening on http://${config.HOST}:${config.PORT}`);
    log.info(`MCP endpoint: http://${config.HOST}:${config.PORT}${config.MCP_PATH}`);
    log.info(`Health check: http://${config.HOST}:${config.PORT}/health`);
  });

  const shutdown = () => {
    log.info("Shutting down gracefully...");
    server.close(() => {
      log.info("HTTP server closed");
      process.exit(0);
    });
    setTimeout(() => {
      log.warn("Forced shutdown after timeout");
      process.exit(1);
    }, 10_000).unref();
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((error) => {
  log.error("Failed to start MCP server:", error);
  process.exit(1);
});
