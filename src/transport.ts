import express, { Request, Response } from "express";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { createLogger } from "./logger.js";
import { getErrorMessage } from "./errors.js";
import { SERVER_NAME, SERVER_VERSION } from "./version.js";

/**
 * Standard JSON-RPC 2.0 error codes.
 * @see https://www.jsonrpc.org/specification#error_object
 */
const JSON_RPC_INTERNAL_ERROR = -32603;
const JSON_RPC_SERVER_ERROR = -32000;

const log = createLogger("transport");

function rpcMethodOf(body: unknown): string {
  if (typeof body === "object" && body !== null && "method" in body && typeof body.method === "string") {
    return body.method;
  }
  return "unknown";
}

export interface HttpTransportOptions {
  mcpPath: string;
  /** Readiness probe, typically a cheap authenticated call to YouTrack. */
  checkReady?: () => Promise<void>;
}

export function createHttpTransport(createServer: () => McpServer, options: HttpTransportOptions): express.Application {
  const { mcpPath, checkReady } = options;
  const app = express();

  app.use(express.json());

  app.use((req: Request, res: Response, next) => {
    const start = performance.now();
    res.on("finish", () => {
      const durationMs = Math.round(performance.now() - start);
      log.debug("HTTP request", {
        method: req.method,
        path: req.path,
        rpcMethod: req.path === mcpPath ? rpcMethodOf(req.body) : undefined,
        status: res.statusCode,
        durationMs,
      });
    });
    next();
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "healthy",
      service: SERVER_NAME,
      timestamp: new Date().toISOString(),
      version: SERVER_VERSION,
    });
  });

  app.get("/ready", async (_req: Request, res: Response) => {
    try {
      await checkReady?.();
      res.json({
        ready: true,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      log.warn("Readiness check failed", { error });
      res.status(503).json({
        ready: false,
        error: getErrorMessage(error),
        timestamp: new Date().toISOString(),
      });
    }
  });

  app.post(mcpPath, async (req: Request, res: Response) => {
    const mcpServer = createServer();
    try {
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
      });
      await mcpServer.connect(transport);
      await transport.handleRequest(req, res, req.body);
      res.on("close", () => {
        Promise.all([transport.close(), mcpServer.close()]).catch((error: unknown) => {
          log.warn("Error closing MCP request resources", { error });
        });
      });
    } catch (error) {
      log.error("Error handling MCP request", { method: rpcMethodOf(req.body), error });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: {
            code: JSON_RPC_INTERNAL_ERROR,
            message: "Internal server error",
          },
          id: null,
        });
      }
    }
  });

  function methodNotAllowed(_req: Request, res: Response) {
    res.status(405).json({
      jsonrpc: "2.0",
      error: {
        code: JSON_RPC_SERVER_ERROR,
        message: "Method not allowed.",
      },
      id: null,
    });
  }

  app.get(mcpPath, methodNotAllowed);
  app.delete(mcpPath, methodNotAllowed);

  return app;
}
