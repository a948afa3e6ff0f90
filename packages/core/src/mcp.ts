/**
 * chartd MCP Server - Transports
 *
 * stdio for local clients, or an express app serving the MCP endpoint and
 * the published charts.
 */

import type { Server } from "http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { AuthInfo } from "@modelcontextprotocol/sdk/server/auth/types.js";
import express from "express";
import { createMcpServer, SERVER_NAME, SERVER_VERSION } from "./index.js";
import { credentialMatches, type ToolGateway } from "./gateway/gateway.js";
import type { ArtifactPublisher } from "./publish/publisher.js";
import { silentLogger, type Logger } from "./chartd/logger.js";
import { errorMessage } from "./errors.js";

export interface HttpAppOptions {
  gateway: ToolGateway;
  publisher: ArtifactPublisher;
  bearerSecret: string;
  logger?: Logger;
}

export function bearerToken(header: string | undefined): string | undefined {
  const match = header?.match(/^Bearer\s+(\S+)\s*$/i);
  return match ? match[1] : undefined;
}

/**
 * stdio: the local process is trusted, so every call presents the configured
 * secret and runs as caller "stdio".
 */
export async function runStdio(gateway: ToolGateway, secret: string, logger: Logger = silentLogger): Promise<McpServer> {
  const server = createMcpServer(gateway, () => ({ credential: secret, callerId: "stdio" }));
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("MCP server running on stdio");
  return server;
}

export function createHttpApp(options: HttpAppOptions): express.Express {
  const { gateway, publisher, bearerSecret } = options;
  const logger = options.logger ?? silentLogger;

  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "1mb" }));

  app.post("/mcp", async (req, res) => {
    const token = bearerToken(req.get("authorization"));
    if (!credentialMatches(token, bearerSecret)) {
      res.status(401).set("WWW-Authenticate", "Bearer").json({
        jsonrpc: "2.0",
        error: { code: -32001, message: "Unauthorized" },
        id: null
      });
      return;
    }

    const auth: AuthInfo = {
      token: token ?? "",
      clientId: req.get("x-caller-id") || req.get("mcp-session-id") || "",
      scopes: []
    };

    // Stateless: a fresh server and transport per request
    const server = createMcpServer(gateway);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true
    });
    res.on("close", () => {
      transport.close().catch(error => logger.warn(`Transport close failed: ${errorMessage(error)}`));
      server.close().catch(error => logger.warn(`Server close failed: ${errorMessage(error)}`));
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(Object.assign(req, { auth }), res, req.body);
    } catch (error) {
      logger.error(`MCP request failed: ${errorMessage(error)}`, error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null
        });
      }
    }
  });

  app.get("/charts/:id", async (req, res) => {
    try {
      const content = await publisher.read(req.params.id);
      if (!content) {
        res.status(404).type("text/plain").send("Chart not found");
        return;
      }
      res.set({
        "Content-Type": content.contentType,
        "Content-Disposition": "inline",
        "Content-Security-Policy": "default-src 'none'; img-src data:; style-src 'unsafe-inline'",
        "X-Content-Type-Options": "nosniff",
        "Cache-Control": "public, max-age=3600"
      });
      res.send(content.bytes);
    } catch (error) {
      logger.error(`Failed to serve chart ${req.params.id}: ${errorMessage(error)}`, error);
      res.status(500).type("text/plain").send("Internal server error");
    }
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      name: SERVER_NAME,
      version: SERVER_VERSION,
      artifacts: publisher.stats()
    });
  });

  return app;
}

export function runHTTP(app: express.Express, port: number, logger: Logger = silentLogger): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info(`MCP server running on http://localhost:${port}/mcp`);
      resolve(server);
    });
    server.once("error", reject);
  });
}
