/**
 * chartd MCP Server
 *
 * Lets AI agents render cryptocurrency charts and get back a link.
 *
 * Tools:
 *   crypto_price_chart - Candlestick + volume chart for one coin
 *   crypto_heatmap     - Treemap of the trending coins' 24h moves
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AuthInfo } from "@modelcontextprotocol/sdk/server/auth/types.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { ChartInputSchema, HeatmapInputSchema, MAX_DAYS, DEFAULT_DAYS } from "./schemas/inputs.js";
import type { ToolGateway, ToolResult } from "./gateway/gateway.js";

// Library surface
export { ChartError, ProviderError, isChartError } from "./errors.js";
export type { ErrorKind } from "./errors.js";
export * from "./types.js";
export { KeyedCache, SingleFlight } from "./cache/index.js";
export { AssetCatalog, CatalogSnapshot } from "./catalog/index.js";
export { IconStore, PLACEHOLDER_ICON } from "./icons/index.js";
export { MarketDataFetcher, CoinMarketCapProvider } from "./market/index.js";
export type { MarketDataProvider, SeriesQuery } from "./market/index.js";
export { renderPriceChart, renderHeatmap } from "./render/index.js";
export { ArtifactPublisher, FsArtifactStore } from "./publish/index.js";
export type { ChartArtifact, ArtifactStore } from "./publish/index.js";
export { ArtifactIndex } from "./db/index.js";
export { SessionRegistry } from "./sessions/index.js";
export { ToolGateway } from "./gateway/index.js";
export type { ToolCall, ToolResult } from "./gateway/index.js";

export const SERVER_NAME = "chartd";
export const SERVER_VERSION = "0.1.0";

/** Who is calling, as the transport saw it */
export interface CallerIdentity {
  credential?: string;
  callerId?: string;
}

export type IdentityResolver = (authInfo: AuthInfo | undefined, sessionId: string | undefined) => CallerIdentity;

/** HTTP: the bearer token and caller id put on the request by the host */
export const identityFromAuth: IdentityResolver = (authInfo, sessionId) => ({
  credential: authInfo?.token,
  callerId: authInfo?.clientId || sessionId,
});

export function toCallToolResult(result: ToolResult): CallToolResult {
  if (result.status === "error") {
    const retry = result.retryAfterMs !== undefined
      ? ` Retry after ${Math.ceil(result.retryAfterMs / 1000)}s.`
      : "";
    return {
      isError: true,
      content: [{ type: "text", text: `${result.kind}: ${result.message}${retry}` }],
      structuredContent: result.retryAfterMs !== undefined
        ? { status: result.status, kind: result.kind, message: result.message, retryAfterMs: result.retryAfterMs }
        : { status: result.status, kind: result.kind, message: result.message }
    };
  }

  const lines = [result.caption, "", result.url];
  if (result.data) {
    lines.push("", `Data: ${JSON.stringify(result.data)}`);
    return {
      content: [{ type: "text", text: lines.join("\n") }],
      structuredContent: { status: result.status, url: result.url, caption: result.caption, data: result.data }
    };
  }
  return {
    content: [{ type: "text", text: lines.join("\n") }],
    structuredContent: { status: result.status, url: result.url, caption: result.caption }
  };
}

// ── Server Init ─────────────────────────────────────────────────

export function createMcpServer(gateway: ToolGateway, identify: IdentityResolver = identityFromAuth): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION
  });

  // ── Tool: crypto_price_chart ────────────────────────────────────

  server.registerTool(
    "crypto_price_chart",
    {
      title: "Crypto Price Chart",
      description: `Render a candlestick chart with volume bars for a cryptocurrency and return a link to the image.

Prices are in USD from CoinMarketCap. The coin's icon is drawn in the corner.

Args:
  - symbol (string): Ticker, slug or name. Examples: "BTC", "eth", "$WELL", "bitcoin-cash"
  - interval ("daily" | "hourly"): Candle size (default: daily)
  - days (number): Last N days (default: ${DEFAULT_DAYS}; daily up to ${MAX_DAYS.daily}, hourly up to ${MAX_DAYS.hourly})
  - start, end (YYYY-MM-DD): Explicit date range instead of days
  - theme ("light" | "dark"), size ("small" | "medium" | "large"), overlay_icon (boolean)

Returns:
  A short caption and the chart URL. Identical requests within a few minutes return the same URL.

Examples:
  - "Show me Bitcoin for the last month" → symbol "BTC"
  - "ETH hourly this week, dark" → symbol "ETH", interval "hourly", days 7, theme "dark"`,
      inputSchema: ChartInputSchema.shape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: true
      }
    },
    async (params, extra) => {
      const identity = identify(extra.authInfo, extra.sessionId);
      const result = await gateway.renderChart({ ...identity, arguments: params });
      return toCallToolResult(result);
    }
  );

  // ── Tool: crypto_heatmap ────────────────────────────────────────

  server.registerTool(
    "crypto_heatmap",
    {
      title: "Trending Crypto Heatmap",
      description: `Render a treemap of the currently trending cryptocurrencies and return a link to the image.

Block size follows the 24h volume change; colour follows the 24h price change (green up, red down, grey flat).

Args:
  - limit (number): How many trending coins to include (default: 20)
  - theme ("light" | "dark"), size ("small" | "medium" | "large")

Returns:
  A caption listing the coins by 24h volume change, the chart URL, and the
  figures behind each block (symbol, name, price, priceChange24h, volumeChange24h).`,
      inputSchema: HeatmapInputSchema.shape,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: true
      }
    },
    async (params, extra) => {
      const identity = identify(extra.authInfo, extra.sessionId);
      const result = await gateway.renderHeatmap({ ...identity, arguments: params });
      return toCallToolResult(result);
    }
  );

  return server;
}
