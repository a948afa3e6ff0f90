/**
 * chartd Daemon
 *
 * Wires the pipeline together and runs it behind the configured transport:
 * 1. CATALOG - coin list snapshot and local icons
 * 2. MARKET  - CoinMarketCap behind a TTL cache
 * 3. PUBLISH - chart files on disk, indexed in SQLite
 * 4. SERVE   - MCP over stdio or HTTP, plus the chart URLs
 */

import { randomBytes } from 'crypto';
import type { Server } from 'http';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { Config } from './config.js';
import { Logger } from './logger.js';
import { AssetCatalog } from '../catalog/catalog.js';
import { IconStore } from '../icons/icon-store.js';
import { CoinMarketCapProvider, type MarketDataProvider } from '../market/provider.js';
import { MarketDataFetcher } from '../market/fetcher.js';
import { ArtifactIndex } from '../db/index.js';
import { FsArtifactStore } from '../publish/fs-store.js';
import { ArtifactPublisher } from '../publish/publisher.js';
import { SessionRegistry } from '../sessions/registry.js';
import { ToolGateway } from '../gateway/gateway.js';
import { createHttpApp, runHTTP, runStdio } from '../mcp.js';

export interface Components {
  catalog: AssetCatalog;
  icons: IconStore;
  provider: MarketDataProvider;
  fetcher: MarketDataFetcher;
  index: ArtifactIndex;
  publisher: ArtifactPublisher;
  sessions: SessionRegistry;
  gateway: ToolGateway;
}

export function createProvider(config: Config): CoinMarketCapProvider {
  return new CoinMarketCapProvider({
    apiKey: config.providerApiKey,
    baseUrl: config.providerBaseUrl,
    timeoutMs: config.fetchTimeoutMs,
  });
}

/**
 * Build every component from config. `secret` is what the gateway checks
 * credentials against.
 */
export async function createComponents(
  config: Config,
  logger: Logger,
  secret: string,
  provider: MarketDataProvider = createProvider(config),
): Promise<Components> {
  const catalog = await AssetCatalog.load(config.coinListPath, logger.child('catalog'));
  const icons = new IconStore(config.iconDir, logger.child('icons'));
  const fetcher = new MarketDataFetcher(provider, {
    ttlMs: config.seriesTtlMs,
    graceMs: config.staleGraceMs,
    timeoutMs: config.fetchTimeoutMs,
    logger: logger.child('market'),
  });
  const index = new ArtifactIndex(config.dbPath);
  const publisher = new ArtifactPublisher(new FsArtifactStore(config.artifactDir), index, {
    publicBaseUrl: config.publicBaseUrl,
    cacheWindowMs: config.cacheWindowMs,
    retentionMs: config.retentionMs,
    maxArtifacts: config.maxArtifacts,
    logger: logger.child('publish'),
  });
  const sessions = new SessionRegistry({
    maxInFlight: config.maxInFlight,
    maxRequestsPerMinute: config.maxRequestsPerMinute,
    idleTimeoutMs: config.idleTimeoutMs,
  });
  const gateway = new ToolGateway(
    { catalog, icons, fetcher, publisher, sessions, logger: logger.child('gateway') },
    { bearerSecret: secret, requestTimeoutMs: config.requestTimeoutMs, watermark: 'chartd' },
  );

  return { catalog, icons, provider, fetcher, index, publisher, sessions, gateway };
}

export class Daemon {
  private config: Config;
  private logger: Logger;
  private provider?: MarketDataProvider;
  private components: Components | null = null;
  private httpServer: Server | null = null;
  private mcpServer: McpServer | null = null;

  constructor(config: Config, logger: Logger, provider?: MarketDataProvider) {
    this.config = config;
    this.logger = logger;
    this.provider = provider;
  }

  /**
   * Start the daemon on the configured transport
   */
  async start(): Promise<void> {
    this.config.validate();
    this.config.ensureDataDir();

    // stdio has no network peer; a per-process secret is enough
    const secret = this.config.bearerSecret ?? randomBytes(32).toString('hex');
    this.components = await createComponents(this.config, this.logger, secret, this.provider);

    if (!this.config.providerApiKey) {
      this.logger.warn('No CoinMarketCap API key configured; chart requests will fail with DataUnavailable');
    }

    if (this.config.transport === 'stdio') {
      this.mcpServer = await runStdio(this.components.gateway, secret, this.logger);
    } else {
      const app = createHttpApp({
        gateway: this.components.gateway,
        publisher: this.components.publisher,
        bearerSecret: secret,
        logger: this.logger.child('http'),
      });
      this.httpServer = await runHTTP(app, this.config.port, this.logger);
    }

    this.logger.info('');
    this.logger.success('chartd is running');
    this.logger.info(`  Transport: ${this.config.transport}`);
    this.logger.info(`  Assets:    ${this.components.catalog.size}`);
    this.logger.info(`  Charts:    ${this.config.publicBaseUrl}/charts/<id>`);
    this.logger.info(`  Data:      ${this.config.dataDir}`);
    this.logger.info('');
  }

  /**
   * Stop the daemon
   */
  async stop(): Promise<void> {
    const httpServer = this.httpServer;
    if (httpServer) {
      this.httpServer = null;
      await new Promise<void>((resolve, reject) => {
        httpServer.close(error => (error ? reject(error) : resolve()));
      });
    }

    if (this.mcpServer) {
      await this.mcpServer.close();
      this.mcpServer = null;
    }

    if (this.components) {
      this.components.index.close();
      this.components = null;
    }

    this.logger.info('Daemon stopped');
  }

  get running(): boolean {
    return this.components !== null;
  }
}

/**
 * Pull a fresh coin list from the provider and write the snapshot file.
 */
export async function refreshCatalog(config: Config, logger: Logger, provider: MarketDataProvider = createProvider(config)): Promise<number> {
  config.ensureDataDir();
  const catalog = await AssetCatalog.load(config.coinListPath, logger.child('catalog'));
  return catalog.refresh(provider, config.coinListPath);
}
