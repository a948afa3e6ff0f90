/**
 * chartd Configuration
 *
 * Layers, lowest first: defaults, environment, <dataDir>/config.json, CLI options.
 */

import { homedir } from 'os';
import { join } from 'path';
import { existsSync, readFileSync, mkdirSync } from 'fs';
import { z } from 'zod';
import { errorMessage } from '../errors.js';

export type TransportMode = 'stdio' | 'http';

export interface ChartdConfig {
  port: number;
  dataDir: string;
  transport: TransportMode;
  publicBaseUrl: string;
  bearerSecret?: string;
  providerApiKey?: string;
  providerBaseUrl: string;
  coinListPath: string;
  iconDir: string;
  artifactDir: string;
  dbPath: string;
  seriesTtlMs: number;
  staleGraceMs: number;
  fetchTimeoutMs: number;
  requestTimeoutMs: number;
  maxInFlight: number;
  maxRequestsPerMinute: number;
  idleTimeoutMs: number;
  cacheWindowMs: number;
  retentionMs: number;
  maxArtifacts: number;
  verbose: boolean;
}

const DEFAULT_PORT = 8430;
const DEFAULT_TRANSPORT: TransportMode = 'http';

const DEFAULTS = {
  dataDir: join(homedir(), '.chartd'),
  providerBaseUrl: 'https://pro-api.coinmarketcap.com',
  seriesTtlMs: 5 * 60 * 1000,
  staleGraceMs: 10 * 60 * 1000,
  fetchTimeoutMs: 10_000,
  requestTimeoutMs: 30_000,
  maxInFlight: 2,
  maxRequestsPerMinute: 30,
  idleTimeoutMs: 15 * 60 * 1000,
  cacheWindowMs: 5 * 60 * 1000,
  retentionMs: 24 * 60 * 60 * 1000,
  maxArtifacts: 500,
};

const ConfigFileSchema = z.object({
  port: z.number().int().min(1).max(65535).optional(),
  transport: z.enum(['stdio', 'http']).optional(),
  publicBaseUrl: z.string().url().optional(),
  bearerSecret: z.string().min(1).optional(),
  providerApiKey: z.string().min(1).optional(),
  providerBaseUrl: z.string().url().optional(),
  coinListPath: z.string().min(1).optional(),
  iconDir: z.string().min(1).optional(),
  seriesTtlMs: z.number().int().min(0).optional(),
  staleGraceMs: z.number().int().min(0).optional(),
  fetchTimeoutMs: z.number().int().min(1).optional(),
  requestTimeoutMs: z.number().int().min(1).optional(),
  maxInFlight: z.number().int().min(1).optional(),
  maxRequestsPerMinute: z.number().int().min(0).optional(),
  idleTimeoutMs: z.number().int().min(1).optional(),
  cacheWindowMs: z.number().int().min(0).optional(),
  retentionMs: z.number().int().min(1).optional(),
  maxArtifacts: z.number().int().min(1).optional(),
  verbose: z.boolean().optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function intFromEnv(env: NodeJS.ProcessEnv, name: string, min = 0): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    const kind = min === 0 ? 'a non-negative integer' : `an integer of at least ${min}`;
    throw new ConfigError(`${name} must be ${kind}, got "${raw}"`);
  }
  return value;
}

function transportFrom(raw: string, source: string): TransportMode {
  if (raw === 'stdio' || raw === 'http') return raw;
  throw new ConfigError(`${source} must be "stdio" or "http", got "${raw}"`);
}

export class Config implements ChartdConfig {
  port: number;
  dataDir: string;
  transport: TransportMode;
  publicBaseUrl: string;
  bearerSecret?: string;
  providerApiKey?: string;
  providerBaseUrl: string;
  coinListPath: string;
  iconDir: string;
  artifactDir: string;
  dbPath: string;
  seriesTtlMs: number;
  staleGraceMs: number;
  fetchTimeoutMs: number;
  requestTimeoutMs: number;
  maxInFlight: number;
  maxRequestsPerMinute: number;
  idleTimeoutMs: number;
  cacheWindowMs: number;
  retentionMs: number;
  maxArtifacts: number;
  verbose: boolean;
  configPath: string;

  constructor(options: Record<string, string | boolean> = {}, env: NodeJS.ProcessEnv = process.env) {
    // Data dir first: every other path hangs off it
    this.dataDir = typeof options.data === 'string' ? options.data : env.CHARTD_DATA_DIR || DEFAULTS.dataDir;
    this.configPath = join(this.dataDir, 'config.json');

    this.port = DEFAULT_PORT;
    this.transport = DEFAULT_TRANSPORT;
    this.providerBaseUrl = DEFAULTS.providerBaseUrl;
    this.seriesTtlMs = DEFAULTS.seriesTtlMs;
    this.staleGraceMs = DEFAULTS.staleGraceMs;
    this.fetchTimeoutMs = DEFAULTS.fetchTimeoutMs;
    this.requestTimeoutMs = DEFAULTS.requestTimeoutMs;
    this.maxInFlight = DEFAULTS.maxInFlight;
    this.maxRequestsPerMinute = DEFAULTS.maxRequestsPerMinute;
    this.idleTimeoutMs = DEFAULTS.idleTimeoutMs;
    this.cacheWindowMs = DEFAULTS.cacheWindowMs;
    this.retentionMs = DEFAULTS.retentionMs;
    this.maxArtifacts = DEFAULTS.maxArtifacts;
    this.verbose = false;
    this.coinListPath = join(this.dataDir, 'cmc_coin_list.json');
    this.iconDir = join(this.dataDir, 'images');
    this.artifactDir = join(this.dataDir, 'charts');
    this.dbPath = join(this.dataDir, 'chartd.db');

    // Load from environment
    this.port = intFromEnv(env, 'CHARTD_PORT') ?? this.port;
    if (env.CHARTD_TRANSPORT) this.transport = transportFrom(env.CHARTD_TRANSPORT, 'CHARTD_TRANSPORT');
    const publicUrl = env.CHARTD_PUBLIC_URL || env.SERVER_DOMAIN;
    this.bearerSecret = env.CHARTD_BEARER_SECRET || undefined;
    this.providerApiKey = env.CMC_API_KEY || env.CMC_KEY || undefined;
    if (env.CMC_BASE_URL) this.providerBaseUrl = env.CMC_BASE_URL;
    if (env.CHARTD_COIN_LIST) this.coinListPath = env.CHARTD_COIN_LIST;
    if (env.CHARTD_ICON_DIR) this.iconDir = env.CHARTD_ICON_DIR;
    this.seriesTtlMs = intFromEnv(env, 'CHARTD_SERIES_TTL_MS') ?? this.seriesTtlMs;
    this.staleGraceMs = intFromEnv(env, 'CHARTD_STALE_GRACE_MS') ?? this.staleGraceMs;
    this.fetchTimeoutMs = intFromEnv(env, 'CHARTD_FETCH_TIMEOUT_MS', 1) ?? this.fetchTimeoutMs;
    this.requestTimeoutMs = intFromEnv(env, 'CHARTD_REQUEST_TIMEOUT_MS', 1) ?? this.requestTimeoutMs;
    this.maxInFlight = intFromEnv(env, 'CHARTD_MAX_IN_FLIGHT', 1) ?? this.maxInFlight;
    this.maxRequestsPerMinute = intFromEnv(env, 'CHARTD_MAX_RPM') ?? this.maxRequestsPerMinute;
    this.idleTimeoutMs = intFromEnv(env, 'CHARTD_IDLE_TIMEOUT_MS', 1) ?? this.idleTimeoutMs;
    this.cacheWindowMs = intFromEnv(env, 'CHARTD_CACHE_WINDOW_MS') ?? this.cacheWindowMs;
    this.retentionMs = intFromEnv(env, 'CHARTD_RETENTION_MS', 1) ?? this.retentionMs;
    this.maxArtifacts = intFromEnv(env, 'CHARTD_MAX_ARTIFACTS', 1) ?? this.maxArtifacts;
    if (env.CHARTD_VERBOSE) this.verbose = env.CHARTD_VERBOSE === 'true';

    // Load from config file
    const fileConfig = this.loadConfigFile();
    const filePublicUrl = fileConfig.publicBaseUrl;
    if (fileConfig.port !== undefined) this.port = fileConfig.port;
    if (fileConfig.transport) this.transport = fileConfig.transport;
    if (fileConfig.bearerSecret) this.bearerSecret = fileConfig.bearerSecret;
    if (fileConfig.providerApiKey) this.providerApiKey = fileConfig.providerApiKey;
    if (fileConfig.providerBaseUrl) this.providerBaseUrl = fileConfig.providerBaseUrl;
    if (fileConfig.coinListPath) this.coinListPath = fileConfig.coinListPath;
    if (fileConfig.iconDir) this.iconDir = fileConfig.iconDir;
    this.seriesTtlMs = fileConfig.seriesTtlMs ?? this.seriesTtlMs;
    this.staleGraceMs = fileConfig.staleGraceMs ?? this.staleGraceMs;
    this.fetchTimeoutMs = fileConfig.fetchTimeoutMs ?? this.fetchTimeoutMs;
    this.requestTimeoutMs = fileConfig.requestTimeoutMs ?? this.requestTimeoutMs;
    this.maxInFlight = fileConfig.maxInFlight ?? this.maxInFlight;
    this.maxRequestsPerMinute = fileConfig.maxRequestsPerMinute ?? this.maxRequestsPerMinute;
    this.idleTimeoutMs = fileConfig.idleTimeoutMs ?? this.idleTimeoutMs;
    this.cacheWindowMs = fileConfig.cacheWindowMs ?? this.cacheWindowMs;
    this.retentionMs = fileConfig.retentionMs ?? this.retentionMs;
    this.maxArtifacts = fileConfig.maxArtifacts ?? this.maxArtifacts;
    this.verbose = fileConfig.verbose ?? this.verbose;

    // Override with CLI options
    if (typeof options.port === 'string') {
      const port = Number(options.port);
      if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new ConfigError(`--port must be a port number, got "${options.port}"`);
      }
      this.port = port;
    }
    if (typeof options.transport === 'string') this.transport = transportFrom(options.transport, '--transport');
    if (options.verbose) this.verbose = true;

    // Public URL defaults to the local listener once the port is settled
    this.publicBaseUrl = (filePublicUrl || publicUrl || `http://localhost:${this.port}`).replace(/\/+$/, '');
  }

  private loadConfigFile(): ConfigFile {
    if (!existsSync(this.configPath)) return {};

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Cannot parse ${this.configPath}: ${errorMessage(error)}`);
    }

    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      const fields = parsed.error.issues.map(issue => issue.path.join('.') || '(root)').join(', ');
      throw new ConfigError(`Invalid ${this.configPath}: check ${fields}`);
    }
    return parsed.data;
  }

  /** Throws when the selected transport cannot run with these settings */
  validate(): void {
    if (this.transport === 'http' && !this.bearerSecret) {
      throw new ConfigError('CHARTD_BEARER_SECRET is required for the http transport');
    }
  }

  ensureDataDir(): void {
    for (const dir of [this.dataDir, this.artifactDir]) {
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true, mode: 0o700 });
      }
    }
  }

  /** Masked view for `chartd config` */
  describe(): Record<string, string | number | boolean> {
    return {
      port: this.port,
      transport: this.transport,
      dataDir: this.dataDir,
      publicBaseUrl: this.publicBaseUrl,
      bearerSecret: this.bearerSecret ? `***${this.bearerSecret.slice(-4)}` : '(not set)',
      providerApiKey: this.providerApiKey ? `***${this.providerApiKey.slice(-4)}` : '(not set)',
      providerBaseUrl: this.providerBaseUrl,
      coinListPath: this.coinListPath,
      iconDir: this.iconDir,
      artifactDir: this.artifactDir,
      seriesTtlMs: this.seriesTtlMs,
      staleGraceMs: this.staleGraceMs,
      fetchTimeoutMs: this.fetchTimeoutMs,
      requestTimeoutMs: this.requestTimeoutMs,
      maxInFlight: this.maxInFlight,
      maxRequestsPerMinute: this.maxRequestsPerMinute,
      idleTimeoutMs: this.idleTimeoutMs,
      cacheWindowMs: this.cacheWindowMs,
      retentionMs: this.retentionMs,
      maxArtifacts: this.maxArtifacts,
      verbose: this.verbose,
    };
  }
}
