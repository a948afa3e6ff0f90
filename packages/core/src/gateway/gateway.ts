/**
 * ToolGateway
 *
 * Entry point for every tool call:
 *
 *   credential → arguments → admit caller → pipeline (under timeout) → result
 *
 * A call that fails authentication or validation has no side effects. Every
 * admitted call is released exactly once, whatever happens downstream. Error
 * results carry a kind and a message that is safe to show the caller.
 */

import { createHash, timingSafeEqual } from 'crypto';
import type { z } from 'zod';
import { SingleFlight } from '../cache/keyed-cache.js';
import { ChartError, errorMessage, isChartError, withTimeout, type ErrorKind } from '../errors.js';
import { silentLogger, type Logger } from '../chartd/logger.js';
import type { AssetCatalog } from '../catalog/catalog.js';
import type { IconStore } from '../icons/icon-store.js';
import type { MarketDataFetcher } from '../market/fetcher.js';
import type { ArtifactPublisher } from '../publish/publisher.js';
import type { SessionRegistry } from '../sessions/registry.js';
import { renderHeatmap, renderPriceChart } from '../render/index.js';
import { ChartRequestSchema, DEFAULT_DAYS, HeatmapInputSchema, type ChartInput, type HeatmapInput } from '../schemas/inputs.js';
import { DEFAULT_STYLE, rangeKey, type Asset, type ChartStyle, type Interval, type TimeRange } from '../types.js';
import {
  chartCaption,
  chartSubtitle,
  chartTitle,
  degradedNote,
  heatmapCaption,
  heatmapEntries,
  rankByVolumeChange,
  type HeatmapEntry,
} from './format.js';

// ── Types ───────────────────────────────────────────────────────────

export interface ToolCall {
  /** Bearer token presented by the caller */
  credential?: string;
  /** Transport-level caller identity; 'anonymous' when absent */
  callerId?: string;
  arguments: unknown;
}

export interface ChartSuccess {
  status: 'ok' | 'degraded';
  url: string;
  caption: string;
  /** Heatmap only: the figures each block was drawn from */
  data?: HeatmapEntry[];
}

export interface ChartFailure {
  status: 'error';
  kind: ErrorKind;
  message: string;
  retryAfterMs?: number;
}

export type ToolResult = ChartSuccess | ChartFailure;

export interface GatewayDeps {
  catalog: AssetCatalog;
  icons: IconStore;
  fetcher: MarketDataFetcher;
  publisher: ArtifactPublisher;
  sessions: SessionRegistry;
  logger?: Logger;
}

export interface GatewayOptions {
  bearerSecret: string;
  requestTimeoutMs: number;
  /** Text drawn faintly on every price chart */
  watermark?: string;
}

const CALLER_ID = /^[A-Za-z0-9._:@-]{1,128}$/;
const ANONYMOUS = 'anonymous';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf-8').digest();
}

/** Constant-time comparison; hashing first evens out the lengths */
export function credentialMatches(given: string | undefined, expected: string): boolean {
  if (!given || !expected) return false;
  return timingSafeEqual(digest(given), digest(expected));
}

export function chartKey(assetId: string, interval: Interval, range: TimeRange, style: ChartStyle): string {
  return [assetId, interval, rangeKey(range), style.theme, style.size, style.overlayIcon ? 'icon' : 'plain'].join('|');
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
    .join('; ');
}

// ── ToolGateway ─────────────────────────────────────────────────────

export class ToolGateway {
  private deps: GatewayDeps;
  private options: GatewayOptions;
  private logger: Logger;
  private charts = new SingleFlight<ChartSuccess>();

  constructor(deps: GatewayDeps, options: GatewayOptions) {
    this.deps = deps;
    this.options = options;
    this.logger = deps.logger ?? silentLogger;
  }

  renderChart(call: ToolCall): Promise<ToolResult> {
    return this.handle('crypto_price_chart', call, ChartRequestSchema, input => this.chartPipeline(input));
  }

  renderHeatmap(call: ToolCall): Promise<ToolResult> {
    return this.handle('crypto_heatmap', call, HeatmapInputSchema, input => this.heatmapPipeline(input));
  }

  // ── Request lifecycle ─────────────────────────────────────────────

  private async handle<I>(
    tool: string,
    call: ToolCall,
    schema: z.ZodType<I, z.ZodTypeDef, unknown>,
    pipeline: (input: I) => Promise<ChartSuccess>,
  ): Promise<ToolResult> {
    const started = Date.now();
    try {
      if (!credentialMatches(call.credential, this.options.bearerSecret)) {
        throw new ChartError('Unauthorized', 'Missing or invalid credentials.');
      }

      const callerId = call.callerId ?? ANONYMOUS;
      if (!CALLER_ID.test(callerId)) {
        throw new ChartError('InvalidArgument', 'Invalid caller id.');
      }

      const parsed = schema.safeParse(call.arguments ?? {});
      if (!parsed.success) {
        throw new ChartError('InvalidArgument', `Invalid arguments: ${describeIssues(parsed.error)}`);
      }

      const handle = this.deps.sessions.admit(callerId);
      try {
        const result = await withTimeout(pipeline(parsed.data), this.options.requestTimeoutMs, () =>
          new ChartError('Timeout', 'The chart request took too long. Please try again.'));
        this.logger.debug(`${tool} for ${callerId}: ${result.status} in ${Date.now() - started}ms`);
        return result;
      } finally {
        this.deps.sessions.release(handle);
      }
    } catch (error) {
      const failure = this.toFailure(error);
      this.logger.debug(`${tool}: ${failure.kind} in ${Date.now() - started}ms`);
      return failure;
    }
  }

  private toFailure(error: unknown): ChartFailure {
    if (isChartError(error)) {
      return error.retryAfterMs !== undefined
        ? { status: 'error', kind: error.kind, message: error.message, retryAfterMs: error.retryAfterMs }
        : { status: 'error', kind: error.kind, message: error.message };
    }
    this.logger.error(`Unexpected failure: ${errorMessage(error)}`, error);
    return {
      status: 'error',
      kind: 'Internal',
      message: 'Something went wrong while producing the chart. Please try again later.',
    };
  }

  // ── Pipelines ─────────────────────────────────────────────────────

  private async chartPipeline(input: ChartInput): Promise<ChartSuccess> {
    const asset = this.deps.catalog.resolve(input.symbol);
    const range: TimeRange = input.start !== undefined && input.end !== undefined
      ? { kind: 'absolute', start: input.start, end: input.end }
      : { kind: 'relative', days: input.days ?? DEFAULT_DAYS };
    const style: ChartStyle = {
      theme: input.theme ?? DEFAULT_STYLE.theme,
      size: input.size ?? DEFAULT_STYLE.size,
      overlayIcon: input.overlay_icon,
    };
    const key = chartKey(asset.id, input.interval, range, style);

    const reused = this.deps.publisher.lookup(key);
    if (reused) {
      return { status: 'ok', url: reused.url, caption: chartCaption(asset, input.interval, range) };
    }

    return this.charts.run(key, () => this.produceChart(asset, input.interval, range, style, key));
  }

  private async produceChart(
    asset: Asset,
    interval: Interval,
    range: TimeRange,
    style: ChartStyle,
    key: string,
  ): Promise<ChartSuccess> {
    const fetched = await this.deps.fetcher.fetch(asset.id, interval, range);
    const icon = style.overlayIcon ? await this.deps.icons.get(asset.id) : null;

    const bytes = renderPriceChart(fetched.series, icon, style, {
      title: chartTitle(asset),
      subtitle: chartSubtitle(interval, range),
      watermark: this.options.watermark,
    });

    // Stale charts never occupy the reuse slot of a fresh one
    const artifact = await this.deps.publisher.publish(bytes, fetched.degraded ? `${key}|degraded` : key);
    const caption = chartCaption(asset, interval, range);
    return fetched.degraded
      ? { status: 'degraded', url: artifact.url, caption: caption + degradedNote(fetched.fetchedAt) }
      : { status: 'ok', url: artifact.url, caption };
  }

  private async heatmapPipeline(input: HeatmapInput): Promise<ChartSuccess> {
    const style: ChartStyle = {
      theme: input.theme ?? DEFAULT_STYLE.theme,
      size: input.size ?? DEFAULT_STYLE.size,
      overlayIcon: false,
    };
    const fetched = await this.deps.fetcher.fetchTrending(input.limit);
    const bytes = renderHeatmap(fetched.coins, style);

    // One artifact per trending snapshot
    const key = ['heatmap', input.limit, style.theme, style.size, fetched.fetchedAt].join('|');
    const artifact = await this.deps.publisher.publish(bytes, key);
    const ranked = rankByVolumeChange(fetched.coins);
    const caption = heatmapCaption(ranked);
    const data = heatmapEntries(ranked);
    return fetched.degraded
      ? { status: 'degraded', url: artifact.url, caption: caption + degradedNote(fetched.fetchedAt), data }
      : { status: 'ok', url: artifact.url, caption, data };
  }
}
