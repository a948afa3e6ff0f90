/**
 * MarketDataFetcher
 *
 * Price series and trending lists behind a KeyedCache. One provider call per
 * key at a time; failures surface as DataUnavailable unless a stale value is
 * still inside the grace window, in which case the result is marked degraded.
 */

import { KeyedCache, type Clock } from '../cache/keyed-cache.js';
import { ChartError, ProviderError, errorMessage, withTimeout } from '../errors.js';
import { silentLogger, type Logger } from '../chartd/logger.js';
import { rangeKey, type Candle, type Interval, type PriceSeries, type TimeRange, type TrendingCoin } from '../types.js';
import type { MarketDataProvider, SeriesQuery } from './provider.js';

export interface FetchedSeries {
  series: PriceSeries;
  degraded: boolean;
  fetchedAt: number;
}

export interface FetchedTrending {
  coins: readonly TrendingCoin[];
  degraded: boolean;
  fetchedAt: number;
}

export interface MarketDataFetcherOptions {
  ttlMs: number;
  graceMs: number;
  timeoutMs: number;
  maxEntries?: number;
  now?: Clock;
  logger?: Logger;
}

export function seriesKey(assetId: string, interval: Interval, range: TimeRange): string {
  return `${assetId}|${interval}|${rangeKey(range)}`;
}

export class MarketDataFetcher {
  private provider: MarketDataProvider;
  private series: KeyedCache<PriceSeries>;
  private trending: KeyedCache<readonly TrendingCoin[]>;
  private timeoutMs: number;
  private logger: Logger;

  constructor(provider: MarketDataProvider, options: MarketDataFetcherOptions) {
    this.provider = provider;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? silentLogger;
    this.series = new KeyedCache({
      ttlMs: options.ttlMs,
      graceMs: options.graceMs,
      maxEntries: options.maxEntries ?? 1000,
      now: options.now,
    });
    this.trending = new KeyedCache({
      ttlMs: options.ttlMs,
      graceMs: options.graceMs,
      maxEntries: 16,
      now: options.now,
    });
  }

  async fetch(assetId: string, interval: Interval, range: TimeRange): Promise<FetchedSeries> {
    const query: SeriesQuery = { assetId, interval, range };
    const result = await this.series.get(seriesKey(assetId, interval, range), () => this.loadSeries(query));
    if (result.degraded) {
      this.logger.warn(`Serving stale series for ${seriesKey(assetId, interval, range)}`);
    }
    return { series: result.value, degraded: result.degraded, fetchedAt: result.storedAt };
  }

  async fetchTrending(limit: number): Promise<FetchedTrending> {
    const result = await this.trending.get(`trending|${limit}`, () => this.loadTrending(limit));
    return { coins: result.value, degraded: result.degraded, fetchedAt: result.storedAt };
  }

  /** Drop every cached series and trending list */
  clear(): void {
    this.series.clear();
    this.trending.clear();
  }

  private async loadSeries(query: SeriesQuery): Promise<PriceSeries> {
    const label = `asset ${query.assetId}`;
    const candles = await this.call(label, () => this.provider.fetchSeries(query));
    return Object.freeze({
      assetId: query.assetId,
      interval: query.interval,
      range: query.range,
      candles: Object.freeze(candles.map((candle): Candle => Object.freeze({ ...candle }))),
    });
  }

  private async loadTrending(limit: number): Promise<readonly TrendingCoin[]> {
    const coins = await this.call('trending coins', () => this.provider.fetchTrending(limit));
    return Object.freeze(coins.map(coin => Object.freeze({ ...coin })));
  }

  private async call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const started = Date.now();
    try {
      const value = await withTimeout(fn(), this.timeoutMs, () =>
        new ChartError('DataUnavailable', `Market data provider timed out after ${this.timeoutMs}ms`));
      this.logger.debug(`Fetched ${label} in ${Date.now() - started}ms`);
      return value;
    } catch (error) {
      const detail = error instanceof ProviderError && error.status
        ? `${error.message} (status ${error.status}${error.body ? `: ${error.body}` : ''})`
        : errorMessage(error);
      this.logger.warn(`Provider fetch for ${label} failed: ${detail}`);
      throw new ChartError('DataUnavailable', `Market data for ${label} is unavailable right now. Please try again later.`, { cause: error });
    }
  }
}
