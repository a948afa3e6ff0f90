/**
 * Market data providers
 *
 * MarketDataProvider is the seam between the pipeline and the outside world.
 * CoinMarketCapProvider is the production implementation; tests use fakes.
 */

import { z } from 'zod';
import { ProviderError, errorMessage } from '../errors.js';
import { CoinRecordSchema, type CoinRecord } from '../catalog/snapshot.js';
import type { Candle, Interval, TimeRange, TrendingCoin } from '../types.js';

export interface SeriesQuery {
  assetId: string;
  interval: Interval;
  range: TimeRange;
}

export interface MarketDataProvider {
  fetchSeries(query: SeriesQuery): Promise<Candle[]>;
  fetchTrending(limit: number): Promise<TrendingCoin[]>;
  fetchCoinMap(): Promise<CoinRecord[]>;
}

// ── CoinMarketCap response schemas ─────────────────────────────────

const UsdOhlcvSchema = z.object({
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nullish(),
  timestamp: z.string().optional(),
  last_updated: z.string().optional(),
});

const HistoricalQuoteSchema = z.object({
  time_close: z.string(),
  quote: z.object({ USD: UsdOhlcvSchema }),
});

const HistoricalEntrySchema = z.object({
  id: z.number(),
  quotes: z.array(HistoricalQuoteSchema),
});

const LatestEntrySchema = z.object({
  id: z.number(),
  last_updated: z.string().optional(),
  quote: z.object({ USD: UsdOhlcvSchema }),
});

const TrendingEntrySchema = z.object({
  id: z.number(),
  name: z.string(),
  symbol: z.string(),
  quote: z.object({
    USD: z.object({
      price: z.number(),
      percent_change_24h: z.number().nullish(),
      volume_change_24h: z.number().nullish(),
    }),
  }),
});

const EnvelopeSchema = z.object({ data: z.unknown() });

type HistoricalEntry = z.infer<typeof HistoricalEntrySchema>;
type LatestEntry = z.infer<typeof LatestEntrySchema>;

/**
 * CMC returns either a single entry or a map of id → entry (or entry[])
 * depending on how the request was keyed. Find the entry for `id`.
 */
function pickEntry<T extends { id: number }>(data: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>, id: string): T | undefined {
  const direct = schema.safeParse(data);
  if (direct.success) return String(direct.data.id) === id ? direct.data : undefined;

  if (typeof data !== 'object' || data === null || Array.isArray(data)) return undefined;
  const keyed = new Map(Object.entries(data));
  const slot = keyed.get(id);
  const candidates = Array.isArray(slot) ? slot : [slot];
  for (const candidate of candidates) {
    const parsed = schema.safeParse(candidate);
    if (parsed.success && String(parsed.data.id) === id) return parsed.data;
  }
  return undefined;
}

// ── CoinMarketCapProvider ──────────────────────────────────────────

export interface CoinMarketCapOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  now?: () => number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export class CoinMarketCapProvider implements MarketDataProvider {
  private apiKey?: string;
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;
  private now: () => number;

  constructor(options: CoinMarketCapOptions = {}) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl || 'https://pro-api.coinmarketcap.com').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async fetchSeries(query: SeriesQuery): Promise<Candle[]> {
    const { start, end } = this.window(query.range);
    const data = await this.request('/v2/cryptocurrency/ohlcv/historical', {
      id: query.assetId,
      time_period: query.interval,
      interval: query.interval,
      time_start: start,
      time_end: end,
      convert: 'USD',
    });

    const entry = pickEntry<HistoricalEntry>(data, HistoricalEntrySchema, query.assetId);
    if (!entry) {
      throw new ProviderError(`Malformed historical response for asset ${query.assetId}`);
    }

    const candles = entry.quotes.map(q => this.toCandle(q.quote.USD, q.quote.USD.timestamp ?? q.time_close));

    // Relative ranges end "now": append the live candle like a ticker would
    if (query.range.kind === 'relative') {
      const latest = await this.fetchLatest(query.assetId);
      const last = candles[candles.length - 1];
      if (!last || latest.timestamp > last.timestamp) {
        candles.push(latest);
      }
    }

    return candles.sort((a, b) => a.timestamp - b.timestamp);
  }

  async fetchTrending(limit: number): Promise<TrendingCoin[]> {
    const data = await this.request('/v1/cryptocurrency/trending/latest', {
      limit: String(limit),
      convert: 'USD',
    });

    const parsed = z.array(TrendingEntrySchema).safeParse(data);
    if (!parsed.success) {
      throw new ProviderError('Malformed trending response');
    }

    return parsed.data.map(entry => ({
      id: String(entry.id),
      name: entry.name,
      symbol: entry.symbol,
      price: entry.quote.USD.price,
      priceChange24h: entry.quote.USD.percent_change_24h ?? 0,
      volumeChange24h: entry.quote.USD.volume_change_24h ?? 0,
    }));
  }

  async fetchCoinMap(): Promise<CoinRecord[]> {
    const data = await this.request('/v1/cryptocurrency/map', { listing_status: 'active' });
    const parsed = z.array(CoinRecordSchema).safeParse(data);
    if (!parsed.success) {
      throw new ProviderError('Malformed coin map response');
    }
    return parsed.data;
  }

  private async fetchLatest(assetId: string): Promise<Candle> {
    const data = await this.request('/v2/cryptocurrency/ohlcv/latest', { id: assetId, convert: 'USD' });
    const entry = pickEntry<LatestEntry>(data, LatestEntrySchema, assetId);
    if (!entry) {
      throw new ProviderError(`Malformed latest response for asset ${assetId}`);
    }
    const usd = entry.quote.USD;
    return this.toCandle(usd, usd.last_updated ?? entry.last_updated);
  }

  private toCandle(usd: z.infer<typeof UsdOhlcvSchema>, time: string | undefined): Candle {
    const timestamp = time ? Date.parse(time) : Number.NaN;
    if (!Number.isFinite(timestamp)) {
      throw new ProviderError(`Unparseable candle timestamp: ${time ?? '(missing)'}`);
    }
    return {
      timestamp,
      open: usd.open,
      high: usd.high,
      low: usd.low,
      close: usd.close,
      volume: usd.volume ?? 0,
    };
  }

  private window(range: TimeRange): { start: string; end: string } {
    if (range.kind === 'absolute') {
      return { start: range.start, end: range.end };
    }
    const end = this.now();
    return {
      start: new Date(end - range.days * DAY_MS).toISOString(),
      end: new Date(end).toISOString(),
    };
  }

  private async request(path: string, params: Record<string, string>): Promise<unknown> {
    if (!this.apiKey) {
      throw new ProviderError('CoinMarketCap API key is not configured');
    }

    const url = `${this.baseUrl}${path}?${new URLSearchParams(params).toString()}`;
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        headers: {
          Accept: 'application/json',
          'X-CMC_PRO_API_KEY': this.apiKey,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new ProviderError(`Request to ${path} failed: ${errorMessage(error)}`);
    }

    if (!res.ok) {
      const body = await res.text();
      throw new ProviderError(`HTTP ${res.status} from ${path}`, res.status, body.slice(0, 500));
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (error) {
      throw new ProviderError(`Invalid JSON from ${path}: ${errorMessage(error)}`, res.status);
    }

    const envelope = EnvelopeSchema.safeParse(json);
    if (!envelope.success || envelope.data.data === undefined) {
      throw new ProviderError(`Response from ${path} has no data field`, res.status);
    }
    return envelope.data.data;
  }
}
