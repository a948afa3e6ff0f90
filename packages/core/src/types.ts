/**
 * Shared domain types
 */

export interface Asset {
  /** Provider's canonical id (CoinMarketCap numeric id, as a string) */
  id: string;
  symbol: string;
  name: string;
  slug: string;
  /** Provider ranking; lower is better. null when the provider has none */
  rank: number | null;
  /** Icon file name under the icon directory */
  iconRef: string;
}

export type Interval = 'daily' | 'hourly';

export type TimeRange =
  | { kind: 'relative'; days: number }
  | { kind: 'absolute'; start: string; end: string };

export interface Candle {
  /** Unix epoch milliseconds at the candle's close */
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface PriceSeries {
  assetId: string;
  interval: Interval;
  range: TimeRange;
  candles: readonly Candle[];
}

export type Theme = 'light' | 'dark';
export type ChartSize = 'small' | 'medium' | 'large';

export interface ChartStyle {
  theme: Theme;
  size: ChartSize;
  overlayIcon: boolean;
}

export const DEFAULT_STYLE: ChartStyle = {
  theme: 'light',
  size: 'medium',
  overlayIcon: true,
};

export interface Icon {
  bytes: Buffer;
  contentType: 'image/png' | 'image/svg+xml';
  placeholder: boolean;
}

export interface TrendingCoin {
  id: string;
  symbol: string;
  name: string;
  price: number;
  priceChange24h: number;
  volumeChange24h: number;
}

export function rangeKey(range: TimeRange): string {
  return range.kind === 'relative' ? `last-${range.days}d` : `${range.start}..${range.end}`;
}

export function describeRange(range: TimeRange): string {
  if (range.kind === 'absolute') return `${range.start} to ${range.end}`;
  return range.days === 1 ? 'last 24 hours' : `last ${range.days} days`;
}
