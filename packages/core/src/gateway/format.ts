/**
 * Caller-facing text for gateway results
 */

import { describeRange, type Asset, type Interval, type TimeRange, type TrendingCoin } from '../types.js';
import { formatPercent } from '../render/svg.js';

export function chartTitle(asset: Asset): string {
  return `${asset.name} (${asset.symbol}) Price & Volume`;
}

export function chartSubtitle(interval: Interval, range: TimeRange): string {
  return `${interval === 'hourly' ? 'Hourly' : 'Daily'} candles, ${describeRange(range)}, USD`;
}

export function chartCaption(asset: Asset, interval: Interval, range: TimeRange): string {
  return `${asset.name} (${asset.symbol}) ${interval} price chart, ${describeRange(range)}.`;
}

/** Figures behind a heatmap, as returned to the caller */
export interface HeatmapEntry {
  symbol: string;
  name: string;
  price: number;
  priceChange24h: number;
  volumeChange24h: number;
}

/** Highest 24h volume change first; ties keep provider order */
export function rankByVolumeChange(coins: readonly TrendingCoin[]): TrendingCoin[] {
  return [...coins].sort((a, b) => b.volumeChange24h - a.volumeChange24h);
}

export function heatmapEntries(coins: readonly TrendingCoin[]): HeatmapEntry[] {
  return coins.map(({ symbol, name, price, priceChange24h, volumeChange24h }) => ({
    symbol,
    name,
    price,
    priceChange24h,
    volumeChange24h,
  }));
}

/** Expects coins already ranked by volume change */
export function heatmapCaption(coins: readonly TrendingCoin[]): string {
  const listed = coins.map(coin => `${coin.symbol} ${formatPercent(coin.priceChange24h)}`).join(', ');
  return `Top ${coins.length} trending coins by 24h volume change: ${listed}.`;
}

export function degradedNote(fetchedAt: number): string {
  return ` Live market data is unavailable; showing data from ${new Date(fetchedAt).toISOString()}.`;
}
