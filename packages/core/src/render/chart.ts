/**
 * Price chart renderer
 *
 * Candlesticks over volume bars, drawn straight to SVG. Pure: the output
 * depends only on the arguments, so identical requests give identical bytes.
 */

import { ChartError } from '../errors.js';
import type { ChartStyle, Icon, PriceSeries } from '../types.js';
import {
  FONT_FAMILY,
  SIZES,
  THEMES,
  escapeXml,
  formatCompact,
  formatPrice,
  formatTime,
  niceTicks,
  px,
  svgDocument,
} from './svg.js';

export interface ChartLabels {
  title: string;
  subtitle?: string;
  watermark?: string;
}

const MARGIN = { top: 64, right: 24, bottom: 36, left: 84 };
const PRICE_SHARE = 0.7;
const PANEL_GAP = 16;
const ICON_SIZE = 44;
const X_LABELS = 6;

function validate(series: PriceSeries, style: ChartStyle): void {
  if (series.candles.length === 0) {
    throw new ChartError('RenderError', 'No price data is available for the requested range.');
  }
  if (!Object.hasOwn(THEMES, style.theme) || !Object.hasOwn(SIZES, style.size)) {
    throw new ChartError('RenderError', `Unsupported chart style (theme "${style.theme}", size "${style.size}").`);
  }
  for (const c of series.candles) {
    const values = [c.timestamp, c.open, c.high, c.low, c.close, c.volume];
    if (!values.every(Number.isFinite) || c.high < c.low) {
      throw new ChartError('RenderError', 'The price series contains invalid values.');
    }
  }
}

export function renderPriceChart(
  series: PriceSeries,
  icon: Icon | null,
  style: ChartStyle,
  labels: ChartLabels,
): Buffer {
  validate(series, style);

  const palette = THEMES[style.theme];
  const { width, height } = SIZES[style.size];
  const candles = series.candles;

  const plotLeft = MARGIN.left;
  const plotRight = width - MARGIN.right;
  const plotWidth = plotRight - plotLeft;
  const plotHeight = height - MARGIN.top - MARGIN.bottom;
  const priceTop = MARGIN.top;
  const priceBottom = MARGIN.top + plotHeight * PRICE_SHARE - PANEL_GAP / 2;
  const volumeTop = priceBottom + PANEL_GAP;
  const volumeBottom = height - MARGIN.bottom;

  // ── Scales ──────────────────────────────────────────────────────

  let low = Math.min(...candles.map(c => c.low));
  let high = Math.max(...candles.map(c => c.high));
  if (high === low) {
    const pad = Math.abs(high) * 0.01 || 1;
    low -= pad;
    high += pad;
  }
  const headroom = (high - low) * 0.05;
  low -= headroom;
  high += headroom;

  const maxVolume = Math.max(...candles.map(c => c.volume), 0);
  const slot = plotWidth / candles.length;
  const bodyWidth = Math.max(1, slot * 0.6);

  const x = (i: number) => plotLeft + slot * (i + 0.5);
  const y = (price: number) => priceTop + ((high - price) / (high - low)) * (priceBottom - priceTop);
  const vy = (volume: number) =>
    maxVolume > 0 ? volumeBottom - (volume / maxVolume) * (volumeBottom - volumeTop) : volumeBottom;

  const body: string[] = [];

  // ── Title ───────────────────────────────────────────────────────

  body.push(
    `<text x="${px(width / 2)}" y="30" font-family="${FONT_FAMILY}" font-size="20" font-weight="bold" fill="${palette.text}" text-anchor="middle">${escapeXml(labels.title)}</text>`,
  );
  if (labels.subtitle) {
    body.push(
      `<text x="${px(width / 2)}" y="50" font-family="${FONT_FAMILY}" font-size="12" fill="${palette.mutedText}" text-anchor="middle">${escapeXml(labels.subtitle)}</text>`,
    );
  }

  if (style.overlayIcon && icon) {
    const href = `data:${icon.contentType};base64,${icon.bytes.toString('base64')}`;
    body.push(
      `<image x="${plotLeft}" y="10" width="${ICON_SIZE}" height="${ICON_SIZE}" preserveAspectRatio="xMidYMid meet" href="${href}"/>`,
    );
  }

  // ── Grid and axes ───────────────────────────────────────────────

  body.push(`<g font-family="${FONT_FAMILY}" font-size="10" fill="${palette.mutedText}">`);
  for (const tick of niceTicks(low, high, 6)) {
    const ty = y(tick);
    body.push(`<line x1="${plotLeft}" y1="${px(ty)}" x2="${plotRight}" y2="${px(ty)}" stroke="${palette.grid}" stroke-width="0.5"/>`);
    body.push(`<text x="${plotLeft - 8}" y="${px(ty + 3)}" text-anchor="end">${formatPrice(tick)}</text>`);
  }
  if (maxVolume > 0) {
    body.push(`<text x="${plotLeft - 8}" y="${px(volumeTop + 8)}" text-anchor="end">${formatCompact(maxVolume)}</text>`);
  }
  body.push(`<line x1="${plotLeft}" y1="${px(volumeBottom)}" x2="${plotRight}" y2="${px(volumeBottom)}" stroke="${palette.grid}" stroke-width="0.5"/>`);

  const withHour = series.interval === 'hourly';
  const labelEvery = Math.max(1, Math.ceil(candles.length / X_LABELS));
  for (let i = 0; i < candles.length; i += labelEvery) {
    const tx = x(i);
    body.push(`<line x1="${px(tx)}" y1="${priceTop}" x2="${px(tx)}" y2="${px(volumeBottom)}" stroke="${palette.grid}" stroke-width="0.5"/>`);
    body.push(`<text x="${px(tx)}" y="${px(volumeBottom + 16)}" text-anchor="middle">${formatTime(candles[i].timestamp, withHour)}</text>`);
  }
  body.push('</g>');

  // ── Candles ─────────────────────────────────────────────────────

  body.push('<g>');
  candles.forEach((c, i) => {
    const color = c.close >= c.open ? palette.up : palette.down;
    const cx = x(i);
    const top = y(Math.max(c.open, c.close));
    const bottom = y(Math.min(c.open, c.close));
    body.push(`<line x1="${px(cx)}" y1="${px(y(c.high))}" x2="${px(cx)}" y2="${px(y(c.low))}" stroke="${color}" stroke-width="1"/>`);
    body.push(
      `<rect x="${px(cx - bodyWidth / 2)}" y="${px(top)}" width="${px(bodyWidth)}" height="${px(Math.max(1, bottom - top))}" fill="${color}"/>`,
    );
  });
  body.push('</g>');

  // ── Volume ──────────────────────────────────────────────────────

  body.push(`<g fill="${palette.volume}">`);
  candles.forEach((c, i) => {
    const top = vy(c.volume);
    if (volumeBottom - top < 0.05) return;
    body.push(`<rect x="${px(x(i) - bodyWidth / 2)}" y="${px(top)}" width="${px(bodyWidth)}" height="${px(volumeBottom - top)}"/>`);
  });
  body.push('</g>');

  if (labels.watermark) {
    body.push(
      `<text x="${plotRight}" y="${px(volumeTop - 6)}" font-family="${FONT_FAMILY}" font-size="20" fill="${palette.watermark}" text-anchor="end">${escapeXml(labels.watermark)}</text>`,
    );
  }

  return Buffer.from(svgDocument(width, height, palette.background, body), 'utf-8');
}
