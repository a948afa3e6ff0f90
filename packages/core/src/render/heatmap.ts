/**
 * Trending-coins heatmap
 *
 * Treemap where block area follows |24h volume change| (clamped to 1..2000)
 * and colour follows 24h price change on a log scale: green up, red down,
 * grey within ±1%. Labels shrink with the block.
 */

import { ChartError } from '../errors.js';
import type { ChartStyle, TrendingCoin } from '../types.js';
import {
  FONT_FAMILY,
  SIZES,
  THEMES,
  escapeXml,
  formatPercent,
  formatSignificant,
  px,
  svgDocument,
} from './svg.js';

interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

interface Block {
  coin: TrendingCoin;
  value: number;
}

const GAP = 2;
const BASE_FONT = 14;

export function blockValue(volumeChange: number): number {
  const abs = Math.abs(volumeChange);
  if (!(abs >= 1)) return 1;
  return Math.min(abs, 2000);
}

/** Binary split: halve the value sum along the longer side, recursively */
function layout(blocks: Block[], rect: Rect, out: { block: Block; rect: Rect }[]): void {
  if (blocks.length === 0) return;
  if (blocks.length === 1) {
    out.push({ block: blocks[0], rect });
    return;
  }

  const total = blocks.reduce((sum, b) => sum + b.value, 0);
  let split = 1;
  let acc = blocks[0].value;
  while (split < blocks.length - 1 && acc + blocks[split].value / 2 < total / 2) {
    acc += blocks[split].value;
    split++;
  }

  const share = acc / total;
  const [first, second]: [Rect, Rect] = rect.w >= rect.h
    ? [
        { x: rect.x, y: rect.y, w: rect.w * share, h: rect.h },
        { x: rect.x + rect.w * share, y: rect.y, w: rect.w * (1 - share), h: rect.h },
      ]
    : [
        { x: rect.x, y: rect.y, w: rect.w, h: rect.h * share },
        { x: rect.x, y: rect.y + rect.h * share, w: rect.w, h: rect.h * (1 - share) },
      ];

  layout(blocks.slice(0, split), first, out);
  layout(blocks.slice(split), second, out);
}

export function changeColor(change: number, maxLogChange: number): string {
  if (change > 1) {
    const intensity = 0.2 + 0.6 * (1 - Math.log(change) / maxLogChange);
    return `rgb(0, ${Math.trunc(intensity * 255)}, 0)`;
  }
  if (change < -1) {
    const intensity = 0.2 + 0.6 * (1 - Math.log(-change) / maxLogChange);
    return `rgb(${Math.trunc(intensity * 255)}, 0, 0)`;
  }
  return 'rgb(100, 100, 100)';
}

export function maxLogChange(changes: readonly number[]): number {
  const gains = changes.filter(c => c > 1);
  const losses = changes.filter(c => c < -1);
  const maxPositive = Math.log(gains.length > 0 ? Math.max(...gains) : 2);
  const maxNegative = Math.log(losses.length > 0 ? -Math.min(...losses) : 2);
  return Math.max(maxPositive, maxNegative);
}

function labelLines(coin: TrendingCoin, fraction: number): string[] {
  const symbol = coin.symbol;
  if (fraction < 0.01) return [symbol];

  const change = formatPercent(coin.priceChange24h);
  if (fraction < 0.02) return [symbol, change];

  const price = coin.price < 1 ? formatSignificant(coin.price, 4) : coin.price.toFixed(2);
  const priceLine = change === '--' ? '--' : `${price} (${change})`;
  return [symbol, priceLine];
}

export function renderHeatmap(coins: readonly TrendingCoin[], style: ChartStyle): Buffer {
  if (coins.length === 0) {
    throw new ChartError('RenderError', 'No trending data is available right now.');
  }
  if (!Object.hasOwn(THEMES, style.theme) || !Object.hasOwn(SIZES, style.size)) {
    throw new ChartError('RenderError', `Unsupported chart style (theme "${style.theme}", size "${style.size}").`);
  }
  if (!coins.every(c => Number.isFinite(c.price) && Number.isFinite(c.priceChange24h) && Number.isFinite(c.volumeChange24h))) {
    throw new ChartError('RenderError', 'The trending data contains invalid values.');
  }

  const palette = THEMES[style.theme];
  const { width, height } = SIZES[style.size];

  // Stable sort: equal values keep provider order
  const blocks = coins
    .map(coin => ({ coin, value: blockValue(coin.volumeChange24h) }))
    .sort((a, b) => b.value - a.value);
  const total = blocks.reduce((sum, b) => sum + b.value, 0);
  const scale = maxLogChange(coins.map(c => c.priceChange24h));

  const placed: { block: Block; rect: Rect }[] = [];
  layout(blocks, { x: 0, y: 0, w: width, h: height }, placed);

  const body: string[] = [`<g font-family="${FONT_FAMILY}" fill="#ffffff" text-anchor="middle">`];
  for (const { block, rect } of placed) {
    const fraction = block.value / total;
    const inner = {
      x: rect.x + GAP / 2,
      y: rect.y + GAP / 2,
      w: Math.max(0, rect.w - GAP),
      h: Math.max(0, rect.h - GAP),
    };
    body.push(
      `<rect x="${px(inner.x)}" y="${px(inner.y)}" width="${px(inner.w)}" height="${px(inner.h)}" rx="5" fill="${changeColor(block.coin.priceChange24h, scale)}"/>`,
    );

    const lines = labelLines(block.coin, fraction);
    const em = Math.max(0.5, Math.log(Math.max(fraction, 0.01) / 0.01) + 1);
    const symbolSize = Math.min(BASE_FONT * em, inner.h / 2.5, inner.w / Math.max(2, block.coin.symbol.length * 0.7));
    const detailSize = Math.min(BASE_FONT, inner.h / 4, inner.w / 9);
    const cx = inner.x + inner.w / 2;
    const cy = inner.y + inner.h / 2;

    if (lines.length === 1) {
      body.push(`<text x="${px(cx)}" y="${px(cy + symbolSize / 3)}" font-size="${px(symbolSize)}">${escapeXml(lines[0])}</text>`);
    } else {
      body.push(`<text x="${px(cx)}" y="${px(cy)}" font-size="${px(symbolSize)}" font-weight="bold">${escapeXml(lines[0])}</text>`);
      body.push(`<text x="${px(cx)}" y="${px(cy + detailSize * 1.4)}" font-size="${px(detailSize)}">${escapeXml(lines[1])}</text>`);
    }
  }
  body.push('</g>');

  return Buffer.from(svgDocument(width, height, palette.background, body), 'utf-8');
}
