/**
 * SVG building blocks shared by the chart renderers.
 * Everything here is pure: same input, same string.
 */

import type { ChartSize, Theme } from '../types.js';

export interface Palette {
  background: string;
  text: string;
  mutedText: string;
  grid: string;
  up: string;
  down: string;
  volume: string;
  watermark: string;
}

export const THEMES: Record<Theme, Palette> = {
  light: {
    background: '#ffffff',
    text: '#1f2937',
    mutedText: '#808080',
    grid: 'rgba(100,100,100,0.4)',
    up: '#26a69a',
    down: '#ef5350',
    volume: 'rgba(0,0,255,0.5)',
    watermark: 'rgba(100,100,100,0.3)',
  },
  dark: {
    background: '#111827',
    text: '#f3f4f6',
    mutedText: '#9ca3af',
    grid: 'rgba(156,163,175,0.25)',
    up: '#22c55e',
    down: '#f43f5e',
    volume: 'rgba(96,165,250,0.5)',
    watermark: 'rgba(243,244,246,0.2)',
  },
};

export const SIZES: Record<ChartSize, { width: number; height: number }> = {
  small: { width: 800, height: 400 },
  medium: { width: 1200, height: 600 },
  large: { width: 1600, height: 800 },
};

export const FONT_FAMILY = 'Helvetica, Arial, sans-serif';

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Coordinate with one decimal */
export function px(value: number): string {
  const fixed = value.toFixed(1);
  return fixed.endsWith('.0') ? fixed.slice(0, -2) : fixed;
}

function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/** Like printf %.4g without exponent noise for ordinary magnitudes */
export function formatSignificant(value: number, digits = 4): string {
  return String(Number(value.toPrecision(digits)));
}

export function formatPrice(value: number): string {
  const abs = Math.abs(value);
  if (abs >= 1000) return groupThousands(value.toFixed(0));
  if (abs >= 1) return value.toFixed(2);
  if (abs === 0) return '0';
  return formatSignificant(value, 4);
}

export function formatCompact(value: number): string {
  const abs = Math.abs(value);
  if (abs >= 1e12) return `${formatSignificant(value / 1e12, 3)}T`;
  if (abs >= 1e9) return `${formatSignificant(value / 1e9, 3)}B`;
  if (abs >= 1e6) return `${formatSignificant(value / 1e6, 3)}M`;
  if (abs >= 1e3) return `${formatSignificant(value / 1e3, 3)}K`;
  return formatSignificant(value, 3);
}

export function formatPercent(value: number): string {
  if (value > 0) return `+${value.toFixed(2)}%`;
  if (value < 0) return `${value.toFixed(2)}%`;
  return '--';
}

function pad2(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}

/** UTC date label; hourly charts get the hour too */
export function formatTime(timestamp: number, withHour: boolean): string {
  const d = new Date(timestamp);
  const day = `${d.getUTCFullYear()}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())}`;
  return withHour ? `${day.slice(5)} ${pad2(d.getUTCHours())}:00` : day;
}

function niceStep(rough: number): number {
  const exponent = Math.floor(Math.log10(rough));
  const fraction = rough / 10 ** exponent;
  const nice = fraction < 1.5 ? 1 : fraction < 3 ? 2 : fraction < 7 ? 5 : 10;
  return nice * 10 ** exponent;
}

/** Round tick values covering [min, max] */
export function niceTicks(min: number, max: number, count = 5): number[] {
  if (!(max > min)) return [min];
  const step = niceStep((max - min) / Math.max(1, count - 1));
  const ticks: number[] = [];
  const first = Math.ceil(min / step) * step;
  for (let value = first; value <= max + step * 1e-9; value += step) {
    // Strip float drift (0.30000000000000004)
    ticks.push(Number(value.toPrecision(12)));
  }
  return ticks;
}

export function svgDocument(width: number, height: number, background: string, body: string[]): string {
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect width="${width}" height="${height}" fill="${background}"/>`,
    ...body,
    '</svg>',
    '',
  ].join('\n');
}
