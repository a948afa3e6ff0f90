/**
 * chartd MCP Server - Input Schemas
 */

import { z } from "zod";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

const isoDate = z.string()
  .regex(ISO_DATE, "Expected a date as YYYY-MM-DD")
  .refine(value => !Number.isNaN(Date.parse(`${value}T00:00:00Z`)), "Not a calendar date");

const theme = z.enum(["light", "dark"])
  .optional()
  .describe("Colour theme (default: light)");

const size = z.enum(["small", "medium", "large"])
  .optional()
  .describe("Image size: small 800x400, medium 1200x600, large 1600x800 (default: medium)");

export const MAX_DAYS = { daily: 365, hourly: 30 } as const;
export const DEFAULT_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;

function rangeDays(start: string, end: string): number {
  return (Date.parse(`${end}T00:00:00Z`) - Date.parse(`${start}T00:00:00Z`)) / DAY_MS;
}

function today(): string {
  return new Date().toISOString().slice(0, 10);
}

// ── crypto_price_chart ─────────────────────────────────────────

export const ChartInputSchema = z.object({
  symbol: z.string()
    .trim()
    .min(1, "Symbol is required")
    .max(64, "Symbol is too long")
    .describe("Ticker symbol, slug or name of the coin on CoinMarketCap. Examples: 'BTC', 'eth', '$WELL', 'bitcoin-cash'"),
  interval: z.enum(["daily", "hourly"])
    .default("daily")
    .describe("Candle interval (default: daily)"),
  days: z.number()
    .int()
    .min(1)
    .max(MAX_DAYS.daily)
    .optional()
    .describe(`Chart the last N days (default: ${DEFAULT_DAYS}; at most ${MAX_DAYS.hourly} for hourly)`),
  start: isoDate
    .optional()
    .describe("Start date YYYY-MM-DD; use together with end instead of days"),
  end: isoDate
    .optional()
    .describe(`End date YYYY-MM-DD, not in the future; use together with start instead of days (range at most ${MAX_DAYS.daily} days daily, ${MAX_DAYS.hourly} hourly)`),
  theme,
  size,
  overlay_icon: z.boolean()
    .default(true)
    .describe("Draw the coin's icon in the top-left corner (default: true)")
}).strict();

export type ChartInput = z.infer<typeof ChartInputSchema>;

/** Cross-field rules the MCP input shape cannot express */
export const ChartRequestSchema = ChartInputSchema.superRefine((input, ctx) => {
  const hasStart = input.start !== undefined;
  const hasEnd = input.end !== undefined;

  if (hasStart !== hasEnd) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [hasStart ? "end" : "start"],
      message: "start and end must be given together",
    });
  }
  if ((hasStart || hasEnd) && input.days !== undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["days"],
      message: "Use either days or start/end, not both",
    });
  }
  if (input.start !== undefined && input.end !== undefined && input.start >= input.end) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["start"],
      message: "start must be before end",
    });
  }
  if (input.interval === "hourly" && input.days !== undefined && input.days > MAX_DAYS.hourly) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["days"],
      message: `Hourly charts cover at most ${MAX_DAYS.hourly} days`,
    });
  }
  if (input.end !== undefined && input.end > today()) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["end"],
      message: "end must not be in the future",
    });
  }
  if (input.start !== undefined && input.end !== undefined && input.start < input.end) {
    const limit = MAX_DAYS[input.interval];
    if (rangeDays(input.start, input.end) > limit) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["end"],
        message: `${input.interval === "hourly" ? "Hourly" : "Daily"} charts cover at most ${limit} days`,
      });
    }
  }
});

// ── crypto_heatmap ─────────────────────────────────────────────

export const HeatmapInputSchema = z.object({
  limit: z.number()
    .int()
    .min(1)
    .max(50)
    .default(20)
    .describe("Number of trending coins to include (default: 20)"),
  theme,
  size
}).strict();

export type HeatmapInput = z.infer<typeof HeatmapInputSchema>;
