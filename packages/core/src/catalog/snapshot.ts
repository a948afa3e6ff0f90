/**
 * Coin-list snapshot
 *
 * The snapshot is the provider's id map (CoinMarketCap /v1/cryptocurrency/map)
 * saved as a JSON array. A CatalogSnapshot is an immutable index over it.
 */

import { existsSync } from 'fs';
import { readFile, rename, writeFile } from 'fs/promises';
import { z } from 'zod';
import type { Asset } from '../types.js';

export const CoinRecordSchema = z.object({
  id: z.number().int().nonnegative(),
  symbol: z.string().min(1),
  name: z.string().min(1),
  slug: z.string().min(1),
  rank: z.number().int().positive().nullish(),
});

export type CoinRecord = z.infer<typeof CoinRecordSchema>;

export interface SnapshotLoad {
  records: CoinRecord[];
  skipped: number;
}

/** Lowercase and drop everything but letters and digits */
export function normalizeName(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]/g, '');
}

function toAsset(record: CoinRecord): Asset {
  const id = String(record.id);
  return {
    id,
    symbol: record.symbol.toUpperCase(),
    name: record.name,
    slug: record.slug.toLowerCase(),
    rank: record.rank ?? null,
    iconRef: `${id}.png`,
  };
}

// Lower rank wins; unranked entries lose to ranked ones
function outranks(a: Asset, b: Asset): boolean {
  if (a.rank === null) return false;
  if (b.rank === null) return true;
  return a.rank < b.rank;
}

export class CatalogSnapshot {
  readonly assets: readonly Asset[];
  private byId = new Map<string, Asset>();
  private bySymbol = new Map<string, Asset>();
  private byName = new Map<string, Asset>();
  /** Assets ordered best rank first, for prefix matching */
  private ranked: readonly { name: string; slug: string; asset: Asset }[];

  constructor(records: readonly CoinRecord[]) {
    const assets = records.map(toAsset);
    this.assets = Object.freeze(assets.map(asset => Object.freeze(asset)));

    for (const asset of this.assets) {
      if (!this.byId.has(asset.id)) this.byId.set(asset.id, asset);
      this.keep(this.bySymbol, asset.symbol.toLowerCase(), asset);
      this.keep(this.byName, asset.slug, asset);
      this.keep(this.byName, asset.name.toLowerCase(), asset);
    }

    // Stable sort keeps snapshot order among equal ranks
    this.ranked = [...this.assets]
      .sort((a, b) => (a.rank ?? Number.MAX_SAFE_INTEGER) - (b.rank ?? Number.MAX_SAFE_INTEGER))
      .map(asset => ({ name: normalizeName(asset.name), slug: normalizeName(asset.slug), asset }));
  }

  get size(): number {
    return this.assets.length;
  }

  getById(id: string): Asset | undefined {
    return this.byId.get(id);
  }

  bySymbolExact(query: string): Asset | undefined {
    return this.bySymbol.get(query);
  }

  byNameExact(query: string): Asset | undefined {
    return this.byName.get(query);
  }

  byNamePrefix(query: string): Asset | undefined {
    const needle = normalizeName(query);
    if (needle.length < 3) return undefined;
    return this.ranked.find(entry => entry.name.startsWith(needle) || entry.slug.startsWith(needle))?.asset;
  }

  private keep(index: Map<string, Asset>, key: string, asset: Asset): void {
    const current = index.get(key);
    if (!current || outranks(asset, current)) {
      index.set(key, asset);
    }
  }
}

/** Validate raw JSON into coin records, skipping malformed entries */
export function parseSnapshot(raw: unknown): SnapshotLoad {
  if (!Array.isArray(raw)) {
    throw new Error('coin list must be a JSON array');
  }

  const records: CoinRecord[] = [];
  let skipped = 0;
  for (const item of raw) {
    const parsed = CoinRecordSchema.safeParse(item);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      skipped++;
    }
  }
  return { records, skipped };
}

/** Read a snapshot file. Returns null when the file does not exist. */
export async function readSnapshotFile(path: string): Promise<SnapshotLoad | null> {
  if (!existsSync(path)) return null;
  const content = await readFile(path, 'utf-8');
  return parseSnapshot(JSON.parse(content));
}

/** Write a snapshot file via rename so readers never see a partial file */
export async function writeSnapshotFile(path: string, records: readonly CoinRecord[]): Promise<void> {
  const tmp = `${path}.${process.pid}.tmp`;
  await writeFile(tmp, JSON.stringify(records, null, 2));
  await rename(tmp, path);
}
