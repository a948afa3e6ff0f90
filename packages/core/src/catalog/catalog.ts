/**
 * AssetCatalog
 *
 * Resolves user text ("btc", "$WELL", "Ethereum", "bitcoin-cash") to an Asset.
 * Order: exact symbol, exact slug or name, then name/slug prefix. Duplicates at
 * every step go to the best provider rank.
 *
 * The snapshot is replaced by swapping one reference, so a resolve always sees
 * one whole snapshot.
 */

import { ChartError, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../chartd/logger.js';
import type { Asset } from '../types.js';
import {
  CatalogSnapshot,
  readSnapshotFile,
  writeSnapshotFile,
  type CoinRecord,
} from './snapshot.js';

export interface CoinMapSource {
  fetchCoinMap(): Promise<CoinRecord[]>;
}

export class AssetCatalog {
  private snapshot: CatalogSnapshot;
  private logger: Logger;

  constructor(records: readonly CoinRecord[] = [], logger: Logger = silentLogger) {
    this.snapshot = new CatalogSnapshot(records);
    this.logger = logger;
  }

  /**
   * Load the catalog from a snapshot file. A missing or unreadable file gives
   * an empty catalog: every lookup then fails with UnknownAsset.
   */
  static async load(path: string, logger: Logger = silentLogger): Promise<AssetCatalog> {
    try {
      const loaded = await readSnapshotFile(path);
      if (!loaded) {
        logger.warn(`Coin list not found at ${path}; catalog is empty`);
        return new AssetCatalog([], logger);
      }
      if (loaded.skipped > 0) {
        logger.warn(`Skipped ${loaded.skipped} malformed coin list entries`);
      }
      logger.info(`Loaded ${loaded.records.length} assets from ${path}`);
      return new AssetCatalog(loaded.records, logger);
    } catch (error) {
      logger.error(`Cannot read coin list ${path}: ${errorMessage(error)}; catalog is empty`);
      return new AssetCatalog([], logger);
    }
  }

  get size(): number {
    return this.snapshot.size;
  }

  get(id: string): Asset | undefined {
    return this.snapshot.getById(id);
  }

  resolve(text: string): Asset {
    const asset = this.tryResolve(text);
    if (!asset) {
      throw new ChartError('UnknownAsset', `Token ${text} not found. Please provide a valid cryptocurrency symbol, name or slug.`);
    }
    return asset;
  }

  tryResolve(text: string): Asset | undefined {
    const query = text.trim().replace(/^\$/, '').toLowerCase();
    if (!query) return undefined;

    // One read of the reference; a concurrent replace cannot split this lookup
    const snapshot = this.snapshot;
    return snapshot.bySymbolExact(query)
      ?? snapshot.byNameExact(query)
      ?? snapshot.byNamePrefix(query);
  }

  /** Swap in a new snapshot */
  replace(records: readonly CoinRecord[]): void {
    this.snapshot = new CatalogSnapshot(records);
    this.logger.info(`Catalog replaced: ${this.snapshot.size} assets`);
  }

  /**
   * Pull the provider's id map, persist it, then swap it in.
   * The file is written before the swap so a restart sees the same catalog.
   */
  async refresh(source: CoinMapSource, path: string): Promise<number> {
    const records = await source.fetchCoinMap();
    if (records.length === 0) {
      throw new Error('Provider returned an empty coin map; keeping the current catalog');
    }
    await writeSnapshotFile(path, records);
    this.replace(records);
    return records.length;
  }
}
