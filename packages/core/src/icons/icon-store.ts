/**
 * IconStore
 *
 * Local, read-through icon cache keyed by asset id. Icons live on disk as
 * <iconDir>/<id>.png; a miss gets the built-in placeholder. Nothing here
 * touches the network: populating the directory is an admin task.
 */

import { existsSync, mkdirSync } from 'fs';
import { readFile, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import type { Icon } from '../types.js';
import { errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../chartd/logger.js';

const PLACEHOLDER_SVG = `<svg xmlns="http://www.w3.org/2000/svg" width="64" height="64" viewBox="0 0 64 64">
<circle cx="32" cy="32" r="30" fill="#9ca3af"/>
<circle cx="32" cy="32" r="22" fill="none" stroke="#f3f4f6" stroke-width="4"/>
<text x="32" y="40" font-family="Helvetica, Arial, sans-serif" font-size="22" font-weight="bold" fill="#f3f4f6" text-anchor="middle">?</text>
</svg>`;

export const PLACEHOLDER_ICON: Icon = Object.freeze({
  bytes: Buffer.from(PLACEHOLDER_SVG, 'utf-8'),
  contentType: 'image/svg+xml',
  placeholder: true,
});

const ASSET_ID = /^[0-9]+$/;

export class IconStore {
  private cache = new Map<string, Icon>();
  private iconDir: string;
  private logger: Logger;

  constructor(iconDir: string, logger: Logger = silentLogger) {
    this.iconDir = iconDir;
    this.logger = logger;
  }

  async get(assetId: string): Promise<Icon> {
    const cached = this.cache.get(assetId);
    if (cached) return cached;

    const icon = await this.readIcon(assetId);
    // Misses are not cached: an icon dropped into the directory later is picked up
    if (!icon.placeholder) this.cache.set(assetId, icon);
    return icon;
  }

  /** Store an icon on disk and in the cache (admin operation) */
  async put(assetId: string, bytes: Buffer): Promise<void> {
    if (!ASSET_ID.test(assetId)) {
      throw new Error(`Invalid asset id for icon: ${assetId}`);
    }
    if (!existsSync(this.iconDir)) {
      mkdirSync(this.iconDir, { recursive: true });
    }
    const path = join(this.iconDir, `${assetId}.png`);
    const tmp = `${path}.${process.pid}.tmp`;
    await writeFile(tmp, bytes);
    await rename(tmp, path);
    this.cache.set(assetId, { bytes, contentType: 'image/png', placeholder: false });
  }

  /** Forget cached lookups so the next get re-reads the directory */
  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  private async readIcon(assetId: string): Promise<Icon> {
    // Ids come from the catalog, but never build a path from anything else
    if (!ASSET_ID.test(assetId)) return PLACEHOLDER_ICON;

    const path = join(this.iconDir, `${assetId}.png`);
    if (!existsSync(path)) {
      this.logger.debug(`No icon for asset ${assetId}, using placeholder`);
      return PLACEHOLDER_ICON;
    }

    try {
      const bytes = await readFile(path);
      return { bytes, contentType: 'image/png', placeholder: false };
    } catch (error) {
      this.logger.warn(`Cannot read icon for asset ${assetId}: ${errorMessage(error)}`);
      return PLACEHOLDER_ICON;
    }
  }
}
