/**
 * ArtifactPublisher
 *
 * Turns rendered bytes into a chart at a stable URL:
 *
 *   request key → reuse window check → write bytes → index row → evict
 *
 * A key published within `cacheWindowMs` is handed back as-is. Every publish
 * enforces retention (age and count), oldest first.
 */

import { createHash } from 'crypto';
import { SingleFlight, type Clock } from '../cache/keyed-cache.js';
import { ChartError, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../chartd/logger.js';
import type { ArtifactIndex, ArtifactRow } from '../db/index.js';
import type { ArtifactStore } from './store.js';

// ── Types ───────────────────────────────────────────────────────────

export interface ChartArtifact {
  id: string;
  requestKey: string;
  contentType: string;
  size: number;
  publishedAt: number;
  url: string;
}

export interface ArtifactContent {
  bytes: Buffer;
  contentType: string;
}

export interface PublisherOptions {
  /** Base for artifact URLs, without trailing slash */
  publicBaseUrl: string;
  /** How long a published key is reused instead of re-published (0 disables reuse) */
  cacheWindowMs: number;
  /** Artifacts older than this are removed on the next publish */
  retentionMs: number;
  /** Newest artifacts kept; older ones are removed on the next publish */
  maxArtifacts: number;
  now?: Clock;
  logger?: Logger;
}

const ARTIFACT_ID = /^[0-9a-f]{16}-[0-9a-z]+$/;

export function artifactId(requestKey: string, publishedAt: number): string {
  const digest = createHash('sha256').update(requestKey).digest('hex').slice(0, 16);
  return `${digest}-${publishedAt.toString(36)}`;
}

// ── ArtifactPublisher ───────────────────────────────────────────────

export class ArtifactPublisher {
  private store: ArtifactStore;
  private index: ArtifactIndex;
  private options: Required<Omit<PublisherOptions, 'logger' | 'now'>>;
  private now: Clock;
  private logger: Logger;
  private flights = new SingleFlight<ChartArtifact>();

  constructor(store: ArtifactStore, index: ArtifactIndex, options: PublisherOptions) {
    this.store = store;
    this.index = index;
    this.options = {
      publicBaseUrl: options.publicBaseUrl.replace(/\/+$/, ''),
      cacheWindowMs: options.cacheWindowMs,
      retentionMs: options.retentionMs,
      maxArtifacts: options.maxArtifacts,
    };
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  urlFor(id: string): string {
    return `${this.options.publicBaseUrl}/charts/${id}`;
  }

  /** Artifact for a key published inside the reuse window, if any */
  lookup(requestKey: string): ChartArtifact | null {
    if (this.options.cacheWindowMs <= 0) return null;
    const since = this.now() - this.options.cacheWindowMs + 1;
    const row = this.index.latestForKey(requestKey, since);
    return row ? this.toArtifact(row) : null;
  }

  /**
   * Publish bytes under a request key. Concurrent publishes of one key share a
   * single write; a key still inside the reuse window is not written again.
   */
  publish(bytes: Buffer, requestKey: string, contentType = 'image/svg+xml'): Promise<ChartArtifact> {
    return this.flights.run(requestKey, async () => {
      const existing = this.lookup(requestKey);
      if (existing) return existing;

      const publishedAt = this.now();
      const id = artifactId(requestKey, publishedAt);
      // Same key in the same millisecond is the same artifact
      const clash = this.index.get(id);
      if (clash) return this.toArtifact(clash);

      let location: string;
      try {
        location = await this.store.put(id, bytes, contentType);
      } catch (error) {
        this.logger.error(`Failed to write artifact ${id}: ${errorMessage(error)}`, error);
        throw new ChartError('Internal', 'The chart could not be published.', { cause: error });
      }

      const row: ArtifactRow = {
        id,
        request_key: requestKey,
        path: location,
        content_type: contentType,
        size: bytes.length,
        published_at: publishedAt,
      };
      this.index.insert(row);
      this.logger.debug(`Published ${id} (${bytes.length} bytes)`);

      await this.evict();
      return this.toArtifact(row);
    });
  }

  /** Stored bytes for an artifact id; null when unknown or evicted */
  async read(id: string): Promise<ArtifactContent | null> {
    if (!ARTIFACT_ID.test(id)) return null;
    const row = this.index.get(id);
    if (!row) return null;

    const bytes = await this.store.read(row.path);
    if (!bytes) {
      this.logger.warn(`Artifact ${id} is indexed but its file is missing`);
      return null;
    }
    return { bytes, contentType: row.content_type };
  }

  stats(): { totalItems: number; totalBytes: number } {
    return this.index.stats();
  }

  private async evict(): Promise<void> {
    const cutoff = this.now() - this.options.retentionMs;
    const victims = this.index.expired(cutoff, this.options.maxArtifacts);
    if (victims.length === 0) return;

    // Index first: once the row is gone no new reader can find the file
    this.index.delete(victims.map(v => v.id));
    for (const victim of victims) {
      try {
        await this.store.remove(victim.path);
      } catch (error) {
        this.logger.warn(`Could not remove evicted artifact ${victim.id}: ${errorMessage(error)}`);
      }
    }
    this.logger.debug(`Evicted ${victims.length} artifact(s)`);
  }

  private toArtifact(row: ArtifactRow): ChartArtifact {
    return {
      id: row.id,
      requestKey: row.request_key,
      contentType: row.content_type,
      size: row.size,
      publishedAt: row.published_at,
      url: this.urlFor(row.id),
    };
  }
}
