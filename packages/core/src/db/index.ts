/**
 * chartd - Local SQLite Database
 *
 * Index of published chart artifacts. The bytes live on disk; this table
 * records where, for which request key, and when.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';

// ── Types ──────────────────────────────────────────────────────────

export interface ArtifactRow {
  id: string;
  request_key: string;
  path: string;
  content_type: string;
  size: number;
  published_at: number;
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS artifacts (
  id            TEXT PRIMARY KEY,
  request_key   TEXT NOT NULL,
  path          TEXT NOT NULL,
  content_type  TEXT NOT NULL,
  size          INTEGER NOT NULL,
  published_at  INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_artifacts_key ON artifacts(request_key, published_at);
CREATE INDEX IF NOT EXISTS idx_artifacts_published ON artifacts(published_at);
`;

// ── ArtifactIndex ──────────────────────────────────────────────────

export class ArtifactIndex {
  private db: Database.Database;

  /**
   * Open (and create if needed) the index. Pass ':memory:' for a throwaway
   * database.
   */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true, mode: 0o700 });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(SCHEMA);
  }

  insert(row: ArtifactRow): void {
    this.db.prepare(`
      INSERT INTO artifacts (id, request_key, path, content_type, size, published_at)
      VALUES (@id, @request_key, @path, @content_type, @size, @published_at)
    `).run(row);
  }

  get(id: string): ArtifactRow | null {
    const row = this.db.prepare('SELECT * FROM artifacts WHERE id = ?').get(id);
    return toRow(row);
  }

  /** Newest artifact for a request key published at or after `since` */
  latestForKey(requestKey: string, since: number): ArtifactRow | null {
    const row = this.db.prepare(`
      SELECT * FROM artifacts
      WHERE request_key = ? AND published_at >= ?
      ORDER BY published_at DESC
      LIMIT 1
    `).get(requestKey, since);
    return toRow(row);
  }

  /**
   * Rows to evict: everything published before `before`, plus the oldest rows
   * beyond `keep`. Oldest first.
   */
  expired(before: number, keep: number): ArtifactRow[] {
    const rows = this.db.prepare(`
      SELECT * FROM artifacts
      WHERE published_at < ?
         OR id NOT IN (SELECT id FROM artifacts ORDER BY published_at DESC, id DESC LIMIT ?)
      ORDER BY published_at ASC, id ASC
    `).all(before, keep);
    return rows.flatMap(row => toRow(row) ?? []);
  }

  delete(ids: readonly string[]): number {
    if (ids.length === 0) return 0;
    const stmt = this.db.prepare('DELETE FROM artifacts WHERE id = ?');
    const removeAll = this.db.transaction((batch: readonly string[]) => {
      let removed = 0;
      for (const id of batch) removed += stmt.run(id).changes;
      return removed;
    });
    return removeAll(ids);
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS n FROM artifacts').get();
    return typeof row === 'object' && row !== null && 'n' in row && typeof row.n === 'number' ? row.n : 0;
  }

  stats(): { totalItems: number; totalBytes: number } {
    const row = this.db.prepare('SELECT COUNT(*) AS n, COALESCE(SUM(size), 0) AS bytes FROM artifacts').get();
    if (typeof row !== 'object' || row === null) return { totalItems: 0, totalBytes: 0 };
    return {
      totalItems: 'n' in row && typeof row.n === 'number' ? row.n : 0,
      totalBytes: 'bytes' in row && typeof row.bytes === 'number' ? row.bytes : 0,
    };
  }

  close(): void {
    this.db.close();
  }
}

function toRow(value: unknown): ArtifactRow | null {
  if (typeof value !== 'object' || value === null) return null;
  if (
    'id' in value && typeof value.id === 'string' &&
    'request_key' in value && typeof value.request_key === 'string' &&
    'path' in value && typeof value.path === 'string' &&
    'content_type' in value && typeof value.content_type === 'string' &&
    'size' in value && typeof value.size === 'number' &&
    'published_at' in value && typeof value.published_at === 'number'
  ) {
    return {
      id: value.id,
      request_key: value.request_key,
      path: value.path,
      content_type: value.content_type,
      size: value.size,
      published_at: value.published_at,
    };
  }
  return null;
}
