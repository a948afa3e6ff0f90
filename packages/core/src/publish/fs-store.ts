/**
 * Filesystem-backed ArtifactStore
 *
 * Stores charts at <artifactDir>/{id-prefix}/{id}.{ext}. Writes land in a
 * temp file first and are renamed into place, so a reader never sees a
 * partial file. Removal unlinks: a reader that already opened the file keeps
 * its bytes.
 */

import { randomBytes } from 'crypto';
import { existsSync, mkdirSync } from 'fs';
import { readFile, rename, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import type { ArtifactStore } from './store.js';

const EXTENSIONS: Record<string, string> = {
  'image/svg+xml': 'svg',
  'image/png': 'png',
};

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FsArtifactStore implements ArtifactStore {
  private baseDir: string;

  constructor(artifactDir: string) {
    this.baseDir = artifactDir;
    if (!existsSync(this.baseDir)) {
      mkdirSync(this.baseDir, { recursive: true, mode: 0o700 });
    }
  }

  private idPath(id: string, contentType: string): string {
    const dir = join(this.baseDir, id.slice(0, 2));
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    return join(dir, `${id}.${EXTENSIONS[contentType] ?? 'bin'}`);
  }

  async put(id: string, bytes: Buffer, contentType: string): Promise<string> {
    const filePath = this.idPath(id, contentType);
    const tmpPath = `${filePath}.${randomBytes(4).toString('hex')}.tmp`;

    await writeFile(tmpPath, bytes);
    await rename(tmpPath, filePath);
    return filePath;
  }

  async read(location: string): Promise<Buffer | null> {
    try {
      return await readFile(location);
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
  }

  async remove(location: string): Promise<boolean> {
    try {
      await unlink(location);
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }
}
