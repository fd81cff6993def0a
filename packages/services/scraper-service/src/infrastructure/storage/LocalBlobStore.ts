/**
 * Local Blob Store
 * Stores artifact blobs as files under a root directory
 */

import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import { assertSafeBlobPath } from '../../domains/artifacts/artifact-paths';
import { NotFoundError, ValidationError } from '../../application/errors';
import type { BlobEntry, IBlobStore } from '../../application/ports';
import { getLogger } from '../../config/logger';

const logger = getLogger('scraper-service:local-blob-store');

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class LocalBlobStore implements IBlobStore {
  private readonly basePath: string;
  private readonly baseUrl: string;

  constructor(basePath: string, baseUrl: string) {
    this.basePath = path.resolve(basePath);
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async put(blobPath: string, data: Buffer, contentType?: string): Promise<string> {
    const fullPath = this.resolve(blobPath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, data);
    logger.debug('Blob stored', { path: blobPath, sizeBytes: data.length, contentType });
    return this.uriFor(blobPath);
  }

  async get(blobPath: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.resolve(blobPath));
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundError('Blob', blobPath);
      }
      throw error;
    }
  }

  async delete(blobPath: string): Promise<void> {
    try {
      await fs.unlink(this.resolve(blobPath));
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }
  }

  async exists(blobPath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(this.resolve(blobPath));
      return stats.isFile();
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  async list(prefix = ''): Promise<BlobEntry[]> {
    const entries: BlobEntry[] = [];
    await this.walk(this.basePath, '', entries);
    return entries.filter(entry => entry.path.startsWith(prefix)).sort((a, b) => a.path.localeCompare(b.path));
  }

  uriFor(blobPath: string): string {
    return `${this.baseUrl}/${blobPath.split('/').map(encodeURIComponent).join('/')}`;
  }

  private resolve(blobPath: string): string {
    assertSafeBlobPath(blobPath);
    const fullPath = path.resolve(this.basePath, blobPath);
    if (!fullPath.startsWith(this.basePath + path.sep)) {
      throw new ValidationError(`Invalid blob path: ${blobPath}`);
    }
    return fullPath;
  }

  private async walk(directory: string, relative: string, out: BlobEntry[]): Promise<void> {
    let dirents: Dirent[];
    try {
      dirents = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (isMissingFile(error)) return;
      throw error;
    }

    for (const dirent of dirents) {
      const childRelative = relative ? `${relative}/${dirent.name}` : dirent.name;
      const childPath = path.join(directory, dirent.name);
      if (dirent.isDirectory()) {
        await this.walk(childPath, childRelative, out);
      } else if (dirent.isFile()) {
        try {
          const stats = await fs.stat(childPath);
          out.push({ path: childRelative, sizeBytes: stats.size, createdAt: stats.mtime });
        } catch (error) {
          // deleted between readdir and stat
          if (!isMissingFile(error)) throw error;
        }
      }
    }
  }
}
