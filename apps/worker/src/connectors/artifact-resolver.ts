// Artifact Resolver - downloads provider media, dedupes by source URL, maps local paths to URLs

import { createWriteStream } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import axios from 'axios';
import { v4 as uuidv4 } from 'uuid';
import {
  DownloadError,
  InputStagingError,
  describeJobError,
  errorMessage,
  isVideoJobError,
  logger,
} from '@vidgen/core';
import type { HttpClient } from './protocol/http-client.js';

const STAGING_ATTEMPTS = 2;

export interface ArtifactResolverOptions {
  dataDir: string;
  mediaBasePath: string;
  downloadBaseUrl: string;
  publicBaseUrl: string;
  cacheTtlMs: number;
  sweepIntervalMs?: number; // default one hour
  downloadTimeoutMs?: number; // default ten minutes
  http?: Pick<HttpClient, 'get'>;
  now?: () => number;
}

export interface CacheEntry {
  path: string;
  downloaded_at: number;
}

export interface DisplayUrls {
  file_url: string;
  download_url: string;
  absolute_url: string;
}

export interface SweepReport {
  expiredEntries: number;
  orphanFiles: number;
}

/** Provider side of the staging handshake. */
export interface InputStager {
  isProviderReference(url: string): boolean;
  upload(localPath: string, model: string, signal?: AbortSignal): Promise<string>;
}

export class ArtifactResolver {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly http: Pick<HttpClient, 'get'>;
  private readonly now: () => number;
  private lastSweepAt: number;

  constructor(private readonly options: ArtifactResolverOptions) {
    this.http = options.http ?? axios.create();
    this.now = options.now ?? Date.now;
    this.lastSweepAt = this.now();
  }

  get dataDir(): string {
    return path.resolve(this.options.dataDir);
  }

  get tempDir(): string {
    return path.join(this.dataDir, 'temp');
  }

  cacheEntry(url: string): CacheEntry | undefined {
    return this.cache.get(url);
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  /** `{dataDir}/videos/{provider}/{provider}_{YYYYMMDD_HHMMSS}_{index}_{hex8}.mp4` */
  videoPath(provider: string, index: number, extension = 'mp4'): string {
    const stamp = new Date(this.now())
      .toISOString()
      .replace(/[-:]/g, '')
      .replace('T', '_')
      .slice(0, 15);
    const suffix = uuidv4().replace(/-/g, '').slice(0, 8);
    return path.join(this.dataDir, 'videos', provider, `${provider}_${stamp}_${index}_${suffix}.${extension}`);
  }

  /**
   * Stream `remoteUrl` to `destinationPath`. A fresh cached copy of the same
   * URL is returned instead of downloading again. Never throws: failures are
   * logged and reported as ''.
   */
  async download(remoteUrl: string, destinationPath: string, signal?: AbortSignal): Promise<string> {
    await this.maybeSweep();

    const cached = this.cache.get(remoteUrl);
    if (cached && !this.isExpired(cached) && (await fileExists(cached.path))) {
      logger.debug(`Artifact cache hit for ${remoteUrl}`, { path: cached.path });
      return cached.path;
    }

    try {
      await this.transfer(remoteUrl, destinationPath, signal);
    } catch (error) {
      logger.error(describeJobError(error));
      return '';
    }

    // Concurrent downloads of one URL both land here; the last one wins
    this.cache.set(remoteUrl, { path: destinationPath, downloaded_at: this.now() });
    logger.info(`Downloaded ${remoteUrl}`, { path: destinationPath });
    return destinationPath;
  }

  /** Download an input file into the temp area. Uncached; the caller owns the file. */
  async fetchToTemp(remoteUrl: string, signal?: AbortSignal): Promise<string> {
    const extension = extensionFromUrl(remoteUrl) || '.jpg';
    const destinationPath = path.join(this.tempDir, `temp_${uuidv4()}${extension}`);
    await this.transfer(remoteUrl, destinationPath, signal);
    return destinationPath;
  }

  /**
   * Provider-native references pass through; anything else is fetched into the
   * temp area and uploaded through the provider's handshake. A retryable
   * failure re-runs the fetch and upload once.
   */
  async ensureStaged(
    sourceUrl: string,
    model: string,
    stager: InputStager,
    signal?: AbortSignal
  ): Promise<string> {
    if (stager.isProviderReference(sourceUrl)) {
      return sourceUrl;
    }

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.stage(sourceUrl, model, stager, signal);
      } catch (error) {
        const retryable = isVideoJobError(error) && error.retryable;
        if (!retryable || attempt >= STAGING_ATTEMPTS || signal?.aborted) throw error;
        logger.warn(`Retrying staging of ${sourceUrl}: ${errorMessage(error)}`, { model, attempt });
      }
    }
  }

  private async stage(
    sourceUrl: string,
    model: string,
    stager: InputStager,
    signal?: AbortSignal
  ): Promise<string> {
    let localPath: string;
    try {
      localPath = await this.fetchToTemp(sourceUrl, signal);
    } catch (error) {
      throw new InputStagingError(`Failed to fetch input media ${sourceUrl}`, { cause: error });
    }

    try {
      const reference = await stager.upload(localPath, model, signal);
      logger.info(`Staged ${sourceUrl} as ${reference}`, { model });
      return reference;
    } catch (error) {
      if (isVideoJobError(error)) throw error;
      throw new InputStagingError(`Failed to upload ${sourceUrl}: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      await this.removeFile(localPath);
    }
  }

  private async transfer(remoteUrl: string, destinationPath: string, signal?: AbortSignal): Promise<void> {
    try {
      await fs.mkdir(path.dirname(destinationPath), { recursive: true });
      const response = await this.http.get<unknown>(remoteUrl, {
        responseType: 'stream',
        timeout: this.options.downloadTimeoutMs ?? 600_000,
        signal,
      });
      if (!(response.data instanceof Readable)) {
        throw new Error('response body is not a stream');
      }
      await pipeline(response.data, createWriteStream(destinationPath));
    } catch (error) {
      await this.removeFile(destinationPath);
      throw new DownloadError(`Failed to download ${remoteUrl}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Map a local path under the data root to servable URLs. Paths outside the
   * root fall back to the bare file name; remote URLs pass through.
   */
  resolveDisplayUrls(localPath: string): DisplayUrls {
    if (!localPath) {
      return { file_url: '', download_url: '', absolute_url: '' };
    }
    if (/^https?:\/\//i.test(localPath)) {
      return { file_url: localPath, download_url: localPath, absolute_url: localPath };
    }

    const absolute = path.resolve(localPath);
    const relative = path.relative(this.dataDir, absolute);
    const inside = relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
    const mediaRelative = inside ? relative.split(path.sep).join('/') : path.basename(absolute);

    const fileUrl = `${trimTrailingSlash(this.options.mediaBasePath)}/${mediaRelative}`;
    return {
      file_url: fileUrl,
      download_url: `${trimTrailingSlash(this.options.downloadBaseUrl)}/${encodeURIComponent(path.basename(absolute))}`,
      absolute_url: `${trimTrailingSlash(this.options.publicBaseUrl)}${fileUrl.startsWith('/') ? '' : '/'}${fileUrl}`,
    };
  }

  /**
   * Drop expired cache entries (removing their file when it sits in the temp
   * area) and delete untracked temp files older than the TTL.
   */
  async sweep(): Promise<SweepReport> {
    const now = this.now();
    this.lastSweepAt = now;
    const report: SweepReport = { expiredEntries: 0, orphanFiles: 0 };

    for (const [url, entry] of this.cache) {
      if (!this.isExpired(entry)) continue;
      this.cache.delete(url);
      report.expiredEntries++;
      if (this.isInTempDir(entry.path)) {
        await this.removeFile(entry.path);
      }
    }

    const tracked = new Set([...this.cache.values()].map(entry => path.resolve(entry.path)));
    let names: string[];
    try {
      names = await fs.readdir(this.tempDir);
    } catch (error) {
      if (isMissingFile(error)) return report;
      logger.warn(`Artifact sweep could not read ${this.tempDir}: ${errorMessage(error)}`);
      return report;
    }

    for (const name of names) {
      const filePath = path.join(this.tempDir, name);
      if (tracked.has(filePath)) continue;
      try {
        const stats = await fs.stat(filePath);
        if (stats.isFile() && now - stats.mtimeMs > this.options.cacheTtlMs) {
          await fs.rm(filePath, { force: true });
          report.orphanFiles++;
        }
      } catch (error) {
        logger.warn(`Artifact sweep skipped ${filePath}: ${errorMessage(error)}`);
      }
    }

    if (report.expiredEntries > 0 || report.orphanFiles > 0) {
      logger.info('Artifact cache swept', { ...report });
    }
    return report;
  }

  private async maybeSweep(): Promise<void> {
    if (this.now() - this.lastSweepAt >= (this.options.sweepIntervalMs ?? 3_600_000)) {
      await this.sweep();
    }
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.downloaded_at > this.options.cacheTtlMs;
  }

  private isInTempDir(filePath: string): boolean {
    const relative = path.relative(this.tempDir, path.resolve(filePath));
    return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
  }

  private async removeFile(filePath: string): Promise<void> {
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      logger.warn(`Could not remove ${filePath}: ${errorMessage(error)}`);
    }
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function extensionFromUrl(url: string): string {
  try {
    return path.extname(new URL(url).pathname);
  } catch {
    return path.extname(url);
  }
}

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}
