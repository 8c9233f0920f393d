import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { DownloadError, InputStagingError, RemoteCallError } from '@vidgen/core';
import { ArtifactResolver, InputStager } from '../artifact-resolver.js';
import { StubHttp, streamOf } from '../../test/stub-http.js';
import { FakeClock } from '../../test/fake-time.js';

const HOUR = 3_600_000;
const T0 = Date.UTC(2024, 2, 10, 8, 30, 0);
const VIDEO_URL = 'https://cdn.test/result.mp4';

describe('ArtifactResolver', () => {
  let dataDir: string;
  let http: StubHttp;
  let clock: FakeClock;
  let resolver: ArtifactResolver;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'artifact-resolver-'));
    http = new StubHttp();
    clock = new FakeClock(T0);
    resolver = new ArtifactResolver({
      dataDir,
      mediaBasePath: '/media/',
      downloadBaseUrl: 'https://api.test/api/download',
      publicBaseUrl: 'https://api.test',
      cacheTtlMs: HOUR,
      http: http.client,
      now: clock.now,
    });
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('names videos by provider, timestamp and index', () => {
    const videoPath = resolver.videoPath('aliyun', 2);

    expect(path.dirname(videoPath)).toBe(path.join(resolver.dataDir, 'videos', 'aliyun'));
    expect(path.basename(videoPath)).toMatch(/^aliyun_20240310_083000_2_[0-9a-f]{8}\.mp4$/);
  });

  describe('download', () => {
    it('writes the body to disk and serves repeats from the cache', async () => {
      http.on('GET', VIDEO_URL, () => ({ data: streamOf('frames') }));
      const destination = resolver.videoPath('aliyun', 0);

      const first = await resolver.download(VIDEO_URL, destination);
      const second = await resolver.download(VIDEO_URL, resolver.videoPath('aliyun', 1));

      expect(first).toBe(destination);
      expect(second).toBe(destination);
      expect(await fs.readFile(destination, 'utf8')).toBe('frames');
      expect(http.sentTo(VIDEO_URL)).toHaveLength(1);
      expect(resolver.cacheEntry(VIDEO_URL)).toEqual({ path: destination, downloaded_at: T0 });
    });

    it('downloads again once the cached copy has expired', async () => {
      http.on('GET', VIDEO_URL, () => ({ data: streamOf('frames') }));
      await resolver.download(VIDEO_URL, resolver.videoPath('aliyun', 0));

      clock.advance(HOUR + 1);
      const refreshed = resolver.videoPath('aliyun', 0);
      await resolver.download(VIDEO_URL, refreshed);

      expect(http.sentTo(VIDEO_URL)).toHaveLength(2);
      expect(resolver.cacheEntry(VIDEO_URL)?.path).toBe(refreshed);
    });

    it('downloads again when the cached file was removed', async () => {
      http.on('GET', VIDEO_URL, () => ({ data: streamOf('frames') }));
      const destination = resolver.videoPath('aliyun', 0);
      await resolver.download(VIDEO_URL, destination);
      await fs.rm(destination);

      await resolver.download(VIDEO_URL, destination);

      expect(http.sentTo(VIDEO_URL)).toHaveLength(2);
      expect(await fs.readFile(destination, 'utf8')).toBe('frames');
    });

    it('keeps a single cache entry when one URL is downloaded concurrently', async () => {
      http.on('GET', VIDEO_URL, () => ({ data: streamOf('frames') }));
      const paths = [resolver.videoPath('aliyun', 0), resolver.videoPath('aliyun', 1)];

      const results = await Promise.all(paths.map(destination => resolver.download(VIDEO_URL, destination)));

      expect(results).toEqual(paths);
      expect(resolver.cacheSize).toBe(1);
      expect(paths).toContain(resolver.cacheEntry(VIDEO_URL)?.path);
    });

    it('returns an empty path and caches nothing when the fetch fails', async () => {
      http.on('GET', VIDEO_URL, { status: 500 });
      const destination = resolver.videoPath('aliyun', 0);

      await expect(resolver.download(VIDEO_URL, destination)).resolves.toBe('');

      expect(resolver.cacheEntry(VIDEO_URL)).toBeUndefined();
      await expect(fs.access(destination)).rejects.toThrow();
    });

    it('places input media in the temp area', async () => {
      http.on('GET', 'https://img.test/photo.webp', () => ({ data: streamOf('pixels') }));
      http.on('GET', 'https://img.test/photo', () => ({ data: streamOf('pixels') }));

      const withExtension = await resolver.fetchToTemp('https://img.test/photo.webp');
      const withoutExtension = await resolver.fetchToTemp('https://img.test/photo');

      expect(path.dirname(withExtension)).toBe(resolver.tempDir);
      expect(path.basename(withExtension)).toMatch(/^temp_[0-9a-f-]{36}\.webp$/);
      expect(path.basename(withoutExtension)).toMatch(/^temp_[0-9a-f-]{36}\.jpg$/);
      expect(resolver.cacheSize).toBe(0);
    });

    it('raises a download error when an input fetch fails', async () => {
      http.on('GET', 'https://img.test/missing.png', { status: 404 });

      const fetching = resolver.fetchToTemp('https://img.test/missing.png');

      await expect(fetching).rejects.toThrow(
        'Failed to download https://img.test/missing.png: Request failed with status code 404'
      );
      await expect(fetching).rejects.toBeInstanceOf(DownloadError);
      await expect(fs.readdir(resolver.tempDir)).resolves.toEqual([]);
    });
  });

  describe('ensureStaged', () => {
    const stager: InputStager = {
      isProviderReference: url => url.startsWith('store://'),
      upload: async localPath => `store://inputs/${path.basename(localPath)}`,
    };

    it('passes provider references through without fetching', async () => {
      const upload = vi.spyOn(stager, 'upload');

      await expect(resolver.ensureStaged('store://inputs/a.png', 'model-x', stager)).resolves.toBe(
        'store://inputs/a.png'
      );
      expect(upload).not.toHaveBeenCalled();
      expect(http.requests).toHaveLength(0);
    });

    it('fetches and uploads anything else', async () => {
      http.on('GET', 'https://img.test/a.png', () => ({ data: streamOf('pixels') }));

      const reference = await resolver.ensureStaged('https://img.test/a.png', 'model-x', stager);

      expect(reference).toMatch(/^store:\/\/inputs\/temp_[0-9a-f-]{36}\.png$/);
    });

    it('removes the temp copy once uploaded and fetches again on the next staging', async () => {
      http.on('GET', 'https://img.test/a.png', () => ({ data: streamOf('pixels') }));
      const uploaded: string[] = [];
      const recording: InputStager = {
        isProviderReference: () => false,
        upload: async localPath => {
          uploaded.push(await fs.readFile(localPath, 'utf8'));
          return `store://inputs/${path.basename(localPath)}`;
        },
      };

      await resolver.ensureStaged('https://img.test/a.png', 'model-x', recording);
      await resolver.ensureStaged('https://img.test/a.png', 'model-x', recording);

      expect(uploaded).toEqual(['pixels', 'pixels']);
      expect(http.sentTo('https://img.test/a.png')).toHaveLength(2);
      expect(resolver.cacheSize).toBe(0);
      await expect(fs.readdir(resolver.tempDir)).resolves.toEqual([]);
    });

    it('re-runs staging once after a retryable failure', async () => {
      http.on('GET', 'https://img.test/a.png', () => ({ data: streamOf('pixels') }));
      const flaky: InputStager = {
        isProviderReference: () => false,
        upload: vi
          .fn<[string, string, AbortSignal?], Promise<string>>()
          .mockRejectedValueOnce(new Error('connection reset'))
          .mockResolvedValueOnce('store://inputs/retried.png'),
      };

      await expect(resolver.ensureStaged('https://img.test/a.png', 'model-x', flaky)).resolves.toBe(
        'store://inputs/retried.png'
      );
      expect(flaky.upload).toHaveBeenCalledTimes(2);
      expect(http.sentTo('https://img.test/a.png')).toHaveLength(2);
    });

    it('does not retry a failure that is not retryable', async () => {
      http.on('GET', 'https://img.test/a.png', () => ({ data: streamOf('pixels') }));
      const rejecting: InputStager = {
        isProviderReference: () => false,
        upload: vi
          .fn<[string, string, AbortSignal?], Promise<string>>()
          .mockRejectedValue(new RemoteCallError('Upload policy rejected', 403)),
      };

      const staging = resolver.ensureStaged('https://img.test/a.png', 'model-x', rejecting);

      await expect(staging).rejects.toThrow('Upload policy rejected');
      await expect(staging).rejects.toBeInstanceOf(RemoteCallError);
      expect(rejecting.upload).toHaveBeenCalledTimes(1);
      await expect(fs.readdir(resolver.tempDir)).resolves.toEqual([]);
    });

    it('reports a failed input fetch as a staging error after one retry', async () => {
      http.on('GET', 'https://img.test/a.png', { status: 404 });

      const staging = resolver.ensureStaged('https://img.test/a.png', 'model-x', stager);

      await expect(staging).rejects.toThrow(new InputStagingError('Failed to fetch input media https://img.test/a.png'));
      await expect(staging).rejects.toMatchObject({ cause: expect.any(DownloadError) });
      expect(http.sentTo('https://img.test/a.png')).toHaveLength(2);
    });

    it('wraps upload failures as staging errors', async () => {
      http.on('GET', 'https://img.test/a.png', () => ({ data: streamOf('pixels') }));
      const failing: InputStager = {
        isProviderReference: () => false,
        upload: async () => {
          throw new Error('quota exceeded');
        },
      };

      const staging = resolver.ensureStaged('https://img.test/a.png', 'model-x', failing);

      await expect(staging).rejects.toThrow(new InputStagingError('Failed to upload https://img.test/a.png: quota exceeded'));
      await expect(staging).rejects.toBeInstanceOf(InputStagingError);
    });
  });

  describe('resolveDisplayUrls', () => {
    it('maps files under the data root to media and download URLs', () => {
      const localPath = path.join(resolver.dataDir, 'videos', 'zhipuai', 'clip one.mp4');

      expect(resolver.resolveDisplayUrls(localPath)).toEqual({
        file_url: '/media/videos/zhipuai/clip one.mp4',
        download_url: 'https://api.test/api/download/clip%20one.mp4',
        absolute_url: 'https://api.test/media/videos/zhipuai/clip one.mp4',
      });
    });

    it('falls back to the file name outside the data root', () => {
      const outside = path.join(os.tmpdir(), 'elsewhere', 'clip.mp4');

      expect(resolver.resolveDisplayUrls(outside).file_url).toBe('/media/clip.mp4');
    });

    it('passes remote URLs through and maps an empty path to empty URLs', () => {
      expect(resolver.resolveDisplayUrls(VIDEO_URL)).toEqual({
        file_url: VIDEO_URL,
        download_url: VIDEO_URL,
        absolute_url: VIDEO_URL,
      });
      expect(resolver.resolveDisplayUrls('')).toEqual({ file_url: '', download_url: '', absolute_url: '' });
    });
  });

  describe('sweep', () => {
    it('reports nothing when the temp area does not exist yet', async () => {
      await expect(resolver.sweep()).resolves.toEqual({ expiredEntries: 0, orphanFiles: 0 });
    });

    it('drops expired entries, deleting only temp files, and clears stale orphans', async () => {
      http.on('GET', 'https://img.test/input.png', () => ({ data: streamOf('pixels') }));
      http.on('GET', VIDEO_URL, () => ({ data: streamOf('frames') }));
      const tempInput = await resolver.download('https://img.test/input.png', path.join(resolver.tempDir, 'input.png'));
      const video = await resolver.download(VIDEO_URL, resolver.videoPath('aliyun', 0));

      const staleOrphan = path.join(resolver.tempDir, 'stale.jpg');
      const freshOrphan = path.join(resolver.tempDir, 'fresh.jpg');
      await fs.writeFile(staleOrphan, 'old');
      await fs.writeFile(freshOrphan, 'new');
      await fs.utimes(staleOrphan, new Date(T0 - 2 * HOUR), new Date(T0 - 2 * HOUR));
      await fs.utimes(freshOrphan, new Date(T0 + 1.5 * HOUR), new Date(T0 + 1.5 * HOUR));

      clock.advance(2 * HOUR);
      const report = await resolver.sweep();

      expect(report).toEqual({ expiredEntries: 2, orphanFiles: 1 });
      expect(resolver.cacheSize).toBe(0);
      await expect(fs.access(tempInput)).rejects.toThrow();
      await expect(fs.access(staleOrphan)).rejects.toThrow();
      await expect(fs.readFile(video, 'utf8')).resolves.toBe('frames');
      await expect(fs.readFile(freshOrphan, 'utf8')).resolves.toBe('new');
    });

    it('runs lazily from download at most once per interval', async () => {
      http.on('GET', VIDEO_URL, () => ({ data: streamOf('frames') }));
      http.on('GET', 'https://cdn.test/other.mp4', () => ({ data: streamOf('other') }));
      await resolver.download(VIDEO_URL, resolver.videoPath('aliyun', 0));

      clock.advance(HOUR - 1);
      await resolver.download('https://cdn.test/other.mp4', resolver.videoPath('aliyun', 1));
      expect(resolver.cacheSize).toBe(2);

      clock.advance(HOUR + 1);
      await resolver.download('https://cdn.test/other.mp4', resolver.videoPath('aliyun', 2));
      expect(resolver.cacheEntry(VIDEO_URL)).toBeUndefined();
      expect(resolver.cacheSize).toBe(1);
    });
  });
});
