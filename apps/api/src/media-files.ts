// Media file lookup for the download endpoint

import fs from 'fs/promises';
import path from 'path';

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
  '.mov': 'video/quicktime',
  '.avi': 'video/x-msvideo',
  '.mkv': 'video/x-matroska',
  '.flv': 'video/x-flv',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
};

const PROVIDER_DIRECTORIES = ['aliyun', 'zhipuai'] as const;

export function contentTypeFor(fileName: string): string {
  return CONTENT_TYPES[path.extname(fileName).toLowerCase()] ?? 'application/octet-stream';
}

/** A bare file name: no separators, no parent references. */
export function isPlainFileName(fileName: string): boolean {
  return (
    fileName.length > 0 &&
    fileName !== '.' &&
    fileName !== '..' &&
    !/[/\\\0]/.test(fileName)
  );
}

/**
 * Find `fileName` under the data root: `videos/`, then each provider's video
 * directory, then anywhere below the root. Resolves to null when absent.
 */
export async function locateMediaFile(dataDir: string, fileName: string): Promise<string | null> {
  if (!isPlainFileName(fileName)) return null;

  const root = path.resolve(dataDir);
  const videosDir = path.join(root, 'videos');
  const candidates = [
    path.join(videosDir, fileName),
    ...PROVIDER_DIRECTORIES.map(provider => path.join(videosDir, provider, fileName)),
  ];
  for (const candidate of candidates) {
    if (await isFile(candidate)) return candidate;
  }

  let entries: string[];
  try {
    entries = await fs.readdir(root, { recursive: true });
  } catch {
    return null;
  }
  for (const entry of entries.sort()) {
    if (path.basename(entry) !== fileName) continue;
    const candidate = path.join(root, entry);
    if (await isFile(candidate)) return candidate;
  }
  return null;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}
