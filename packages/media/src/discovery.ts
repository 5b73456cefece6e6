/**
 * Asset Discovery
 * 
 * Recursive scan of a source folder for video files.
 */

import { readdir } from 'node:fs/promises';
import { join, relative } from 'node:path';
import { getExtension, isDirectory } from '@clipferry/utils';
import { ValidationError, type DiscoveredAsset } from '@clipferry/core';

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  'mp4', 'avi', 'mkv', 'mov', 'wmv', 'flv', 'webm',
  'm4v', 'mpg', 'mpeg', '3gp', 'ts',
]);

export function isVideoFile(filePath: string): boolean {
  return VIDEO_EXTENSIONS.has(getExtension(filePath));
}

async function scanDirectory(dirPath: string, root: string, results: DiscoveredAsset[]): Promise<void> {
  const entries = await readdir(dirPath, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);

    if (entry.isDirectory()) {
      await scanDirectory(fullPath, root, results);
    } else if (entry.isFile() && isVideoFile(entry.name)) {
      results.push({
        sourcePath: fullPath,
        relativePath: relative(root, fullPath),
      });
    }
  }
}

/**
 * Find every video file under `root`, sorted by relative path
 */
export async function discoverAssets(root: string): Promise<DiscoveredAsset[]> {
  if (!(await isDirectory(root))) {
    throw new ValidationError('sourceRoot', `not a directory: ${root}`);
  }

  const results: DiscoveredAsset[] = [];
  await scanDirectory(root, root, results);

  return results.sort((a, b) =>
    a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0
  );
}
