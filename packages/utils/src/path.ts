/**
 * Path Utilities
 */

import { basename, dirname, extname, join, posix, sep } from 'node:path';

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Strip the final extension from a relative path, keeping its directories.
 * `a/b.mp4` becomes `a/b`.
 */
export function stripExtension(relativePath: string): string {
  const dir = dirname(relativePath);
  const stem = getBasename(relativePath);
  return dir === '.' ? stem : join(dir, stem);
}

/**
 * Convert a platform path to forward slashes
 */
export function toPosixPath(p: string): string {
  return sep === '/' ? p : p.split(sep).join('/');
}

/**
 * Join a remote folder and a relative path. Remote paths are always POSIX.
 */
export function joinRemote(remoteFolder: string, relativePath: string): string {
  return posix.join(toPosixPath(remoteFolder), toPosixPath(relativePath));
}

/**
 * Every ancestor of a POSIX directory, root first, excluding the root itself.
 * `/d/a/b` yields `/d`, `/d/a`, `/d/a/b`; `d/a` yields `d`, `d/a`.
 */
export function remoteAncestors(remoteDir: string): string[] {
  const normalized = posix.normalize(remoteDir);
  if (normalized === '/' || normalized === '.' || normalized === '') {
    return [];
  }

  const absolute = normalized.startsWith('/');
  const segments = normalized.split('/').filter(Boolean);
  const result: string[] = [];

  for (let i = 1; i <= segments.length; i++) {
    const joined = segments.slice(0, i).join('/');
    result.push(absolute ? `/${joined}` : joined);
  }

  return result;
}

/**
 * Quote a string for a POSIX shell
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
