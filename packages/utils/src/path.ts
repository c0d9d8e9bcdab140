/**
 * Path Utilities
 */

import { posix, sep } from 'node:path';

/**
 * Join archive path segments with forward slashes, whatever the host separator
 */
export function joinEntryPath(...segments: string[]): string {
  return posix.join(...segments.map(toPosixPath));
}

/**
 * Convert a host path to forward slashes
 */
export function toPosixPath(filePath: string): string {
  return sep === '\\' ? filePath.replace(/\\/g, '/') : filePath;
}

/**
 * Extension of the last segment of an archive entry name, dot included.
 * Directory names (trailing slash) and dot-files have none.
 */
export function getEntryExtension(entryName: string): string {
  if (entryName.endsWith('/')) {
    return '';
  }
  return posix.extname(entryName);
}

export function isDirectoryEntryName(entryName: string): boolean {
  return entryName.endsWith('/');
}
