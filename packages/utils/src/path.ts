/**
 * Path Utilities
 */

import { extname, basename, dirname, relative, sep } from 'node:path';

/**
 * Convert a platform path to forward slashes
 */
export function toPosixPath(filePath: string): string {
  return filePath.split(sep).join('/');
}

/**
 * Get file extension including the dot, as written (".png", "" when absent)
 */
export function getExtension(filename: string): string {
  return extname(filename);
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Path of a file relative to a root, without its extension, in posix form.
 * Files sitting directly in the root get a "." directory part ("./foo").
 */
export function toRelativeStem(root: string, filePath: string): string {
  const dir = toPosixPath(relative(root, dirname(filePath)));
  return `${dir === '' ? '.' : dir}/${getBasename(filePath)}`;
}
