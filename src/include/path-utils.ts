/**
 * Path utilities for include resolution
 */

import fs from 'fs';
import path from 'path';

/**
 * Regex to match both Unix and Windows path separators
 */
export const PATH_SEP_REGEX = /[\\/]/;

/**
 * Normalize path separators to Unix style (forward slashes)
 */
export function toUnixPath(p: string): string {
  return p.split(PATH_SEP_REGEX).join('/');
}

/**
 * Last path segment, for either separator style
 *
 * @example
 * fileNameOf('/docs/chapters/intro.adoc')  // 'intro.adoc'
 * fileNameOf('C:\\docs\\intro.adoc')       // 'intro.adoc'
 */
export function fileNameOf(p: string): string {
  const segments = p.split(PATH_SEP_REGEX);
  return segments[segments.length - 1] ?? p;
}

/**
 * True when `p` exists and is a regular file
 */
export function isFile(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

/**
 * Directory relative paths are resolved against.
 * A file resolves to its directory; an empty base to the working directory.
 */
export function baseDirectoryOf(basePath: string): string {
  if (!basePath) return process.cwd();
  const absolute = path.resolve(basePath);
  return isFile(absolute) ? path.dirname(absolute) : absolute;
}

/**
 * Case-insensitive comparison key of an absolute path
 */
export function pathKey(p: string): string {
  return toUnixPath(path.resolve(p)).toLowerCase();
}
