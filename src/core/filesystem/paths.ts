import * as path from 'node:path';
import { FilesystemError } from '../../utils/errors.js';

/**
 * Normalize a target path: POSIX separators, no leading or trailing slash,
 * `''` for the root. Paths escaping the root are rejected.
 */
export function normalizeTargetPath(target: string): string {
  const normalized = path.posix.normalize(target.replace(/\\/g, '/'));
  const trimmed = normalized.replace(/^\/+/, '').replace(/\/+$/, '');
  const result = trimmed === '.' ? '' : trimmed;

  if (result === '..' || result.startsWith('../')) {
    throw new FilesystemError(`Path escapes the filesystem root: ${target}`, { path: target });
  }

  return result;
}

/**
 * Join target path segments.
 */
export function joinTargetPath(...segments: string[]): string {
  return normalizeTargetPath(path.posix.join(...segments));
}

/**
 * Parent directories of a normalized path, outermost first.
 */
export function parentDirectories(target: string): string[] {
  const parts = target.split('/').slice(0, -1);
  return parts.map((_, i) => parts.slice(0, i + 1).join('/'));
}
