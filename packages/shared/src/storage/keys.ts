import { isAbsolute, relative, resolve, sep } from 'node:path';
import { StorageError } from '@appraise/domain';

/** Rejects keys that could name anything outside the storage root, before any path math. */
export function assertSafeKey(key: string): void {
  if (
    key.length === 0 ||
    key.includes('\0') ||
    key.startsWith('/') ||
    key.startsWith('\\') ||
    isAbsolute(key) ||
    key.split(/[/\\]/).includes('..')
  ) {
    throw new StorageError('PATH_TRAVERSAL', `Invalid storage key: ${JSON.stringify(key)}`, key);
  }
}

export function resolveWithinRoot(root: string, key: string): string {
  assertSafeKey(key);
  const target = resolve(root, key);
  const rel = relative(root, target);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel) || rel.split(sep).includes('..')) {
    throw new StorageError('PATH_TRAVERSAL', `Storage key escapes root: ${JSON.stringify(key)}`, key);
  }
  return target;
}
