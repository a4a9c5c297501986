import path from 'node:path';

import { PathError } from '../errors.js';

function toPosixPath(p: string): string {
  return p.split(path.sep).join('/');
}

/**
 * Root-relative path of a descendant, with `/` separators and no `.`/`..` segments,
 * leading slash or trailing slash.
 */
export function toRelativePath(root: string, fullPath: string): string {
  const rel = path.relative(root, fullPath);
  if (rel === '' || path.isAbsolute(rel)) {
    throw new PathError(fullPath, root);
  }

  const segments = toPosixPath(rel)
    .split('/')
    .filter((segment) => segment !== '' && segment !== '.');

  if (segments.length === 0 || segments.includes('..')) {
    throw new PathError(fullPath, root);
  }

  return segments.join('/');
}

/** Patterns are written root-relative; accept Windows separators and a leading `./` or `/`. */
export function normalizePatternPath(pattern: string): string {
  let out = pattern.replace(/\\/g, '/');
  if (out.startsWith('./')) out = out.slice(2);
  else if (out.startsWith('/')) out = out.slice(1);
  return out;
}
