import { compileGlob } from './glob.js';

/**
 * Ordered set of compiled ignore patterns. Every pattern is compiled up front so that a
 * malformed one surfaces before the tree is touched.
 */
export class IgnoreMatcher {
  private readonly compiled: RegExp[];

  constructor(patterns: readonly string[] = []) {
    this.compiled = patterns.map(compileGlob);
  }

  /** True when any pattern matches the normalized relative path. */
  matches(relativePath: string): boolean {
    return this.compiled.some((regex) => regex.test(relativePath));
  }
}
