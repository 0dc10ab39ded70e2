// packages/core/src/config/ignore.ts — gitignore-style exclusion of directory entries

import ignore, { type Ignore } from 'ignore';

/**
 * Compile scan exclusion patterns into a single matcher.
 * Patterns use .gitignore syntax and are matched against top-level entry names.
 */
export function createExcludeFilter(patterns: readonly string[]): Ignore {
  return ignore().add([...patterns]);
}

/** Test one entry name; directories are matched with a trailing slash so `build/` patterns work. */
export function isExcluded(filter: Ignore, name: string, isDirectory: boolean): boolean {
  return filter.ignores(isDirectory ? `${name}/` : name);
}
