import type { FileEntry, PathFilters } from '../types/index.js';
import { ConfigurationError, errorMessage } from '../errors.js';

export function compilePatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(pattern);
    } catch (error) {
      throw new ConfigurationError(`Invalid pattern "${pattern}": ${errorMessage(error)}`, {
        hint: 'Patterns are regular expressions matched anywhere in the relative path',
      });
    }
  });
}

/**
 * Applies include patterns first (when any are given), then exclude patterns.
 * The returned array holds the same entry objects, so selection flags stay shared.
 */
export function filterByPatterns(entries: readonly FileEntry[], filters: PathFilters): FileEntry[] {
  const include = compilePatterns(filters.include ?? []);
  const exclude = compilePatterns(filters.exclude ?? []);

  return entries.filter((entry) => {
    if (include.length > 0 && !include.some((re) => re.test(entry.path))) {
      return false;
    }
    return !exclude.some((re) => re.test(entry.path));
  });
}

export function filterByText(entries: readonly FileEntry[], text: string): FileEntry[] {
  const needle = text.trim().toLowerCase();
  if (!needle) return [...entries];
  return entries.filter((entry) => entry.path.toLowerCase().includes(needle));
}
