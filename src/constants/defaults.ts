import ignoreLists from './ignore-lists.json' with { type: 'json' };
import type { OutputFormat } from '../types/index.js';

export const Defaults = {
  MAX_FILE_SIZE: 1024 * 1024,
  MAX_SIZE: '1M',
  SAMPLE_BYTES: 1024,
  OUTPUT_FORMAT: 'markdown',
  OUTPUT_DIR: 'compendium',
} as const;

// Directory basenames never descended into
export const IgnoredDirectoryNames: ReadonlySet<string> = new Set(ignoreLists.directories);

// Lowercase, dot-prefixed; compound entries like '.min.js' are matched as suffixes
export const IgnoredExtensions: ReadonlySet<string> = new Set(ignoreLists.extensions);

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['markdown', 'json', 'plain', 'outline'];

export const SEPARATOR_WIDTH = 80;
export const UNDERLINE_PADDING = 6;
