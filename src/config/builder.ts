import type { CLIOptions, OutputFormat, ScanConfiguration } from '../types/index.js';
import { Defaults, IgnoredDirectoryNames, IgnoredExtensions, OUTPUT_FORMATS } from '../constants/defaults.js';
import { ConfigurationError } from '../errors.js';
import { normalizeFolder } from '../core/scanner.js';

export interface ScanConfigurationInput {
  ignoredDirectoryNames?: Iterable<string> | undefined;
  ignoredExtensions?: Iterable<string> | undefined;
  maxFileSize?: number | undefined;
  excludedFolders?: Iterable<string> | undefined;
  includedFolders?: Iterable<string> | undefined;
  useGitignore?: boolean | undefined;
}

/**
 * Returns `undefined` for an empty string or `0`, meaning no size limit.
 */
export function parseSize(sizeStr: string): number | undefined {
  if (!sizeStr) return undefined;

  const normalized = sizeStr.trim().toLowerCase();
  if (normalized === '0') return undefined;

  const multipliers: Record<string, number> = {
    k: 1024,
    m: 1024 ** 2,
    g: 1024 ** 3,
  };

  const lastChar = normalized.slice(-1);
  const multiplier = multipliers[lastChar];
  const digits = multiplier === undefined ? normalized : normalized.slice(0, -1);

  if (!/^\d+$/.test(digits)) {
    throw new ConfigurationError(`Invalid size: ${sizeStr}`, {
      hint: 'Use a byte count or a number with a K, M or G suffix, e.g. 512K',
    });
  }

  return parseInt(digits, 10) * (multiplier ?? 1);
}

export function parseList(value: string | readonly string[] | undefined): string[] {
  if (value === undefined) return [];
  const items = typeof value === 'string' ? [value] : value;
  return items.flatMap((item) => item.split(',').map((s) => s.trim()).filter(Boolean));
}

export function parseFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!format) {
    throw new ConfigurationError(`Unknown output format: ${value}`, {
      hint: `Choose one of: ${OUTPUT_FORMATS.join(', ')}`,
    });
  }
  return format;
}

function normalizeFolders(folders: Iterable<string> | undefined): ReadonlySet<string> {
  const normalized = new Set<string>();
  for (const folder of folders ?? []) {
    const value = normalizeFolder(folder);
    if (value) {
      normalized.add(value);
    }
  }
  return normalized;
}

export function createScanConfiguration(input: ScanConfigurationInput = {}): ScanConfiguration {
  const ignoredExtensions = new Set<string>();
  for (const ext of input.ignoredExtensions ?? IgnoredExtensions) {
    const lower = ext.trim().toLowerCase();
    if (lower) {
      ignoredExtensions.add(lower.startsWith('.') ? lower : `.${lower}`);
    }
  }

  return Object.freeze({
    ignoredDirectoryNames: new Set(input.ignoredDirectoryNames ?? IgnoredDirectoryNames),
    ignoredExtensions,
    maxFileSize: input.maxFileSize ?? Defaults.MAX_FILE_SIZE,
    excludedFolders: normalizeFolders(input.excludedFolders),
    includedFolders: normalizeFolders(input.includedFolders),
    useGitignore: input.useGitignore ?? false,
  });
}

/** Without an explicit target the output goes to the suggested path inside the root, so its folder is skipped. */
export function usesSuggestedOutput(options: CLIOptions): boolean {
  return !options.output && !options.stdout && !options.clipboard;
}

export function buildScanConfiguration(options: CLIOptions): ScanConfiguration {
  return createScanConfiguration({
    maxFileSize: parseSize(options.maxSize) ?? Number.POSITIVE_INFINITY,
    excludedFolders: usesSuggestedOutput(options)
      ? [...options.excludeFolders, Defaults.OUTPUT_DIR]
      : options.excludeFolders,
    includedFolders: options.includeFolders,
    useGitignore: options.gitignore,
  });
}

export function getDefaultOptions(): CLIOptions {
  return {
    stdout: false,
    clipboard: false,
    format: Defaults.OUTPUT_FORMAT,
    excludeFolders: [],
    includeFolders: [],
    include: [],
    exclude: [],
    maxSize: Defaults.MAX_SIZE,
    gitignore: false,
    interactive: false,
    list: false,
  };
}
