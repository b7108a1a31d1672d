import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors.js';
import {
  buildScanConfiguration,
  createScanConfiguration,
  getDefaultOptions,
  parseFormat,
  parseList,
  parseSize,
  usesSuggestedOutput,
} from './builder.js';

describe('parseSize', () => {
  it('parses plain byte counts and K/M/G suffixes', () => {
    expect(parseSize('512')).toBe(512);
    expect(parseSize('2k')).toBe(2048);
    expect(parseSize('1M')).toBe(1048576);
    expect(parseSize('1G')).toBe(1073741824);
  });

  it('treats empty and zero as no limit', () => {
    expect(parseSize('')).toBeUndefined();
    expect(parseSize('0')).toBeUndefined();
  });

  it('rejects malformed sizes', () => {
    expect(() => parseSize('big')).toThrow(ConfigurationError);
    expect(() => parseSize('1.5M')).toThrow(/Invalid size/);
  });
});

describe('parseList', () => {
  it('splits comma-separated values and drops blanks', () => {
    expect(parseList(' src, build ,,docs ')).toEqual(['src', 'build', 'docs']);
    expect(parseList(['a,b', 'c'])).toEqual(['a', 'b', 'c']);
    expect(parseList(undefined)).toEqual([]);
  });
});

describe('parseFormat', () => {
  it('accepts known formats case-insensitively', () => {
    expect(parseFormat('JSON')).toBe('json');
    expect(parseFormat('outline')).toBe('outline');
  });

  it('rejects unknown formats', () => {
    expect(() => parseFormat('xml')).toThrow(/Unknown output format: xml/);
  });
});

describe('createScanConfiguration', () => {
  it('starts from the default ignore lists and a 1 MiB cap', () => {
    const config = createScanConfiguration();
    expect(config.ignoredDirectoryNames.has('.git')).toBe(true);
    expect(config.ignoredDirectoryNames.has('node_modules')).toBe(true);
    expect(config.ignoredExtensions.has('.min.js')).toBe(true);
    expect(config.maxFileSize).toBe(1048576);
    expect(config.excludedFolders.size).toBe(0);
    expect(config.includedFolders.size).toBe(0);
    expect(config.useGitignore).toBe(false);
  });

  it('normalizes extensions and folders', () => {
    const config = createScanConfiguration({
      ignoredExtensions: ['PY', '.Log', ' '],
      excludedFolders: ['./build/', '', 'src\\gen'],
    });
    expect([...config.ignoredExtensions]).toEqual(['.py', '.log']);
    expect([...config.excludedFolders]).toEqual(['build', 'src/gen']);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(createScanConfiguration())).toBe(true);
  });
});

describe('buildScanConfiguration', () => {
  it('maps CLI options onto the configuration', () => {
    const config = buildScanConfiguration({
      ...getDefaultOptions(),
      stdout: true,
      maxSize: '2K',
      excludeFolders: ['dist'],
      includeFolders: ['src'],
      gitignore: true,
    });
    expect(config.maxFileSize).toBe(2048);
    expect([...config.excludedFolders]).toEqual(['dist']);
    expect([...config.includedFolders]).toEqual(['src']);
    expect(config.useGitignore).toBe(true);
  });

  it('skips the compendium folder when writing to the suggested path', () => {
    const config = buildScanConfiguration({ ...getDefaultOptions(), excludeFolders: ['dist'] });
    expect([...config.excludedFolders]).toEqual(['dist', 'compendium']);
  });

  it('scans the compendium folder when an explicit target is given', () => {
    const options = { ...getDefaultOptions(), output: 'bundle.md' };
    expect(usesSuggestedOutput(options)).toBe(false);
    expect([...buildScanConfiguration(options).excludedFolders]).toEqual([]);
  });

  it('lifts the size cap for --max-size 0', () => {
    const config = buildScanConfiguration({ ...getDefaultOptions(), maxSize: '0' });
    expect(config.maxFileSize).toBe(Number.POSITIVE_INFINITY);
  });
});
