import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { TextDecoder } from 'node:util';
import chalk from 'chalk';
import type { DecodeMode, FileContent, FileEntry } from '../types/index.js';
import { errorMessage } from '../errors.js';

export type WarningHandler = (message: string, path: string) => void;

export interface ReadOptions {
  decode?: DecodeMode | undefined;
  onWarning?: WarningHandler | undefined;
}

export const printWarning: WarningHandler = (message) => {
  console.error(chalk.yellow(`⚠️ ${message}`));
};

export function decodeContent(buffer: Buffer, mode: DecodeMode = 'replace'): string {
  if (mode === 'replace') {
    return buffer.toString('utf-8');
  }
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(buffer);
  } catch {
    return buffer.toString('latin1');
  }
}

/**
 * Reads the entries in order. A file that cannot be read is reported
 * through `onWarning` and left out; the rest of the batch continues.
 */
export function readFiles(
  rootDir: string,
  entries: readonly Pick<FileEntry, 'path'>[],
  options: ReadOptions = {}
): FileContent[] {
  const onWarning = options.onWarning ?? printWarning;
  const results: FileContent[] = [];

  for (const entry of entries) {
    const absPath = join(rootDir, entry.path);
    try {
      const buffer = readFileSync(absPath);
      results.push({ path: entry.path, content: decodeContent(buffer, options.decode) });
    } catch (error) {
      onWarning(`Error reading file ${entry.path}: ${errorMessage(error)}`, entry.path);
    }
  }

  return results;
}
