import { basename, join, parse, resolve } from 'node:path';
import type { OutputFormat } from '../types/index.js';
import { getEncoder } from '../formatters/index.js';
import { Defaults } from '../constants/defaults.js';

export function defaultExtension(format: OutputFormat): string {
  return getEncoder(format).extension;
}

/** Swaps the extension of an output path to the one the format writes. */
export function withFormatExtension(outputPath: string, format: OutputFormat): string {
  const { dir, name } = parse(outputPath);
  const file = `${name}${defaultExtension(format)}`;
  return dir ? join(dir, file) : file;
}

/** `<root>/compendium/<root name>_compendium<ext>` */
export function suggestOutputPath(rootDir: string, format: OutputFormat): string {
  const root = resolve(rootDir);
  return join(root, Defaults.OUTPUT_DIR, `${basename(root)}_compendium${defaultExtension(format)}`);
}
