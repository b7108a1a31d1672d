import { resolve } from 'node:path';
import type {
  DecodeMode,
  FileContent,
  FileEntry,
  OutputFormat,
  PathFilters,
  ScanConfiguration,
  Stage,
} from '../types/index.js';
import { CompendiumError, ConfigurationError, errorMessage } from '../errors.js';
import { createScanConfiguration } from '../config/builder.js';
import { getEncoder } from '../formatters/index.js';
import { writeToFile } from '../output/writer.js';
import { assertDirectory, scanRepository } from './scanner.js';
import { filterByPatterns } from './filter.js';
import { readFiles, type WarningHandler } from './reader.js';

export type ProgressHandler = (message: string) => void;

export interface CompendiumOptions {
  configuration?: ScanConfiguration | undefined;
  onProgress?: ProgressHandler | undefined;
  onWarning?: WarningHandler | undefined;
}

export interface BuildRequest {
  rootPath: string;
  format: OutputFormat;
  /** A previously scanned inventory; scanned afresh when omitted */
  entries?: readonly FileEntry[] | undefined;
  /** Overrides the entries' own `selected` flags */
  select?: ((entry: FileEntry) => boolean) | undefined;
  filters?: PathFilters | undefined;
}

export interface RunRequest extends BuildRequest {
  outputPath: string;
}

export interface CompendiumResult {
  document: string;
  scanned: number;
  selected: number;
  extracted: number;
}

/**
 * Scan -> select -> extract -> encode -> write. Every call is synchronous and
 * holds no state between runs apart from the configuration it was built with.
 */
export class Compendium {
  readonly configuration: ScanConfiguration;
  private readonly onProgress: ProgressHandler;
  private readonly onWarning: WarningHandler | undefined;

  constructor(options: CompendiumOptions = {}) {
    this.configuration = options.configuration ?? createScanConfiguration();
    this.onProgress = options.onProgress ?? (() => undefined);
    this.onWarning = options.onWarning;
  }

  scan(rootPath: string): FileEntry[] {
    this.onProgress(`Scanning ${rootPath}...`);
    return this.stage('scan', rootPath, () => scanRepository(rootPath, this.configuration));
  }

  extract(rootPath: string, entries: readonly FileEntry[], decode: DecodeMode = 'replace'): FileContent[] {
    this.onProgress(`Reading ${entries.length.toLocaleString()} files...`);
    return this.stage('extract', rootPath, () =>
      readFiles(rootPath, entries, { decode, onWarning: this.onWarning })
    );
  }

  encode(contents: readonly FileContent[], format: OutputFormat): string {
    this.onProgress(`Formatting ${contents.length.toLocaleString()} files as ${format}...`);
    return this.stage('encode', undefined, () => getEncoder(format).encode(contents));
  }

  build(request: BuildRequest): CompendiumResult {
    return this.assemble(request, undefined);
  }

  run(request: RunRequest): CompendiumResult {
    if (!request.outputPath) {
      throw new ConfigurationError('No output file specified', {
        hint: 'Pass --output <file>, --stdout or --clipboard',
      });
    }

    const outputPath = resolve(request.outputPath);
    const result = this.assemble(request, outputPath);
    this.onProgress(`Writing ${outputPath}...`);
    writeToFile(result.document, outputPath);
    return result;
  }

  /** `outputPath` is left out of the inventory so a rerun never reads its own previous output. */
  private assemble(request: BuildRequest, outputPath: string | undefined): CompendiumResult {
    const rootDir = resolve(request.rootPath);
    assertDirectory(rootDir);

    const scanned = request.entries ?? this.scan(rootDir);
    const inventory = outputPath
      ? scanned.filter((entry) => resolve(rootDir, entry.path) !== outputPath)
      : scanned;
    const candidates = request.filters ? filterByPatterns(inventory, request.filters) : [...inventory];
    const isSelected = request.select ?? ((entry: FileEntry) => entry.selected);
    const selected = candidates.filter(isSelected);

    if (selected.length === 0) {
      throw new ConfigurationError('No files selected for inclusion', {
        path: rootDir,
        hint: 'Loosen the folder or pattern filters, or select at least one file',
      });
    }

    // The outline variant keeps legacy-encoded files readable instead of replacing bytes
    const decode: DecodeMode = request.format === 'outline' ? 'latin1-fallback' : 'replace';
    const contents = this.extract(rootDir, selected, decode);
    const document = this.encode(contents, request.format);

    return {
      document,
      scanned: inventory.length,
      selected: selected.length,
      extracted: contents.length,
    };
  }

  private stage<T>(stage: Stage, path: string | undefined, task: () => T): T {
    try {
      return task();
    } catch (error) {
      if (error instanceof CompendiumError) {
        throw error;
      }
      throw new CompendiumError(stage, `${stage} failed: ${errorMessage(error)}`, { path, cause: error });
    }
  }
}
