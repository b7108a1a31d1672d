import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';

import type { CLIOptions, FileEntry, OutputTarget } from './types/index.js';
import {
  buildScanConfiguration,
  getDefaultOptions,
  parseFormat,
  parseList,
  usesSuggestedOutput,
} from './config/builder.js';
import { Compendium } from './core/compendium.js';
import { assertDirectory } from './core/scanner.js';
import { filterByPatterns } from './core/filter.js';
import { selectedEntries } from './core/selection.js';
import { printWarning } from './core/reader.js';
import { writeOutput } from './output/writer.js';
import { suggestOutputPath } from './output/paths.js';
import { formatInventory } from './output/table.js';
import { runSelectionPrompt } from './interactive/wizard.js';
import { CompendiumError, errorMessage } from './errors.js';
import { Defaults, OUTPUT_FORMATS } from './constants/defaults.js';

const VERSION = '1.0.0';

const program = new Command();

program
  .name('repo-compendium')
  .description('Bundle the text files of a repository into one Markdown, JSON or plain-text compendium for LLMs')
  .version(VERSION)
  .argument('[root_dir]', 'Repository directory to scan', '.')

  // Output options
  .option('-o, --output <file>', 'Write to file (default: <root>/compendium/<name>_compendium.<ext>)')
  .option('--stdout', 'Print to stdout')
  .option('--clipboard', 'Copy to the clipboard')
  .option('--format <format>', `Output format (${OUTPUT_FORMATS.join(', ')})`, Defaults.OUTPUT_FORMAT)

  // Filtering
  .option('--exclude-folders <folders>', 'Comma-separated folders to leave out')
  .option('--include-folders <folders>', 'Comma-separated folders to keep; everything else is left out')
  .option('--include <patterns>', 'Comma-separated regular expressions; keep only matching paths')
  .option('--exclude <patterns>', 'Comma-separated regular expressions; drop matching paths')
  .option('--max-size <size>', `Max file size, 0 for no limit (default: ${Defaults.MAX_SIZE})`, Defaults.MAX_SIZE)
  .option('--gitignore', 'Also skip paths matched by the root .gitignore')

  // Features
  .option('--interactive', 'Pick the files to include from a checklist')
  .option('--list', 'Print the file inventory and exit')

  .action(async (rootDirArg: string, opts: Record<string, unknown>) => {
    try {
      await run(rootDirArg, opts);
    } catch (error) {
      console.error(chalk.red(`❌ Error: ${errorMessage(error)}`));
      if (error instanceof CompendiumError) {
        if (error.hint) {
          console.error(chalk.dim(`   ${error.hint}`));
        }
        process.exit(error.code);
      }
      process.exit(1);
    }
  });

function stringList(value: unknown): string[] {
  if (typeof value === 'string') return parseList(value);
  if (Array.isArray(value)) return parseList(value.filter((v): v is string => typeof v === 'string'));
  return [];
}

function parseOptions(opts: Record<string, unknown>): CLIOptions {
  return {
    ...getDefaultOptions(),
    output: typeof opts.output === 'string' ? opts.output : undefined,
    stdout: Boolean(opts.stdout),
    clipboard: Boolean(opts.clipboard),
    format: parseFormat(typeof opts.format === 'string' ? opts.format : Defaults.OUTPUT_FORMAT),
    excludeFolders: stringList(opts.excludeFolders),
    includeFolders: stringList(opts.includeFolders),
    include: stringList(opts.include),
    exclude: stringList(opts.exclude),
    maxSize: typeof opts.maxSize === 'string' ? opts.maxSize : Defaults.MAX_SIZE,
    gitignore: Boolean(opts.gitignore),
    interactive: Boolean(opts.interactive),
    list: Boolean(opts.list),
  };
}

function resolveTarget(options: CLIOptions, rootDir: string): OutputTarget {
  if (usesSuggestedOutput(options)) return { mode: 'file', path: suggestOutputPath(rootDir, options.format) };
  if (options.output) return { mode: 'file', path: resolve(options.output) };
  return options.stdout ? { mode: 'stdout' } : { mode: 'clipboard' };
}

async function run(rootDirArg: string, opts: Record<string, unknown>): Promise<void> {
  const options = parseOptions(opts);
  const rootDir = resolve(rootDirArg);
  assertDirectory(rootDir);

  const configuration = buildScanConfiguration(options);
  const warnings: { message: string; path: string }[] = [];
  const spinner = ora('Scanning files...');
  const compendium = new Compendium({
    configuration,
    onProgress: (message) => {
      spinner.text = message;
    },
    onWarning: (message, path) => {
      warnings.push({ message, path });
    },
  });

  spinner.start();
  let entries: FileEntry[];
  try {
    entries = filterByPatterns(compendium.scan(rootDir), {
      include: options.include,
      exclude: options.exclude,
    });
  } catch (error) {
    spinner.fail('Scan failed');
    throw error;
  }

  let status = `Found ${entries.length.toLocaleString()} files`;
  if (configuration.excludedFolders.size > 0) {
    status += ` (Excluded ${configuration.excludedFolders.size} folders)`;
  }
  spinner.succeed(status);

  if (options.list) {
    console.log(formatInventory(entries));
    return;
  }

  if (options.interactive) {
    await runSelectionPrompt(entries);
  }

  const target = resolveTarget(options, rootDir);
  const request = { rootPath: rootDir, entries: selectedEntries(entries), format: options.format };

  spinner.start('Generating compendium...');
  let message: string;
  let extracted: number;
  try {
    if (target.mode === 'file') {
      extracted = compendium.run({ ...request, outputPath: target.path }).extracted;
      message = `Written to ${target.path}`;
    } else {
      const result = compendium.build(request);
      extracted = result.extracted;
      spinner.stop();
      message = await writeOutput(result.document, target);
    }
  } catch (error) {
    spinner.fail('Failed to generate compendium');
    throw error;
  }
  spinner.stop();

  for (const warning of warnings) {
    printWarning(warning.message, warning.path);
  }
  console.error(chalk.green(`✅ Compendium generated with ${extracted.toLocaleString()} files. ${message}`));
}

await program.parseAsync();
