import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import clipboard from 'clipboardy';
import chalk from 'chalk';
import type { OutputTarget } from '../types/index.js';
import { CompendiumError, ConfigurationError, errorMessage } from '../errors.js';

/**
 * Writes the encoded document to its sink and returns a short status line
 * for the caller to display.
 */
export async function writeOutput(content: string, target: OutputTarget): Promise<string> {
  switch (target.mode) {
    case 'file':
      writeToFile(content, target.path);
      return `Written to ${target.path}`;
    case 'stdout':
      writeToStdout(content);
      return `${content.length.toLocaleString()} chars written to stdout`;
    case 'clipboard':
      return writeToClipboard(content);
  }
}

export function writeToFile(content: string, outputFile: string): void {
  if (!outputFile) {
    throw new ConfigurationError('No output file specified', {
      hint: 'Pass --output <file>, --stdout or --clipboard',
    });
  }

  try {
    mkdirSync(dirname(outputFile), { recursive: true });
    writeFileSync(outputFile, content, 'utf-8');
  } catch (error) {
    throw new CompendiumError('write', `Error writing file: ${errorMessage(error)}`, {
      path: outputFile,
      cause: error,
    });
  }
}

function writeToStdout(content: string): void {
  try {
    process.stdout.write(content.endsWith('\n') ? content : `${content}\n`);
  } catch (error) {
    throw new CompendiumError('write', `Error writing to stdout: ${errorMessage(error)}`, { cause: error });
  }
}

async function writeToClipboard(content: string): Promise<string> {
  try {
    await clipboard.write(content);
    return `${content.length.toLocaleString()} chars copied to clipboard`;
  } catch {
    console.error(chalk.yellow('⚠️ Clipboard not available, printing to stdout'));
    writeToStdout(content);
    return `${content.length.toLocaleString()} chars written to stdout`;
  }
}
