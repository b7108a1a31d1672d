import { posix } from 'node:path';
import type { FileContent } from '../types/index.js';
import { comparePaths } from '../core/scanner.js';

export const MARKDOWN_TITLE = '# Repository Code Compendium';

/** Bare extension used as the code fence language: `a.py` -> `py`, `Makefile` -> `` */
export function fenceLanguage(filePath: string): string {
  return posix.extname(posix.basename(filePath)).slice(1);
}

export function formatCodeBlock(filePath: string, content: string): string {
  return `\`\`\`${fenceLanguage(filePath)}\n${content}\n\`\`\`\n\n`;
}

/**
 * Files grouped by directory; directories in sorted order (the root, as
 * the empty string, comes first) and files sorted by path within each.
 */
export function formatMarkdown(contents: readonly FileContent[]): string {
  const byDirectory = new Map<string, FileContent[]>();
  for (const file of contents) {
    const dir = posix.dirname(file.path);
    const key = dir === '.' ? '' : dir;
    const group = byDirectory.get(key);
    if (group) {
      group.push(file);
    } else {
      byDirectory.set(key, [file]);
    }
  }

  let result = `${MARKDOWN_TITLE}\n\n`;

  for (const dir of [...byDirectory.keys()].sort(comparePaths)) {
    result += dir ? `## Directory: ${dir}\n\n` : '## Root Directory\n\n';

    const files = [...(byDirectory.get(dir) ?? [])].sort((a, b) => comparePaths(a.path, b.path));
    for (const file of files) {
      result += `### File: ${file.path}\n\n`;
      result += formatCodeBlock(file.path, file.content);
    }
  }

  return result;
}
