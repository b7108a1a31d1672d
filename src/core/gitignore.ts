import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import ignore from 'ignore';
import { minimatch } from 'minimatch';

export interface GitignoreMatcher {
  ignores(relPath: string, isDirectory?: boolean): boolean;
}

export function parseGitignore(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Gitignore rules, plus a `**\/<pattern>` fallback so that patterns containing
 * a slash also match below the root (`build/out` ignores `pkg/build/out`).
 */
export function createGitignoreMatcher(patterns: readonly string[]): GitignoreMatcher {
  const rules = ignore().add([...patterns]);
  // Slash-free patterns already match at any depth; '/' and '!' keep their meaning
  const fallbacks = patterns
    .filter((pattern) => !pattern.startsWith('!') && !pattern.startsWith('/'))
    .map((pattern) => ({
      body: pattern.replace(/\/+$/, ''),
      directoryOnly: pattern.endsWith('/'),
    }))
    .filter(({ body }) => body.includes('/'))
    .map(({ body, directoryOnly }) => ({ glob: `**/${body}`, directoryOnly }));

  return {
    ignores(relPath: string, isDirectory = false): boolean {
      if (relPath === '') {
        return false;
      }
      const candidate = isDirectory ? `${relPath}/` : relPath;
      if (rules.ignores(candidate)) {
        return true;
      }
      return fallbacks.some(
        (fallback) =>
          (isDirectory || !fallback.directoryOnly) &&
          minimatch(relPath, fallback.glob, { dot: true })
      );
    },
  };
}

export function loadGitignore(rootDir: string): GitignoreMatcher | null {
  const gitignorePath = join(rootDir, '.gitignore');

  if (!existsSync(gitignorePath)) {
    return null;
  }

  try {
    const content = readFileSync(gitignorePath, 'utf-8');
    return createGitignoreMatcher(parseGitignore(content));
  } catch {
    return null;
  }
}
