import { readdirSync, statSync, type Dirent } from 'node:fs';
import { relative, resolve, join } from 'node:path';
import type { FileEntry, ScanConfiguration } from '../types/index.js';
import { ConfigurationError } from '../errors.js';
import { isTextFile } from './detector.js';
import { loadGitignore, type GitignoreMatcher } from './gitignore.js';

type FolderScope = 'inside' | 'ancestor' | 'outside';

export function scanRepository(rootPath: string, configuration: ScanConfiguration): FileEntry[] {
  const rootDir = resolve(rootPath);
  assertDirectory(rootDir);

  const gitignore = configuration.useGitignore ? loadGitignore(rootDir) : null;
  const entries: FileEntry[] = [];
  walk(rootDir, rootDir, configuration, gitignore, entries);

  return entries.sort((a, b) => comparePaths(a.path, b.path));
}

export function assertDirectory(rootDir: string): void {
  let isDirectory: boolean;
  try {
    isDirectory = statSync(rootDir).isDirectory();
  } catch (error) {
    throw new ConfigurationError(`Directory not found: ${rootDir}`, {
      path: rootDir,
      hint: 'Check the path and try again',
      cause: error,
    });
  }
  if (!isDirectory) {
    throw new ConfigurationError(`Not a directory: ${rootDir}`, {
      path: rootDir,
      hint: 'Pass the repository folder, not a file inside it',
    });
  }
}

function walk(
  dirPath: string,
  rootDir: string,
  configuration: ScanConfiguration,
  gitignore: GitignoreMatcher | null,
  entries: FileEntry[]
): void {
  const relDir = getRelativePath(dirPath, rootDir);

  for (const folder of configuration.excludedFolders) {
    if (isWithinFolder(relDir, folder)) {
      return;
    }
  }

  const scope = folderScope(relDir, configuration.includedFolders);
  if (scope === 'outside') {
    return;
  }

  let dirents: Dirent[];
  try {
    dirents = readdirSync(dirPath, { withFileTypes: true });
  } catch {
    return;
  }

  for (const dirent of dirents) {
    const absPath = join(dirPath, dirent.name);
    const relPath = getRelativePath(absPath, rootDir);

    if (dirent.isDirectory()) {
      if (configuration.ignoredDirectoryNames.has(dirent.name)) {
        continue;
      }
      if (gitignore?.ignores(relPath, true)) {
        continue;
      }
      walk(absPath, rootDir, configuration, gitignore, entries);
      continue;
    }

    // Symlinks and special files are left out
    if (!dirent.isFile() || scope !== 'inside') {
      continue;
    }

    const entry = inspectFile(absPath, relPath, configuration, gitignore);
    if (entry) {
      entries.push(entry);
    }
  }
}

function inspectFile(
  absPath: string,
  relPath: string,
  configuration: ScanConfiguration,
  gitignore: GitignoreMatcher | null
): FileEntry | null {
  const name = relPath.slice(relPath.lastIndexOf('/') + 1);
  if (hasIgnoredExtension(name, configuration.ignoredExtensions)) {
    return null;
  }
  if (gitignore?.ignores(relPath)) {
    return null;
  }

  let size: number;
  try {
    const stat = statSync(absPath);
    if (!stat.isFile()) {
      return null;
    }
    size = stat.size;
  } catch {
    return null;
  }

  if (size > configuration.maxFileSize || !isTextFile(absPath)) {
    return null;
  }

  return { path: relPath, size, selected: true };
}

/**
 * Tests every dot-suffix of the name, so `app.min.js` is checked against both
 * `.min.js` and `.js`. A leading dot (`.env`) does not start an extension.
 */
export function hasIgnoredExtension(name: string, ignoredExtensions: ReadonlySet<string>): boolean {
  const lower = name.toLowerCase();
  for (let i = lower.indexOf('.', 1); i !== -1; i = lower.indexOf('.', i + 1)) {
    if (ignoredExtensions.has(lower.slice(i))) {
      return true;
    }
  }
  return false;
}

/**
 * Segment-wise containment: `src/app` is within `src`, `src2` is not.
 */
export function isWithinFolder(relPath: string, folder: string): boolean {
  return relPath === folder || relPath.startsWith(`${folder}/`);
}

function folderScope(relDir: string, includedFolders: ReadonlySet<string>): FolderScope {
  if (includedFolders.size === 0) {
    return 'inside';
  }
  let ancestor = false;
  for (const folder of includedFolders) {
    if (isWithinFolder(relDir, folder)) {
      return 'inside';
    }
    if (relDir === '' || folder.startsWith(`${relDir}/`)) {
      ancestor = true;
    }
  }
  return ancestor ? 'ancestor' : 'outside';
}

export function normalizeFolder(folder: string): string {
  return toPosixPath(folder.trim())
    .replace(/^(\.\/)+/, '')
    .replace(/^\/+/, '')
    .replace(/\/+$/, '');
}

export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function getRelativePath(absPath: string, rootDir: string): string {
  return toPosixPath(relative(rootDir, absPath));
}

export function toPosixPath(path: string): string {
  return path.split('\\').join('/');
}
