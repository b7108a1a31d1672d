import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export type FixtureTree = Record<string, string | Uint8Array>;

/** Writes the files into a fresh temp directory and returns its path. */
export function createFixture(files: FixtureTree): string {
  const root = mkdtempSync(join(tmpdir(), 'repo-compendium-'));
  writeFixtureFiles(root, files);
  return root;
}

export function writeFixtureFiles(root: string, files: FixtureTree): void {
  for (const [relPath, content] of Object.entries(files)) {
    const absPath = join(root, relPath);
    mkdirSync(dirname(absPath), { recursive: true });
    writeFileSync(absPath, content);
  }
}

export function removeFixture(root: string): void {
  rmSync(root, { recursive: true, force: true });
}
