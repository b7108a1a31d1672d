import type { DirectoryNode, FileContent } from '../types/index.js';
import { buildTree, numberTree } from '../core/tree.js';
import { formatCodeBlock } from './markdown.js';

const INDENT = '    ';

/**
 * Numbered directory outline followed by every file's contents, in tree
 * order. The tree defaults to the one implied by the content paths; a
 * caller may pass a scanned tree that also lists files it could not read.
 */
export function formatOutline(
  contents: readonly FileContent[],
  tree: DirectoryNode = buildTree(contents.map((f) => f.path))
): string {
  const byPath = new Map(contents.map((f) => [f.path, f] as const));
  const numbered = numberTree(tree);

  const lines: string[] = ['# Directory Structure', ''];
  for (const { number, depth, node } of numbered) {
    const label = node.kind === 'directory' ? `${node.name}/` : node.name;
    lines.push(`${INDENT.repeat(depth)}${number} ${label}`);
  }

  let result = `${lines.join('\n')}\n\n# File Contents\n\n`;

  for (const { number, node } of numbered) {
    const file = node.kind === 'file' ? byPath.get(node.path) : undefined;
    if (!file) continue;
    result += `## ${number} ${file.path}\n\n`;
    result += formatCodeBlock(file.path, file.content);
  }

  return result;
}
