import type { DirectoryNode, FileNode, TreeNode } from '../types/index.js';
import { comparePaths } from './scanner.js';

export interface NumberedNode {
  number: string;
  depth: number;
  node: TreeNode;
}

/**
 * Builds a directory tree from root-relative file paths. Children are
 * ordered by name; the root node has an empty name and path.
 */
export function buildTree(paths: Iterable<string>): DirectoryNode {
  const root: DirectoryNode = { kind: 'directory', name: '', path: '', children: [] };

  for (const filePath of paths) {
    const parts = filePath.split('/').filter(Boolean);
    let current = root;

    parts.forEach((part, index) => {
      const path = parts.slice(0, index + 1).join('/');
      if (index === parts.length - 1) {
        const file: FileNode = { kind: 'file', name: part, path };
        current.children.push(file);
        return;
      }
      let next = current.children.find(
        (child): child is DirectoryNode => child.kind === 'directory' && child.name === part
      );
      if (!next) {
        next = { kind: 'directory', name: part, path, children: [] };
        current.children.push(next);
      }
      current = next;
    });
  }

  sortTree(root);
  return root;
}

function sortTree(node: DirectoryNode): void {
  node.children.sort((a, b) => comparePaths(a.name, b.name));
  for (const child of node.children) {
    if (child.kind === 'directory') {
      sortTree(child);
    }
  }
}

/**
 * Pre-order numbering: top-level children are `1`, `2`, ..., their
 * children `1.1`, `1.2`, ... The root itself is not numbered.
 */
export function numberTree(root: DirectoryNode): NumberedNode[] {
  const numbered: NumberedNode[] = [];

  const visit = (node: DirectoryNode, prefix: string, depth: number): void => {
    node.children.forEach((child, index) => {
      const number = prefix ? `${prefix}.${index + 1}` : String(index + 1);
      numbered.push({ number, depth, node: child });
      if (child.kind === 'directory') {
        visit(child, number, depth + 1);
      }
    });
  };

  visit(root, '', 0);
  return numbered;
}
