import chalk from 'chalk';
import type { FileEntry } from '../types/index.js';

export function humanBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ['KB', 'MB', 'GB'];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${units[unit] ?? 'GB'}`;
}

export function padPlain(text: string, width: number): string {
  if (text.length > width) {
    return `${text.slice(0, Math.max(0, width - 1))}…`;
  }
  return text.padEnd(width);
}

/** Inventory listing shown by `--list`: path, size and a ✓/✗ selection mark. */
export function formatInventory(entries: readonly FileEntry[], pathWidth = 60): string {
  const header = `${padPlain('Path', pathWidth)}  ${padPlain('Size', 10)}  Sel`;
  const lines = [chalk.bold(header), '-'.repeat(header.length)];

  for (const entry of entries) {
    const mark = entry.selected ? chalk.green('✓') : chalk.yellow('✗');
    lines.push(`${padPlain(entry.path, pathWidth)}  ${padPlain(humanBytes(entry.size), 10)}  ${mark}`);
  }

  return lines.join('\n');
}
