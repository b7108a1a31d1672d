import type { FileContent } from '../types/index.js';
import { SEPARATOR_WIDTH, UNDERLINE_PADDING } from '../constants/defaults.js';

export const PLAIN_BANNER = 'REPOSITORY CODE COMPENDIUM';

export function formatPlain(contents: readonly FileContent[]): string {
  const lines: string[] = [PLAIN_BANNER, ''];

  for (const f of contents) {
    lines.push(`FILE: ${f.path}`);
    lines.push('='.repeat(f.path.length + UNDERLINE_PADDING));
    lines.push('');
    lines.push(f.content);
    lines.push('');
    lines.push('-'.repeat(SEPARATOR_WIDTH));
    lines.push('');
  }

  return `${lines.join('\n')}\n`;
}
