import { checkbox } from '@inquirer/prompts';
import type { FileEntry } from '../types/index.js';
import { humanBytes } from '../output/table.js';
import { setSelected } from '../core/selection.js';

/**
 * Lets the user tick the files to include. The answers are written back
 * into the entries' `selected` flags.
 */
export async function runSelectionPrompt(entries: readonly FileEntry[]): Promise<void> {
  console.log('\n🔧 Select files to include\n');
  console.log('Space toggles a file, a toggles all, i inverts, Enter confirms.\n');

  const chosen = await checkbox({
    message: `Files (${entries.length.toLocaleString()} found)`,
    choices: entries.map((entry) => ({
      name: `${entry.path} (${humanBytes(entry.size)})`,
      value: entry.path,
      checked: entry.selected,
    })),
    pageSize: 20,
  });

  setSelected(entries, chosen);

  console.log(`\n✅ ${chosen.length.toLocaleString()} of ${entries.length.toLocaleString()} files selected\n`);
}
