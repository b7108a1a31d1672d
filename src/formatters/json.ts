import type { FileContent } from '../types/index.js';

export interface JsonCompendium {
  repository: { path: string; content: string }[];
}

/** Writes every non-ASCII UTF-16 unit as a `\uXXXX` escape; the document itself stays ASCII. */
export function formatJson(contents: readonly FileContent[]): string {
  const output: JsonCompendium = {
    repository: contents.map((f) => ({
      path: f.path,
      content: f.content,
    })),
  };

  return JSON.stringify(output, null, 2).replace(
    /[\u0080-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}
