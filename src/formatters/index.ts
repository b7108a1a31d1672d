import type { FileContent, OutputFormat } from '../types/index.js';
import { formatMarkdown } from './markdown.js';
import { formatJson } from './json.js';
import { formatPlain } from './plain.js';
import { formatOutline } from './outline.js';

export interface Encoder {
  readonly format: OutputFormat;
  /** Output file extension, with the dot */
  readonly extension: string;
  encode(contents: readonly FileContent[]): string;
}

const ENCODERS: Readonly<Record<OutputFormat, Encoder>> = {
  markdown: { format: 'markdown', extension: '.md', encode: formatMarkdown },
  json: { format: 'json', extension: '.json', encode: formatJson },
  plain: { format: 'plain', extension: '.txt', encode: formatPlain },
  outline: { format: 'outline', extension: '.md', encode: (contents) => formatOutline(contents) },
};

export function getEncoder(format: OutputFormat): Encoder {
  return ENCODERS[format];
}

export { formatMarkdown, formatJson, formatPlain, formatOutline };
