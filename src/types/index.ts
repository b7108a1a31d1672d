export type OutputFormat = 'markdown' | 'json' | 'plain' | 'outline';
export type OutputMode = 'file' | 'stdout' | 'clipboard';
export type DecodeMode = 'replace' | 'latin1-fallback';
export type Stage = 'config' | 'scan' | 'extract' | 'encode' | 'write';

export interface ScanConfiguration {
  readonly ignoredDirectoryNames: ReadonlySet<string>;
  readonly ignoredExtensions: ReadonlySet<string>;
  readonly maxFileSize: number;
  readonly excludedFolders: ReadonlySet<string>;
  readonly includedFolders: ReadonlySet<string>;
  readonly useGitignore: boolean;
}

export interface FileEntry {
  readonly path: string;
  readonly size: number;
  selected: boolean;
}

export interface FileContent {
  readonly path: string;
  readonly content: string;
}

export interface PathFilters {
  include?: readonly string[] | undefined;
  exclude?: readonly string[] | undefined;
}

export type OutputTarget =
  | { mode: 'file'; path: string }
  | { mode: 'stdout' }
  | { mode: 'clipboard' };

export interface DirectoryNode {
  kind: 'directory';
  name: string;
  path: string;
  children: TreeNode[];
}

export interface FileNode {
  kind: 'file';
  name: string;
  path: string;
}

export type TreeNode = DirectoryNode | FileNode;

export interface CLIOptions {
  output?: string | undefined;
  stdout: boolean;
  clipboard: boolean;
  format: OutputFormat;

  excludeFolders: string[];
  includeFolders: string[];
  include: string[];
  exclude: string[];

  maxSize: string;
  gitignore: boolean;

  interactive: boolean;
  list: boolean;
}
