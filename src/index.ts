export type {
  DecodeMode,
  DirectoryNode,
  FileContent,
  FileEntry,
  FileNode,
  OutputFormat,
  OutputTarget,
  PathFilters,
  ScanConfiguration,
  Stage,
  TreeNode,
} from './types/index.js';
export { CompendiumError, ConfigurationError } from './errors.js';
export { createScanConfiguration, parseSize, type ScanConfigurationInput } from './config/builder.js';
export { Compendium, type BuildRequest, type CompendiumOptions, type CompendiumResult, type RunRequest } from './core/compendium.js';
export { scanRepository, isWithinFolder } from './core/scanner.js';
export { isTextFile } from './core/detector.js';
export { createGitignoreMatcher, loadGitignore, parseGitignore, type GitignoreMatcher } from './core/gitignore.js';
export { readFiles, type ReadOptions, type WarningHandler } from './core/reader.js';
export { filterByPatterns, filterByText } from './core/filter.js';
export { deselectAll, invertSelection, selectAll, selectedEntries, setSelected, toggleEntry } from './core/selection.js';
export { buildTree, numberTree, type NumberedNode } from './core/tree.js';
export { getEncoder, formatJson, formatMarkdown, formatOutline, formatPlain, type Encoder } from './formatters/index.js';
export { writeOutput } from './output/writer.js';
export { defaultExtension, suggestOutputPath, withFormatExtension } from './output/paths.js';
export { IgnoredDirectoryNames, IgnoredExtensions } from './constants/defaults.js';
