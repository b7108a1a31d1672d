import type { FileEntry } from '../types/index.js';

// Operations a front end uses to edit the `selected` flags of an inventory in place.

export function setSelected(entries: readonly FileEntry[], paths: Iterable<string>): void {
  const wanted = new Set(paths);
  for (const entry of entries) {
    entry.selected = wanted.has(entry.path);
  }
}

export function toggleEntry(entries: readonly FileEntry[], path: string): boolean | undefined {
  const entry = entries.find((e) => e.path === path);
  if (!entry) return undefined;
  entry.selected = !entry.selected;
  return entry.selected;
}

export function selectAll(entries: readonly FileEntry[]): void {
  for (const entry of entries) entry.selected = true;
}

export function deselectAll(entries: readonly FileEntry[]): void {
  for (const entry of entries) entry.selected = false;
}

export function invertSelection(entries: readonly FileEntry[]): void {
  for (const entry of entries) entry.selected = !entry.selected;
}

export function selectedEntries(entries: readonly FileEntry[]): FileEntry[] {
  return entries.filter((entry) => entry.selected);
}
