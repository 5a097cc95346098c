import path from 'node:path';
import { minimatch } from 'minimatch';
import type { TrackedFile } from './git.js';

export type FileFilters = {
  /** e.g. ['.go', '.md']; empty keeps everything. */
  extensions: readonly string[];
  exclude: readonly string[];
  restrictTo: readonly string[];
};

export const NO_FILTERS: FileFilters = { extensions: [], exclude: [], restrictTo: [] };

/** Text from the last '.' of the base name, so `.env` and `cfg/.gitignore` have extensions too. */
export function extOf(p: string): string {
  const base = path.posix.basename(p);
  const i = base.lastIndexOf('.');
  return i < 0 ? '' : base.slice(i).toLowerCase();
}

export function normalizeExtension(ext: string): string {
  const e = ext.trim().toLowerCase();
  if (!e) return '';
  return e.startsWith('.') ? e : `.${e}`;
}

export function filterByExtension<T extends { path: string }>(files: readonly T[], extensions: readonly string[]): T[] {
  const wanted = new Set(extensions.map(normalizeExtension).filter(Boolean));
  return files.filter(f => wanted.has(extOf(f.path)));
}

export function matchesGlob(file: string, pattern: string): boolean {
  return minimatch(file, pattern, { dot: true, noglobstar: true, nocomment: true, nonegate: true });
}

export function filterByGlob<T extends { path: string }>(files: readonly T[], patterns: readonly string[], include: boolean): T[] {
  return files.filter(f => patterns.some(p => matchesGlob(f.path, p)) === include);
}

/** Applies extensions, then exclude, then restrict-to; each step is skipped when its list is empty. */
export function selectFiles(files: readonly TrackedFile[], filters: FileFilters): TrackedFile[] {
  let out = files.filter(f => f.path.trim() !== '');
  if (filters.extensions.length > 0) out = filterByExtension(out, filters.extensions);
  if (filters.exclude.length > 0) out = filterByGlob(out, filters.exclude, false);
  if (filters.restrictTo.length > 0) out = filterByGlob(out, filters.restrictTo, true);
  return out;
}
