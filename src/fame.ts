import os from 'node:os';
import { parsePorcelain, type ContributorMode } from './blame.js';
import { RunAbortedError, describeError, isFileError } from './errors.js';
import { NO_FILTERS, selectFiles, type FileFilters } from './files.js';
import type { AttributionSource, TrackedFile } from './git.js';
import { mergeInto, rank, recordAttribution, type FileAttribution, type RankedEntry, type SortKey } from './stats.js';

export type FameOptions = {
  revision: string;
  orderBy: SortKey;
  mode: ContributorMode;
  filters?: FileFilters;
  concurrency?: number;
  signal?: AbortSignal;
  onWarning?: (w: FileWarning) => void;
  onFileDone?: (done: number, total: number) => void;
};

export type FileWarning = { file: string; message: string };

export type FameResult = {
  entries: readonly RankedEntry[];
  warnings: FileWarning[];
  filesAnalyzed: number;
};

export function defaultConcurrency(): number {
  return Math.min(Math.max(os.cpus().length - 1, 2), 8);
}

export async function attributeEmptyFile(source: AttributionSource, revision: string, file: string, mode: ContributorMode): Promise<FileAttribution> {
  const info = await source.lastCommitInfo(revision, file);
  const name = mode === 'committer' ? info.committerName : info.authorName;
  const result: FileAttribution = new Map();
  recordAttribution(result, name, info.commit, file, false);
  return result;
}

export async function attributeFile(source: AttributionSource, revision: string, file: TrackedFile, mode: ContributorMode): Promise<FileAttribution> {
  if (file.size === 0) return attributeEmptyFile(source, revision, file.path, mode);
  const raw = await source.rawAttribution(revision, file.path);
  const stats = parsePorcelain(raw, file.path, mode);
  // Heuristic: blame with no lines is treated like an empty file.
  if (stats.size === 0) return attributeEmptyFile(source, revision, file.path, mode);
  return stats;
}

/**
 * Lists, filters and blames every file at `revision`, folding the results into one ranking.
 * Per-file failures become warnings; anything else rejects the whole run.
 */
export async function computeFame(source: AttributionSource, opts: FameOptions): Promise<FameResult> {
  const { revision, mode, signal } = opts;
  const files = selectFiles(await source.listTrackedFiles(revision), opts.filters ?? NO_FILTERS);
  const total: FileAttribution = new Map();
  const warnings: FileWarning[] = [];
  let analyzed = 0;
  let done = 0;

  const concurrency = Math.max(1, Math.min(opts.concurrency ?? defaultConcurrency(), files.length || 1));
  let idx = 0;
  let fatal: { err: unknown } | undefined;
  const worker = async (): Promise<void> => {
    while (!signal?.aborted && !fatal) {
      const i = idx++;
      const file = files[i];
      if (file === undefined) return;
      try {
        const partial = await attributeFile(source, revision, file, mode);
        if (signal?.aborted) return;
        mergeInto(total, partial);
        analyzed++;
      } catch (err) {
        if (signal?.aborted) return;
        if (!isFileError(err)) { fatal ??= { err }; return; }
        const w = { file: file.path, message: describeError(err) };
        warnings.push(w);
        opts.onWarning?.(w);
      }
      opts.onFileDone?.(++done, files.length);
    }
  };

  const workers: Promise<void>[] = [];
  for (let w = 0; w < concurrency; w++) workers.push(worker());
  await Promise.all(workers);
  if (fatal) throw fatal.err;
  if (signal?.aborted) throw new RunAbortedError({ cause: signal.reason });

  warnings.sort((a, b) => (a.file < b.file ? -1 : a.file > b.file ? 1 : 0));
  return { entries: rank(total, opts.orderBy), warnings, filesAnalyzed: analyzed };
}
