import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { GitError, simpleGit, type SimpleGit } from 'simple-git';
import { mkTempDir, looksLikeUrl, sanitizeRepoForDisplay } from './cli.js';
import { AttributionError, ConfigError, HistoryLookupError, InvalidRevisionError, describeError } from './errors.js';
import type { Logger } from './log.js';

export type TrackedFile = { path: string; size: number | null };

export type CommitInfo = { commit: string; authorName: string; committerName: string };

/** What the pipeline needs from version control. */
export interface AttributionSource {
  listTrackedFiles(revision: string): Promise<TrackedFile[]>;
  rawAttribution(revision: string, file: string): Promise<string>;
  lastCommitInfo(revision: string, file: string): Promise<CommitInfo>;
}

export type Repo = { repoPath: string; cleanup: () => void; git: SimpleGit; displayName: string };

function openGit(baseDir: string | undefined, signal?: AbortSignal): SimpleGit {
  return baseDir ? simpleGit({ baseDir, abort: signal }) : simpleGit({ abort: signal });
}

type RepoOptions = { keepTemp?: boolean; signal?: AbortSignal; log?: Logger };

async function cloneRepo(url: string, opts: RepoOptions): Promise<Repo> {
  const displayName = sanitizeRepoForDisplay(url);
  const dir = mkTempDir('repo_fame_');
  const remove = () => fs.rmSync(dir, { recursive: true, force: true });
  opts.log?.info(`Cloning ${displayName} ...`);
  try {
    await openGit(undefined, opts.signal).clone(url, dir);
  } catch (err) {
    remove();
    throw new ConfigError(`clone of ${displayName} failed: ${gitMessage(err)}`, { cause: err });
  }
  if (opts.keepTemp) opts.log?.debug(`Keeping clone at ${dir}`);
  return { repoPath: dir, cleanup: opts.keepTemp ? () => {} : remove, git: openGit(dir, opts.signal), displayName };
}

function openLocalRepo(repoArg: string, signal?: AbortSignal): Repo {
  const dir = path.resolve(repoArg);
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    const home = os.homedir();
    const shown = dir.startsWith(home) ? `~${dir.slice(home.length)}` : dir;
    throw new ConfigError(`Path does not exist or is not a directory: ${shown}`);
  }
  return { repoPath: dir, cleanup: () => {}, git: openGit(dir, signal), displayName: sanitizeRepoForDisplay(dir) };
}

/** Local checkouts are used in place; URLs are cloned into a private temp dir that `cleanup` removes. */
export async function ensureRepo(repoArg: string, opts: RepoOptions = {}): Promise<Repo> {
  return looksLikeUrl(repoArg) ? cloneRepo(repoArg, opts) : openLocalRepo(repoArg, opts.signal);
}

function gitMessage(err: unknown): string {
  if (err instanceof GitError) return err.message.trim().split('\n')[0] ?? 'git failed';
  return describeError(err);
}

export async function verifyRevision(git: SimpleGit, revision: string): Promise<string> {
  try {
    const sha = await git.raw(['rev-parse', '--verify', '--quiet', `${revision}^{commit}`]);
    if (!sha.trim()) throw new InvalidRevisionError(revision);
    return sha.trim();
  } catch (err) {
    if (err instanceof InvalidRevisionError) throw err;
    throw new InvalidRevisionError(revision, { cause: err });
  }
}

/** Parses `git ls-tree -r -l -z` output, keeping blobs only (submodules are skipped). */
export function parseTree(out: string): TrackedFile[] {
  const files: TrackedFile[] = [];
  for (const rec of out.split('\0')) {
    if (!rec) continue;
    const tabIdx = rec.indexOf('\t');
    if (tabIdx < 0) continue;
    const meta = rec.slice(0, tabIdx).trim().split(/\s+/);
    if (meta[1] !== 'blob') continue;
    const sizeField = meta[3] ?? '';
    const size = /^\d+$/.test(sizeField) ? parseInt(sizeField, 10) : null;
    files.push({ path: rec.slice(tabIdx + 1), size });
  }
  return files;
}

export function parseCommitInfo(out: string): CommitInfo | null {
  const [commit = '', authorName = '', committerName = ''] = out.replace(/\n+$/, '').split('\0');
  if (!commit.trim()) return null;
  return { commit: commit.trim(), authorName: authorName.trim(), committerName: committerName.trim() };
}

export function createGitSource(git: SimpleGit): AttributionSource {
  return {
    async listTrackedFiles(revision) {
      await verifyRevision(git, revision);
      const out = await git.raw(['ls-tree', '-r', '-l', '-z', revision]);
      return parseTree(out);
    },
    async rawAttribution(revision, file) {
      try {
        return await git.raw(['blame', '--porcelain', '-l', revision, '--', file]);
      } catch (err) {
        throw new AttributionError(file, `git blame failed for ${file}: ${gitMessage(err)}`, { cause: err });
      }
    },
    async lastCommitInfo(revision, file) {
      let out: string;
      try {
        // literal: a name like `[ab].txt` must not match a.txt and b.txt
        out = await git.raw(['log', '-1', '--format=%H%x00%an%x00%cn', revision, '--', `:(literal)${file}`]);
      } catch (err) {
        throw new HistoryLookupError(file, `git log failed for ${file}: ${gitMessage(err)}`, { cause: err });
      }
      const info = parseCommitInfo(out);
      if (!info) throw new HistoryLookupError(file, `no commit touches ${file} at ${revision}`);
      return info;
    }
  };
}
