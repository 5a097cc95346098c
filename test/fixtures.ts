import type { AttributionSource, CommitInfo, TrackedFile } from '../src/git.js';
import { AttributionError, HistoryLookupError, InvalidRevisionError } from '../src/errors.js';

export const C1 = '1111111111111111111111111111111111111111';
export const C2 = '2222222222222222222222222222222222222222';
export const C3 = '3333333333333333333333333333333333333333';

export type Commit = { sha: string; author: string; committer?: string };

/** Builds porcelain blame text; metadata is printed only the first time a commit shows up. */
export function porcelain(file: string, lines: Array<{ commit: Commit; text: string }>): string {
  const seen = new Set<string>();
  const out: string[] = [];
  lines.forEach(({ commit, text }, i) => {
    out.push(`${commit.sha} ${i + 1} ${i + 1}${seen.has(commit.sha) ? '' : ' 1'}`);
    if (!seen.has(commit.sha)) {
      seen.add(commit.sha);
      const committer = commit.committer ?? commit.author;
      out.push(
        `author ${commit.author}`,
        'author-mail <someone@example.com>',
        'author-time 1700000000',
        'author-tz +0000',
        `committer ${committer}`,
        'committer-mail <someone@example.com>',
        'committer-time 1700000000',
        'committer-tz +0000',
        'summary a change',
        `filename ${file}`
      );
    }
    out.push(`\t${text}`);
  });
  return out.join('\n') + '\n';
}

export type FakeFile = {
  path: string;
  size?: number;
  lines?: Array<{ commit: Commit; text: string }>;
  /** Used for empty files and for the zero-record fallback. */
  last?: Commit;
  blameFails?: boolean;
  raw?: string;
};

export class FakeSource implements AttributionSource {
  readonly blamed: string[] = [];
  /** Highest number of rawAttribution calls running at once. */
  peakInFlight = 0;
  private inFlight = 0;
  constructor(private readonly files: FakeFile[], private readonly revision = 'HEAD', private readonly delays: Record<string, number> = {}) {}

  async listTrackedFiles(revision: string): Promise<TrackedFile[]> {
    if (revision !== this.revision) throw new InvalidRevisionError(revision);
    return this.files.map(f => ({ path: f.path, size: f.size ?? (f.lines ? 10 : 0) }));
  }

  async rawAttribution(_revision: string, file: string): Promise<string> {
    const f = this.find(file);
    this.peakInFlight = Math.max(this.peakInFlight, ++this.inFlight);
    try {
      await new Promise(r => setTimeout(r, this.delays[file] ?? 0));
    } finally {
      this.inFlight--;
    }
    this.blamed.push(file);
    if (f.blameFails) throw new AttributionError(file, `git blame failed for ${file}: fatal: no such path`);
    return f.raw ?? porcelain(file, f.lines ?? []);
  }

  async lastCommitInfo(revision: string, file: string): Promise<CommitInfo> {
    const f = this.find(file);
    if (!f.last) throw new HistoryLookupError(file, `no commit touches ${file} at ${revision}`);
    return { commit: f.last.sha, authorName: f.last.author, committerName: f.last.committer ?? f.last.author };
  }

  private find(file: string): FakeFile {
    const f = this.files.find(x => x.path === file);
    if (!f) throw new AttributionError(file, `unknown path ${file}`);
    return f;
  }
}
