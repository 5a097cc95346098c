export type SortKey = 'lines' | 'commits' | 'files';
export const SORT_KEYS: readonly SortKey[] = ['lines', 'commits', 'files'];

export type ContributorStats = {
  name: string;
  lines: number;
  commits: Set<string>;
  files: Set<string>;
};

/** Contributor name -> stats, for one file or for the whole tree. */
export type FileAttribution = Map<string, ContributorStats>;

export type RankedEntry = Readonly<{ name: string; lines: number; commits: number; files: number }>;

export function emptyStats(name: string): ContributorStats {
  return { name, lines: 0, commits: new Set(), files: new Set() };
}

/** Adds one attribution record; `countsLine` is false for the synthetic empty-file record. */
export function recordAttribution(target: FileAttribution, name: string, commit: string, file: string, countsLine: boolean): void {
  let s = target.get(name);
  if (!s) { s = emptyStats(name); target.set(name, s); }
  if (countsLine) s.lines++;
  s.commits.add(commit);
  s.files.add(file);
}

export function mergeInto(total: FileAttribution, partial: FileAttribution): FileAttribution {
  for (const [name, p] of partial) {
    let s = total.get(name);
    if (!s) { s = emptyStats(name); total.set(name, s); }
    s.lines += p.lines;
    for (const c of p.commits) s.commits.add(c);
    for (const f of p.files) s.files.add(f);
  }
  return total;
}

export function aggregate(parts: Iterable<FileAttribution>): FileAttribution {
  const total: FileAttribution = new Map();
  for (const p of parts) mergeInto(total, p);
  return total;
}

export function toRankedEntry(s: ContributorStats): RankedEntry {
  return Object.freeze({ name: s.name, lines: s.lines, commits: s.commits.size, files: s.files.size });
}

// The promoted key comes first; the other two keep the lines, commits, files order.
const KEY_ORDER: Record<SortKey, readonly SortKey[]> = {
  lines: ['lines', 'commits', 'files'],
  commits: ['commits', 'lines', 'files'],
  files: ['files', 'lines', 'commits'],
};

/** Descending on the key tuple, then ascending case-insensitive name, then raw name. */
export function compareEntries(a: RankedEntry, b: RankedEntry, key: SortKey): number {
  for (const k of KEY_ORDER[key]) {
    const d = b[k] - a[k];
    if (d !== 0) return d;
  }
  const la = a.name.toLowerCase(), lb = b.name.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  return 0;
}

export function rankEntries(entries: readonly RankedEntry[], key: SortKey): readonly RankedEntry[] {
  return Object.freeze([...entries].sort((a, b) => compareEntries(a, b, key)));
}

export function rank(stats: FileAttribution, key: SortKey): readonly RankedEntry[] {
  return rankEntries(Array.from(stats.values(), toRankedEntry), key);
}

export function isSortKey(s: string): s is SortKey {
  return (SORT_KEYS as readonly string[]).includes(s);
}
