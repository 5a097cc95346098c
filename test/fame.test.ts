import { describe, it, expect } from 'vitest';
import { attributeFile, computeFame } from '../src/fame.js';
import { FameError, InvalidRevisionError, RunAbortedError } from '../src/errors.js';
import type { AttributionSource } from '../src/git.js';
import { C1, C2, C3, FakeSource } from './fixtures.js';

const alice = { sha: C1, author: 'Alice', committer: 'Mallory' };
const bob = { sha: C2, author: 'Bob' };
const carol = { sha: C3, author: 'Carol' };

describe('computeFame', () => {
  it('one file, three lines from one commit', async () => {
    const source = new FakeSource([
      { path: 'main.go', lines: [{ commit: alice, text: 'a' }, { commit: alice, text: 'b' }, { commit: alice, text: 'c' }] }
    ]);
    const result = await computeFame(source, { revision: 'HEAD', orderBy: 'lines', mode: 'author' });
    expect(result.entries).toEqual([{ name: 'Alice', lines: 3, commits: 1, files: 1 }]);
    expect(result.filesAnalyzed).toBe(1);
    expect(result.warnings).toEqual([]);
  });

  it('counts an empty file for its last committer without blaming it', async () => {
    const source = new FakeSource([
      { path: 'file1', lines: [{ commit: alice, text: 'a' }, { commit: alice, text: 'b' }] },
      { path: 'file2', size: 0, last: bob }
    ]);
    const result = await computeFame(source, { revision: 'HEAD', orderBy: 'lines', mode: 'author' });
    expect(result.entries).toEqual([
      { name: 'Alice', lines: 2, commits: 1, files: 1 },
      { name: 'Bob', lines: 0, commits: 1, files: 1 }
    ]);
    expect(source.blamed).toEqual(['file1']);
  });

  it('names committers in committer mode, including for empty files', async () => {
    const source = new FakeSource([
      { path: 'a', lines: [{ commit: alice, text: 'a' }] },
      { path: 'b', size: 0, last: alice }
    ]);
    const result = await computeFame(source, { revision: 'HEAD', orderBy: 'files', mode: 'committer' });
    expect(result.entries).toEqual([{ name: 'Mallory', lines: 1, commits: 1, files: 2 }]);
  });

  it('falls back to the last commit when blame yields no lines', async () => {
    const source = new FakeSource([{ path: 'odd', size: 12, raw: '', last: carol }]);
    const result = await computeFame(source, { revision: 'HEAD', orderBy: 'lines', mode: 'author' });
    expect(result.entries).toEqual([{ name: 'Carol', lines: 0, commits: 1, files: 1 }]);
  });

  it('rejects an unknown revision before doing any work', async () => {
    const source = new FakeSource([{ path: 'a', lines: [{ commit: alice, text: 'a' }] }]);
    await expect(computeFame(source, { revision: 'nope', orderBy: 'lines', mode: 'author' })).rejects.toBeInstanceOf(InvalidRevisionError);
    expect(source.blamed).toEqual([]);
  });

  it('skips a failing file with a warning and keeps the rest', async () => {
    const source = new FakeSource([
      { path: 'a', lines: [{ commit: alice, text: 'a' }] },
      { path: 'broken', blameFails: true, size: 5 },
      { path: 'c', lines: [{ commit: bob, text: 'b' }, { commit: bob, text: 'b' }] },
      { path: 'lost', size: 0 }
    ]);
    const seen: string[] = [];
    const result = await computeFame(source, { revision: 'HEAD', orderBy: 'lines', mode: 'author', onWarning: w => seen.push(w.file) });
    expect(result.entries.map(r => [r.name, r.lines])).toEqual([['Bob', 2], ['Alice', 1]]);
    expect(result.warnings).toEqual([
      { file: 'broken', message: 'git blame failed for broken: fatal: no such path' },
      { file: 'lost', message: 'no commit touches lost at HEAD' }
    ]);
    expect(seen.sort()).toEqual(['broken', 'lost']);
    expect(result.filesAnalyzed).toBe(2);
  });

  it('applies the file filters', async () => {
    const source = new FakeSource([
      { path: 'src/a.go', lines: [{ commit: alice, text: 'a' }] },
      { path: 'src/b.md', lines: [{ commit: bob, text: 'b' }] },
      { path: 'vendor/c.go', lines: [{ commit: carol, text: 'c' }] }
    ]);
    const result = await computeFame(source, {
      revision: 'HEAD', orderBy: 'lines', mode: 'author',
      filters: { extensions: ['.go'], exclude: ['vendor/*'], restrictTo: [] }
    });
    expect(result.entries.map(r => r.name)).toEqual(['Alice']);
    expect(source.blamed).toEqual(['src/a.go']);
  });

  it('gives the same ranking whatever order files finish in', async () => {
    const files = [
      { path: 'a', lines: [{ commit: alice, text: '1' }, { commit: bob, text: '2' }] },
      { path: 'b', lines: [{ commit: bob, text: '1' }] },
      { path: 'c', size: 0, last: carol },
      { path: 'd', lines: [{ commit: alice, text: '1' }, { commit: carol, text: '2' }] }
    ];
    const slowFirst = new FakeSource(files, 'HEAD', { a: 30, b: 20 });
    const slowLast = new FakeSource(files, 'HEAD', { d: 30 });
    const r1 = await computeFame(slowFirst, { revision: 'HEAD', orderBy: 'commits', mode: 'author', concurrency: 4 });
    const r2 = await computeFame(slowLast, { revision: 'HEAD', orderBy: 'commits', mode: 'author', concurrency: 1 });
    expect(r1.entries).toEqual(r2.entries);
    expect(r1.entries).toEqual([
      { name: 'Alice', lines: 2, commits: 1, files: 2 },
      { name: 'Bob', lines: 2, commits: 1, files: 2 },
      { name: 'Carol', lines: 1, commits: 1, files: 2 }
    ]);
  });

  it('never runs more blames at once than the concurrency limit', async () => {
    const files = Array.from({ length: 9 }, (_, i) => ({ path: `f${i}`, lines: [{ commit: alice, text: String(i) }] }));
    const delays = Object.fromEntries(files.map((f, i) => [f.path, 5 + (i % 3) * 5]));
    const source = new FakeSource(files, 'HEAD', delays);
    const result = await computeFame(source, { revision: 'HEAD', orderBy: 'lines', mode: 'author', concurrency: 3 });
    expect(source.peakInFlight).toBe(3);
    expect(source.blamed).toHaveLength(9);
    expect(result.entries).toEqual([{ name: 'Alice', lines: 9, commits: 1, files: 9 }]);

    const serial = new FakeSource(files, 'HEAD', delays);
    await computeFame(serial, { revision: 'HEAD', orderBy: 'lines', mode: 'author', concurrency: 1 });
    expect(serial.peakInFlight).toBe(1);
  });

  it('rejects with RunAbortedError once the signal fires', async () => {
    const controller = new AbortController();
    const source = new FakeSource([
      { path: 'a', lines: [{ commit: alice, text: '1' }] },
      { path: 'b', lines: [{ commit: bob, text: '1' }] }
    ], 'HEAD', { a: 20, b: 20 });
    const run = computeFame(source, { revision: 'HEAD', orderBy: 'lines', mode: 'author', concurrency: 1, signal: controller.signal });
    setTimeout(() => controller.abort(), 5);
    await expect(run).rejects.toBeInstanceOf(RunAbortedError);
    expect(source.blamed).toEqual(['a']);
  });

  it('lets unexpected errors abort the run', async () => {
    const source: AttributionSource = {
      listTrackedFiles: async () => [{ path: 'a', size: 1 }],
      rawAttribution: async () => { throw new Error('spawn git ENOENT'); },
      lastCommitInfo: async () => ({ commit: C1, authorName: 'x', committerName: 'x' })
    };
    await expect(computeFame(source, { revision: 'HEAD', orderBy: 'lines', mode: 'author' })).rejects.toThrow('spawn git ENOENT');
  });
});

describe('attributeFile', () => {
  it('blames non-empty files', async () => {
    const source = new FakeSource([{ path: 'x', lines: [{ commit: bob, text: 'q' }] }]);
    const stats = await attributeFile(source, 'HEAD', { path: 'x', size: 2 }, 'author');
    expect(stats.get('Bob')?.lines).toBe(1);
  });

  it('treats an unknown size as non-empty', async () => {
    const source = new FakeSource([{ path: 'x', lines: [{ commit: bob, text: 'q' }] }]);
    const stats = await attributeFile(source, 'HEAD', { path: 'x', size: null }, 'author');
    expect(source.blamed).toEqual(['x']);
    expect(stats.size).toBe(1);
  });

  it('reports a missing history as a FameError', async () => {
    const source = new FakeSource([{ path: 'gone', size: 0 }]);
    await expect(attributeFile(source, 'HEAD', { path: 'gone', size: 0 }, 'author')).rejects.toBeInstanceOf(FameError);
  });
});
