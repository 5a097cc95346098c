import { AttributionError } from './errors.js';
import { recordAttribution, type FileAttribution } from './stats.js';

export type ContributorMode = 'author' | 'committer';

function nameFromLine(line: string, mode: ContributorMode): string | undefined {
  if (mode === 'author') {
    if (line.startsWith('author ')) return line.slice('author '.length).trim();
    return undefined;
  }
  if (line.startsWith('committer ')) return line.split(/\s+/).slice(1).filter(Boolean).join(' ');
  return undefined;
}

/**
 * Parse `git blame --porcelain` output for one file.
 *
 * Each block is a header (`<sha> <orig> <final> [<count>]`), optional metadata,
 * and a single TAB-prefixed content line. git only prints the metadata the first
 * time a commit appears, so names are cached per commit for the rest of the parse.
 */
export function parsePorcelain(raw: string, file: string, mode: ContributorMode): FileAttribution {
  const result: FileAttribution = new Map();
  const commitNames = new Map<string, string>();
  let block: string[] = [];

  for (const line of raw.split('\n')) {
    if (line === '') continue;
    if (!line.startsWith('\t')) { block.push(line); continue; }
    const header = block[0];
    if (header === undefined) continue;
    const commit = header.trim().split(/\s+/)[0] ?? '';

    let name: string | undefined;
    for (const meta of block) {
      name = nameFromLine(meta, mode);
      if (name !== undefined) break;
    }
    if (name === undefined) {
      name = commitNames.get(commit);
      if (name === undefined) throw new AttributionError(file, `no ${mode} recorded for commit ${commit} in blame of ${file}`);
    } else {
      commitNames.set(commit, name);
    }

    recordAttribution(result, name, commit, file, true);
    block = [];
  }
  return result;
}
