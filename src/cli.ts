import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { ContributorMode } from './blame.js';
import { UsageError } from './errors.js';
import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from './output.js';
import { isSortKey, SORT_KEYS, type SortKey } from './stats.js';

export type Args = {
  repository: string; revision: string; orderBy: SortKey; mode: ContributorMode; format: OutputFormat; extensions: string[]; languages: string[]; exclude: string[]; restrictTo: string[]; languagesConfigPath?: string; concurrency?: number; dryRun: boolean; keepTemp: boolean; verbose: boolean;
};

export const USAGE = 'Usage: repo-fame [--repository PATH|URL] [--revision REV] [--order-by lines|commits|files] [--use-committer] [--format tabular|csv|json|json-lines] [--extensions .go,.md] [--languages go,markdown] [--exclude GLOBS] [--restrict-to GLOBS] [--languages-config-path FILE] [--concurrency N] [--dry-run] [--keep-temp] [--verbose]';

export function splitList(s: string): string[] {
  return s.split(',').map(x => x.trim()).filter(Boolean);
}

export function parseArgs(argv: readonly string[] = process.argv.slice(2)): Args {
  const args: Args = { repository: '.', revision: 'HEAD', orderBy: 'lines', mode: 'author', format: 'tabular', extensions: [], languages: [], exclude: [], restrictTo: [], dryRun: false, keepTemp: false, verbose: false };
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? '';
    const eq = token.startsWith('--') ? token.indexOf('=') : -1;
    const t = eq >= 0 ? token.slice(0, eq) : token;
    const inline = eq >= 0 ? token.slice(eq + 1) : undefined;
    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[++i];
      if (next === undefined) throw new UsageError(`${t} needs a value`);
      return next;
    };
    if (t === '--repository') args.repository = value();
    else if (t === '--revision') args.revision = value();
    else if (t === '--order-by') {
      const v = value();
      if (!isSortKey(v)) throw new UsageError(`--order-by must be one of ${SORT_KEYS.join(', ')}, got "${v}"`);
      args.orderBy = v;
    }
    else if (t === '--format') {
      const v = value();
      if (!isOutputFormat(v)) throw new UsageError(`unknown output format "${v}"; expected one of ${OUTPUT_FORMATS.join(', ')}`);
      args.format = v;
    }
    else if (t === '--use-committer') args.mode = 'committer';
    else if (t === '--extensions') args.extensions.push(...splitList(value()));
    else if (t === '--languages') args.languages.push(...splitList(value()));
    else if (t === '--exclude') args.exclude.push(...splitList(value()));
    else if (t === '--restrict-to') args.restrictTo.push(...splitList(value()));
    else if (t === '--languages-config-path') args.languagesConfigPath = value();
    else if (t === '--concurrency') {
      const n = parseInt(value(), 10);
      if (!Number.isFinite(n) || n < 1) throw new UsageError('--concurrency must be a positive integer');
      args.concurrency = n;
    }
    else if (t === '--dry-run') args.dryRun = true;
    else if (t === '--keep-temp') args.keepTemp = true;
    else if (t === '--verbose') args.verbose = true;
    else throw new UsageError(`Unknown arg: ${token}`);
  }
  return args;
}

const URL_SCHEME = /^(https?|git|ssh|file):\/\//i;
const SCP_LIKE = /^[\w.-]+@[\w.-]+:/;

export function looksLikeUrl(s: string): boolean { return URL_SCHEME.test(s) || SCP_LIKE.test(s) || s.endsWith('.git'); }

/** Repository label for logs: URLs lose their credentials, local paths keep only the last segment. */
export function sanitizeRepoForDisplay(s: string): string {
  if (URL_SCHEME.test(s)) {
    if (!URL.canParse(s)) return s.replace(/\/\/[^@/]+@/, '//');
    const u = new URL(s);
    return `${u.protocol}//${u.host}${u.pathname}`;
  }
  if (SCP_LIKE.test(s)) return s.slice(s.indexOf('@') + 1);
  return path.basename(path.resolve(s));
}

export function mkTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  fs.chmodSync(dir, 0o700);
  return dir;
}
