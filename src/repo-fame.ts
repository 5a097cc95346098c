#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { USAGE, parseArgs } from './cli.js';
import { FameError, UsageError, describeError } from './errors.js';
import { computeFame } from './fame.js';
import { selectFiles, type FileFilters } from './files.js';
import * as Git from './git.js';
import { loadLanguageTable, resolveExtensions } from './languages.js';
import { createLogger, type Logger } from './log.js';
import { writeReport, type OutputSink } from './output.js';

export type MainIO = { argv?: readonly string[]; stdout?: OutputSink; log?: Logger; signal?: AbortSignal };

export async function main(io: MainIO = {}): Promise<void> {
  const args = parseArgs(io.argv ?? process.argv.slice(2));
  const log = io.log ?? createLogger({ verbose: args.verbose });

  const extensions = [...args.extensions];
  if (args.languages.length > 0) {
    const table = loadLanguageTable(args.languagesConfigPath);
    const resolved = resolveExtensions(args.languages, table);
    for (const name of resolved.unknown) log.warn(`unknown language: ${name}`);
    extensions.push(...resolved.extensions);
    log.debug(`Languages ${args.languages.join(', ')} -> ${resolved.extensions.join(' ') || '(none)'}`);
  }
  const filters: FileFilters = { extensions, exclude: args.exclude, restrictTo: args.restrictTo };

  const { cleanup, git, displayName } = await Git.ensureRepo(args.repository, { keepTemp: args.keepTemp, signal: io.signal, log });
  try {
    const source = Git.createGitSource(git);

    if (args.dryRun) {
      const files = selectFiles(await source.listTrackedFiles(args.revision), filters);
      log.info(`Dry run: would analyze ${files.length} files of ${displayName} at ${args.revision}`);
      for (const f of files) log.info(`  ${f.path}`);
      return;
    }

    log.debug(`Analyzing ${displayName} at ${args.revision} by ${args.mode}`);
    const result = await computeFame(source, {
      revision: args.revision,
      orderBy: args.orderBy,
      mode: args.mode,
      filters,
      concurrency: args.concurrency,
      signal: io.signal,
      onWarning: w => log.warn(`skipping ${w.file}: ${w.message}`),
      onFileDone: (done, total) => { if (done % 100 === 0 || done === total) log.debug(`  ... ${done}/${total}`); }
    });
    log.debug(`Attributed ${result.filesAnalyzed} files, skipped ${result.warnings.length}`);

    await writeReport(io.stdout ?? process.stdout, result.entries, args.format);
  } finally {
    cleanup();
  }
}

function exitCodeOf(err: unknown): number {
  return err instanceof FameError ? err.exitCode : 1;
}

// argv[1] is the bin symlink when installed, so compare real paths.
function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return fs.realpathSync(path.resolve(entry)) === fs.realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new Error('interrupted')));
  main({ signal: controller.signal }).catch((err: unknown) => {
    const log = createLogger({ verbose: process.argv.includes('--verbose') });
    log.error(describeError(err));
    if (err instanceof UsageError) log.info(USAGE);
    if (err instanceof Error && err.stack) log.debug(err.stack);
    process.exitCode = exitCodeOf(err);
  });
}
