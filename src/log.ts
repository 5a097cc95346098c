export type Logger = {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  /** Only written with --verbose. */
  debug(msg: string): void;
};

export type LogSink = { write(chunk: string): unknown };

export function createLogger(opts: { verbose?: boolean; stream?: LogSink } = {}): Logger {
  const out = opts.stream ?? process.stderr;
  const verbose = !!opts.verbose;
  return {
    info: msg => { out.write(`${msg}\n`); },
    warn: msg => { out.write(`warning: ${msg}\n`); },
    error: msg => { out.write(`error: ${msg}\n`); },
    debug: msg => { if (verbose) out.write(`${msg}\n`); }
  };
}
