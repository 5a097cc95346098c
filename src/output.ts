import { SerializationError, describeError } from './errors.js';
import type { RankedEntry } from './stats.js';

export type OutputFormat = 'tabular' | 'csv' | 'json' | 'json-lines';
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['tabular', 'csv', 'json', 'json-lines'];

export function isOutputFormat(s: string): s is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(s);
}

// Width in code points, so names with astral characters line up like the others.
function padEnd(v: string | number, width: number): string {
  const s = String(v);
  const len = [...s].length;
  return len >= width ? s : s + ' '.repeat(width - len);
}

export function renderTabular(entries: readonly RankedEntry[]): string {
  const row = (name: string, lines: string | number, commits: string | number, files: string | number) =>
    `${padEnd(name, 23)}${padEnd(lines, 5)} ${padEnd(commits, 8)}${files}\n`;
  return row('Name', 'Lines', 'Commits', 'Files') + entries.map(e => row(e.name, e.lines, e.commits, e.files)).join('');
}

export function csvEscape(v: string | number): string {
  const s = String(v);
  if (/[,"\r\n]/.test(s) || /^\s/.test(s)) return '"' + s.replace(/"/g, '""') + '"';
  return s;
}

export function renderCsv(entries: readonly RankedEntry[]): string {
  const header = 'Name,Lines,Commits,Files\n';
  return header + entries.map(e => [e.name, e.lines, e.commits, e.files].map(csvEscape).join(',') + '\n').join('');
}

function toJson(e: RankedEntry) {
  return { name: e.name, lines: e.lines, commits: e.commits, files: e.files };
}

export function renderJson(entries: readonly RankedEntry[]): string {
  return JSON.stringify(entries.map(toJson), null, 2) + '\n';
}

export function renderJsonLines(entries: readonly RankedEntry[]): string {
  return entries.map(e => JSON.stringify(toJson(e)) + '\n').join('');
}

export function renderReport(entries: readonly RankedEntry[], format: OutputFormat): string {
  switch (format) {
    case 'tabular': return renderTabular(entries);
    case 'csv': return renderCsv(entries);
    case 'json': return renderJson(entries);
    case 'json-lines': return renderJsonLines(entries);
  }
}

export type OutputSink = {
  write(chunk: string, cb: (err?: Error | null) => void): unknown;
  /** Streams such as stdout also emit 'error' (EPIPE); without a listener that would crash the process. */
  once?(event: 'error', listener: (err: Error) => void): unknown;
};

export function writeReport(out: OutputSink, entries: readonly RankedEntry[], format: OutputFormat): Promise<void> {
  const text = renderReport(entries, format);
  return new Promise((resolve, reject) => {
    const fail = (err: unknown) => reject(new SerializationError(`failed to write ${format} output: ${describeError(err)}`, { cause: err }));
    out.once?.('error', fail);
    try {
      out.write(text, err => {
        if (err) fail(err);
        else resolve();
      });
    } catch (err) {
      fail(err);
    }
  });
}
