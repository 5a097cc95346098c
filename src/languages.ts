import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';

const LanguageSchema = z.object({
  name: z.string().min(1),
  type: z.string().optional(),
  extensions: z.array(z.string())
});

const LanguageTableSchema = z.array(LanguageSchema);

export type Language = z.infer<typeof LanguageSchema>;

export const DEFAULT_LANGUAGES_CONFIG = fileURLToPath(new URL('../configs/language_extensions.json', import.meta.url));

export function loadLanguageTable(configPath: string = DEFAULT_LANGUAGES_CONFIG): Language[] {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf8');
  } catch (err) {
    throw new ConfigError(`cannot read language config ${configPath}: ${describeError(err)}`, { cause: err });
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`language config ${configPath} is not valid JSON: ${describeError(err)}`, { cause: err });
  }
  const parsed = LanguageTableSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? ` at ${issue.path.join('.')}` : '';
    throw new ConfigError(`language config ${configPath} is malformed${where}: ${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

/**
 * Extensions for the named languages, in the order given. Names match case-insensitively;
 * unknown names end up in `unknown`.
 */
export function resolveExtensions(languages: readonly string[], table: readonly Language[]): { extensions: string[]; unknown: string[] } {
  const byName = new Map<string, Language>();
  for (const lang of table) byName.set(lang.name.toLowerCase(), lang);
  const extensions: string[] = [];
  const unknown: string[] = [];
  for (const name of languages) {
    const lang = byName.get(name.trim().toLowerCase());
    if (lang) extensions.push(...lang.extensions);
    else unknown.push(name);
  }
  return { extensions, unknown };
}
