import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { writeJsonAtomic } from '../utils/fs.js';

export const MANIFEST_VERSION = '1.0';

/** Why `name` cannot name a baseline, or null when it can. */
export function baselineNameError(name: string): string | null {
  if (!name.trim()) return 'Baseline name is empty';
  if (/[\\/\0]/.test(name)) return `Baseline name '${name}' must not contain path separators`;
  if (name.startsWith('.')) return `Baseline name '${name}' must not start with '.'`;
  return null;
}

const plainName = (field: string) => z.string().superRefine((value, ctx) => {
  const error = baselineNameError(value);
  if (error) ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.replace('Baseline name', `Baseline ${field}`) });
});

export const baselineEntrySchema = z.object({
  name: plainName('name'),
  file: plainName('file'),
  created: z.string(),
  app_type: z.enum(['web', 'native-window', 'terminal-program']),
  url: z.string().optional(),
  command: z.string().optional(),
  window_title: z.string().optional(),
  description: z.string().optional(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});
export type BaselineEntry = z.infer<typeof baselineEntrySchema>;

export const manifestSchema = z.object({
  version: z.string().default(MANIFEST_VERSION),
  baselines: z.array(baselineEntrySchema).default([]),
});
export type Manifest = z.infer<typeof manifestSchema>;

export class ManifestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ManifestError';
  }
}

export function emptyManifest(): Manifest {
  return { version: MANIFEST_VERSION, baselines: [] };
}

/** A missing manifest is an empty one; an unreadable one is an error. */
export async function loadManifest(path: string): Promise<Manifest> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return emptyManifest();
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ManifestError(`Invalid JSON in ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = manifestSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ManifestError(`Malformed manifest ${path}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`);
  }
  return parsed.data;
}

export async function saveManifest(path: string, manifest: Manifest): Promise<void> {
  await writeJsonAtomic(path, manifest);
}

export function findEntry(manifest: Manifest, name: string): BaselineEntry | undefined {
  return manifest.baselines.find(b => b.name === name);
}

/** Drop any entry with the same name, then append. Returns a new manifest. */
export function upsertEntry(manifest: Manifest, entry: BaselineEntry): Manifest {
  return {
    version: manifest.version,
    baselines: [...manifest.baselines.filter(b => b.name !== entry.name), entry],
  };
}

export function removeEntry(manifest: Manifest, name: string): Manifest {
  return { version: manifest.version, baselines: manifest.baselines.filter(b => b.name !== name) };
}
