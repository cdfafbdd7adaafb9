import { access, mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { resourceName } from './id.js';

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write JSON by writing a sibling temp file and renaming it over the target,
 * so readers see either the old document or the new one.
 */
export async function writeJsonAtomic(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${resourceName('tmp')}`;
  await writeFile(tmp, JSON.stringify(data, null, 2) + '\n', 'utf-8');
  await rename(tmp, path);
}

/** Replace a text file's contents through a temp file and a rename. */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const tmp = `${path}.${resourceName('tmp')}`;
  try {
    await writeFile(tmp, content, 'utf-8');
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}
