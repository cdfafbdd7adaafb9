import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  ManifestError,
  emptyManifest,
  findEntry,
  loadManifest,
  removeEntry,
  saveManifest,
  upsertEntry,
  type BaselineEntry,
} from '../../src/baseline/manifest.js';

function entry(name: string, file: string): BaselineEntry {
  return { name, file, created: '2026-01-01T00:00:00.000Z', app_type: 'web', url: 'http://localhost:3000', width: 1280, height: 720 };
}

describe('manifest', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sightcheck-manifest-'));
    path = join(dir, 'manifest.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should keep one entry per name on upsert', () => {
    let manifest = upsertEntry(emptyManifest(), entry('home', 'home_1.png'));
    manifest = upsertEntry(manifest, entry('settings', 'settings_1.png'));
    manifest = upsertEntry(manifest, entry('home', 'home_2.png'));

    expect(manifest.baselines.map(b => b.file)).toEqual(['settings_1.png', 'home_2.png']);
    expect(findEntry(manifest, 'home')?.file).toBe('home_2.png');
    expect(removeEntry(manifest, 'home').baselines.map(b => b.name)).toEqual(['settings']);
  });

  it('should not mutate the manifest it was given', () => {
    const original = emptyManifest();
    upsertEntry(original, entry('home', 'home_1.png'));
    expect(original.baselines).toEqual([]);
  });

  it('should treat a missing file as empty', async () => {
    expect(await loadManifest(path)).toEqual({ version: '1.0', baselines: [] });
  });

  it('should read back what it saved', async () => {
    const manifest = upsertEntry(emptyManifest(), entry('home', 'home_1.png'));
    await saveManifest(path, manifest);
    expect(await loadManifest(path)).toEqual(manifest);
  });

  it('should reject invalid JSON', async () => {
    await writeFile(path, '{ not json');
    await expect(loadManifest(path)).rejects.toBeInstanceOf(ManifestError);
    await expect(loadManifest(path)).rejects.toThrow(`Invalid JSON in ${path}: `);
  });

  it('should name the first malformed field', async () => {
    await writeFile(path, JSON.stringify({ baselines: [{ name: 'home' }] }));
    await expect(loadManifest(path)).rejects.toThrow(`Malformed manifest ${path}: baselines.0.file: Required`);
  });

  it('should reject an entry whose file points outside the directory', async () => {
    const entry = { name: 'home', file: '../home.png', created: '2026-01-01T00:00:00.000Z', app_type: 'web', width: 10, height: 10 };
    await writeFile(path, JSON.stringify({ version: '1.0', baselines: [entry] }));
    await expect(loadManifest(path)).rejects.toThrow(
      `Malformed manifest ${path}: baselines.0.file: Baseline file '../home.png' must not contain path separators`,
    );
  });
});
