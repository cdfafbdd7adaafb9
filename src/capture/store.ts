import { copyFile, mkdir, readFile, rm } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import chokidar, { type FSWatcher } from 'chokidar';
import { z } from 'zod';
import { generateId } from '../utils/id.js';
import { pathExists, writeJsonAtomic } from '../utils/fs.js';
import { isRecord, errorMessage } from '../utils/guards.js';
import { logger, type Logger } from '../utils/logger.js';
import { nowIso, unixSeconds } from '../utils/time.js';

export const WATCHED_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.gif', '.txt', '.html'];

const METADATA_FILE = 'captures.json';

export interface StoredCapture {
  id: string;
  originalPath: string;
  storedPath: string;
  event: string;
  description: string;
  timestamp: string;
  source: string;
  verified: boolean;
  verificationResult: string | null;
  tags: string[];
  customData: Record<string, unknown>;
}

export interface AddCaptureInput {
  event?: string;
  description?: string;
  source?: string;
  tags?: string[];
  customData?: Record<string, unknown>;
}

const storedCaptureSchema = z.object({
  id: z.string().min(1),
  original_path: z.string().default(''),
  stored_path: z.string().min(1),
  event: z.string().default(''),
  description: z.string().default(''),
  timestamp: z.string().default(''),
  source: z.string().default('external'),
  verified: z.boolean().default(false),
  verification_result: z.string().nullable().default(null),
  tags: z.array(z.string()).default([]),
  custom_data: z.record(z.unknown()).default({}),
});

/** Read one record from captures.json; null for anything malformed. */
function parseStoredCapture(value: unknown): StoredCapture | null {
  const parsed = storedCaptureSchema.safeParse(value);
  if (!parsed.success) return null;
  const record = parsed.data;
  return {
    id: record.id,
    originalPath: record.original_path,
    storedPath: record.stored_path,
    event: record.event,
    description: record.description,
    timestamp: record.timestamp,
    source: record.source,
    verified: record.verified,
    verificationResult: record.verification_result,
    tags: record.tags,
    customData: record.custom_data,
  };
}

function serialize(capture: StoredCapture): Record<string, unknown> {
  return {
    id: capture.id,
    original_path: capture.originalPath,
    stored_path: capture.storedPath,
    event: capture.event,
    description: capture.description,
    timestamp: capture.timestamp,
    source: capture.source,
    verified: capture.verified,
    verification_result: capture.verificationResult,
    tags: capture.tags,
    custom_data: capture.customData,
  };
}

/**
 * Registry of captures pushed in from outside: a copy of each file plus its
 * metadata, persisted in `captures.json` under the store directory.
 */
export class CaptureStore {
  private captures = new Map<string, StoredCapture>();
  private loaded = false;
  private writes: Promise<void> = Promise.resolve();

  constructor(readonly baseDir: string, private log: Logger = logger.child('store')) {}

  private get metadataPath(): string {
    return join(this.baseDir, METADATA_FILE);
  }

  async load(): Promise<void> {
    if (this.loaded) return;
    await mkdir(this.baseDir, { recursive: true });
    this.loaded = true;

    let raw: string;
    try {
      raw = await readFile(this.metadataPath, 'utf-8');
    } catch {
      return;
    }
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      this.log.warn(`Ignoring unreadable ${this.metadataPath}: ${errorMessage(err)}`);
      return;
    }
    if (!isRecord(data)) return;
    for (const value of Object.values(data)) {
      const capture = parseStoredCapture(value);
      if (capture) this.captures.set(capture.id, capture);
    }
  }

  /** Copy `path` into the store and record it. Throws if the file does not exist. */
  async add(path: string, input: AddCaptureInput = {}): Promise<StoredCapture> {
    await this.load();
    if (!(await pathExists(path))) {
      throw new Error(`Capture file not found: ${path}`);
    }
    const id = generateId();
    const storedPath = join(this.baseDir, `${id}_${unixSeconds()}${extname(path)}`);
    await copyFile(path, storedPath);

    const capture: StoredCapture = {
      id,
      originalPath: resolve(path),
      storedPath,
      event: input.event ?? '',
      description: input.description ?? '',
      timestamp: nowIso(),
      source: input.source ?? 'external',
      verified: false,
      verificationResult: null,
      tags: input.tags ?? [],
      customData: input.customData ?? {},
    };
    this.captures.set(id, capture);
    await this.save();
    this.log.debug(`Stored capture ${id} from ${path}`);
    return capture;
  }

  async get(id: string): Promise<StoredCapture | null> {
    await this.load();
    return this.captures.get(id) ?? null;
  }

  async all(): Promise<StoredCapture[]> {
    await this.load();
    return [...this.captures.values()];
  }

  async pending(): Promise<StoredCapture[]> {
    return (await this.all()).filter(c => !c.verified);
  }

  async byTag(tag: string): Promise<StoredCapture[]> {
    return (await this.all()).filter(c => c.tags.includes(tag));
  }

  async bySource(source: string): Promise<StoredCapture[]> {
    return (await this.all()).filter(c => c.source === source);
  }

  async paths(): Promise<string[]> {
    return (await this.all()).map(c => c.storedPath);
  }

  async markVerified(id: string, result: string): Promise<boolean> {
    await this.load();
    const capture = this.captures.get(id);
    if (!capture) return false;
    capture.verified = true;
    capture.verificationResult = result;
    await this.save();
    return true;
  }

  async delete(id: string): Promise<boolean> {
    await this.load();
    const capture = this.captures.get(id);
    if (!capture) return false;
    await rm(capture.storedPath, { force: true });
    this.captures.delete(id);
    await this.save();
    return true;
  }

  async clear(): Promise<number> {
    await this.load();
    const count = this.captures.size;
    for (const capture of this.captures.values()) {
      await rm(capture.storedPath, { force: true });
    }
    this.captures.clear();
    await this.save();
    return count;
  }

  private async save(): Promise<void> {
    const write = async (): Promise<void> => {
      const doc: Record<string, unknown> = {};
      for (const [id, capture] of this.captures) doc[id] = serialize(capture);
      await writeJsonAtomic(this.metadataPath, doc);
    };
    // Serialize writes so concurrent adds cannot interleave
    this.writes = this.writes.then(write, write);
    await this.writes;
  }
}

/**
 * Entry point for external producers: accepts captures one at a time, in
 * batches, or by watching an `incoming/` directory.
 */
export class CaptureHook {
  private watcher: FSWatcher | null = null;

  constructor(readonly store: CaptureStore, private log: Logger = logger.child('hook')) {}

  async accept(path: string, input: Omit<AddCaptureInput, 'source'> = {}): Promise<StoredCapture> {
    return this.store.add(path, { ...input, source: 'external' });
  }

  /** Accept several files; ones that cannot be stored are logged and skipped. */
  async acceptBatch(paths: string[], tags: string[] = []): Promise<StoredCapture[]> {
    const accepted: StoredCapture[] = [];
    for (const [i, path] of paths.entries()) {
      try {
        accepted.push(await this.accept(path, { event: `batch_${i + 1}`, tags }));
      } catch (err) {
        this.log.warn(`Failed to accept ${path}: ${errorMessage(err)}`);
      }
    }
    return accepted;
  }

  get watching(): boolean {
    return this.watcher !== null;
  }

  /** Watch `dir` (default `<store>/incoming`) for new capture files. */
  async startWatching(
    dir: string = join(this.store.baseDir, 'incoming'),
    onCapture?: (capture: StoredCapture) => void,
  ): Promise<string> {
    if (this.watcher) return dir;
    await mkdir(dir, { recursive: true });

    const watcher = chokidar.watch(dir, {
      ignoreInitial: true,
      depth: 0,
      awaitWriteFinish: { stabilityThreshold: 200, pollInterval: 50 },
    });
    watcher.on('add', (path: string) => {
      void this.handleIncoming(path, onCapture);
    });
    watcher.on('error', (err: unknown) => {
      this.log.warn(`Watcher error: ${errorMessage(err)}`);
    });
    await new Promise<void>((resolveReady) => watcher.once('ready', () => resolveReady()));
    this.watcher = watcher;
    this.log.info(`Watching ${dir} for new captures`);
    return dir;
  }

  async stopWatching(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) await watcher.close();
  }

  private async handleIncoming(path: string, onCapture?: (capture: StoredCapture) => void): Promise<void> {
    if (!WATCHED_EXTENSIONS.includes(extname(path).toLowerCase())) return;
    try {
      const capture = await this.accept(path, { event: `detected:${basename(path)}` });
      onCapture?.(capture);
    } catch (err) {
      this.log.warn(`Failed to accept ${path}: ${errorMessage(err)}`);
    }
  }
}
