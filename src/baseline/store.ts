/**
 * Named reference captures for regression comparison.
 *
 * Layout: <baseDir>/manifest.json plus one artifact per entry. Every
 * mutation is one read-modify-write of the manifest; one writer at a time.
 */

import { copyFile, mkdir, rm } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import type { CaptureAdapter } from '../capture/adapter.js';
import { selectAdapter } from '../capture/router.js';
import {
  locationPath,
  type CaptureOptionsInput,
  type CaptureResult,
  type CaptureType,
} from '../capture/types.js';
import type { Judge } from '../judge/client.js';
import { replyText } from '../judge/client.js';
import { evidenceFromPath, type Evidence } from '../judge/evidence.js';
import { parseJudgeResponse } from '../judge/parse.js';
import { buildComparisonPrompt } from '../judge/prompts.js';
import { comparisonSchema, type Comparison } from '../judge/schemas.js';
import { appTarget, type AppDescriptor } from '../verify/app.js';
import type { AdapterFactory } from '../verify/orchestrator.js';
import {
  baselineNameError,
  findEntry,
  loadManifest,
  removeEntry,
  saveManifest,
  upsertEntry,
  type BaselineEntry,
} from './manifest.js';
import { logger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/guards.js';
import { nowIso, unixSeconds } from '../utils/time.js';

export class BaselineNotFoundError extends Error {
  constructor(readonly baselineName: string) {
    super(`Baseline '${baselineName}' not found`);
    this.name = 'BaselineNotFoundError';
  }
}

export interface SaveBaselineInput {
  app: AppDescriptor;
  description?: string;
  width?: number;
  height?: number;
}

export type SaveBaselineOutcome =
  | { ok: true; entry: BaselineEntry; path: string }
  | { ok: false; error: string };

export interface ComparisonResult extends Comparison {
  baselineName: string;
  baselinePath: string;
  currentPath?: string;
  /** Raw judge reply, or the reason none was asked */
  judgeResponse: string;
}

export interface BaselineStoreOptions {
  baseDir: string;
  judge: Judge;
  captureType?: CaptureType;
  captureDefaults?: CaptureOptionsInput;
  judgeTimeoutMs?: number;
  maxInlineChars?: number;
  adapterFor?: AdapterFactory;
  log?: Logger;
}

function artifactExtension(path: string): string {
  if (path.endsWith('.ansi.txt')) return '.txt';
  return extname(path) || '.png';
}

function descriptorOf(entry: BaselineEntry): AppDescriptor {
  return { kind: entry.app_type, url: entry.url, command: entry.command, windowTitle: entry.window_title };
}

export class BaselineStore {
  private log: Logger;
  private adapterFor: AdapterFactory;

  constructor(private options: BaselineStoreOptions) {
    this.log = options.log ?? logger.child('baseline');
    this.adapterFor = options.adapterFor ?? ((target, captureType) => selectAdapter(target, {
      captureType,
      defaults: options.captureDefaults,
      log: this.log,
    }));
  }

  get manifestPath(): string {
    return join(this.options.baseDir, 'manifest.json');
  }

  pathOf(entry: BaselineEntry): string {
    return join(this.options.baseDir, entry.file);
  }

  async list(): Promise<BaselineEntry[]> {
    return (await loadManifest(this.manifestPath)).baselines;
  }

  async get(name: string): Promise<BaselineEntry | undefined> {
    return findEntry(await loadManifest(this.manifestPath), name);
  }

  /** Capture the app and store the artifact under `name`, replacing any earlier one. */
  async save(name: string, input: SaveBaselineInput): Promise<SaveBaselineOutcome> {
    const invalid = baselineNameError(name);
    if (invalid) return { ok: false, error: invalid };
    const target = appTarget(input.app);
    if (!target.ok) return { ok: false, error: target.error };

    const width = input.width ?? this.options.captureDefaults?.width ?? 1280;
    const height = input.height ?? this.options.captureDefaults?.height ?? 720;
    await mkdir(this.options.baseDir, { recursive: true });

    const capture = await this.captureOnce(target.target, { width, height, outputDir: this.options.baseDir });
    const captured = locationPath(capture);
    if (!capture.success || !captured) {
      return { ok: false, error: `Capture failed: ${capture.error ?? 'no artifact written'}` };
    }

    const file = `${name}_${unixSeconds()}${artifactExtension(captured)}`;
    const path = join(this.options.baseDir, file);
    if (captured !== path) {
      try {
        await copyFile(captured, path);
      } catch (err) {
        return { ok: false, error: `Could not store baseline artifact: ${errorMessage(err)}` };
      } finally {
        await rm(captured, { force: true });
      }
    }

    const entry: BaselineEntry = {
      name,
      file,
      created: nowIso(),
      app_type: input.app.kind,
      url: input.app.url,
      command: input.app.command,
      window_title: input.app.windowTitle,
      description: input.description,
      width,
      height,
    };

    const manifest = await loadManifest(this.manifestPath);
    const previous = findEntry(manifest, name);
    await saveManifest(this.manifestPath, upsertEntry(manifest, entry));
    if (previous && previous.file !== file) {
      await rm(this.pathOf(previous), { force: true });
    }

    this.log.info(`Saved baseline '${name}' to ${path}`);
    return { ok: true, entry, path };
  }

  /**
   * Ask the judge whether the current state matches the baseline. Without
   * `currentPath` the app is captured again with the entry's parameters.
   */
  async compare(name: string, currentPath?: string): Promise<ComparisonResult> {
    const entry = await this.get(name);
    if (!entry) throw new BaselineNotFoundError(name);
    const baselinePath = this.pathOf(entry);

    const failed = (judgeResponse: string, difference: string, current?: string): ComparisonResult => ({
      matches: false,
      similarity_score: 0,
      differences: [difference],
      analysis: '',
      suggested_fixes: [],
      baselineName: name,
      baselinePath,
      currentPath: current,
      judgeResponse,
    });

    let current = currentPath;
    if (!current) {
      const target = appTarget(descriptorOf(entry));
      if (!target.ok) return failed(target.error, target.error);
      const capture = await this.captureOnce(target.target, {
        width: entry.width,
        height: entry.height,
        outputDir: this.options.baseDir,
      });
      const path = locationPath(capture);
      if (!capture.success || !path) {
        const reason = `Capture failed: ${capture.error ?? 'no artifact written'}`;
        return failed(reason, reason);
      }
      current = join(this.options.baseDir, `current_${name}_${unixSeconds()}${artifactExtension(path)}`);
      await copyFile(path, current);
      await rm(path, { force: true });
    }

    let baselineEvidence: Evidence;
    let currentEvidence: Evidence;
    try {
      baselineEvidence = await evidenceFromPath(baselinePath, this.options.maxInlineChars);
      currentEvidence = await evidenceFromPath(current, this.options.maxInlineChars);
    } catch (err) {
      const reason = `Could not read capture: ${errorMessage(err)}`;
      return failed(reason, reason, current);
    }
    const reply = await this.options.judge.ask({
      prompt: buildComparisonPrompt(baselineEvidence, currentEvidence),
      timeoutMs: this.options.judgeTimeoutMs,
      cwd: this.options.baseDir,
    });
    const raw = replyText(reply);

    const outcome = parseJudgeResponse(raw, comparisonSchema);
    if (outcome.kind === 'unparseable') {
      return failed(raw, `Could not parse comparison result: ${outcome.reason}`, current);
    }
    this.log.info(`Compared '${name}': similarity ${outcome.value.similarity_score}`);
    return { ...outcome.value, baselineName: name, baselinePath, currentPath: current, judgeResponse: raw };
  }

  /** Returns false when no baseline has that name. A missing artifact is not an error. */
  async delete(name: string): Promise<boolean> {
    const manifest = await loadManifest(this.manifestPath);
    const entry = findEntry(manifest, name);
    if (!entry) return false;
    await saveManifest(this.manifestPath, removeEntry(manifest, name));
    await rm(this.pathOf(entry), { force: true });
    this.log.info(`Deleted baseline '${name}' (${basename(entry.file)})`);
    return true;
  }

  private async captureOnce(target: string, options: CaptureOptionsInput): Promise<CaptureResult> {
    const adapter: CaptureAdapter = await this.adapterFor(target, this.options.captureType ?? 'ansi');
    try {
      return await adapter.capture(target, options);
    } finally {
      await adapter.endSession();
    }
  }
}
