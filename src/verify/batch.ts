import { dirname } from 'node:path';
import type { Judge } from '../judge/client.js';
import { replyText } from '../judge/client.js';
import { evidenceFromPath, type Evidence } from '../judge/evidence.js';
import { parseJudgeResponse } from '../judge/parse.js';
import { buildBatchPrompt } from '../judge/prompts.js';
import { batchVerdictSchema, type CaptureStatus, type OverallStatus } from '../judge/schemas.js';
import type { CaptureStore, StoredCapture } from '../capture/store.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/guards.js';

const BATCH_INLINE_CHARS = 2000;

export interface BatchCaptureVerdict {
  index: number;
  path: string;
  status: CaptureStatus;
  evidence: string;
  itemsVerified: string[];
  issues: string[];
  /** False when the judge said nothing about this capture */
  judged: boolean;
}

export interface BatchResult {
  success: boolean;
  /** False when the judge reply could not be read */
  parsed: boolean;
  total: number;
  passed: number;
  failed: number;
  uncertain: number;
  overallStatus: OverallStatus;
  issues: string[];
  details: BatchCaptureVerdict[];
  recommendation: string;
  judgeResponse: string;
}

export interface BatchRequest {
  judge: Judge;
  paths: string[];
  items: string[];
  criteria?: string;
  context?: string;
  /** Ask for one verdict per capture (default true) */
  detailed?: boolean;
  timeoutMs?: number;
}

const log = logger.child('batch');

function allUncertain(paths: string[], reason: string, raw: string): BatchResult {
  return {
    success: false,
    parsed: false,
    total: paths.length,
    passed: 0,
    failed: 0,
    uncertain: paths.length,
    overallStatus: 'fail',
    issues: [reason],
    details: paths.map((path, i) => ({
      index: i + 1,
      path,
      status: 'uncertain',
      evidence: reason,
      itemsVerified: [],
      issues: [],
      judged: false,
    })),
    recommendation: 'Review the raw judge response and re-run the verification.',
    judgeResponse: raw,
  };
}

/** Verify several captures in one judge call. */
export async function verifyBatch(request: BatchRequest): Promise<BatchResult> {
  const { judge, paths, items, criteria, context } = request;
  const detailed = request.detailed ?? true;

  if (paths.length === 0) {
    return allUncertain(paths, 'No captures to verify', '');
  }

  const captures: Evidence[] = [];
  for (const path of paths) {
    try {
      captures.push(await evidenceFromPath(path, BATCH_INLINE_CHARS));
    } catch (err) {
      return allUncertain(paths, `Could not read capture ${path}: ${errorMessage(err)}`, '');
    }
  }

  const prompt = buildBatchPrompt({ items, criteria, context, captures, detailed });
  log.info(`Asking ${judge.name} to verify ${paths.length} capture(s)`);
  const reply = await judge.ask({ prompt, timeoutMs: request.timeoutMs, cwd: dirname(paths[0] ?? '.') });
  const raw = replyText(reply);

  const outcome = parseJudgeResponse(raw, batchVerdictSchema);
  if (outcome.kind === 'unparseable') {
    log.warn(`Unparseable batch response: ${outcome.reason}`);
    return allUncertain(paths, `Unparseable judge response: ${outcome.reason}`, raw);
  }

  const { summary, details, recommendation } = outcome.value;
  const byIndex = new Map(details.map(d => [d.image_index, d]));
  const verdicts: BatchCaptureVerdict[] = [];
  if (detailed) {
    paths.forEach((path, i) => {
      const d = byIndex.get(i + 1);
      verdicts.push(d
        ? { index: i + 1, path, status: d.status, evidence: d.evidence, itemsVerified: d.task_items_verified, issues: d.issues, judged: true }
        : { index: i + 1, path, status: 'uncertain', evidence: 'No verdict returned for this capture', itemsVerified: [], issues: [], judged: false });
    });
  }

  const anyUnsettled = verdicts.some(v => v.status !== 'pass');
  return {
    success: summary.overall_status === 'pass' && !anyUnsettled,
    parsed: true,
    total: paths.length,
    passed: summary.passed,
    failed: summary.failed,
    uncertain: summary.uncertain,
    overallStatus: summary.overall_status,
    issues: summary.issues,
    details: verdicts,
    recommendation,
    judgeResponse: raw,
  };
}

/**
 * Mark stored captures the judge ruled on. Captures without their own
 * verdict, or every capture after an unreadable reply, stay pending.
 */
export async function recordBatchVerdicts(
  store: CaptureStore,
  stored: StoredCapture[],
  result: BatchResult,
): Promise<string[]> {
  if (!result.parsed) return [];
  const marked: string[] = [];
  for (const capture of stored) {
    const verdict = result.details.find(d => d.judged && d.path === capture.storedPath);
    if (!verdict) continue;
    await store.markVerified(capture.id, verdict.status);
    marked.push(capture.id);
  }
  return marked;
}
