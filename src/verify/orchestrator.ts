import { rename } from 'node:fs/promises';
import { dirname, extname, join } from 'node:path';
import type { CaptureAdapter } from '../capture/adapter.js';
import {
  locationPath,
  relocate,
  type CaptureOptionsInput,
  type CaptureResult,
  type CaptureType,
} from '../capture/types.js';
import { selectAdapter } from '../capture/router.js';
import type { Judge } from '../judge/client.js';
import { replyText } from '../judge/client.js';
import { evidenceFromCapture, type Evidence } from '../judge/evidence.js';
import { parseJudgeResponse } from '../judge/parse.js';
import { buildVerificationPrompt, type AppKind } from '../judge/prompts.js';
import { verdictSchema, type VerdictStatus } from '../judge/schemas.js';
import { appTarget, detectApp, type AppDescriptor } from './app.js';
import { logger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/guards.js';

export interface ItemVerdict {
  task: string;
  status: VerdictStatus;
  evidence: string;
}

export interface VerificationResult {
  success: boolean;
  completedItems: string[];
  /** Judged NOT_COMPLETED, or every item when the verdict could not be read */
  failedItems: string[];
  /** Judged UNCERTAIN or left out of the verdict; these also block success */
  uncertainItems: string[];
  verdicts: ItemVerdict[];
  summary: string;
  /** Raw judge reply, or the reason no judge was asked */
  judgeResponse: string;
  evidencePath?: string;
  appKind?: AppKind;
}

export type AdapterFactory = (target: string, captureType: CaptureType) => Promise<CaptureAdapter>;

export interface VerifierOptions {
  judge: Judge;
  /** Where evidence artifacts are written */
  evidenceDir: string;
  captureType?: CaptureType;
  captureDefaults?: CaptureOptionsInput;
  judgeTimeoutMs?: number;
  /** Text captures longer than this are cut before going to the judge */
  maxInlineChars?: number;
  adapterFor?: AdapterFactory;
  log?: Logger;
}

export function failedVerification(items: string[], judgeResponse: string, extra?: Partial<VerificationResult>): VerificationResult {
  return {
    success: false,
    completedItems: [],
    failedItems: [...items],
    uncertainItems: [],
    verdicts: [],
    summary: '',
    ...extra,
    judgeResponse,
  };
}

function normalize(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

function sameItem(a: string, b: string): boolean {
  const na = normalize(a);
  const nb = normalize(b);
  return na.length > 0 && nb.length > 0 && (na === nb || na.includes(nb) || nb.includes(na));
}

/**
 * Reduce a judge reply to completed / failed / uncertain lists, in the
 * order the judge gave them. An unreadable reply fails every item.
 */
export function interpretVerdict(raw: string, items: string[]): Omit<VerificationResult, 'evidencePath' | 'appKind'> {
  const outcome = parseJudgeResponse(raw, verdictSchema);
  if (outcome.kind === 'unparseable') {
    return failedVerification(items, raw, { summary: `Unparseable judge response: ${outcome.reason}` });
  }

  const verdict = outcome.value;
  const completed: string[] = [];
  const failed: string[] = [];
  const uncertain: string[] = [];
  for (const result of verdict.results) {
    if (result.status === 'COMPLETED') completed.push(result.task);
    else if (result.status === 'NOT_COMPLETED') failed.push(result.task);
    else uncertain.push(result.task);
  }
  const unreported = items.filter(item => !verdict.results.some(r => sameItem(r.task, item)));
  uncertain.push(...unreported);

  return {
    success: completed.length > 0 && failed.length === 0 && uncertain.length === 0 && verdict.all_completed !== false,
    completedItems: completed,
    failedItems: failed,
    uncertainItems: uncertain,
    verdicts: verdict.results.map(r => ({ task: r.task, status: r.status, evidence: r.evidence })),
    summary: verdict.summary,
    judgeResponse: raw,
  };
}

function artifactExtension(path: string): string {
  return path.endsWith('.ansi.txt') ? '.txt' : extname(path);
}

function slug(name: string): string {
  return name.replace(/[^A-Za-z0-9._-]+/g, '-').replace(/^-+|-+$/g, '') || 'verify';
}

/**
 * Capture an application and have the judge decide which checklist items
 * it satisfies.
 */
export class Verifier {
  private log: Logger;
  private adapterFor: AdapterFactory;

  constructor(private options: VerifierOptions) {
    this.log = options.log ?? logger.child('verify');
    this.adapterFor = options.adapterFor ?? ((target, captureType) => selectAdapter(target, {
      captureType,
      defaults: options.captureDefaults,
      log: this.log,
    }));
  }

  /** Verify against a task description carrying an app marker such as `[webapp]: <url>`. */
  async verify(descriptor: string, items: string[], criteria?: string, name = 'verify'): Promise<VerificationResult> {
    const app = detectApp(descriptor);
    if (!app) {
      return failedVerification(
        items,
        'Could not detect application type. Add [webapp]: <url>, [gui]: <command> or [tui]: <command> to the task file.',
      );
    }
    return this.verifyApp(app, items, criteria, name);
  }

  async verifyApp(app: AppDescriptor, items: string[], criteria?: string, name = 'verify'): Promise<VerificationResult> {
    const target = appTarget(app);
    if (!target.ok) {
      return failedVerification(items, target.error, { appKind: app.kind });
    }

    try {
      const capture = await this.captureEvidence(target.target, name);
      if (!capture.success) {
        return failedVerification(items, `Capture failed: ${capture.error ?? 'unknown error'}`, {
          appKind: app.kind,
          evidencePath: locationPath(capture),
        });
      }
      return await this.judgeCapture(capture, app.kind, items, criteria);
    } catch (err) {
      this.log.error(`Verification aborted: ${errorMessage(err)}`);
      return failedVerification(items, `Error during verification: ${errorMessage(err)}`, { appKind: app.kind });
    }
  }

  /** Steps after capture: build the request, ask the judge, reduce the verdict. */
  async judgeCapture(capture: CaptureResult, appKind: AppKind, items: string[], criteria?: string): Promise<VerificationResult> {
    const evidencePath = locationPath(capture);
    let evidence: Evidence | null;
    try {
      evidence = await evidenceFromCapture(capture, this.options.maxInlineChars);
    } catch (err) {
      return failedVerification(items, `Could not read capture: ${errorMessage(err)}`, { appKind, evidencePath });
    }
    if (!evidence || (evidence.type === 'inline' && !evidence.text.trim())) {
      return failedVerification(items, 'Capture produced no output to verify.', { appKind, evidencePath });
    }

    const prompt = buildVerificationPrompt({ appKind, items, criteria, evidence });
    this.log.info(`Asking ${this.options.judge.name} to verify ${items.length} item(s)`);
    const reply = await this.options.judge.ask({
      prompt,
      timeoutMs: this.options.judgeTimeoutMs,
      cwd: evidencePath ? dirname(evidencePath) : undefined,
    });

    const result = interpretVerdict(replyText(reply), items);
    this.log.info(
      `Verdict: ${result.completedItems.length} completed, ${result.failedItems.length} failed, ` +
      `${result.uncertainItems.length} uncertain`,
    );
    return { ...result, appKind, evidencePath };
  }

  private async captureEvidence(target: string, name: string): Promise<CaptureResult> {
    const adapter = await this.adapterFor(target, this.options.captureType ?? 'ansi');
    this.log.info(`Capturing ${target} with ${adapter.name}`);
    try {
      const capture = await adapter.capture(target, { outputDir: this.options.evidenceDir });
      const path = locationPath(capture);
      if (!capture.success || !path) return capture;

      const evidencePath = join(this.options.evidenceDir, `${slug(name)}_${Date.now()}${artifactExtension(path)}`);
      await rename(path, evidencePath);
      return relocate(capture, evidencePath);
    } finally {
      await adapter.endSession();
    }
  }
}
