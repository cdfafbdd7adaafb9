/**
 * Auto-fix loop.
 *
 * Verifying -> Fixed | Proposing
 * Proposing -> Applying | Abandoned
 * Applying  -> Verifying | Abandoned
 *
 * Bounded by `maxAttempts` applied or rejected proposals.
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import type { Judge } from '../judge/client.js';
import { replyText } from '../judge/client.js';
import { evidenceFromPath, type Evidence } from '../judge/evidence.js';
import { parseJudgeResponse, type ParseOutcome } from '../judge/parse.js';
import { buildFixPrompt, type SourceFile } from '../judge/prompts.js';
import { fixProposalSchema, type FixProposal } from '../judge/schemas.js';
import type { VerificationResult } from '../verify/orchestrator.js';
import { applyFix as defaultApplyFix, type ApplyOutcome, type FixEdit } from './apply.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { FixSettings } from '../config/schema.js';
import { logger, type Logger } from '../utils/logger.js';
import { sleep } from '../utils/time.js';
import { errorMessage } from '../utils/guards.js';

export type FixPolicy = Pick<FixSettings, 'maxAttempts' | 'minConfidence' | 'reloadDelayMs' | 'maxContextFiles' | 'maxFileChars'>;

export type AttemptOutcome = 'applied' | 'no_proposal' | 'low_confidence' | 'apply_failed';

export interface FixAttempt {
  attempt: number;
  issue: string;
  file: string | null;
  lineNumber: number | null;
  originalCode: string;
  fixedCode: string;
  confidence: number;
  explanation: string;
  outcome: AttemptOutcome;
  applied: boolean;
  /** Set at the end of the iteration: true when re-verification passed */
  success: boolean;
  message: string;
  verificationAfter?: VerificationResult;
}

export type StopReason = 'verified' | 'max_attempts' | 'no_proposal' | 'low_confidence' | 'apply_failed';

export interface AutoFixResult {
  allFixed: boolean;
  stopReason: StopReason;
  attempts: FixAttempt[];
  /** Evidence artifacts in the order they were produced */
  evidence: string[];
  finalVerification: VerificationResult;
}

export interface AutoFixOptions {
  /** One verification run against the live application */
  verify: () => Promise<VerificationResult>;
  judge: Judge;
  /** Recently edited source files, most relevant first */
  editedFiles: string[];
  policy?: Partial<FixPolicy>;
  cwd?: string;
  judgeTimeoutMs?: number;
  /** Text evidence longer than this is cut before going to the judge */
  maxInlineChars?: number;
  applyFix?: (edit: FixEdit, cwd?: string) => Promise<ApplyOutcome>;
  log?: Logger;
}

type LoopState =
  | { name: 'verifying' }
  | { name: 'proposing'; verification: VerificationResult }
  | { name: 'applying'; attempt: FixAttempt }
  | { name: 'fixed' }
  | { name: 'abandoned'; reason: StopReason };

export function describeIssue(verification: VerificationResult): string {
  const lines: string[] = [];
  if (verification.failedItems.length > 0) {
    lines.push('Items not completed:', ...verification.failedItems.map(i => `- ${i}`));
  }
  if (verification.uncertainItems.length > 0) {
    lines.push('Items that could not be confirmed:', ...verification.uncertainItems.map(i => `- ${i}`));
  }
  const notes = verification.verdicts.filter(v => v.status !== 'COMPLETED' && v.evidence);
  if (notes.length > 0) {
    lines.push('', 'Judge observations:', ...notes.map(v => `- ${v.task}: ${v.evidence}`));
  }
  if (verification.summary) lines.push('', verification.summary);
  return lines.join('\n') || 'Verification failed';
}

export async function readSourceFiles(paths: string[], policy: FixPolicy, cwd: string, log: Logger): Promise<SourceFile[]> {
  const files: SourceFile[] = [];
  for (const path of paths.slice(0, policy.maxContextFiles)) {
    const full = isAbsolute(path) ? path : resolve(cwd, path);
    try {
      const content = await readFile(full, 'utf-8');
      const truncated = content.length > policy.maxFileChars;
      files.push({ path, content: truncated ? content.slice(0, policy.maxFileChars) : content, truncated });
    } catch (err) {
      log.warn(`Skipping unreadable file ${path}: ${errorMessage(err)}`);
    }
  }
  return files;
}

/** Ask the judge for one edit addressing the failed verification. */
export async function proposeFix(
  judge: Judge,
  verification: VerificationResult,
  files: SourceFile[],
  timeoutMs?: number,
  maxInlineChars?: number,
): Promise<ParseOutcome<FixProposal>> {
  if (!verification.evidencePath) {
    return { kind: 'unparseable', raw: '', reason: 'no evidence artifact to analyze' };
  }
  let evidence: Evidence;
  try {
    evidence = await evidenceFromPath(verification.evidencePath, maxInlineChars);
  } catch (err) {
    return { kind: 'unparseable', raw: '', reason: `evidence unreadable: ${errorMessage(err)}` };
  }
  const prompt = buildFixPrompt({ issue: describeIssue(verification), evidence, files });
  const reply = await judge.ask({ prompt, timeoutMs });
  return parseJudgeResponse(replyText(reply), fixProposalSchema);
}

function attemptFrom(n: number, proposal: FixProposal | null, message: string): FixAttempt {
  return {
    attempt: n,
    issue: proposal?.issue_identified ?? '',
    file: proposal?.file_to_fix ?? null,
    lineNumber: proposal?.line_number ?? null,
    originalCode: proposal?.original_code ?? '',
    fixedCode: proposal?.fixed_code ?? '',
    confidence: proposal?.confidence ?? 0,
    explanation: proposal?.explanation ?? '',
    outcome: 'no_proposal',
    applied: false,
    success: false,
    message,
  };
}

export async function runAutoFix(options: AutoFixOptions): Promise<AutoFixResult> {
  const policy: FixPolicy = { ...DEFAULT_CONFIG.fix, ...options.policy };
  const log = options.log ?? logger.child('fix');
  const cwd = options.cwd ?? process.cwd();
  const apply = options.applyFix ?? defaultApplyFix;

  const attempts: FixAttempt[] = [];
  const evidence: string[] = [];
  let latest: VerificationResult | null = null;
  let pending: FixAttempt | null = null;
  let state: LoopState = { name: 'verifying' };

  for (;;) {
    switch (state.name) {
      case 'verifying': {
        const verification = await options.verify();
        latest = verification;
        if (verification.evidencePath) evidence.push(verification.evidencePath);
        if (pending) {
          pending.verificationAfter = verification;
          pending.success = verification.success;
          pending = null;
        }
        if (verification.success) {
          state = { name: 'fixed' };
        } else if (attempts.length >= policy.maxAttempts) {
          log.info(`Giving up after ${attempts.length} fix attempt(s)`);
          state = { name: 'abandoned', reason: 'max_attempts' };
        } else {
          state = { name: 'proposing', verification };
        }
        break;
      }

      case 'proposing': {
        const n = attempts.length + 1;
        log.info(`Fix attempt ${n}/${policy.maxAttempts}: asking ${options.judge.name} for a proposal`);
        const files = await readSourceFiles(options.editedFiles, policy, cwd, log);
        const outcome = await proposeFix(options.judge, state.verification, files, options.judgeTimeoutMs, options.maxInlineChars);

        if (outcome.kind === 'unparseable') {
          attempts.push(attemptFrom(n, null, `No usable proposal: ${outcome.reason}`));
          state = { name: 'abandoned', reason: 'no_proposal' };
          break;
        }
        const proposal = outcome.value;
        const attempt = attemptFrom(n, proposal, '');
        attempts.push(attempt);

        if (!proposal.file_to_fix) {
          attempt.message = `No file proposed: ${proposal.explanation || proposal.root_cause || 'no reason given'}`;
          state = { name: 'abandoned', reason: 'no_proposal' };
        } else if (proposal.confidence < policy.minConfidence) {
          attempt.outcome = 'low_confidence';
          attempt.message = `Confidence ${proposal.confidence} is below ${policy.minConfidence}; not applied`;
          log.info(attempt.message);
          state = { name: 'abandoned', reason: 'low_confidence' };
        } else {
          state = { name: 'applying', attempt };
        }
        break;
      }

      case 'applying': {
        const { attempt } = state;
        const result = await apply(
          { file: attempt.file ?? '', originalCode: attempt.originalCode, fixedCode: attempt.fixedCode },
          cwd,
        );
        if (!result.applied) {
          attempt.outcome = 'apply_failed';
          attempt.message = result.message;
          log.warn(`Fix not applied: ${result.message}`);
          state = { name: 'abandoned', reason: 'apply_failed' };
          break;
        }
        attempt.outcome = 'applied';
        attempt.applied = true;
        attempt.message = `Applied to ${result.path}`;
        log.info(`Applied fix to ${result.path}; waiting ${policy.reloadDelayMs}ms for reload`);
        pending = attempt;
        await sleep(policy.reloadDelayMs);
        state = { name: 'verifying' };
        break;
      }

      case 'fixed':
      case 'abandoned': {
        if (!latest) throw new Error('auto-fix finished without a verification');
        return {
          allFixed: state.name === 'fixed',
          stopReason: state.name === 'fixed' ? 'verified' : state.reason,
          attempts,
          evidence,
          finalVerification: latest,
        };
      }
    }
  }
}
