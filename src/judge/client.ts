/**
 * Judge client: one headless call to an LLM CLI per request.
 * Format: `<tool> -p "<prompt>" --output-format text` (per-tool flags below).
 */

import type { JudgeTool } from '../config/schema.js';
import { exec } from '../utils/process.js';
import { logger } from '../utils/logger.js';

export interface JudgeRequest {
  prompt: string;
  timeoutMs?: number;
  /** Working directory for the judge, so it can read referenced artifacts */
  cwd?: string;
}

export type JudgeReply =
  | { ok: true; text: string; durationMs: number }
  | { ok: false; text: string; error: string; durationMs: number };

export interface Judge {
  readonly name: string;
  ask(request: JudgeRequest): Promise<JudgeReply>;
}

const log = logger.child('judge');

/** CLI args for a judge call. Each tool has slightly different flags. */
export function buildJudgeArgs(tool: JudgeTool, prompt: string, model?: string): string[] {
  switch (tool) {
    case 'claude': {
      const args = ['-p', prompt, '--output-format', 'text', '--allowedTools', 'Read'];
      if (model) args.push('--model', model);
      return args;
    }
    case 'codex': {
      const args = ['exec'];
      if (model) args.push('--model', model);
      args.push(prompt);
      return args;
    }
    case 'gemini': {
      const args = ['-p', prompt];
      if (model) args.push('--model', model);
      return args;
    }
  }
}

export class CliJudge implements Judge {
  readonly name: string;

  constructor(
    private tool: JudgeTool = 'claude',
    private options: { model?: string; timeoutMs?: number } = {},
  ) {
    this.name = tool;
  }

  async ask(request: JudgeRequest): Promise<JudgeReply> {
    const timeout = request.timeoutMs ?? this.options.timeoutMs ?? 120_000;
    const args = buildJudgeArgs(this.tool, request.prompt, this.options.model);

    log.debug(`${this.tool} call (${request.prompt.length} chars, timeout ${timeout}ms)`);
    const start = Date.now();
    const result = await exec(this.tool, args, { timeout, cwd: request.cwd });
    const durationMs = Date.now() - start;

    if (result.timedOut) {
      log.warn(`${this.tool} timed out after ${timeout}ms`);
      return { ok: false, text: result.stdout.trim(), error: `Judge timed out after ${timeout}ms`, durationMs };
    }
    if (result.exitCode !== 0) {
      const error = result.exitCode === 127
        ? `Judge command not found: ${this.tool}`
        : result.stderr.trim() || `exit code ${result.exitCode}`;
      log.warn(`${this.tool} call failed: ${error}`);
      return { ok: false, text: result.stdout.trim(), error, durationMs };
    }

    log.debug(`${this.tool} answered in ${durationMs}ms`);
    return { ok: true, text: result.stdout.trim(), durationMs };
  }
}

/** Raw text to show a human for any reply, including failed calls. */
export function replyText(reply: JudgeReply): string {
  if (reply.ok) return reply.text;
  return reply.text ? `Error: ${reply.error}\n${reply.text}` : `Error: ${reply.error}`;
}
