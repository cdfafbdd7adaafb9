import { writeFile } from 'node:fs/promises';
import { BaseCaptureAdapter } from '../src/capture/adapter.js';
import {
  CaptureError,
  captureSucceeded,
  type CaptureErrorKind,
  type CaptureOptions,
  type CaptureResult,
  type ContentKind,
} from '../src/capture/types.js';
import type { Judge, JudgeReply, JudgeRequest } from '../src/judge/client.js';
import type { Logger } from '../src/utils/logger.js';

export const silentLog: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLog,
};

/** Wrap a value the way a judge reply would: prose around a fenced JSON block. */
export function fencedJson(data: unknown): string {
  return `Here is my assessment.\n\n\`\`\`json\n${JSON.stringify(data, null, 2)}\n\`\`\`\n`;
}

/** Judge that answers from a script and records every request. */
export class ScriptedJudge implements Judge {
  readonly name = 'scripted';
  readonly requests: JudgeRequest[] = [];

  constructor(private script: (request: JudgeRequest, n: number) => string) {}

  async ask(request: JudgeRequest): Promise<JudgeReply> {
    this.requests.push(request);
    return { ok: true, text: this.script(request, this.requests.length), durationMs: 1 };
  }
}

export interface StubArtifact {
  kind: ContentKind;
  ext: string;
  content: string;
}

/**
 * Capture backend that writes a fixed artifact into the output directory,
 * or fails with a given kind.
 */
export class StubAdapter extends BaseCaptureAdapter {
  readonly name = 'headless-browser' as const;
  readonly targets: string[] = [];
  ended = 0;

  constructor(private artifact: StubArtifact | { fail: CaptureErrorKind; error: string }) {
    super({ defaults: { waitBeforeMs: 0 }, log: silentLog });
  }

  canHandle(): boolean {
    return true;
  }

  async endSession(): Promise<CaptureResult[]> {
    this.ended++;
    return super.endSession();
  }

  protected async doCapture(target: string, options: CaptureOptions): Promise<CaptureResult> {
    this.targets.push(target);
    if ('fail' in this.artifact) throw new CaptureError(this.artifact.fail, this.artifact.error);
    const path = await this.artifactPath(options, 'stub', this.artifact.ext);
    await writeFile(path, this.artifact.content);
    return captureSucceeded(this.artifact.kind, { type: 'file', path }, { metadata: { target } });
  }
}

export const PNG_ARTIFACT: StubArtifact = { kind: 'image', ext: 'png', content: 'png-bytes' };
