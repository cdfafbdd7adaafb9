import { writeFile } from 'node:fs/promises';
import { BaseCaptureAdapter, eventLabel, type AdapterSettings } from '../adapter.js';
import {
  captureFailed,
  captureSucceeded,
  withEvent,
  type CaptureEvent,
  type CaptureOptions,
  type CaptureResult,
} from '../types.js';
import { classifyTarget, stripTargetPrefix } from '../target.js';
import { execShell, type ShellResult } from '../../utils/process.js';
import { sleep } from '../../utils/time.js';

const COMMAND_NOT_FOUND = 127;

/** Default limit for the `timeout` event when its selector is not a number of seconds. */
const EVENT_TIMEOUT_SECONDS = 5;

export interface ProcessOutputSettings extends AdapterSettings {
  cwd?: string;
  env?: Record<string, string>;
}

function seconds(ms: number): string {
  return (ms / 1000).toFixed(2);
}

/** Plain-text transcript written next to every process capture. */
export function formatTranscript(command: string, run: ShellResult): string {
  if (run.timedOut) {
    return [
      `$ ${command}`,
      '--- TIMEOUT ---',
      '--- PARTIAL STDOUT ---',
      run.stdout,
      '--- PARTIAL STDERR ---',
      run.stderr,
      '',
      `--- TIMED OUT AFTER: ${seconds(run.durationMs)}s ---`,
    ].join('\n');
  }
  return [
    `$ ${command}`,
    '--- STDOUT ---',
    run.stdout,
    '',
    '--- STDERR ---',
    run.stderr,
    '',
    `--- EXIT CODE: ${run.exitCode} ---`,
    `--- DURATION: ${seconds(run.durationMs)}s ---`,
  ].join('\n');
}

/**
 * Runs a shell command to completion and captures its output as text.
 * Has no session of its own; every capture is a fresh run.
 */
export class ProcessOutputAdapter extends BaseCaptureAdapter {
  readonly name = 'process-output' as const;

  private cwd?: string;
  private env?: Record<string, string>;

  constructor(settings: ProcessOutputSettings = {}) {
    super(settings);
    this.cwd = settings.cwd;
    this.env = settings.env;
  }

  canHandle(target: string): boolean {
    const kind = classifyTarget(target);
    return kind === 'shell-command' || kind === 'terminal-program';
  }

  protected async doCapture(target: string, options: CaptureOptions): Promise<CaptureResult> {
    const command = stripTargetPrefix(target, ['cli:', 'tui:']);
    if (!command) {
      return captureFailed('not_found', 'No command given', { kind: 'text' });
    }

    await sleep(options.waitBeforeMs);
    this.log.debug(`Running: ${command} (timeout ${options.timeoutMs}ms)`);
    const run = await execShell(command, { cwd: this.cwd, env: this.env, timeout: options.timeoutMs });

    const outputPath = await this.artifactPath(options, 'cli', 'txt');
    await writeFile(outputPath, formatTranscript(command, run), 'utf-8');
    await sleep(options.waitAfterMs);

    const location = { type: 'file' as const, path: outputPath };
    const metadata: Record<string, unknown> = {
      command,
      exit_code: run.exitCode,
      duration_seconds: Number(seconds(run.durationMs)),
      stdout: run.stdout,
      stderr: run.stderr,
    };

    if (run.timedOut) {
      this.log.warn(`Command timed out after ${options.timeoutMs}ms: ${command}`);
      return captureFailed('timeout', `Command timed out after ${seconds(options.timeoutMs)}s (partial output kept)`, {
        kind: 'text',
        location,
        metadata: { ...metadata, timed_out: true, partial: true },
      });
    }
    if (run.exitCode === COMMAND_NOT_FOUND) {
      return captureFailed('not_found', `Command not found: ${command}`, { kind: 'text', location, metadata });
    }
    if (run.exitCode !== 0) {
      return captureFailed('nonzero_exit', `Command exited with code ${run.exitCode}`, {
        kind: 'text',
        location,
        metadata,
      });
    }
    this.log.debug(`Transcript written: ${outputPath}`);
    return captureSucceeded('text', location, { metadata });
  }

  protected async doCaptureOnEvent(target: string, event: CaptureEvent, options: CaptureOptions): Promise<CaptureResult> {
    const label = eventLabel(event);
    switch (event.action) {
      case 'output': {
        const result = await this.doCapture(target, options);
        const expected = event.selector ?? '';
        const stdout = typeof result.metadata.stdout === 'string' ? result.metadata.stdout : '';
        const stderr = typeof result.metadata.stderr === 'string' ? result.metadata.stderr : '';
        const found = expected.length > 0 && (stdout.includes(expected) || stderr.includes(expected));
        if (!result.success || found) {
          return withEvent(
            { ...result, metadata: { ...result.metadata, output_check: found ? 'found' : 'not_found' } },
            label,
          );
        }
        return captureFailed('not_found', `Expected output not found: ${expected}`, {
          kind: 'text',
          location: result.location,
          event: label,
          metadata: { ...result.metadata, output_check: 'not_found' },
        });
      }
      case 'timeout': {
        const secs = Number(event.selector);
        const timeoutMs = (Number.isFinite(secs) && secs > 0 ? secs : EVENT_TIMEOUT_SECONDS) * 1000;
        return withEvent(await this.doCapture(target, { ...options, timeoutMs }), label);
      }
      default:
        // `complete` and anything this backend cannot act on
        return withEvent(await this.doCapture(target, options), label);
    }
  }
}
