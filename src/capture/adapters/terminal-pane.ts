import { writeFile } from 'node:fs/promises';
import { BaseCaptureAdapter, eventLabel, type AdapterSettings } from '../adapter.js';
import {
  CaptureError,
  captureSucceeded,
  withEvent,
  type CaptureEvent,
  type CaptureOptions,
  type CaptureResult,
} from '../types.js';
import { classifyTarget, stripTargetPrefix } from '../target.js';
import { capturePane, killSession, newSession, sendKeys, sessionExists, sendLiteral, stripAnsi, toTmuxKey } from '../tmux.js';
import { commandExists } from '../../utils/process.js';
import { resourceName } from '../../utils/id.js';
import { sleep } from '../../utils/time.js';

export interface TerminalPaneSettings extends AdapterSettings {
  cols?: number;
  rows?: number;
  cwd?: string;
}

/**
 * Runs a terminal program inside a private, detached tmux session and
 * captures the pane as ANSI text. Supports key, input and wait events.
 */
export class TerminalPaneAdapter extends BaseCaptureAdapter {
  readonly name = 'terminal-pane' as const;

  private cols: number;
  private rows: number;
  private cwd?: string;
  private session: string | null = null;

  constructor(settings: TerminalPaneSettings = {}) {
    super(settings);
    this.cols = settings.cols ?? 120;
    this.rows = settings.rows ?? 40;
    this.cwd = settings.cwd;
  }

  canHandle(target: string): boolean {
    return classifyTarget(target) === 'terminal-program';
  }

  protected async openSession(target: string, options: CaptureOptions): Promise<void> {
    if (!(await commandExists('tmux'))) {
      throw new CaptureError('unavailable', 'No terminal capture available: tmux is not installed');
    }
    const command = stripTargetPrefix(target, ['tui:', 'cli:']);
    if (!command) {
      throw new CaptureError('not_found', 'No command given');
    }
    const name = resourceName('sightcheck');
    await newSession(name, command, { cols: this.cols, rows: this.rows }, this.cwd);
    this.session = name;
    this.cleanup.push(`tmux session ${name}`, async () => {
      this.session = null;
      if (await sessionExists(name)) await killSession(name);
    });
    await sleep(options.waitBeforeMs);
  }

  protected async doCapture(target: string, options: CaptureOptions): Promise<CaptureResult> {
    return this.withSession(target, options, () => this.snapshot(options));
  }

  protected async doCaptureOnEvent(target: string, event: CaptureEvent, options: CaptureOptions): Promise<CaptureResult> {
    return this.withSession(target, options, async () => {
      const session = this.requireSession();
      switch (event.action) {
        case 'key': {
          const key = toTmuxKey(event.selector ?? '');
          if (!key) {
            throw new CaptureError('internal', `Unknown key: ${event.selector ?? ''}`);
          }
          await sendKeys(session, [key]);
          break;
        }
        case 'input':
          await sendLiteral(session, event.selector ?? '');
          break;
        case 'wait': {
          const secs = Number(event.selector ?? '1');
          await sleep((Number.isFinite(secs) ? secs : 1) * 1000);
          break;
        }
        default:
          break;
      }
      await sleep(this.settleMs);
      return withEvent(await this.snapshot(options), eventLabel(event));
    });
  }

  private requireSession(): string {
    if (!this.session) throw new CaptureError('internal', 'terminal session is not running');
    return this.session;
  }

  private async snapshot(options: CaptureOptions): Promise<CaptureResult> {
    const session = this.requireSession();
    const ansi = await capturePane(session, true);
    const outputPath = await this.artifactPath(options, 'tui', 'ansi.txt');
    await writeFile(outputPath, ansi, 'utf-8');
    await sleep(options.waitAfterMs);
    return captureSucceeded('ansi', { type: 'file', path: outputPath }, {
      metadata: {
        session,
        cols: this.cols,
        rows: this.rows,
        text: stripAnsi(ansi),
      },
    });
  }
}
