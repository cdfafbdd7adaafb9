import type { ChildProcess } from 'node:child_process';
import { BaseCaptureAdapter, type AdapterSettings } from '../adapter.js';
import {
  CaptureError,
  captureSucceeded,
  type CaptureOptions,
  type CaptureResult,
} from '../types.js';
import { classifyTarget, parseWindowTarget } from '../target.js';
import {
  VirtualDisplay,
  X11WindowSystem,
  waitForWindow,
  type WindowQuery,
  type WindowSystem,
} from '../display.js';
import { commandExists, spawnProcess, terminateProcess } from '../../utils/process.js';
import { sleep } from '../../utils/time.js';

export interface WindowAdapterSettings extends AdapterSettings {
  windowSystem?: WindowSystem;
  cwd?: string;
}

/** How a target's window comes into being, and where it lives. */
export interface LaunchPlan {
  /** argv to launch; absent when the window already exists */
  argv?: string[];
  title?: string;
  /** Run on a private virtual display: always, when possible, or never */
  isolation: 'required' | 'preferred' | 'never';
  /** Binaries that must be on PATH besides the window system's own */
  requires: string[];
}

interface OpenWindow {
  id: string;
  display?: string;
  title?: string;
  pid?: number;
}

/**
 * Captures a native top-level window by title or by owning process.
 *
 * Launched programs go onto a private Xvfb display when one is available,
 * so they never show up on the operator's screen or take focus.
 */
export class WindowAdapter extends BaseCaptureAdapter {
  readonly name: 'window' | 'terminal-window' = 'window';

  protected windows: WindowSystem;
  private cwd?: string;
  private window: OpenWindow | null = null;

  constructor(settings: WindowAdapterSettings = {}) {
    super(settings);
    this.windows = settings.windowSystem ?? new X11WindowSystem();
    this.cwd = settings.cwd;
  }

  canHandle(target: string): boolean {
    return classifyTarget(target) === 'native-window';
  }

  protected plan(target: string, _options: CaptureOptions): LaunchPlan {
    const parsed = parseWindowTarget(target);
    return {
      argv: parsed.command ? ['sh', '-c', parsed.command] : undefined,
      title: parsed.title,
      isolation: parsed.command ? 'preferred' : 'never',
      requires: [],
    };
  }

  protected async openSession(target: string, options: CaptureOptions): Promise<void> {
    const plan = this.plan(target, options);
    if (!plan.title && !plan.argv) {
      throw new CaptureError('not_found', `No window title or command in target: ${target}`);
    }
    if (!(await this.windows.available())) {
      throw new CaptureError('unavailable', 'No window capture available: install xdotool and ImageMagick');
    }
    for (const bin of plan.requires) {
      if (!(await commandExists(bin))) {
        throw new CaptureError('unavailable', `${bin} is not installed`);
      }
    }

    let display: string | undefined;
    let pid: number | undefined;
    if (plan.argv) {
      display = await this.prepareDisplay(plan, options);
      const child = this.launch(plan.argv, display);
      pid = child.pid;
      await sleep(options.waitBeforeMs);
    }

    const query: WindowQuery = plan.title ? { title: plan.title } : { pid };
    const id = await waitForWindow(this.windows, query, options.timeoutMs, display);
    if (!id) {
      const what = plan.title ? `titled "${plan.title}"` : `for process ${pid ?? '?'}`;
      throw new CaptureError('not_found', `No window ${what} appeared within ${options.timeoutMs}ms`);
    }

    this.window = { id, display, title: plan.title, pid };
    this.cleanup.push('window handle', () => {
      this.window = null;
    });
  }

  protected async doCapture(target: string, options: CaptureOptions): Promise<CaptureResult> {
    return this.withSession(target, options, async () => {
      const window = this.window;
      if (!window) throw new CaptureError('internal', 'window session is not open');

      const outputPath = await this.artifactPath(options, this.name === 'window' ? 'gui' : 'tui', 'png');
      const result = await this.windows.captureWindow(window.id, outputPath, window.display);
      if (result.timedOut) {
        throw new CaptureError('timeout', `Window capture timed out (window ${window.id})`);
      }
      if (result.exitCode !== 0) {
        throw new CaptureError('internal', `Window capture failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
      }
      await sleep(options.waitAfterMs);
      this.log.debug(`Window ${window.id} captured to ${outputPath}`);
      return captureSucceeded('image', { type: 'file', path: outputPath }, {
        metadata: {
          window_id: window.id,
          display: window.display ?? null,
          title: window.title ?? null,
          pid: window.pid ?? null,
          width: options.width,
          height: options.height,
        },
      });
    });
  }

  private async prepareDisplay(plan: LaunchPlan, options: CaptureOptions): Promise<string | undefined> {
    if (plan.isolation === 'never') return undefined;
    if (!(await VirtualDisplay.available())) {
      if (plan.isolation === 'required') {
        throw new CaptureError('unavailable', 'No isolated display available: Xvfb is not installed');
      }
      this.log.warn('Xvfb is not installed; launching on the current display');
      return undefined;
    }
    const display = new VirtualDisplay(this.log);
    this.cleanup.push('virtual display', () => display.stop());
    return display.start({ width: options.width, height: options.height }, options.timeoutMs);
  }

  private launch(argv: string[], display?: string): ChildProcess {
    const [command, ...args] = argv;
    if (!command) throw new CaptureError('not_found', 'Empty launch command');
    const child = spawnProcess(command, args, {
      cwd: this.cwd,
      env: display ? { DISPLAY: display } : undefined,
      stdio: 'ignore',
    });
    child.once('error', (err) => {
      this.log.warn(`Launch of ${command} failed: ${err.message}`);
    });
    this.cleanup.push(`process ${child.pid ?? command}`, () => terminateProcess(child));
    this.log.info(`Launched ${argv.join(' ')}${display ? ` on ${display}` : ''}`);
    return child;
  }
}
