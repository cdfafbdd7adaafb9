/**
 * Isolated display surfaces and window capture on X11.
 *
 * A VirtualDisplay is a private Xvfb server: programs launched on it are
 * invisible to the operator and can never take input focus from them.
 * WindowSystem finds a top-level window and renders it to a PNG, which works
 * whether or not the window is focused.
 */

import { access } from 'node:fs/promises';
import type { ChildProcess } from 'node:child_process';
import { commandExists, exec, spawnProcess, terminateProcess, type ExecResult } from '../utils/process.js';
import { sleep } from '../utils/time.js';
import type { Logger } from '../utils/logger.js';
import { CaptureError } from './types.js';

const FIRST_DISPLAY = 90;
const LAST_DISPLAY = 190;
const POLL_MS = 100;

export interface WindowQuery {
  title?: string;
  pid?: number;
}

export interface WindowSystem {
  /** Whether the tools this system needs are installed. */
  available(): Promise<boolean>;
  /** Window id of the first visible match, or null. */
  findWindow(query: WindowQuery, display?: string): Promise<string | null>;
  captureWindow(windowId: string, outputPath: string, display?: string): Promise<ExecResult>;
}

function displayEnv(display?: string): Record<string, string> | undefined {
  return display ? { DISPLAY: display } : undefined;
}

/** xdotool for lookup, ImageMagick `import` for rendering. */
export class X11WindowSystem implements WindowSystem {
  constructor(private timeoutMs = 10_000) {}

  async available(): Promise<boolean> {
    return (await commandExists('xdotool')) && (await commandExists('import'));
  }

  async findWindow(query: WindowQuery, display?: string): Promise<string | null> {
    const args = ['search', '--onlyvisible'];
    if (query.pid !== undefined) {
      args.push('--pid', String(query.pid));
    }
    if (query.title) {
      args.push('--name', escapeRegex(query.title));
    } else if (query.pid === undefined) {
      return null;
    } else {
      args.push('--name', '.*');
    }
    const result = await exec('xdotool', args, { env: displayEnv(display), timeout: this.timeoutMs });
    if (result.exitCode !== 0) return null;
    const first = result.stdout.split('\n').map(l => l.trim()).find(l => /^\d+$/.test(l));
    return first ?? null;
  }

  async captureWindow(windowId: string, outputPath: string, display?: string): Promise<ExecResult> {
    return exec('import', ['-window', windowId, outputPath], {
      env: displayEnv(display),
      timeout: this.timeoutMs,
    });
  }
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Poll for a window until it appears or `timeoutMs` runs out. */
export async function waitForWindow(
  system: WindowSystem,
  query: WindowQuery,
  timeoutMs: number,
  display?: string,
): Promise<string | null> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const id = await system.findWindow(query, display);
    if (id) return id;
    if (Date.now() >= deadline) return null;
    await sleep(Math.min(500, Math.max(0, deadline - Date.now())));
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** A private Xvfb server. */
export class VirtualDisplay {
  private proc: ChildProcess | null = null;
  private number: number | null = null;

  constructor(private log: Logger) {}

  static async available(): Promise<boolean> {
    return commandExists('Xvfb');
  }

  /** `:<n>` once started. */
  get name(): string | null {
    return this.number === null ? null : `:${this.number}`;
  }

  async start(size: { width: number; height: number }, timeoutMs: number): Promise<string> {
    if (this.name) return this.name;

    const number = await this.freeDisplayNumber();
    const proc = spawnProcess('Xvfb', [
      `:${number}`,
      '-screen', '0', `${size.width}x${size.height}x24`,
      '-nolisten', 'tcp',
    ], { stdio: 'ignore' });
    this.proc = proc;
    this.number = number;

    let dead = false;
    proc.once('exit', () => { dead = true; });
    proc.once('error', () => { dead = true; });

    const socket = `/tmp/.X11-unix/X${number}`;
    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
      if (dead) break;
      if (await fileExists(socket)) {
        this.log.debug(`Xvfb ready on :${number}`);
        return `:${number}`;
      }
      await sleep(POLL_MS);
    }
    await this.stop();
    if (dead) throw new CaptureError('unavailable', 'Xvfb exited during startup');
    throw new CaptureError('timeout', `Xvfb did not start within ${timeoutMs}ms`);
  }

  async stop(): Promise<void> {
    const proc = this.proc;
    this.proc = null;
    this.number = null;
    if (proc) await terminateProcess(proc);
  }

  private async freeDisplayNumber(): Promise<number> {
    for (let n = FIRST_DISPLAY; n <= LAST_DISPLAY; n++) {
      if (!(await fileExists(`/tmp/.X11-unix/X${n}`)) && !(await fileExists(`/tmp/.X${n}-lock`))) {
        return n;
      }
    }
    throw new CaptureError('unavailable', 'No free X display number');
  }
}
