import { exec as execCallback, execFile, spawn, type ChildProcess } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);
const execAsync = promisify(execCallback);

const MAX_BUFFER = 10 * 1024 * 1024;

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  /** Set when the timeout killed the process */
  timedOut?: boolean;
}

export interface ShellResult extends ExecResult {
  timedOut: boolean;
  durationMs: number;
}

export interface ExecOptions {
  cwd?: string;
  timeout?: number;
  env?: Record<string, string>;
}

interface ExecFailure {
  stdout: string;
  stderr: string;
  exitCode: number;
  killed: boolean;
  signal: string | null;
}

/** Pull partial output and exit status off a rejected child_process call. */
function readExecFailure(err: unknown): ExecFailure {
  const failure: ExecFailure = { stdout: '', stderr: '', exitCode: 1, killed: false, signal: null };
  if (typeof err !== 'object' || err === null) return failure;

  if ('stdout' in err && typeof err.stdout === 'string') failure.stdout = err.stdout;
  if ('stderr' in err && typeof err.stderr === 'string') failure.stderr = err.stderr;
  if ('killed' in err && typeof err.killed === 'boolean') failure.killed = err.killed;
  if ('signal' in err && typeof err.signal === 'string') failure.signal = err.signal;
  if ('code' in err) {
    if (typeof err.code === 'number') {
      failure.exitCode = err.code;
    } else if (err.code === 'ENOENT') {
      // Same status a shell reports for a missing command
      failure.exitCode = 127;
      if (!failure.stderr && 'message' in err && typeof err.message === 'string') {
        failure.stderr = err.message;
      }
    }
  }
  return failure;
}

export async function exec(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
  try {
    const result = await execFileAsync(command, args, {
      cwd: options?.cwd,
      timeout: options?.timeout,
      env: options?.env ? { ...process.env, ...options.env } : undefined,
      maxBuffer: MAX_BUFFER,
    });
    return { stdout: result.stdout, stderr: result.stderr, exitCode: 0 };
  } catch (err: unknown) {
    const e = readExecFailure(err);
    const result: ExecResult = { stdout: e.stdout, stderr: e.stderr, exitCode: e.exitCode };
    if (options?.timeout !== undefined && e.killed && e.signal !== null) result.timedOut = true;
    return result;
  }
}

/**
 * Run a command line through the system shell.
 *
 * Never rejects. When the timeout fires the child is killed and whatever it
 * had written so far comes back with `timedOut` set.
 */
export async function execShell(command: string, options?: ExecOptions): Promise<ShellResult> {
  const start = Date.now();
  try {
    const result = await execAsync(command, {
      cwd: options?.cwd,
      timeout: options?.timeout,
      env: options?.env ? { ...process.env, ...options.env } : undefined,
      maxBuffer: MAX_BUFFER,
    });
    return {
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: 0,
      timedOut: false,
      durationMs: Date.now() - start,
    };
  } catch (err: unknown) {
    const e = readExecFailure(err);
    return {
      stdout: e.stdout,
      stderr: e.stderr,
      exitCode: e.exitCode,
      timedOut: options?.timeout !== undefined && e.killed && e.signal !== null,
      durationMs: Date.now() - start,
    };
  }
}

export function spawnProcess(command: string, args: string[], options?: {
  cwd?: string;
  env?: Record<string, string>;
  stdio?: 'pipe' | 'inherit' | 'ignore';
  detached?: boolean;
}): ChildProcess {
  return spawn(command, args, {
    cwd: options?.cwd,
    env: options?.env ? { ...process.env, ...options.env } : undefined,
    stdio: options?.stdio ?? 'pipe',
    detached: options?.detached ?? false,
  });
}

/** Send SIGTERM, then SIGKILL if the process is still around after `graceMs`. */
export async function terminateProcess(child: ChildProcess, graceMs = 2000): Promise<void> {
  if (child.exitCode !== null || child.signalCode !== null) return;

  await new Promise<void>((resolve) => {
    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      resolve();
    }, graceMs);
    child.once('exit', () => {
      clearTimeout(timer);
      resolve();
    });
    child.kill('SIGTERM');
  });
}

export async function commandExists(command: string): Promise<boolean> {
  const result = await exec('which', [command]);
  return result.exitCode === 0 && result.stdout.trim().length > 0;
}

/** First command from `candidates` found on PATH. */
export async function findCommand(candidates: string[]): Promise<string | null> {
  for (const candidate of candidates) {
    if (await commandExists(candidate)) return candidate;
  }
  return null;
}
