/**
 * Low-level tmux helpers for terminal captures.
 *
 * Every terminal-pane session gets its own detached tmux session, so nothing
 * is attached to the operator's terminal and sessions never share state.
 */

import { exec } from '../utils/process.js';

export const TMUX_TIMEOUT_MS = 10_000;

export class TmuxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TmuxError';
  }
}

export async function tmux(...args: string[]): Promise<string> {
  const result = await exec('tmux', args, { timeout: TMUX_TIMEOUT_MS });
  if (result.exitCode !== 0) {
    const stderr = result.stderr.trim() ? ` (stderr: ${result.stderr.trim()})` : '';
    throw new TmuxError(`tmux ${args[0] ?? ''} failed with exit code ${result.exitCode}${stderr}`);
  }
  return result.stdout;
}

/** Strip ANSI escape codes from captured pane output */
export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;?]*[a-zA-Z]/g, '');
}

export async function newSession(
  name: string,
  command: string,
  size: { cols: number; rows: number },
  cwd?: string,
): Promise<void> {
  const args = ['new-session', '-d', '-s', name, '-x', String(size.cols), '-y', String(size.rows)];
  if (cwd) args.push('-c', cwd);
  args.push(command);
  await tmux(...args);
  // Keep the pane around after the program exits so its last screen can still be read
  await tmux('set-option', '-t', name, 'remain-on-exit', 'on');
}

export async function killSession(name: string): Promise<void> {
  await tmux('kill-session', '-t', name);
}

export async function sessionExists(name: string): Promise<boolean> {
  try {
    await tmux('has-session', '-t', name);
    return true;
  } catch {
    return false;
  }
}

/**
 * Send keys to a pane. Each element of `keys` is passed as a separate
 * argument to `tmux send-keys`, so tmux key names like `Enter` work.
 */
export async function sendKeys(target: string, keys: string[]): Promise<void> {
  await tmux('send-keys', '-t', target, ...keys);
}

/** Type text literally, without interpreting key names. */
export async function sendLiteral(target: string, text: string): Promise<void> {
  await tmux('send-keys', '-t', target, '-l', text);
}

/**
 * Capture the visible content of a pane.
 * @param withEscapes - keep colour and attribute escape sequences
 */
export async function capturePane(target: string, withEscapes = true): Promise<string> {
  const args = ['capture-pane', '-t', target, '-p'];
  if (withEscapes) args.push('-e');
  return tmux(...args);
}

/** Named keys accepted by the `key` event, mapped to tmux key names. */
const KEY_NAMES: Record<string, string> = {
  enter: 'Enter',
  return: 'Enter',
  tab: 'Tab',
  escape: 'Escape',
  esc: 'Escape',
  up: 'Up',
  down: 'Down',
  left: 'Left',
  right: 'Right',
  space: 'Space',
  backspace: 'BSpace',
  delete: 'DC',
  home: 'Home',
  end: 'End',
  pageup: 'PPage',
  pagedown: 'NPage',
};

/**
 * Resolve a key name to a tmux key. Single characters pass through;
 * `f1`..`f12` and `ctrl+x` are supported. Returns null for unknown names.
 */
export function toTmuxKey(name: string): string | null {
  const key = name.trim();
  if (key.length === 1) return key;
  const lower = key.toLowerCase();
  const named = KEY_NAMES[lower];
  if (named) return named;
  const fn = /^f([1-9]|1[0-2])$/.exec(lower);
  if (fn) return `F${fn[1]}`;
  const ctrl = /^(?:ctrl|c)[+-]([a-z])$/.exec(lower);
  if (ctrl) return `C-${ctrl[1]}`;
  return null;
}
