export type TargetKind = 'web' | 'native-window' | 'terminal-program' | 'shell-command';

const TUI_LIBRARY_MARKERS = ['ratatui', 'crossterm', 'bubbletea', 'ncurses'];

/**
 * Classify an opaque target string. Total and pure: every string maps to
 * exactly one kind, and shell-command is the fallback.
 */
export function classifyTarget(target: string): TargetKind {
  const t = target.trim();
  const lower = t.toLowerCase();

  if (/^https?:\/\//.test(lower) || /^(localhost|127\.0\.0\.1):\d/.test(lower)) {
    return 'web';
  }
  if (lower.startsWith('window:') || lower.startsWith('gui:') || lower.endsWith('.exe')) {
    return 'native-window';
  }
  if (lower.startsWith('tui:')) {
    return 'terminal-program';
  }
  if (TUI_LIBRARY_MARKERS.some(marker => lower.includes(marker))) {
    return 'terminal-program';
  }
  return 'shell-command';
}

/** Drop a `scheme:` routing prefix such as `tui:` or `cli:`. */
export function stripTargetPrefix(target: string, prefixes: string[]): string {
  const t = target.trim();
  const lower = t.toLowerCase();
  for (const prefix of prefixes) {
    if (lower.startsWith(prefix)) return t.slice(prefix.length).trim();
  }
  return t;
}

/** Web targets given as `localhost:3000` get an http scheme. */
export function normalizeUrl(target: string): string {
  const t = target.trim();
  return /^https?:\/\//i.test(t) ? t : `http://${t}`;
}

export interface WindowTarget {
  /** Command to launch, if the window does not exist yet */
  command?: string;
  /** Title substring used to find the window */
  title?: string;
}

/** Index of the last single `|` in `s`, skipping the bars of a shell `||`; -1 if none. */
function titleSeparator(s: string): number {
  for (let i = s.length - 1; i >= 0; i--) {
    if (s[i] !== '|') continue;
    if (s[i - 1] === '|' || s[i + 1] === '|') continue;
    return i;
  }
  return -1;
}

/**
 * Parse `window:<title>`, `gui:<command>|<title>` and bare `.exe` paths.
 * The title after the last bar may be empty, so `gui:app | tee log|` keeps
 * the whole pipeline as the command.
 */
export function parseWindowTarget(target: string): WindowTarget {
  const t = target.trim();
  const lower = t.toLowerCase();
  if (lower.startsWith('window:')) {
    return { title: t.slice('window:'.length).trim() || undefined };
  }
  if (lower.startsWith('gui:')) {
    const rest = t.slice('gui:'.length);
    const bar = titleSeparator(rest);
    if (bar === -1) return { command: rest.trim() || undefined };
    return {
      command: rest.slice(0, bar).trim() || undefined,
      title: rest.slice(bar + 1).trim() || undefined,
    };
  }
  return { command: t || undefined };
}
