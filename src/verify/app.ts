import type { AppKind } from '../judge/prompts.js';

export interface AppDescriptor {
  kind: Exclude<AppKind, 'shell-command'>;
  url?: string;
  command?: string;
  windowTitle?: string;
}

const WEBAPP_MARKER = /\[webapp\]:\s*(https?:\/\/\S+)/i;
const GUI_MARKER = /\[gui\]:\s*([^\n]+)/i;
const WINDOW_TITLE_MARKER = /\[window_title\]:\s*([^\n]+)/i;
const TUI_MARKER = /\[tui\]:\s*([^\n]+)/i;
const URL_IN_TEXT = /(https?:\/\/[^\s)]+)/;

function mentions(text: string, words: string[]): boolean {
  return words.some(word => new RegExp(`\\b${word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}\\b`, 'i').test(text));
}

/**
 * Recover the application under test from task text. Explicit markers win;
 * without them a keyword guess may give a kind but no launch parameters.
 */
export function detectApp(text: string): AppDescriptor | null {
  const webapp = WEBAPP_MARKER.exec(text);
  if (webapp?.[1]) {
    return { kind: 'web', url: webapp[1] };
  }

  const gui = GUI_MARKER.exec(text);
  if (gui?.[1]) {
    const title = WINDOW_TITLE_MARKER.exec(text)?.[1]?.trim();
    return { kind: 'native-window', command: gui[1].trim(), windowTitle: title || undefined };
  }

  const tui = TUI_MARKER.exec(text);
  if (tui?.[1]) {
    return { kind: 'terminal-program', command: tui[1].trim() };
  }

  if (mentions(text, ['localhost', 'browser', 'webpage']) || /https?:\/\//i.test(text)) {
    return { kind: 'web', url: URL_IN_TEXT.exec(text)?.[1] };
  }
  if (mentions(text, ['terminal', 'console', 'cli', 'command line', 'tui'])) {
    return { kind: 'terminal-program' };
  }
  if (mentions(text, ['window', 'gui', 'application', 'desktop']) || /\.exe\b/i.test(text)) {
    return { kind: 'native-window' };
  }
  return null;
}

export type AppTarget = { ok: true; target: string } | { ok: false; error: string };

/** Router target string for an app, or why there is none. */
export function appTarget(app: AppDescriptor): AppTarget {
  switch (app.kind) {
    case 'web':
      return app.url
        ? { ok: true, target: app.url }
        : { ok: false, error: 'Webapp detected but no URL found. Add [webapp]: http://your-url to the task file.' };
    case 'native-window':
      if (app.command) return { ok: true, target: `gui:${app.command}|${app.windowTitle ?? ''}` };
      if (app.windowTitle) return { ok: true, target: `window:${app.windowTitle}` };
      return { ok: false, error: 'GUI detected but no command or window title found. Add [gui]: <command> and [window_title]: <title> to the task file.' };
    case 'terminal-program':
      return app.command
        ? { ok: true, target: `tui:${app.command}` }
        : { ok: false, error: 'TUI detected but no command found. Add [tui]: your-command to the task file.' };
  }
}
