import type { AdapterName, AdapterSettings, CaptureAdapter } from './adapter.js';
import type { CaptureType } from './types.js';
import { classifyTarget, type TargetKind } from './target.js';
import { browserEngineAvailable, findBrowserBinary, playwrightInstalled } from './browser.js';
import { BrowserSessionAdapter } from './adapters/browser-session.js';
import { HeadlessBrowserAdapter } from './adapters/headless-browser.js';
import { WindowAdapter } from './adapters/window.js';
import { TerminalWindowAdapter } from './adapters/terminal-window.js';
import { TerminalPaneAdapter } from './adapters/terminal-pane.js';
import { ProcessOutputAdapter } from './adapters/process-output.js';
import { VirtualDisplay, X11WindowSystem, type WindowSystem } from './display.js';
import { commandExists } from '../utils/process.js';

export { classifyTarget, type TargetKind };

export interface RouterSettings extends AdapterSettings {
  /** Terminal programs: ANSI text from tmux, or a rendered PNG (default 'ansi') */
  captureType?: CaptureType;
  browserPath?: string;
  cols?: number;
  rows?: number;
  cwd?: string;
  windowSystem?: WindowSystem;
  /** Override the browser-automation availability check */
  engineAvailable?: (browserPath?: string) => Promise<boolean>;
}

/**
 * Classify the target, then build the adapter for it. For web targets the
 * browser-session adapter wins when its engine is usable right now;
 * otherwise the headless browser process is the fallback.
 */
export async function selectAdapter(target: string, settings: RouterSettings = {}): Promise<CaptureAdapter> {
  const kind = classifyTarget(target);
  const base: AdapterSettings = { defaults: settings.defaults, settleMs: settings.settleMs, log: settings.log };

  switch (kind) {
    case 'web': {
      const engineAvailable = settings.engineAvailable ?? browserEngineAvailable;
      if (await engineAvailable(settings.browserPath)) {
        return new BrowserSessionAdapter({ ...base, browserPath: settings.browserPath });
      }
      return new HeadlessBrowserAdapter({ ...base, browserPath: settings.browserPath });
    }
    case 'native-window':
      return new WindowAdapter({ ...base, windowSystem: settings.windowSystem, cwd: settings.cwd });
    case 'terminal-program':
      if (settings.captureType === 'screenshot') {
        return new TerminalWindowAdapter({
          ...base,
          windowSystem: settings.windowSystem,
          cwd: settings.cwd,
          cols: settings.cols,
          rows: settings.rows,
        });
      }
      return new TerminalPaneAdapter({ ...base, cwd: settings.cwd, cols: settings.cols, rows: settings.rows });
    case 'shell-command':
      return new ProcessOutputAdapter({ ...base, cwd: settings.cwd });
  }
}

export interface AdapterDescription {
  name: AdapterName;
  available: boolean;
  handles: TargetKind;
  targets: string;
  features: string[];
  requires: string;
}

/** What each adapter handles and whether it can run on this machine now. */
export async function describeAdapters(browserPath?: string): Promise<AdapterDescription[]> {
  const x11 = new X11WindowSystem();
  const [browser, windows, xvfb, xterm, tmux] = await Promise.all([
    findBrowserBinary(browserPath),
    x11.available(),
    VirtualDisplay.available(),
    commandExists('xterm'),
    commandExists('tmux'),
  ]);

  return [
    {
      name: 'browser-session',
      available: playwrightInstalled() && browser !== null,
      handles: 'web',
      targets: 'http://, https://, localhost:<port>',
      features: ['session', 'click', 'navigate', 'input', 'wait', 'hover', 'scroll', 'dom'],
      requires: 'playwright-core and Chrome/Chromium/Edge',
    },
    {
      name: 'headless-browser',
      available: browser !== null,
      handles: 'web',
      targets: 'http://, https://, localhost:<port>',
      features: ['screenshot'],
      requires: 'Chrome/Chromium/Edge',
    },
    {
      name: 'window',
      available: windows,
      handles: 'native-window',
      targets: 'window:<title>, gui:<command>|[title], *.exe',
      features: ['session', 'launch', 'isolated display'],
      requires: 'xdotool, ImageMagick (Xvfb for isolation)',
    },
    {
      name: 'terminal-window',
      available: windows && xvfb && xterm,
      handles: 'terminal-program',
      targets: 'tui:<command> (capture type screenshot)',
      features: ['session', 'rendered png', 'isolated display'],
      requires: 'Xvfb, xterm, xdotool, ImageMagick',
    },
    {
      name: 'terminal-pane',
      available: tmux,
      handles: 'terminal-program',
      targets: 'tui:<command> (capture type ansi)',
      features: ['session', 'key', 'input', 'wait', 'ansi text'],
      requires: 'tmux',
    },
    {
      name: 'process-output',
      available: true,
      handles: 'shell-command',
      targets: 'any other command line',
      features: ['complete', 'output', 'timeout', 'transcript'],
      requires: 'a POSIX shell',
    },
  ];
}
