import { WindowAdapter, type LaunchPlan, type WindowAdapterSettings } from './window.js';
import type { CaptureOptions } from '../types.js';
import { classifyTarget, stripTargetPrefix } from '../target.js';
import { resourceName } from '../../utils/id.js';

export interface TerminalWindowSettings extends WindowAdapterSettings {
  cols?: number;
  rows?: number;
}

/**
 * Renders a terminal program to a PNG: the program runs in an xterm on a
 * private Xvfb display, and the xterm window is captured like any other.
 */
export class TerminalWindowAdapter extends WindowAdapter {
  readonly name = 'terminal-window' as const;

  private cols: number;
  private rows: number;

  constructor(settings: TerminalWindowSettings = {}) {
    super(settings);
    this.cols = settings.cols ?? 120;
    this.rows = settings.rows ?? 40;
  }

  canHandle(target: string): boolean {
    return classifyTarget(target) === 'terminal-program';
  }

  protected plan(target: string, _options: CaptureOptions): LaunchPlan {
    const command = stripTargetPrefix(target, ['tui:', 'cli:']);
    const title = resourceName('sightcheck-term');
    return {
      argv: command
        ? ['xterm', '-T', title, '-geometry', `${this.cols}x${this.rows}`, '-e', 'sh', '-c', command]
        : undefined,
      title: command ? title : undefined,
      isolation: 'required',
      requires: ['xterm'],
    };
  }
}
