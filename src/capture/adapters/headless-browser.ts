import { access } from 'node:fs/promises';
import { BaseCaptureAdapter, type AdapterSettings } from '../adapter.js';
import { captureFailed, captureSucceeded, type CaptureOptions, type CaptureResult } from '../types.js';
import { classifyTarget, normalizeUrl } from '../target.js';
import { findBrowserBinary } from '../browser.js';
import { exec } from '../../utils/process.js';
import { sleep } from '../../utils/time.js';

export interface HeadlessBrowserSettings extends AdapterSettings {
  browserPath?: string;
}

export function buildScreenshotArgs(url: string, outputPath: string, options: CaptureOptions): string[] {
  const args = [
    '--headless=new',
    '--disable-gpu',
    '--no-sandbox',
    '--hide-scrollbars',
    `--window-size=${options.width},${options.height}`,
  ];
  if (options.waitBeforeMs > 0) {
    args.push(`--virtual-time-budget=${options.waitBeforeMs}`);
  }
  args.push(`--screenshot=${outputPath}`, url);
  return args;
}

/**
 * One-shot page screenshots through an installed browser's own
 * `--screenshot` flag. Cannot act on the page, so events degrade to a
 * plain capture.
 */
export class HeadlessBrowserAdapter extends BaseCaptureAdapter {
  readonly name = 'headless-browser' as const;

  private browserPath?: string;

  constructor(settings: HeadlessBrowserSettings = {}) {
    super(settings);
    this.browserPath = settings.browserPath;
  }

  canHandle(target: string): boolean {
    return classifyTarget(target) === 'web';
  }

  protected async doCapture(target: string, options: CaptureOptions): Promise<CaptureResult> {
    const browser = await findBrowserBinary(this.browserPath);
    if (!browser) {
      return captureFailed(
        'unavailable',
        'No browser found: install Chrome, Chromium or Edge, or set capture.browserPath',
      );
    }

    const url = normalizeUrl(target);
    const outputPath = await this.artifactPath(options, 'web', 'png');
    this.log.debug(`${browser} --screenshot ${url}`);
    const result = await exec(browser, buildScreenshotArgs(url, outputPath, options), {
      timeout: options.timeoutMs,
    });

    if (result.timedOut) {
      return captureFailed('timeout', `Browser did not finish within ${options.timeoutMs}ms`);
    }
    if (result.exitCode !== 0) {
      return captureFailed(
        'not_found',
        `Screenshot of ${url} failed (exit ${result.exitCode}): ${result.stderr.trim().split('\n').pop() ?? ''}`,
      );
    }
    try {
      await access(outputPath);
    } catch {
      return captureFailed('internal', `Browser exited cleanly but wrote no screenshot for ${url}`);
    }

    await sleep(options.waitAfterMs);
    this.log.info(`Screenshot saved: ${outputPath}`);
    return captureSucceeded('image', { type: 'file', path: outputPath }, {
      metadata: { url, browser, width: options.width, height: options.height },
    });
  }
}
