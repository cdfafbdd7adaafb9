import { writeFile } from 'node:fs/promises';
import type { Page } from 'playwright-core';
import { BaseCaptureAdapter, eventLabel, type AdapterSettings } from '../adapter.js';
import {
  CaptureError,
  captureSucceeded,
  resolveCaptureOptions,
  withEvent,
  type CaptureEvent,
  type CaptureOptions,
  type CaptureOptionsInput,
  type CaptureResult,
} from '../types.js';
import { classifyTarget, normalizeUrl } from '../target.js';
import { findBrowserBinary, loadPlaywright, type PlaywrightModule } from '../browser.js';
import { errorMessage } from '../../utils/guards.js';
import { sleep } from '../../utils/time.js';

export interface BrowserSessionSettings extends AdapterSettings {
  browserPath?: string;
  /** Swap the automation module, e.g. for tests */
  loadEngine?: () => Promise<PlaywrightModule | null>;
}

/** Split `selector=value`; a bare selector means focus only. */
export function parseInputSelector(selector: string): { selector: string; value?: string } {
  const eq = selector.indexOf('=');
  if (eq === -1) return { selector };
  return { selector: selector.slice(0, eq), value: selector.slice(eq + 1) };
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && err.name === 'TimeoutError';
}

/**
 * Drives a live page through playwright-core. Inside a session the page is
 * reused; one-shot calls launch and close a whole browser per call.
 */
export class BrowserSessionAdapter extends BaseCaptureAdapter {
  readonly name = 'browser-session' as const;

  private browserPath?: string;
  private loadEngine: () => Promise<PlaywrightModule | null>;
  private page: Page | null = null;

  constructor(settings: BrowserSessionSettings = {}) {
    super(settings);
    this.browserPath = settings.browserPath;
    this.loadEngine = settings.loadEngine ?? loadPlaywright;
  }

  canHandle(target: string): boolean {
    return classifyTarget(target) === 'web';
  }

  protected async openSession(target: string, options: CaptureOptions): Promise<void> {
    const engine = await this.loadEngine();
    if (!engine) {
      throw new CaptureError('unavailable', 'No browser automation available: playwright-core is not installed');
    }
    const executablePath = await findBrowserBinary(this.browserPath);
    if (!executablePath) {
      throw new CaptureError('unavailable', 'No browser found: install Chrome, Chromium or Edge, or set capture.browserPath');
    }

    const browser = await engine.chromium.launch({
      executablePath,
      headless: true,
      timeout: options.timeoutMs,
    });
    this.cleanup.push('browser', () => browser.close());
    const context = await browser.newContext({
      viewport: { width: options.width, height: options.height },
    });
    this.cleanup.push('browser context', () => context.close());
    const page = await context.newPage();
    this.page = page;
    this.cleanup.push('page handle', () => {
      this.page = null;
    });

    await this.navigate(page, normalizeUrl(target), options);
  }

  protected async doCapture(target: string, options: CaptureOptions): Promise<CaptureResult> {
    return this.withSession(target, options, async () => {
      const page = this.requirePage();
      await sleep(options.waitBeforeMs);
      return this.screenshot(page, options);
    });
  }

  protected async doCaptureOnEvent(target: string, event: CaptureEvent, options: CaptureOptions): Promise<CaptureResult> {
    return this.withSession(target, options, async () => {
      const page = this.requirePage();
      await this.act(page, target, event, options);
      await sleep(this.settleMs);
      return withEvent(await this.screenshot(page, options), eventLabel(event));
    });
  }

  /** Snapshot of the page's current HTML. */
  async captureDom(target: string, input?: CaptureOptionsInput): Promise<CaptureResult> {
    return this.recordCapture(async () => {
      const options = resolveCaptureOptions(input, this.defaults);
      return this.withSession(target, options, async () => {
        const page = this.requirePage();
        await sleep(options.waitBeforeMs);
        const html = await page.content();
        const outputPath = await this.artifactPath(options, 'dom', 'html');
        await writeFile(outputPath, html, 'utf-8');
        return captureSucceeded('markup', { type: 'file', path: outputPath }, {
          metadata: { url: page.url(), length: html.length, preview: html.slice(0, 1000) },
        });
      });
    }, 'dom');
  }

  private requirePage(): Page {
    if (!this.page) throw new CaptureError('internal', 'browser page is not open');
    return this.page;
  }

  private async navigate(page: Page, url: string, options: CaptureOptions): Promise<void> {
    try {
      await page.goto(url, { timeout: options.timeoutMs, waitUntil: 'load' });
    } catch (err) {
      if (isTimeout(err)) {
        throw new CaptureError('timeout', `Page ${url} did not load within ${options.timeoutMs}ms`);
      }
      throw new CaptureError('not_found', `Could not load ${url}: ${errorMessage(err).split('\n')[0] ?? ''}`);
    }
  }

  private async act(page: Page, target: string, event: CaptureEvent, options: CaptureOptions): Promise<void> {
    const selector = event.selector ?? '';
    const need = (): string => {
      if (!selector) throw new CaptureError('internal', `"${event.action}" needs a selector`);
      return selector;
    };

    try {
      switch (event.action) {
        case 'click':
          await page.click(need(), { timeout: options.timeoutMs });
          break;
        case 'navigate':
          await this.navigate(page, normalizeUrl(selector || target), options);
          break;
        case 'input': {
          const input = parseInputSelector(need());
          if (input.value === undefined) {
            await page.focus(input.selector, { timeout: options.timeoutMs });
          } else {
            await page.fill(input.selector, input.value, { timeout: options.timeoutMs });
          }
          break;
        }
        case 'wait': {
          const secs = selector ? Number(selector) : 1;
          await sleep((Number.isFinite(secs) ? secs : 1) * 1000);
          break;
        }
        case 'hover':
          await page.hover(need(), { timeout: options.timeoutMs });
          break;
        case 'scroll':
          if (selector) {
            await page.locator(selector).first().scrollIntoViewIfNeeded({ timeout: options.timeoutMs });
          } else {
            await page.mouse.wheel(0, options.height);
          }
          break;
        case 'screenshot':
          break;
        default:
          this.log.debug(`Unknown browser action "${event.action}", capturing without acting`);
      }
    } catch (err) {
      if (err instanceof CaptureError) throw err;
      if (isTimeout(err)) {
        throw new CaptureError('not_found', `Element not found for ${eventLabel(event)}`);
      }
      throw err;
    }
  }

  private async screenshot(page: Page, options: CaptureOptions): Promise<CaptureResult> {
    const outputPath = await this.artifactPath(options, 'web', 'png');
    if (options.selector) {
      await page.locator(options.selector).first().screenshot({ path: outputPath, timeout: options.timeoutMs });
    } else {
      await page.screenshot({ path: outputPath, fullPage: options.fullPage, timeout: options.timeoutMs });
    }
    await sleep(options.waitAfterMs);
    return captureSucceeded('image', { type: 'file', path: outputPath }, {
      metadata: {
        url: page.url(),
        title: await page.title(),
        width: options.width,
        height: options.height,
        full_page: options.fullPage,
      },
    });
  }
}
