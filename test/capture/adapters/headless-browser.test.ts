import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

const { execMock } = vi.hoisted(() => ({ execMock: vi.fn() }));

vi.mock('../../../src/utils/process.js', () => ({
  exec: execMock,
  findCommand: vi.fn(async () => null),
}));

import { HeadlessBrowserAdapter, buildScreenshotArgs } from '../../../src/capture/adapters/headless-browser.js';
import { DEFAULT_CAPTURE_OPTIONS } from '../../../src/capture/types.js';
import { silentLog } from '../../helpers.js';

/** Pull the --screenshot=<path> argument out of a browser call. */
function screenshotPath(args: string[]): string {
  const arg = args.find(a => a.startsWith('--screenshot='));
  return arg ? arg.slice('--screenshot='.length) : '';
}

describe('buildScreenshotArgs', () => {
  it('should size the window and budget virtual time for the pre-capture wait', () => {
    const args = buildScreenshotArgs('http://localhost:3000', '/tmp/out.png', {
      ...DEFAULT_CAPTURE_OPTIONS,
      width: 800,
      height: 600,
      waitBeforeMs: 1500,
    });
    expect(args).toEqual([
      '--headless=new',
      '--disable-gpu',
      '--no-sandbox',
      '--hide-scrollbars',
      '--window-size=800,600',
      '--virtual-time-budget=1500',
      '--screenshot=/tmp/out.png',
      'http://localhost:3000',
    ]);
  });
});

describe('HeadlessBrowserAdapter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sightcheck-web-'));
    execMock.mockReset();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function adapter(browserPath?: string): HeadlessBrowserAdapter {
    return new HeadlessBrowserAdapter({
      browserPath,
      defaults: { outputDir: dir, waitBeforeMs: 0, timeoutMs: 5000 },
      log: silentLog,
    });
  }

  it('should save a screenshot written by the browser', async () => {
    execMock.mockImplementation(async (_cmd: string, args: string[]) => {
      await writeFile(screenshotPath(args), 'png-bytes');
      return { stdout: '', stderr: '', exitCode: 0 };
    });

    const result = await adapter('chromium-test').capture('localhost:3000');

    expect(result.success).toBe(true);
    expect(result.kind).toBe('image');
    expect(result.metadata).toEqual({ url: 'http://localhost:3000', browser: 'chromium-test', width: 1280, height: 720 });
    expect(execMock).toHaveBeenCalledWith('chromium-test', expect.any(Array), { timeout: 5000 });
  });

  it('should be unavailable when no browser is installed', async () => {
    const result = await adapter().capture('http://localhost:3000');
    expect(result.errorKind).toBe('unavailable');
    expect(execMock).not.toHaveBeenCalled();
  });

  it('should report a timeout distinctly', async () => {
    execMock.mockResolvedValue({ stdout: '', stderr: '', exitCode: 1, timedOut: true });
    const result = await adapter('chromium-test').capture('http://localhost:3000');
    expect(result.errorKind).toBe('timeout');
    expect(result.error).toBe('Browser did not finish within 5000ms');
  });

  it('should report an unreachable page as not_found with the last stderr line', async () => {
    execMock.mockResolvedValue({ stdout: '', stderr: 'starting\nnet::ERR_CONNECTION_REFUSED\n', exitCode: 1 });
    const result = await adapter('chromium-test').capture('http://localhost:9');
    expect(result.errorKind).toBe('not_found');
    expect(result.error).toBe('Screenshot of http://localhost:9 failed (exit 1): net::ERR_CONNECTION_REFUSED');
  });

  it('should fail when the browser exits cleanly without a file', async () => {
    execMock.mockResolvedValue({ stdout: '', stderr: '', exitCode: 0 });
    const result = await adapter('chromium-test').capture('http://localhost:3000');
    expect(result.errorKind).toBe('internal');
  });
});
