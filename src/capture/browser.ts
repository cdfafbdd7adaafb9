import { createRequire } from 'node:module';
import { findCommand } from '../utils/process.js';

const BROWSER_CANDIDATES = [
  'google-chrome',
  'google-chrome-stable',
  'chromium',
  'chromium-browser',
  'microsoft-edge',
  'microsoft-edge-stable',
];

export type PlaywrightModule = typeof import('playwright-core');

/** An explicit path wins; otherwise the first Chrome/Chromium/Edge on PATH. */
export async function findBrowserBinary(explicitPath?: string): Promise<string | null> {
  if (explicitPath) return explicitPath;
  return findCommand(BROWSER_CANDIDATES);
}

/** Whether playwright-core can be resolved from here. No import is performed. */
export function playwrightInstalled(): boolean {
  try {
    createRequire(import.meta.url).resolve('playwright-core');
    return true;
  } catch {
    return false;
  }
}

export async function loadPlaywright(): Promise<PlaywrightModule | null> {
  try {
    return await import('playwright-core');
  } catch {
    return null;
  }
}

/**
 * The browser-session adapter needs both the automation library and a
 * browser for it to drive, since playwright-core ships no browsers.
 */
export async function browserEngineAvailable(explicitPath?: string): Promise<boolean> {
  if (!playwrightInstalled()) return false;
  return (await findBrowserBinary(explicitPath)) !== null;
}
