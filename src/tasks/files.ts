/**
 * Decides from edited file paths whether a change is visible, and which
 * kind of app should be captured to see it.
 */

import { readFile } from 'node:fs/promises';
import { Socket } from 'node:net';
import { extname } from 'node:path';
import { minimatch } from 'minimatch';
import { z } from 'zod';
import type { AppDescriptor } from '../verify/app.js';
import { errorMessage } from '../utils/guards.js';
import { logger } from '../utils/logger.js';

export const UI_CATEGORIES = ['webapp', 'styles', 'gui', 'tui'] as const;
export type UiCategory = (typeof UI_CATEGORIES)[number] | 'unknown';

export interface FileDetection {
  path: string;
  shouldVerify: boolean;
  category: UiCategory;
  /** Glob that matched, `content:tui-import` for a sniffed file, else null */
  matchedPattern: string | null;
  confidence: number;
  reason: string;
}

const patternFileSchema = z.object({
  categories: z.object({
    webapp: z.array(z.string()),
    styles: z.array(z.string()),
    gui: z.array(z.string()),
    tui: z.array(z.string()),
  }),
  tuiImports: z.array(z.string()),
  contentExtensions: z.array(z.string()),
  devServerPorts: z.array(z.number().int().positive()),
});

export interface UiPatterns {
  categories: Record<(typeof UI_CATEGORIES)[number], string[]>;
  tuiImports: RegExp[];
  contentExtensions: string[];
  devServerPorts: number[];
}

const PATTERN_FILE = new URL('../../data/ui-patterns.json', import.meta.url);
const CONTENT_MATCH = 'content:tui-import';

const log = logger.child('files');
let cached: Promise<UiPatterns> | null = null;

async function readPatterns(): Promise<UiPatterns> {
  const raw: unknown = JSON.parse(await readFile(PATTERN_FILE, 'utf-8'));
  const data = patternFileSchema.parse(raw);
  return { ...data, tuiImports: data.tuiImports.map(p => new RegExp(p)) };
}

export function loadUiPatterns(): Promise<UiPatterns> {
  cached ??= readPatterns();
  return cached;
}

/** Forward slashes, no drive letter, no leading slash. */
function normalizePath(path: string): string {
  return path.replace(/\\/g, '/').replace(/^[A-Za-z]:/, '').replace(/^\/+/, '');
}

/** First category whose glob matches the path, checked in category order. */
export function matchUiPattern(path: string, patterns: UiPatterns): FileDetection | null {
  const normalized = normalizePath(path);
  for (const category of UI_CATEGORIES) {
    for (const pattern of patterns.categories[category]) {
      if (minimatch(normalized, pattern, { dot: true, nocase: true })) {
        return {
          path,
          shouldVerify: true,
          category,
          matchedPattern: pattern,
          confidence: 1,
          reason: `File matches ${category} pattern: ${pattern}`,
        };
      }
    }
  }
  return null;
}

async function importsTuiLibrary(path: string, patterns: UiPatterns): Promise<boolean> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    log.debug(`Not sniffing ${path}: ${errorMessage(err)}`);
    return false;
  }
  return patterns.tuiImports.some(re => re.test(content));
}

/**
 * Path globs first; a code file matching none is then read and checked for
 * terminal-UI library imports.
 */
export async function detectEditedFile(path: string, options: { checkContent?: boolean } = {}): Promise<FileDetection> {
  const patterns = await loadUiPatterns();
  const matched = matchUiPattern(path, patterns);
  if (matched) return matched;

  const checkContent = options.checkContent ?? true;
  if (checkContent && patterns.contentExtensions.includes(extname(path).toLowerCase())) {
    if (await importsTuiLibrary(path, patterns)) {
      return {
        path,
        shouldVerify: true,
        category: 'tui',
        matchedPattern: CONTENT_MATCH,
        confidence: 0.9,
        reason: 'File contains TUI library imports',
      };
    }
  }

  return {
    path,
    shouldVerify: false,
    category: 'unknown',
    matchedPattern: null,
    confidence: 0,
    reason: 'File does not match any UI patterns',
  };
}

export async function detectEditedFiles(paths: string[], options: { checkContent?: boolean } = {}): Promise<FileDetection[]> {
  const detections: FileDetection[] = [];
  for (const path of paths) detections.push(await detectEditedFile(path, options));
  return detections;
}

/** Styles and unmatched files are assumed to belong to a web app. */
export function appKindForCategory(category: UiCategory): AppDescriptor['kind'] {
  switch (category) {
    case 'gui':
      return 'native-window';
    case 'tui':
      return 'terminal-program';
    default:
      return 'web';
  }
}

export async function appKindForFile(path: string): Promise<AppDescriptor['kind']> {
  return appKindForCategory((await detectEditedFile(path)).category);
}

export interface EditSummary {
  shouldVerify: boolean;
  /** App kind suggested by the first UI file, null when none is UI */
  appKind: AppDescriptor['kind'] | null;
  uiFiles: string[];
}

export function summarizeEdits(detections: FileDetection[]): EditSummary {
  const ui = detections.filter(d => d.shouldVerify);
  const first = ui[0];
  return {
    shouldVerify: first !== undefined,
    appKind: first ? appKindForCategory(first.category) : null,
    uiFiles: ui.map(d => d.path),
  };
}

function tryConnect(port: number, host: string, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = new Socket();
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => {
      socket.destroy();
      resolve(true);
    });
    socket.once('timeout', () => {
      socket.destroy();
      resolve(false);
    });
    socket.once('error', () => {
      socket.destroy();
      resolve(false);
    });
    socket.connect(port, host);
  });
}

export interface RunningServer {
  url: string;
  port: number;
}

/** First port accepting connections, tried in order. Defaults to common dev-server ports. */
export async function detectRunningServer(
  ports?: number[],
  options: { host?: string; timeoutMs?: number } = {},
): Promise<RunningServer | null> {
  const candidates = ports ?? (await loadUiPatterns()).devServerPorts;
  const host = options.host ?? '127.0.0.1';
  for (const port of candidates) {
    if (await tryConnect(port, host, options.timeoutMs ?? 100)) {
      return { url: `http://localhost:${port}`, port };
    }
  }
  return null;
}
