import { readFile } from 'node:fs/promises';
import type { CaptureResult } from '../capture/types.js';
import { stripAnsi } from '../capture/tmux.js';

/** How a capture is shown to the judge: text inline, anything else by path. */
export type Evidence =
  | { type: 'inline'; text: string; truncated: boolean }
  | { type: 'file'; path: string };

export function truncate(text: string, maxChars?: number): { text: string; truncated: boolean } {
  if (maxChars === undefined || text.length <= maxChars) return { text, truncated: false };
  return { text: text.slice(0, maxChars), truncated: true };
}

/**
 * Text and ANSI captures are read and inlined (escape codes stripped);
 * images and markup stay on disk for the judge to open itself.
 */
export async function evidenceFromCapture(result: CaptureResult, maxChars?: number): Promise<Evidence | null> {
  const location = result.location;
  if (!location) return null;

  if (location.type === 'inline') {
    return { type: 'inline', ...truncate(stripAnsi(location.text), maxChars) };
  }
  if (result.kind === 'text' || result.kind === 'ansi') {
    const content = await readFile(location.path, 'utf-8');
    return { type: 'inline', ...truncate(stripAnsi(content), maxChars) };
  }
  return { type: 'file', path: location.path };
}

/** Same rule for a bare artifact path, decided by extension. */
export async function evidenceFromPath(path: string, maxChars?: number): Promise<Evidence> {
  if (/\.(txt|log|ansi)$/i.test(path)) {
    const content = await readFile(path, 'utf-8');
    return { type: 'inline', ...truncate(stripAnsi(content), maxChars) };
  }
  return { type: 'file', path };
}
