import { readFile } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import { writeFileAtomic } from '../utils/fs.js';
import { errorMessage } from '../utils/guards.js';

export interface FixEdit {
  file: string;
  originalCode: string;
  fixedCode: string;
}

export type ApplyOutcome =
  | { applied: true; path: string }
  | {
    applied: false;
    path: string;
    reason: 'empty_original' | 'file_unreadable' | 'not_found' | 'whitespace_mismatch' | 'write_failed';
    message: string;
  };

function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

/**
 * Replace the first verbatim occurrence of `originalCode`. A match that only
 * exists after whitespace normalization is reported but never written.
 */
export async function applyFix(edit: FixEdit, cwd = process.cwd()): Promise<ApplyOutcome> {
  const path = isAbsolute(edit.file) ? edit.file : resolve(cwd, edit.file);
  if (!edit.originalCode) {
    return { applied: false, path, reason: 'empty_original', message: 'Proposal has no original code to replace' };
  }

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return { applied: false, path, reason: 'file_unreadable', message: `Cannot read ${path}` };
  }

  const index = content.indexOf(edit.originalCode);
  if (index !== -1) {
    const next = content.slice(0, index) + edit.fixedCode + content.slice(index + edit.originalCode.length);
    try {
      await writeFileAtomic(path, next);
    } catch (err) {
      return { applied: false, path, reason: 'write_failed', message: `Cannot write ${path}: ${errorMessage(err)}` };
    }
    return { applied: true, path };
  }

  if (collapseWhitespace(content).includes(collapseWhitespace(edit.originalCode))) {
    return {
      applied: false,
      path,
      reason: 'whitespace_mismatch',
      message: 'Original code only matches with different whitespace; not applied',
    };
  }
  return { applied: false, path, reason: 'not_found', message: `Original code not found in ${path}` };
}
