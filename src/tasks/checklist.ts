import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { detectApp, type AppDescriptor } from '../verify/app.js';
import { writeFileAtomic } from '../utils/fs.js';

export class TaskFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaskFileError';
  }
}

export interface ChecklistItem {
  /** 1-based line in the task file */
  line: number;
  text: string;
  completed: boolean;
}

export type TaskStatus = 'NO_ITEMS' | 'NOT_STARTED' | 'IN_PROGRESS' | 'COMPLETE';

export interface TaskFile {
  path: string;
  title: string;
  description: string;
  items: ChecklistItem[];
  criteria?: string;
  app: AppDescriptor | null;
  /** Full file text, used as the app descriptor for verification */
  content: string;
}

const LIST_CHECKBOX = /^(\s*[-*]\s*)\[([xX ])\]\s*(.+)$/;
const TABLE_CHECKBOX = /^\|(.+)\|\s*\[([xX ])\]\s*\|?\s*$/;
const CRITERIA_HEADING = /^#{2,}\s+acceptance criteria\s*$/i;

export function parseChecklistLine(line: string): { text: string; completed: boolean } | null {
  const trimmed = line.trimEnd();
  const listed = LIST_CHECKBOX.exec(trimmed);
  if (listed?.[2] && listed[3]) {
    return { text: listed[3].trim(), completed: listed[2].toLowerCase() === 'x' };
  }
  const tabled = TABLE_CHECKBOX.exec(trimmed);
  if (tabled?.[1] && tabled[2]) {
    const columns = tabled[1].split('|');
    const text = (columns[columns.length - 1] ?? '').trim();
    return text ? { text, completed: tabled[2].toLowerCase() === 'x' } : null;
  }
  return null;
}

function firstParagraph(lines: string[]): string {
  let description = '';
  let afterTitle = false;
  for (const line of lines) {
    if (line.startsWith('# ')) {
      afterTitle = true;
      continue;
    }
    if (!afterTitle) continue;
    if (!line.trim()) {
      if (description) break;
    } else if (line.startsWith('#')) {
      break;
    } else {
      description += (description ? ' ' : '') + line.trim();
    }
  }
  return description.slice(0, 200);
}

function criteriaSection(lines: string[]): string | undefined {
  const start = lines.findIndex(l => CRITERIA_HEADING.test(l.trim()));
  if (start === -1) return undefined;
  const body: string[] = [];
  for (const line of lines.slice(start + 1)) {
    if (/^#{1,2}\s/.test(line)) break;
    body.push(line);
  }
  const text = body.join('\n').trim();
  return text || undefined;
}

export function parseTaskFile(content: string, path = 'task.md'): TaskFile {
  const lines = content.split('\n');
  const title = /^#\s+(.+)$/m.exec(content)?.[1]?.trim() ?? basename(path, extname(path));

  const items: ChecklistItem[] = [];
  lines.forEach((line, i) => {
    const parsed = parseChecklistLine(line);
    if (parsed) items.push({ line: i + 1, ...parsed });
  });

  return {
    path,
    title,
    description: firstParagraph(lines) || 'No description',
    items,
    criteria: criteriaSection(lines),
    app: detectApp(content),
    content,
  };
}

export async function loadTaskFile(path: string): Promise<TaskFile> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    throw new TaskFileError(`Cannot read task file: ${path}`);
  }
  return parseTaskFile(content, path);
}

export function taskStatus(task: TaskFile): TaskStatus {
  const done = task.items.filter(i => i.completed).length;
  if (task.items.length === 0) return 'NO_ITEMS';
  if (done === 0) return 'NOT_STARTED';
  return done === task.items.length ? 'COMPLETE' : 'IN_PROGRESS';
}

export function progressPercent(task: TaskFile): number {
  if (task.items.length === 0) return 0;
  return (task.items.filter(i => i.completed).length / task.items.length) * 100;
}

/** Items not yet checked off, i.e. the ones to verify. */
export function openItems(task: TaskFile): ChecklistItem[] {
  return task.items.filter(i => !i.completed);
}

/** Tick the checkbox on `line`. Returns false if that line holds no open checkbox. */
export async function markItemComplete(path: string, line: number): Promise<boolean> {
  const content = await readFile(path, 'utf-8');
  const lines = content.split('\n');
  const current = lines[line - 1];
  if (current === undefined || !parseChecklistLine(current)) return false;

  const ticked = current.replace(/\[ \]/, '[x]');
  if (ticked === current) return false;
  lines[line - 1] = ticked;
  await writeFileAtomic(path, lines.join('\n'));
  return true;
}
