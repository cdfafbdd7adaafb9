/**
 * Decides from a todo list whether verification should run now.
 * Pure: no I/O, no judge calls.
 */

import { isRecord } from '../utils/guards.js';

export type TodoStatus = 'pending' | 'in_progress' | 'completed';

export type Phase = 'implementation' | 'testing' | 'verification' | 'build' | 'deploy' | 'review' | 'unknown';

export interface TodoItem {
  content: string;
  status: TodoStatus;
  phase: Phase;
  requiresVerification: boolean;
}

// Checked in order; the first phase with a matching keyword wins
const PHASE_KEYWORDS: ReadonlyArray<[Exclude<Phase, 'unknown'>, readonly string[]]> = [
  ['implementation', ['implement', 'create', 'add', 'write', 'code', 'develop']],
  ['testing', ['test', 'spec', 'unit', 'integration', 'e2e']],
  ['verification', ['verify', 'check', 'validate', 'confirm']],
  ['build', ['build', 'compile', 'bundle', 'package']],
  ['deploy', ['deploy', 'release', 'publish', 'ship']],
  ['review', ['review', 'pr', 'merge', 'commit']],
];

export const VERIFICATION_KEYWORDS: readonly string[] = [
  'verify', 'test', 'check', 'validate', 'confirm', 'ensure',
  'build', 'run', 'deploy', 'launch', 'render', 'display',
  'ui', 'visual', 'screenshot', 'appearance', 'layout',
];

const HIGH_PRIORITY_PHASES: readonly Phase[] = ['build', 'testing', 'deploy'];

const escape = (s: string): string => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Short keywords ("pr", "ui", "run") must be whole words; longer ones also
 * match as a word prefix ("tests", "building").
 */
function hasKeyword(text: string, keyword: string): boolean {
  const pattern = keyword.length <= 3 ? `\\b${escape(keyword)}\\b` : `\\b${escape(keyword)}`;
  return new RegExp(pattern, 'i').test(text);
}

export function detectPhase(content: string): Phase {
  for (const [phase, keywords] of PHASE_KEYWORDS) {
    if (keywords.some(k => hasKeyword(content, k))) return phase;
  }
  return 'unknown';
}

export function requiresVerification(content: string): boolean {
  return VERIFICATION_KEYWORDS.some(k => hasKeyword(content, k));
}

export function todo(content: string, status: TodoStatus): TodoItem {
  return { content, status, phase: detectPhase(content), requiresVerification: requiresVerification(content) };
}

function toStatus(value: unknown): TodoStatus {
  return value === 'completed' || value === 'in_progress' ? value : 'pending';
}

function fromJson(data: unknown): TodoItem[] {
  const list = isRecord(data) ? data.todos : data;
  if (!Array.isArray(list)) return [];
  const items: TodoItem[] = [];
  for (const entry of list) {
    if (!isRecord(entry) || typeof entry.content !== 'string') continue;
    items.push(todo(entry.content, toStatus(entry.status)));
  }
  return items;
}

/**
 * Read todos from a JSON document (`{ todos: [...] }` or a bare array) or
 * from markdown checkbox lines. Duplicate contents keep the first.
 */
export function parseTodos(input: string): TodoItem[] {
  const trimmed = input.trim();
  let items: TodoItem[] = [];
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    try {
      items = fromJson(JSON.parse(trimmed));
    } catch {
      items = [];
    }
  }

  for (const match of input.matchAll(/^\s*[-*] \[([ xX])\]\s*(.+)$/gm)) {
    const [, mark, content] = match;
    if (!mark || !content) continue;
    items.push(todo(content.trim(), mark.toLowerCase() === 'x' ? 'completed' : 'pending'));
  }

  const seen = new Set<string>();
  return items.filter(item => {
    if (seen.has(item.content)) return false;
    seen.add(item.content);
    return true;
  });
}

/** In-progress phase if any, else the phase of the last completed item. */
export function currentPhase(todos: TodoItem[]): Phase {
  const active = todos.find(t => t.status === 'in_progress');
  if (active) return active.phase;
  const completed = todos.filter(t => t.status === 'completed');
  return completed[completed.length - 1]?.phase ?? 'unknown';
}

const allDone = (items: TodoItem[]): boolean => items.length > 0 && items.every(t => t.status === 'completed');

export interface TriggerDecision {
  shouldVerify: boolean;
  /** Every rule that fired, in rule order */
  reasons: string[];
}

export function shouldVerify(todos: TodoItem[]): TriggerDecision {
  if (todos.length === 0) return { shouldVerify: false, reasons: [] };
  const reasons: string[] = [];

  const phase = currentPhase(todos);
  if (allDone(todos.filter(t => t.phase === phase))) {
    reasons.push(`Phase '${phase}' completed`);
  }

  for (const t of todos) {
    if (t.status === 'completed' && t.requiresVerification) {
      reasons.push(`Verification todo completed: ${t.content.slice(0, 50)}`);
    }
  }

  for (const p of HIGH_PRIORITY_PHASES) {
    if (allDone(todos.filter(t => t.phase === p))) {
      reasons.push(`High-priority phase '${p}' completed`);
    }
  }

  if (allDone(todos)) {
    reasons.push('All todos completed - final verification');
  }

  return { shouldVerify: reasons.length > 0, reasons };
}

export type TriggerPriority = 'high' | 'normal' | 'none';

export interface TriggerReport extends TriggerDecision {
  phase: Phase;
  priority: TriggerPriority;
  /** Percent complete, one decimal */
  progress: number;
  completed: number;
  pending: number;
  inProgress: number;
  reason: string;
}

/** High when a final, build or deploy trigger fired. */
export function triggerPriority(reasons: string[]): TriggerPriority {
  if (reasons.length === 0) return 'none';
  const urgent = reasons.some(r => /final|build|deploy/i.test(r));
  return urgent ? 'high' : 'normal';
}

export function checkVerificationNeeded(todos: TodoItem[], justCompleted?: TodoItem): TriggerReport {
  const decision = shouldVerify(todos);
  const reasons = [...decision.reasons];
  if (justCompleted?.requiresVerification) {
    reasons.push(`Just completed verification-requiring todo: ${justCompleted.content.slice(0, 50)}`);
  }

  const completed = todos.filter(t => t.status === 'completed').length;
  return {
    shouldVerify: reasons.length > 0,
    reasons,
    phase: currentPhase(todos),
    priority: triggerPriority(reasons),
    progress: todos.length > 0 ? Math.round((completed / todos.length) * 1000) / 10 : 0,
    completed,
    pending: todos.filter(t => t.status === 'pending').length,
    inProgress: todos.filter(t => t.status === 'in_progress').length,
    reason: reasons[0] ?? 'No verification needed',
  };
}
