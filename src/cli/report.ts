/** Markdown reports for command output and saved files. */

import { basename } from 'node:path';
import type { VerificationResult } from '../verify/orchestrator.js';
import type { BatchResult } from '../verify/batch.js';
import type { AutoFixResult } from '../fix/auto-fix.js';
import type { BaselineEntry } from '../baseline/manifest.js';
import type { ComparisonResult } from '../baseline/store.js';
import type { TriggerReport } from '../tasks/trigger.js';
import { progressPercent, taskStatus, type TaskFile } from '../tasks/checklist.js';

export function formatVerification(result: VerificationResult, title = 'Visual Verification'): string {
  const lines = [
    `## ${title}`,
    '',
    `**Result**: ${result.success ? 'PASSED' : 'FAILED'}`,
  ];
  if (result.appKind) lines.push(`**Application**: ${result.appKind}`);
  if (result.evidencePath) lines.push(`**Evidence**: ${result.evidencePath}`);
  lines.push('');

  const section = (heading: string, items: string[], mark: string): void => {
    if (items.length === 0) return;
    lines.push(`### ${heading}`, '', ...items.map(i => `- [${mark}] ${i}`), '');
  };
  section('Completed', result.completedItems, 'x');
  section('Failed', result.failedItems, ' ');
  section('Uncertain', result.uncertainItems, '?');

  const evidence = result.verdicts.filter(v => v.evidence);
  if (evidence.length > 0) {
    lines.push('### Evidence', '', ...evidence.map(v => `- **${v.task}** (${v.status}): ${v.evidence}`), '');
  }
  if (result.summary) lines.push('### Summary', '', result.summary, '');
  if (result.completedItems.length === 0 && result.verdicts.length === 0) {
    lines.push('### Judge Response', '', '```', result.judgeResponse, '```', '');
  }
  return lines.join('\n');
}

export function formatFixResult(result: AutoFixResult): string {
  const lines = [
    '## Auto-Fix',
    '',
    `**Result**: ${result.allFixed ? 'ALL FIXED' : 'NOT FIXED'} (${result.stopReason})`,
    `**Attempts**: ${result.attempts.length}`,
    '',
  ];
  for (const a of result.attempts) {
    lines.push(`### Attempt ${a.attempt}: ${a.outcome}`, '');
    if (a.issue) lines.push(`**Issue**: ${a.issue}`);
    if (a.file) lines.push(`**File**: ${a.file}${a.lineNumber ? `:${a.lineNumber}` : ''}`);
    lines.push(`**Confidence**: ${Math.round(a.confidence * 100)}%`);
    if (a.applied) {
      lines.push(`**Re-verified**: ${a.success ? 'passed' : 'still failing'}`);
    }
    if (a.message) lines.push(`**Note**: ${a.message}`);
    if (a.originalCode || a.fixedCode) {
      lines.push('', '```diff');
      lines.push(...a.originalCode.split('\n').map(l => `- ${l}`));
      lines.push(...a.fixedCode.split('\n').map(l => `+ ${l}`));
      lines.push('```');
    }
    lines.push('');
  }
  if (result.evidence.length > 0) {
    lines.push('### Evidence', '', ...result.evidence.map((p, i) => `${i + 1}. ${p}`), '');
  }
  return lines.join('\n');
}

export function formatBaselineList(entries: BaselineEntry[]): string {
  if (entries.length === 0) return 'No baselines saved.';
  const lines = [
    '## Baselines',
    '',
    '| Name | Type | Created | Size | Description |',
    '|------|------|---------|------|-------------|',
  ];
  for (const e of entries) {
    lines.push(`| ${e.name} | ${e.app_type} | ${e.created.slice(0, 19)} | ${e.width}x${e.height} | ${e.description ?? ''} |`);
  }
  return lines.join('\n');
}

export function formatComparison(result: ComparisonResult): string {
  const lines = [
    `## Baseline Comparison: ${result.baselineName}`,
    '',
    `**Matches**: ${result.matches ? 'yes' : 'no'}`,
    `**Similarity**: ${Math.round(result.similarity_score * 100)}%`,
    `**Baseline**: ${basename(result.baselinePath)}`,
  ];
  if (result.currentPath) lines.push(`**Current**: ${basename(result.currentPath)}`);
  lines.push('');
  if (result.differences.length > 0) lines.push('### Differences', '', ...result.differences.map(d => `- ${d}`), '');
  if (result.analysis) lines.push('### Analysis', '', result.analysis, '');
  if (result.suggested_fixes.length > 0) {
    lines.push('### Suggested Fixes', '', ...result.suggested_fixes.map(f => `- ${f}`), '');
  }
  return lines.join('\n');
}

export function formatBatch(result: BatchResult): string {
  const lines = [
    '## Batch Verification',
    '',
    `**Overall**: ${result.overallStatus.toUpperCase()}`,
    `**Captures**: ${result.total} (${result.passed} passed, ${result.failed} failed, ${result.uncertain} uncertain)`,
    '',
  ];
  if (result.details.length > 0) {
    lines.push('| # | Capture | Status | Evidence |', '|---|---------|--------|----------|');
    for (const d of result.details) {
      lines.push(`| ${d.index} | ${basename(d.path)} | ${d.status} | ${d.evidence.replace(/\|/g, '\\|')} |`);
    }
    lines.push('');
  }
  if (result.issues.length > 0) lines.push('### Issues', '', ...result.issues.map(i => `- ${i}`), '');
  if (result.recommendation) lines.push('### Recommendation', '', result.recommendation, '');
  return lines.join('\n');
}

export function formatTrigger(report: TriggerReport): string {
  const lines = [
    '## Verification Trigger',
    '',
    `**Verify now**: ${report.shouldVerify ? 'yes' : 'no'}`,
    `**Phase**: ${report.phase}`,
    `**Progress**: ${report.progress}% (${report.completed} completed, ${report.inProgress} in progress, ${report.pending} pending)`,
  ];
  if (report.shouldVerify) lines.push(`**Priority**: ${report.priority}`);
  if (report.reasons.length > 0) {
    lines.push('', '**Triggers**:', ...report.reasons.map(r => `  - ${r}`));
  }
  return lines.join('\n');
}

export function formatTaskStatus(task: TaskFile): string {
  const done = task.items.filter(i => i.completed).length;
  const lines = [
    `## Task: ${basename(task.path)}`,
    '',
    `**Title**: ${task.title}`,
    `**Status**: ${taskStatus(task)}`,
    `**Progress**: ${done}/${task.items.length} (${progressPercent(task).toFixed(0)}%)`,
  ];
  const open = task.items.filter(i => !i.completed);
  if (open.length > 0) {
    lines.push('', '### Remaining Items', '', ...open.map((i, n) => `${n + 1}. [ ] ${i.text}`));
  }
  return lines.join('\n');
}
