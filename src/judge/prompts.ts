import type { Evidence } from './evidence.js';

export type AppKind = 'web' | 'native-window' | 'terminal-program' | 'shell-command';

const APP_LABELS: Record<AppKind, string> = {
  'web': 'WEBAPP',
  'native-window': 'GUI',
  'terminal-program': 'TUI',
  'shell-command': 'CLI',
};

function bulletList(items: string[]): string {
  return items.map(item => `- ${item}`).join('\n');
}

function fence(text: string, truncated = false): string {
  return ['```', text, '```', truncated ? '(output truncated)' : ''].filter(Boolean).join('\n');
}

export function buildVerificationPrompt(input: {
  appKind: AppKind;
  items: string[];
  criteria?: string;
  evidence: Evidence;
}): string {
  const { appKind, items, criteria, evidence } = input;
  const subject = evidence.type === 'file' ? 'screenshot' : 'terminal output';

  const body = [
    'You are verifying whether tasks have been completed based on visual evidence.',
    '',
    '## Application Type',
    APP_LABELS[appKind],
    '',
    '## Tasks to Verify',
    bulletList(items),
    '',
    ...(criteria ? ['## Acceptance Criteria', criteria, ''] : []),
    '## Instructions',
    `Analyze the provided ${subject} and decide, for each task, whether it is done.`,
    'Use COMPLETED when you can see evidence the task is done, NOT_COMPLETED when it does not appear done,',
    'and UNCERTAIN when the evidence does not let you decide.',
    '',
    'Respond in this exact JSON format:',
    '```json',
    '{',
    '  "results": [',
    '    {"task": "task description", "status": "COMPLETED|NOT_COMPLETED|UNCERTAIN", "evidence": "what you observed"}',
    '  ],',
    '  "summary": "brief overall assessment",',
    '  "all_completed": true',
    '}',
    '```',
  ].join('\n');

  if (evidence.type === 'inline') {
    return `${body}\n\n## Terminal Output\n${fence(evidence.text, evidence.truncated)}`;
  }
  return [
    'I need you to analyze a screenshot to verify task completion.',
    '',
    `The screenshot is saved at: ${evidence.path}`,
    '',
    'Use the Read tool to view this image file, then answer the following:',
    '',
    body,
  ].join('\n');
}

export interface SourceFile {
  path: string;
  content: string;
  truncated: boolean;
}

export function buildFixPrompt(input: { issue: string; evidence: Evidence; files: SourceFile[] }): string {
  const { issue, evidence, files } = input;

  const filesSection = files.length > 0
    ? files.map(f => `### ${f.path}\n${fence(f.content, f.truncated)}`).join('\n\n')
    : 'No recently edited files were provided.';
  const evidenceSection = evidence.type === 'file'
    ? `The screenshot showing the issue is at: ${evidence.path}\nUse the Read tool to view it.`
    : `Captured terminal output:\n${fence(evidence.text, evidence.truncated)}`;

  return [
    'You are debugging a visual issue in an application.',
    '',
    '## Issue Description',
    issue,
    '',
    '## Evidence',
    evidenceSection,
    '',
    '## Recently Edited Files',
    'These files were recently edited and may contain the bug:',
    filesSection,
    '',
    '## Task',
    '1. Work out what is wrong from the evidence',
    '2. Identify which file and line contains the bug',
    '3. Propose one specific code replacement',
    '',
    '"original_code" must be copied exactly from the file, whitespace included.',
    '',
    'Respond in this JSON format:',
    '```json',
    '{',
    '  "issue_identified": "specific description of what is wrong",',
    '  "root_cause": "why this is happening",',
    '  "file_to_fix": "path/to/file.tsx",',
    '  "line_number": 42,',
    '  "original_code": "the exact code that needs changing",',
    '  "fixed_code": "the corrected code",',
    '  "confidence": 0.8,',
    '  "explanation": "why this fix should work"',
    '}',
    '```',
    '',
    'If you cannot determine a fix, set "file_to_fix" to null and "confidence" to 0.',
  ].join('\n');
}

const COMPARISON_FORMAT = [
  'Respond in this JSON format:',
  '```json',
  '{',
  '  "matches": true,',
  '  "similarity_score": 0.95,',
  '  "differences": ["list of differences found"],',
  '  "analysis": "detailed analysis of what changed",',
  '  "suggested_fixes": ["list of code fixes if regressions found"]',
  '}',
  '```',
].join('\n');

export function buildComparisonPrompt(baseline: Evidence, current: Evidence): string {
  if (baseline.type === 'inline' && current.type === 'inline') {
    return [
      'Compare these two terminal outputs and identify any differences.',
      '',
      '## Baseline Output (Expected)',
      fence(baseline.text, baseline.truncated),
      '',
      '## Current Output',
      fence(current.text, current.truncated),
      '',
      COMPARISON_FORMAT,
    ].join('\n');
  }

  const describe = (e: Evidence): string => (e.type === 'file' ? e.path : `\n${fence(e.text, e.truncated)}`);
  return [
    'I need you to compare two captures to detect visual regressions.',
    '',
    `Baseline (expected state): ${describe(baseline)}`,
    `Current: ${describe(current)}`,
    '',
    'Use the Read tool to view any image files, then check:',
    '- whether there are visual differences',
    '- whether the layouts match',
    '- whether all expected elements are present',
    '- whether colors, fonts and spacing are consistent',
    '',
    COMPARISON_FORMAT,
  ].join('\n');
}

export function buildBatchPrompt(input: {
  items: string[];
  criteria?: string;
  context?: string;
  captures: Evidence[];
  detailed: boolean;
}): string {
  const { items, criteria, context, captures, detailed } = input;
  const n = captures.length;

  const captureSection = captures.map((c, i) => {
    const header = `### Capture ${i + 1}`;
    return c.type === 'file'
      ? `${header}\nFile: ${c.path} (use the Read tool to view it)`
      : `${header}\n${fence(c.text, c.truncated)}`;
  }).join('\n\n');

  const detailsFormat = detailed
    ? [
      '  "details": [',
      '    {',
      '      "image_index": 1,',
      '      "status": "pass|fail|uncertain",',
      '      "evidence": "what you observed",',
      '      "task_items_verified": ["items this capture verifies"],',
      '      "issues": ["any issues in this capture"]',
      '    }',
      '  ],',
    ]
    : [];

  return [
    `You are verifying ${n} captures against task criteria.`,
    '',
    '## Task Items to Verify',
    items.length > 0 ? bulletList(items) : 'No specific items',
    '',
    '## Acceptance Criteria',
    criteria || 'Verify the captures show expected behavior',
    '',
    ...(context ? ['## Additional Context', context, ''] : []),
    '## Captures',
    'The captures may be steps of one user flow, several states of one feature, or different features.',
    '',
    captureSection,
    '',
    '## Instructions',
    'For each capture decide which task items it satisfies and what issues are visible, then give an overall status.',
    detailed ? 'For each capture, provide detailed analysis.' : 'Provide a summary of all captures.',
    '',
    '## Response Format',
    'Respond with valid JSON in this format:',
    '```json',
    '{',
    '  "summary": {',
    `    "total": ${n},`,
    '    "passed": 0,',
    '    "failed": 0,',
    '    "uncertain": 0,',
    '    "overall_status": "pass|fail|partial",',
    '    "issues": ["list of issues found across all captures"]',
    '  },',
    ...detailsFormat,
    '  "recommendation": "brief recommendation for next steps"',
    '}',
    '```',
  ].join('\n');
}
