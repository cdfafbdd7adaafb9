import { describe, it, expect } from 'vitest';
import {
  buildBatchPrompt,
  buildComparisonPrompt,
  buildFixPrompt,
  buildVerificationPrompt,
} from '../../src/judge/prompts.js';

describe('buildVerificationPrompt', () => {
  it('should point the judge at a screenshot file', () => {
    const prompt = buildVerificationPrompt({
      appKind: 'web',
      items: ['Login form renders'],
      evidence: { type: 'file', path: '/tmp/shot.png' },
    });

    expect(prompt.startsWith('I need you to analyze a screenshot to verify task completion.')).toBe(true);
    expect(prompt).toContain('The screenshot is saved at: /tmp/shot.png');
    expect(prompt).toContain('## Application Type\nWEBAPP');
    expect(prompt).toContain('## Tasks to Verify\n- Login form renders');
    expect(prompt).not.toContain('## Acceptance Criteria');
  });

  it('should inline terminal output and mark truncation', () => {
    const prompt = buildVerificationPrompt({
      appKind: 'terminal-program',
      items: ['Menu shows'],
      criteria: 'Menu has three entries',
      evidence: { type: 'inline', text: 'File Edit View', truncated: true },
    });

    expect(prompt).toContain('## Acceptance Criteria\nMenu has three entries');
    expect(prompt.endsWith('## Terminal Output\n```\nFile Edit View\n```\n(output truncated)')).toBe(true);
  });
});

describe('buildFixPrompt', () => {
  it('should include each edited file and the evidence path', () => {
    const prompt = buildFixPrompt({
      issue: 'Button is red',
      evidence: { type: 'file', path: '/tmp/shot.png' },
      files: [{ path: 'src/button.css', content: '.btn { color: red; }', truncated: false }],
    });

    expect(prompt).toContain('## Issue Description\nButton is red');
    expect(prompt).toContain('The screenshot showing the issue is at: /tmp/shot.png');
    expect(prompt).toContain('### src/button.css\n```\n.btn { color: red; }\n```');
  });

  it('should say when no files were given', () => {
    const prompt = buildFixPrompt({ issue: 'x', evidence: { type: 'inline', text: 'out', truncated: false }, files: [] });
    expect(prompt).toContain('No recently edited files were provided.');
    expect(prompt).toContain('Captured terminal output:\n```\nout\n```');
  });
});

describe('buildComparisonPrompt', () => {
  it('should compare two text outputs inline', () => {
    const prompt = buildComparisonPrompt(
      { type: 'inline', text: 'v1', truncated: false },
      { type: 'inline', text: 'v2', truncated: false },
    );
    expect(prompt).toContain('## Baseline Output (Expected)\n```\nv1\n```\n\n## Current Output\n```\nv2\n```');
  });

  it('should reference image paths', () => {
    const prompt = buildComparisonPrompt({ type: 'file', path: '/b.png' }, { type: 'file', path: '/c.png' });
    expect(prompt).toContain('Baseline (expected state): /b.png\nCurrent: /c.png');
  });
});

describe('buildBatchPrompt', () => {
  it('should number captures and state the total', () => {
    const prompt = buildBatchPrompt({
      items: [],
      captures: [{ type: 'file', path: '/a.png' }, { type: 'inline', text: 'ok', truncated: false }],
      detailed: false,
    });

    expect(prompt.startsWith('You are verifying 2 captures against task criteria.')).toBe(true);
    expect(prompt).toContain('## Task Items to Verify\nNo specific items');
    expect(prompt).toContain('### Capture 1\nFile: /a.png (use the Read tool to view it)');
    expect(prompt).toContain('### Capture 2\n```\nok\n```');
    expect(prompt).toContain('"total": 2,');
    expect(prompt).not.toContain('"details"');
  });
});
