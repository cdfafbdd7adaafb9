import { describe, it, expect } from 'vitest';
import {
  formatBaselineList,
  formatFixResult,
  formatTaskStatus,
  formatTrigger,
  formatVerification,
} from '../../src/cli/report.js';
import { failedVerification } from '../../src/verify/orchestrator.js';
import { checkVerificationNeeded, todo } from '../../src/tasks/trigger.js';
import { parseTaskFile } from '../../src/tasks/checklist.js';

describe('formatVerification', () => {
  it('should list items under their status', () => {
    const text = formatVerification({
      ...failedVerification(['Logo shows'], 'raw'),
      completedItems: ['Form renders'],
      verdicts: [{ task: 'Logo shows', status: 'NOT_COMPLETED', evidence: 'no logo' }],
      appKind: 'web',
      evidencePath: '/tmp/e.png',
    });

    expect(text).toBe([
      '## Visual Verification',
      '',
      '**Result**: FAILED',
      '**Application**: web',
      '**Evidence**: /tmp/e.png',
      '',
      '### Completed',
      '',
      '- [x] Form renders',
      '',
      '### Failed',
      '',
      '- [ ] Logo shows',
      '',
      '### Evidence',
      '',
      '- **Logo shows** (NOT_COMPLETED): no logo',
      '',
    ].join('\n'));
  });

  it('should show the raw reply when the judge gave no verdicts', () => {
    const text = formatVerification(failedVerification(['A'], 'Capture failed: boom'));
    expect(text.endsWith('### Judge Response\n\n```\nCapture failed: boom\n```\n')).toBe(true);
  });
});

describe('formatFixResult', () => {
  it('should render each attempt with a diff', () => {
    const text = formatFixResult({
      allFixed: true,
      stopReason: 'verified',
      attempts: [{
        attempt: 1,
        issue: 'Button is red',
        file: 'button.ts',
        lineNumber: 3,
        originalCode: 'red',
        fixedCode: 'blue',
        confidence: 0.85,
        explanation: '',
        outcome: 'applied',
        applied: true,
        success: true,
        message: 'Applied to /app/button.ts',
      }],
      evidence: ['/tmp/a.png'],
      finalVerification: failedVerification([], 'raw', { success: true }),
    });

    expect(text).toContain('**Result**: ALL FIXED (verified)');
    expect(text).toContain('### Attempt 1: applied\n\n**Issue**: Button is red\n**File**: button.ts:3\n**Confidence**: 85%\n**Re-verified**: passed');
    expect(text).toContain('```diff\n- red\n+ blue\n```');
    expect(text).toContain('### Evidence\n\n1. /tmp/a.png');
  });
});

describe('formatBaselineList', () => {
  it('should say when there is nothing saved', () => {
    expect(formatBaselineList([])).toBe('No baselines saved.');
  });

  it('should render a table row per baseline', () => {
    const text = formatBaselineList([{
      name: 'home',
      file: 'home_1.png',
      created: '2026-01-02T03:04:05.678Z',
      app_type: 'web',
      width: 1280,
      height: 720,
    }]);
    expect(text.split('\n').pop()).toBe('| home | web | 2026-01-02T03:04:05 | 1280x720 |  |');
  });
});

describe('formatTrigger', () => {
  it('should list the triggers that fired', () => {
    const report = checkVerificationNeeded([todo('Build frontend bundle', 'completed')]);
    const text = formatTrigger(report);
    expect(text).toContain('**Verify now**: yes\n**Phase**: build\n**Progress**: 100% (1 completed, 0 in progress, 0 pending)\n**Priority**: high');
    expect(text).toContain("  - Phase 'build' completed");
  });
});

describe('formatTaskStatus', () => {
  it('should number the remaining items', () => {
    const task = parseTaskFile('# Login\n- [x] Form renders\n- [ ] Logo shows', 'tasks/login.md');
    const text = formatTaskStatus(task);
    expect(text).toContain('## Task: login.md\n\n**Title**: Login\n**Status**: IN_PROGRESS\n**Progress**: 1/2 (50%)');
    expect(text).toContain('### Remaining Items\n\n1. [ ] Logo shows');
  });
});
