import { describe, it, expect } from 'vitest';
import {
  checkVerificationNeeded,
  currentPhase,
  detectPhase,
  parseTodos,
  requiresVerification,
  shouldVerify,
  todo,
} from '../../src/tasks/trigger.js';

describe('detectPhase', () => {
  it('should take the first phase with a matching keyword', () => {
    expect(detectPhase('Implement login form')).toBe('implementation');
    expect(detectPhase('Run unit tests')).toBe('testing');
    expect(detectPhase('Build the bundle')).toBe('build');
    expect(detectPhase('Publish to npm')).toBe('deploy');
    expect(detectPhase('Open PR')).toBe('review');
  });

  it('should match short keywords as whole words only', () => {
    expect(detectPhase('Improve parser')).toBe('unknown');
    expect(detectPhase('Address feedback')).toBe('unknown');
  });
});

describe('requiresVerification', () => {
  it('should flag visible or runnable work', () => {
    expect(requiresVerification('Update UI layout')).toBe(true);
    expect(requiresVerification('Refactor parser')).toBe(false);
  });
});

describe('parseTodos', () => {
  it('should read JSON todos, defaulting unknown statuses and skipping duplicates', () => {
    const todos = parseTodos(JSON.stringify({
      todos: [
        { content: 'Build app', status: 'completed' },
        { content: 'Build app', status: 'pending' },
        { content: 'Polish copy', status: 'weird' },
        { status: 'completed' },
      ],
    }));

    expect(todos.map(t => [t.content, t.status])).toEqual([['Build app', 'completed'], ['Polish copy', 'pending']]);
  });

  it('should read markdown checkboxes', () => {
    const todos = parseTodos('- [x] Ship it\n- [ ] Review PR\n* [ ] Review PR\nnot a todo');
    expect(todos).toEqual([
      { content: 'Ship it', status: 'completed', phase: 'deploy', requiresVerification: false },
      { content: 'Review PR', status: 'pending', phase: 'review', requiresVerification: false },
    ]);
  });
});

describe('shouldVerify', () => {
  it('should not trigger on an empty list', () => {
    expect(shouldVerify([])).toEqual({ shouldVerify: false, reasons: [] });
  });

  it('should trigger when every build item is done', () => {
    const todos = [todo('Build frontend bundle', 'completed'), todo('Compile backend', 'completed')];

    expect(currentPhase(todos)).toBe('build');
    expect(shouldVerify(todos)).toEqual({
      shouldVerify: true,
      reasons: [
        "Phase 'build' completed",
        'Verification todo completed: Build frontend bundle',
        "High-priority phase 'build' completed",
        'All todos completed - final verification',
      ],
    });
  });
});

describe('checkVerificationNeeded', () => {
  const todos = [
    todo('Write login form', 'completed'),
    todo('Write tests for login', 'in_progress'),
    todo('Deploy to staging', 'pending'),
  ];

  it('should summarize progress when nothing fires', () => {
    expect(checkVerificationNeeded(todos)).toEqual({
      shouldVerify: false,
      reasons: [],
      phase: 'implementation',
      priority: 'none',
      progress: 33.3,
      completed: 1,
      pending: 1,
      inProgress: 1,
      reason: 'No verification needed',
    });
  });

  it('should trigger for a just-completed todo that needs checking', () => {
    const report = checkVerificationNeeded(todos, todo('Run smoke test', 'completed'));
    expect(report.shouldVerify).toBe(true);
    expect(report.reason).toBe('Just completed verification-requiring todo: Run smoke test');
    expect(report.priority).toBe('normal');
  });

  it('should raise the priority for build and final triggers', () => {
    const report = checkVerificationNeeded([todo('Build frontend bundle', 'completed')]);
    expect(report.priority).toBe('high');
  });
});
