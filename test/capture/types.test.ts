import { describe, it, expect } from 'vitest';
import {
  CaptureOptionsError,
  DEFAULT_CAPTURE_OPTIONS,
  captureFailed,
  captureSucceeded,
  relocate,
  resolveCaptureOptions,
  toRecord,
} from '../../src/capture/types.js';

describe('resolveCaptureOptions', () => {
  it('should fill defaults and ignore undefined overrides', () => {
    const options = resolveCaptureOptions({ width: 800, height: undefined });
    expect(options.width).toBe(800);
    expect(options.height).toBe(DEFAULT_CAPTURE_OPTIONS.height);
    expect(options.timeoutMs).toBe(30_000);
  });

  it('should reject a non-positive timeout', () => {
    expect(() => resolveCaptureOptions({ timeoutMs: 0 })).toThrow(CaptureOptionsError);
    expect(() => resolveCaptureOptions({ timeoutMs: 0 })).toThrow('timeout must be greater than 0 (got 0)');
  });

  it('should reject non-positive dimensions and negative waits', () => {
    expect(() => resolveCaptureOptions({ width: 0 })).toThrow('width and height must be greater than 0 (got 0x720)');
    expect(() => resolveCaptureOptions({ waitAfterMs: -1 })).toThrow('wait durations cannot be negative');
  });
});

describe('capture results', () => {
  it('should be frozen', () => {
    const result = captureSucceeded('text', { type: 'inline', text: 'hi' });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.metadata)).toBe(true);
  });

  it('should default a failure to an image kind with a message', () => {
    const result = captureFailed('timeout', '');
    expect(result.success).toBe(false);
    expect(result.kind).toBe('image');
    expect(result.error).toBe('capture failed');
    expect(result.errorKind).toBe('timeout');
  });

  it('should give a snake_case record', () => {
    const record = toRecord(captureFailed('not_found', 'gone', { kind: 'text', event: 'click:#a' }));
    expect(record).toMatchObject({
      success: false,
      kind: 'text',
      path: null,
      text: null,
      event: 'click:#a',
      error: 'gone',
      error_kind: 'not_found',
    });
  });

  it('should relocate a file result', () => {
    const moved = relocate(captureSucceeded('image', { type: 'file', path: '/a.png' }), '/b.png');
    expect(moved.location).toEqual({ type: 'file', path: '/b.png' });
  });
});
