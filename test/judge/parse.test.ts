import { describe, it, expect } from 'vitest';
import { extractJsonBlock, parseJudgeResponse } from '../../src/judge/parse.js';
import { batchVerdictSchema, fixProposalSchema, verdictSchema } from '../../src/judge/schemas.js';
import { fencedJson } from '../helpers.js';

describe('extractJsonBlock', () => {
  it('should take the first json-tagged block', () => {
    const text = 'before\n```json\n{"a": 1}\n```\nafter\n```json\n{"b": 2}\n```';
    expect(extractJsonBlock(text)).toBe('{"a": 1}');
  });

  it('should accept an untagged fence only when it holds an object', () => {
    expect(extractJsonBlock('```\n{"a": 1}\n```')).toBe('{"a": 1}');
    expect(extractJsonBlock('```\nnot json\n```')).toBeNull();
  });

  it('should return null for bare JSON with no fence', () => {
    expect(extractJsonBlock('{"results": []}')).toBeNull();
  });
});

describe('parseJudgeResponse', () => {
  it('should parse a valid verdict and fill defaults', () => {
    const raw = fencedJson({ results: [{ task: 'Login button', status: 'COMPLETED' }] });
    const outcome = parseJudgeResponse(raw, verdictSchema);

    expect(outcome).toEqual({
      kind: 'parsed',
      raw,
      value: { results: [{ task: 'Login button', status: 'COMPLETED', evidence: '' }], summary: '' },
    });
  });

  it('should be unparseable without a fenced block', () => {
    const outcome = parseJudgeResponse('Everything looks complete to me.', verdictSchema);
    expect(outcome).toEqual({
      kind: 'unparseable',
      raw: 'Everything looks complete to me.',
      reason: 'no fenced JSON block in response',
    });
  });

  it('should be unparseable when the block is not JSON', () => {
    const outcome = parseJudgeResponse('```json\n{"results": [\n```', verdictSchema);
    expect(outcome.kind).toBe('unparseable');
    if (outcome.kind === 'unparseable') expect(outcome.reason.startsWith('invalid JSON: ')).toBe(true);
  });

  it('should reject a status outside the verdict vocabulary', () => {
    const outcome = parseJudgeResponse(fencedJson({ results: [{ task: 't', status: 'DONE' }] }), verdictSchema);
    expect(outcome.kind).toBe('unparseable');
    if (outcome.kind === 'unparseable') expect(outcome.reason.startsWith('unexpected shape at results.0.status: ')).toBe(true);
  });

  it('should reject a confidence above 1', () => {
    const outcome = parseJudgeResponse(fencedJson({ file_to_fix: 'a.ts', confidence: 1.5 }), fixProposalSchema);
    expect(outcome.kind).toBe('unparseable');
    if (outcome.kind === 'unparseable') expect(outcome.reason.startsWith('unexpected shape at confidence: ')).toBe(true);
  });

  it('should normalize batch statuses to lower case', () => {
    const outcome = parseJudgeResponse(fencedJson({
      summary: { total: 1, passed: 1, failed: 0, uncertain: 0, overall_status: 'PASS' },
      details: [{ image_index: 1, status: ' Pass ' }],
    }), batchVerdictSchema);

    expect(outcome.kind).toBe('parsed');
    if (outcome.kind === 'parsed') {
      expect(outcome.value.summary.overall_status).toBe('pass');
      expect(outcome.value.details[0]?.status).toBe('pass');
      expect(outcome.value.recommendation).toBe('');
    }
  });
});
