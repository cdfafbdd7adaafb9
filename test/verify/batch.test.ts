import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CaptureStore } from '../../src/capture/store.js';
import { recordBatchVerdicts, verifyBatch } from '../../src/verify/batch.js';
import { ScriptedJudge, fencedJson, silentLog } from '../helpers.js';

describe('verifyBatch', () => {
  let dir: string;
  let first: string;
  let second: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sightcheck-batch-'));
    first = join(dir, 'step1.png');
    second = join(dir, 'step2.txt');
    await writeFile(first, 'png-bytes');
    await writeFile(second, 'Welcome back');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should pass when the judge passes every capture', async () => {
    const judge = new ScriptedJudge(() => fencedJson({
      summary: { total: 2, passed: 2, failed: 0, uncertain: 0, overall_status: 'pass' },
      details: [
        { image_index: 1, status: 'pass', task_items_verified: ['Login form'] },
        { image_index: 2, status: 'pass' },
      ],
      recommendation: 'Ship it',
    }));

    const result = await verifyBatch({ judge, paths: [first, second], items: ['Login form', 'Welcome text'] });

    expect(result.success).toBe(true);
    expect(result.parsed).toBe(true);
    expect(result.details.map(d => [d.index, d.path, d.status])).toEqual([[1, first, 'pass'], [2, second, 'pass']]);
    expect(result.details[0]?.itemsVerified).toEqual(['Login form']);
    expect(result.recommendation).toBe('Ship it');
    expect(judge.requests[0]?.cwd).toBe(dir);
    expect(judge.requests[0]?.prompt).toContain('### Capture 2\n```\nWelcome back\n```');
  });

  it('should not pass when a capture has no verdict', async () => {
    const judge = new ScriptedJudge(() => fencedJson({
      summary: { total: 2, passed: 1, failed: 0, uncertain: 0, overall_status: 'pass' },
      details: [{ image_index: 1, status: 'pass' }],
    }));

    const result = await verifyBatch({ judge, paths: [first, second], items: [] });

    expect(result.success).toBe(false);
    expect(result.details[1]).toEqual({
      index: 2,
      path: second,
      status: 'uncertain',
      evidence: 'No verdict returned for this capture',
      itemsVerified: [],
      issues: [],
      judged: false,
    });
  });

  it('should mark everything uncertain when the reply cannot be parsed', async () => {
    const judge = new ScriptedJudge(() => 'Both look good.');

    const result = await verifyBatch({ judge, paths: [first, second], items: [] });

    expect(result.success).toBe(false);
    expect(result.parsed).toBe(false);
    expect(result.uncertain).toBe(2);
    expect(result.overallStatus).toBe('fail');
    expect(result.issues).toEqual(['Unparseable judge response: no fenced JSON block in response']);
    expect(result.judgeResponse).toBe('Both look good.');
  });

  it('should skip the judge when there is nothing to verify', async () => {
    const judge = new ScriptedJudge(() => '');
    const result = await verifyBatch({ judge, paths: [], items: [] });
    expect(result.issues).toEqual(['No captures to verify']);
    expect(judge.requests).toHaveLength(0);
  });

  it('should leave details empty for a summary-only request', async () => {
    const judge = new ScriptedJudge(() => fencedJson({
      summary: { total: 2, passed: 2, failed: 0, uncertain: 0, overall_status: 'pass' },
    }));
    const result = await verifyBatch({ judge, paths: [first, second], items: [], detailed: false });
    expect(result.success).toBe(true);
    expect(result.details).toEqual([]);
  });
});

describe('recordBatchVerdicts', () => {
  let dir: string;
  let store: CaptureStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sightcheck-batch-store-'));
    store = new CaptureStore(join(dir, 'store'), silentLog);
    await writeFile(join(dir, 'a.png'), 'png-bytes');
    await writeFile(join(dir, 'b.png'), 'png-bytes');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should leave every capture pending after an unreadable reply', async () => {
    await store.add(join(dir, 'a.png'));
    await store.add(join(dir, 'b.png'));
    const stored = await store.pending();
    const judge = new ScriptedJudge(() => 'Both look good.');
    const result = await verifyBatch({ judge, paths: stored.map(c => c.storedPath), items: ['Header'] });

    expect(await recordBatchVerdicts(store, stored, result)).toEqual([]);
    expect(await store.pending()).toHaveLength(2);
  });

  it('should only mark captures that got their own verdict', async () => {
    const a = await store.add(join(dir, 'a.png'));
    const b = await store.add(join(dir, 'b.png'));
    const judge = new ScriptedJudge(() => fencedJson({
      summary: { total: 2, passed: 0, failed: 1, uncertain: 1, overall_status: 'fail' },
      details: [{ image_index: 1, status: 'fail' }],
    }));
    const result = await verifyBatch({ judge, paths: [a.storedPath, b.storedPath], items: ['Header'] });

    expect(await recordBatchVerdicts(store, [a, b], result)).toEqual([a.id]);
    expect(await store.get(a.id)).toMatchObject({ verified: true, verificationResult: 'fail' });
    expect((await store.pending()).map(c => c.id)).toEqual([b.id]);
  });

  it('should mark nothing for a summary-only reply', async () => {
    const a = await store.add(join(dir, 'a.png'));
    const judge = new ScriptedJudge(() => fencedJson({
      summary: { total: 1, passed: 1, failed: 0, uncertain: 0, overall_status: 'pass' },
    }));
    const result = await verifyBatch({ judge, paths: [a.storedPath], items: ['Header'], detailed: false });

    expect(await recordBatchVerdicts(store, [a], result)).toEqual([]);
    expect(await store.get(a.id)).toMatchObject({ verified: false });
  });
});
