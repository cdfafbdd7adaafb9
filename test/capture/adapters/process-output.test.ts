import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { tmpdir } from 'node:os';
import { ProcessOutputAdapter, formatTranscript } from '../../../src/capture/adapters/process-output.js';
import { locationPath } from '../../../src/capture/types.js';
import { silentLog } from '../../helpers.js';

describe('ProcessOutputAdapter', () => {
  let dir: string;
  let adapter: ProcessOutputAdapter;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sightcheck-proc-'));
    adapter = new ProcessOutputAdapter({ defaults: { outputDir: dir, waitBeforeMs: 0 }, log: silentLog });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should capture stdout of a successful command as text', async () => {
    const result = await adapter.capture('echo hello');
    expect(result.success).toBe(true);
    expect(result.kind).toBe('text');
    expect(result.metadata.exit_code).toBe(0);
    expect(result.metadata.stdout).toBe('hello\n');

    const path = locationPath(result);
    expect(path && basename(path).startsWith('cli_')).toBe(true);
    const transcript = await readFile(path ?? '', 'utf-8');
    expect(transcript.startsWith('$ echo hello\n--- STDOUT ---\nhello\n')).toBe(true);
  });

  it('should fail a non-zero exit but keep the transcript', async () => {
    const result = await adapter.capture('exit 1');
    expect(result.success).toBe(false);
    expect(result.errorKind).toBe('nonzero_exit');
    expect(result.error).toBe('Command exited with code 1');
    expect(result.metadata.exit_code).toBe(1);

    const transcript = await readFile(locationPath(result) ?? '', 'utf-8');
    expect(transcript).toContain('--- EXIT CODE: 1 ---');
  });

  it('should report a missing command as not_found', async () => {
    const result = await adapter.capture('cli:sightcheck-no-such-command-xyz');
    expect(result.success).toBe(false);
    expect(result.errorKind).toBe('not_found');
    expect(result.error).toBe('Command not found: sightcheck-no-such-command-xyz');
  });

  it('should time out and keep partial output', async () => {
    const result = await adapter.capture('echo started; sleep 2', { timeoutMs: 300 });
    expect(result.success).toBe(false);
    expect(result.errorKind).toBe('timeout');
    expect(result.metadata.timed_out).toBe(true);

    const transcript = await readFile(locationPath(result) ?? '', 'utf-8');
    expect(transcript.split('\n')[1]).toBe('--- TIMEOUT ---');
  });

  it('should check for expected output on the output event', async () => {
    const found = await adapter.captureOnEvent('echo server ready', 'output', 'ready');
    expect(found.success).toBe(true);
    expect(found.event).toBe('output:ready');
    expect(found.metadata.output_check).toBe('found');

    const missing = await adapter.captureOnEvent('echo booting', 'output', 'ready');
    expect(missing.success).toBe(false);
    expect(missing.errorKind).toBe('not_found');
    expect(missing.error).toBe('Expected output not found: ready');
  });

  it('should use the timeout event selector as seconds', async () => {
    const result = await adapter.captureOnEvent('sleep 2', 'timeout', '0.2');
    expect(result.errorKind).toBe('timeout');
    expect(result.error).toBe('Command timed out after 0.20s (partial output kept)');
  });
});

describe('formatTranscript', () => {
  it('should lay out a finished run', () => {
    const text = formatTranscript('ls', { stdout: 'a\n', stderr: '', exitCode: 0, timedOut: false, durationMs: 1234 });
    expect(text).toBe('$ ls\n--- STDOUT ---\na\n\n\n--- STDERR ---\n\n\n--- EXIT CODE: 0 ---\n--- DURATION: 1.23s ---');
  });
});
