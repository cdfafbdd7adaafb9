import { describe, it, expect, vi, beforeEach } from 'vitest';

const { execMock } = vi.hoisted(() => ({ execMock: vi.fn() }));

vi.mock('../../src/utils/process.js', () => ({ exec: execMock }));

import { CliJudge, buildJudgeArgs, replyText } from '../../src/judge/client.js';

describe('buildJudgeArgs', () => {
  it('should build per-tool flags', () => {
    expect(buildJudgeArgs('claude', 'look')).toEqual(['-p', 'look', '--output-format', 'text', '--allowedTools', 'Read']);
    expect(buildJudgeArgs('claude', 'look', 'm1')).toEqual([
      '-p', 'look', '--output-format', 'text', '--allowedTools', 'Read', '--model', 'm1',
    ]);
    expect(buildJudgeArgs('codex', 'look', 'm1')).toEqual(['exec', '--model', 'm1', 'look']);
    expect(buildJudgeArgs('gemini', 'look')).toEqual(['-p', 'look']);
  });
});

describe('CliJudge', () => {
  beforeEach(() => {
    execMock.mockReset();
  });

  it('should return the trimmed answer', async () => {
    execMock.mockResolvedValue({ stdout: '  answer\n', stderr: '', exitCode: 0 });
    const judge = new CliJudge('claude', { timeoutMs: 1000 });

    const reply = await judge.ask({ prompt: 'look', cwd: '/tmp' });

    expect(reply.ok).toBe(true);
    expect(reply.text).toBe('answer');
    expect(execMock).toHaveBeenCalledWith('claude', buildJudgeArgs('claude', 'look'), { timeout: 1000, cwd: '/tmp' });
  });

  it('should let the request timeout win over the default', async () => {
    execMock.mockResolvedValue({ stdout: '', stderr: '', exitCode: 0 });
    await new CliJudge('gemini', { timeoutMs: 1000 }).ask({ prompt: 'look', timeoutMs: 50 });
    expect(execMock).toHaveBeenCalledWith('gemini', ['-p', 'look'], { timeout: 50, cwd: undefined });
  });

  it('should report a timeout', async () => {
    execMock.mockResolvedValue({ stdout: 'partial', stderr: '', exitCode: 1, timedOut: true });
    const reply = await new CliJudge('claude').ask({ prompt: 'look', timeoutMs: 10 });
    expect(reply).toMatchObject({ ok: false, text: 'partial', error: 'Judge timed out after 10ms' });
  });

  it('should name a missing judge tool', async () => {
    execMock.mockResolvedValue({ stdout: '', stderr: 'spawn codex ENOENT', exitCode: 127 });
    const reply = await new CliJudge('codex').ask({ prompt: 'look' });
    expect(reply).toMatchObject({ ok: false, error: 'Judge command not found: codex' });
  });

  it('should pass stderr through for other failures', async () => {
    execMock.mockResolvedValue({ stdout: '', stderr: 'rate limited\n', exitCode: 2 });
    const reply = await new CliJudge('claude').ask({ prompt: 'look' });
    expect(reply).toMatchObject({ ok: false, error: 'rate limited' });
    expect(replyText(reply)).toBe('Error: rate limited');
  });
});

describe('replyText', () => {
  it('should keep partial output after the error', () => {
    expect(replyText({ ok: false, text: 'half', error: 'boom', durationMs: 1 })).toBe('Error: boom\nhalf');
    expect(replyText({ ok: true, text: 'fine', durationMs: 1 })).toBe('fine');
  });
});
