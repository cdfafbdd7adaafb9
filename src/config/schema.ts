import { z } from 'zod';
import { isLogLevel, type LogLevel } from '../utils/logger.js';

const positive = () => z.number({ invalid_type_error: 'must be a positive number' })
  .finite('must be a positive number')
  .positive('must be a positive number');

const nonNegative = () => z.number({ invalid_type_error: 'must be a non-negative number' })
  .finite('must be a non-negative number')
  .nonnegative('must be a non-negative number');

const count = () => z.number({ invalid_type_error: 'must be a positive integer' })
  .int('must be a positive integer')
  .positive('must be a positive integer');

const optionalString = () => z.string({ invalid_type_error: 'must be a string' }).optional();

const section = <T extends z.ZodRawShape>(shape: T) => z.object(shape, { invalid_type_error: 'must be an object' });

export const judgeToolSchema = z.enum(['claude', 'codex', 'gemini'], {
  errorMap: () => ({ message: 'must be one of: claude, codex, gemini' }),
});
export type JudgeTool = z.infer<typeof judgeToolSchema>;

/** How terminal programs are captured: raw ANSI text, or a rendered PNG. */
export const terminalCaptureSchema = z.enum(['ansi', 'screenshot'], {
  errorMap: () => ({ message: 'must be "ansi" or "screenshot"' }),
});
export type TerminalCaptureMode = z.infer<typeof terminalCaptureSchema>;

export const captureSettingsSchema = section({
  /** Viewport / window size in pixels */
  width: count().default(1280),
  height: count().default(720),
  /** Delay before each capture in ms */
  waitBeforeMs: nonNegative().default(500),
  waitAfterMs: nonNegative().default(0),
  /** Hard limit on every external call a capture makes, in ms */
  timeoutMs: positive().default(30_000),
  /** Pause after a browser or terminal action before capturing */
  settleMs: nonNegative().default(300),
  terminalCapture: terminalCaptureSchema.default('ansi'),
  /** Explicit Chrome/Chromium/Edge executable */
  browserPath: optionalString(),
  /** Terminal size in character cells for tmux-backed captures */
  terminalCols: count().default(120),
  terminalRows: count().default(40),
});
export type CaptureSettings = z.infer<typeof captureSettingsSchema>;

export const judgeSettingsSchema = section({
  tool: judgeToolSchema.default('claude'),
  model: optionalString(),
  /** Timeout for a single verification or fix call */
  timeoutMs: positive().default(120_000),
  batchTimeoutMs: positive().default(180_000),
  /**
   * Text captures longer than this are truncated before they go into the
   * prompt, which is passed as one command-line argument.
   */
  maxInlineChars: count().default(30_000),
});
export type JudgeSettings = z.infer<typeof judgeSettingsSchema>;

export const fixSettingsSchema = section({
  maxAttempts: count().default(3),
  minConfidence: z.number({ invalid_type_error: 'must be between 0 and 1' })
    .min(0, 'must be between 0 and 1')
    .max(1, 'must be between 0 and 1')
    .default(0.5),
  /** Wait after writing a fix so dev servers can hot-reload */
  reloadDelayMs: nonNegative().default(2000),
  maxContextFiles: count().default(5),
  maxFileChars: count().default(10_000),
});
export type FixSettings = z.infer<typeof fixSettingsSchema>;

export const configSchema = z.object({
  logLevel: z.custom<LogLevel>(isLogLevel, { message: 'must be one of: debug, info, warn, error, silent' })
    .default('info'),
  jsonOutput: z.boolean({ invalid_type_error: 'must be a boolean' }).default(false),
  /** Working directory for captures, evidence and baselines, relative to the project root */
  workDir: z.string({ invalid_type_error: 'must be a non-empty string' })
    .min(1, 'must be a non-empty string')
    .default('.sightcheck'),
  capture: captureSettingsSchema.default({}),
  judge: judgeSettingsSchema.default({}),
  fix: fixSettingsSchema.default({}),
});
export type SightcheckConfig = z.infer<typeof configSchema>;
