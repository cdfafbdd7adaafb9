import { DEFAULT_CONFIG } from '../config/defaults.js';
import { nowIso } from '../utils/time.js';

/** What a capture produced. `markup` is a DOM/HTML snapshot. */
export type ContentKind = 'image' | 'text' | 'ansi' | 'markup';

/** Requested terminal capture flavour. */
export type CaptureType = 'screenshot' | 'ansi';

export type CaptureErrorKind =
  | 'unavailable'
  | 'not_found'
  | 'timeout'
  | 'nonzero_exit'
  | 'internal';

export type CaptureLocation =
  | { type: 'file'; path: string }
  | { type: 'inline'; text: string };

export interface CaptureEvent {
  /** click, navigate, input, wait, hover, scroll, key, output, ... */
  action: string;
  selector?: string;
  /** Extra pause after this event's capture, inside a sequence */
  waitAfterMs?: number;
  /** Stop the sequence here if this capture fails */
  stopOnFail?: boolean;
}

export interface CaptureOptions {
  outputDir: string;
  width: number;
  height: number;
  waitBeforeMs: number;
  waitAfterMs: number;
  timeoutMs: number;
  fullPage: boolean;
  events: CaptureEvent[];
  selector?: string;
}

export type CaptureOptionsInput = Partial<CaptureOptions>;

export interface CaptureResult {
  readonly success: boolean;
  readonly kind: ContentKind;
  readonly location?: CaptureLocation;
  readonly timestamp: string;
  readonly event?: string;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly error?: string;
  readonly errorKind?: CaptureErrorKind;
}

export const DEFAULT_OUTPUT_DIR = '.sightcheck/captures';

export const DEFAULT_CAPTURE_OPTIONS: CaptureOptions = {
  outputDir: DEFAULT_OUTPUT_DIR,
  width: DEFAULT_CONFIG.capture.width,
  height: DEFAULT_CONFIG.capture.height,
  waitBeforeMs: DEFAULT_CONFIG.capture.waitBeforeMs,
  waitAfterMs: DEFAULT_CONFIG.capture.waitAfterMs,
  timeoutMs: DEFAULT_CONFIG.capture.timeoutMs,
  fullPage: false,
  events: [],
};

export class CaptureOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CaptureOptionsError';
  }
}

/** An expected capture failure, carried to the caller as a failed CaptureResult. */
export class CaptureError extends Error {
  constructor(readonly kind: CaptureErrorKind, message: string) {
    super(message);
    this.name = 'CaptureError';
  }
}

/** Fill in defaults and check the option invariants. Throws CaptureOptionsError. */
export function resolveCaptureOptions(
  input: CaptureOptionsInput | undefined,
  defaults: CaptureOptions = DEFAULT_CAPTURE_OPTIONS,
): CaptureOptions {
  const options: CaptureOptions = {
    ...defaults,
    ...stripUndefined(input ?? {}),
  };
  if (!(options.timeoutMs > 0)) {
    throw new CaptureOptionsError(`timeout must be greater than 0 (got ${options.timeoutMs})`);
  }
  if (!(options.width > 0) || !(options.height > 0)) {
    throw new CaptureOptionsError(`width and height must be greater than 0 (got ${options.width}x${options.height})`);
  }
  if (options.waitBeforeMs < 0 || options.waitAfterMs < 0) {
    throw new CaptureOptionsError('wait durations cannot be negative');
  }
  return options;
}

function stripUndefined(input: CaptureOptionsInput): CaptureOptionsInput {
  const out: CaptureOptionsInput = {};
  if (input.outputDir !== undefined) out.outputDir = input.outputDir;
  if (input.width !== undefined) out.width = input.width;
  if (input.height !== undefined) out.height = input.height;
  if (input.waitBeforeMs !== undefined) out.waitBeforeMs = input.waitBeforeMs;
  if (input.waitAfterMs !== undefined) out.waitAfterMs = input.waitAfterMs;
  if (input.timeoutMs !== undefined) out.timeoutMs = input.timeoutMs;
  if (input.fullPage !== undefined) out.fullPage = input.fullPage;
  if (input.events !== undefined) out.events = input.events;
  if (input.selector !== undefined) out.selector = input.selector;
  return out;
}

export function captureSucceeded(
  kind: ContentKind,
  location: CaptureLocation,
  extra?: { event?: string; metadata?: Record<string, unknown> },
): CaptureResult {
  return Object.freeze({
    success: true,
    kind,
    location,
    timestamp: nowIso(),
    event: extra?.event,
    metadata: Object.freeze({ ...extra?.metadata }),
  });
}

export function captureFailed(
  errorKind: CaptureErrorKind,
  error: string,
  extra?: {
    kind?: ContentKind;
    location?: CaptureLocation;
    event?: string;
    metadata?: Record<string, unknown>;
  },
): CaptureResult {
  return Object.freeze({
    success: false,
    kind: extra?.kind ?? 'image',
    location: extra?.location,
    timestamp: nowIso(),
    event: extra?.event,
    metadata: Object.freeze({ ...extra?.metadata }),
    error: error || 'capture failed',
    errorKind,
  });
}

/** Copy of `result` carrying an event label. */
export function withEvent(result: CaptureResult, event: string): CaptureResult {
  return Object.freeze({ ...result, event });
}

export function locationPath(result: CaptureResult): string | undefined {
  return result.location?.type === 'file' ? result.location.path : undefined;
}

/** JSON-friendly view used by reports and `--json` output. */
export function toRecord(result: CaptureResult): Record<string, unknown> {
  return {
    success: result.success,
    kind: result.kind,
    path: result.location?.type === 'file' ? result.location.path : null,
    text: result.location?.type === 'inline' ? result.location.text : null,
    timestamp: result.timestamp,
    event: result.event ?? null,
    metadata: result.metadata,
    error: result.error ?? null,
    error_kind: result.errorKind ?? null,
  };
}

/** Copy of `result` pointing at a file that was moved. */
export function relocate(result: CaptureResult, path: string): CaptureResult {
  return Object.freeze({ ...result, location: { type: 'file' as const, path } });
}
