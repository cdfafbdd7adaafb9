import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import {
  CaptureError,
  captureFailed,
  resolveCaptureOptions,
  withEvent,
  type CaptureEvent,
  type CaptureOptions,
  type CaptureOptionsInput,
  type CaptureResult,
} from './types.js';
import { CleanupStack } from './cleanup.js';
import { logger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/guards.js';
import { sleep } from '../utils/time.js';

export type AdapterName =
  | 'browser-session'
  | 'headless-browser'
  | 'window'
  | 'terminal-window'
  | 'terminal-pane'
  | 'process-output';

/** The contract every capture backend implements. */
export interface CaptureAdapter {
  readonly name: AdapterName;
  readonly history: readonly CaptureResult[];
  readonly sessionActive: boolean;

  /** Cheap string inspection only. */
  canHandle(target: string): boolean;
  capture(target: string, options?: CaptureOptionsInput): Promise<CaptureResult>;
  captureOnEvent(target: string, action: string, selector?: string, options?: CaptureOptionsInput): Promise<CaptureResult>;
  captureSequence(target: string, events: CaptureEvent[], options?: CaptureOptionsInput): Promise<CaptureResult[]>;
  startSession(target: string, options?: CaptureOptionsInput): Promise<boolean>;
  /** Releases everything the session created and returns the full history. */
  endSession(): Promise<CaptureResult[]>;
}

export interface AdapterSettings {
  defaults?: CaptureOptionsInput;
  /** Pause between an action and the capture that follows it */
  settleMs?: number;
  log?: Logger;
}

export function eventLabel(event: CaptureEvent): string {
  return event.selector ? `${event.action}:${event.selector}` : event.action;
}

export abstract class BaseCaptureAdapter implements CaptureAdapter {
  abstract readonly name: AdapterName;

  protected readonly defaults: CaptureOptions;
  protected readonly settleMs: number;
  protected readonly log: Logger;
  /** Releases for whatever the current session acquired. */
  protected readonly cleanup: CleanupStack;

  private captures: CaptureResult[] = [];
  private active = false;
  private artifactCounter = 0;

  constructor(settings: AdapterSettings = {}) {
    this.defaults = resolveCaptureOptions(settings.defaults);
    this.settleMs = settings.settleMs ?? 300;
    this.log = settings.log ?? logger.child('capture');
    this.cleanup = new CleanupStack(this.log);
  }

  abstract canHandle(target: string): boolean;

  protected abstract doCapture(target: string, options: CaptureOptions): Promise<CaptureResult>;

  /** Backends that cannot act on the target fall back to a plain capture. */
  protected async doCaptureOnEvent(target: string, event: CaptureEvent, options: CaptureOptions): Promise<CaptureResult> {
    return withEvent(await this.doCapture(target, options), eventLabel(event));
  }

  /** Acquire session resources, pushing a release for each onto `cleanup`. */
  protected async openSession(_target: string, _options: CaptureOptions): Promise<void> {}

  protected async closeSession(): Promise<void> {
    await this.cleanup.run();
  }

  get history(): readonly CaptureResult[] {
    return [...this.captures];
  }

  get sessionActive(): boolean {
    return this.active;
  }

  async capture(target: string, options?: CaptureOptionsInput): Promise<CaptureResult> {
    const result = await this.guard(() => this.doCapture(target, resolveCaptureOptions(options, this.defaults)));
    return this.record(result);
  }

  async captureOnEvent(
    target: string,
    action: string,
    selector?: string,
    options?: CaptureOptionsInput,
  ): Promise<CaptureResult> {
    return this.record(await this.runEvent(target, { action, selector }, options));
  }

  async captureSequence(target: string, events: CaptureEvent[], options?: CaptureOptionsInput): Promise<CaptureResult[]> {
    const results: CaptureResult[] = [];
    for (const event of events) {
      const result = this.record(await this.runEvent(target, event, options));
      results.push(result);
      if (!result.success && event.stopOnFail) {
        this.log.info(`${this.name}: sequence stopped at "${eventLabel(event)}": ${result.error ?? 'failed'}`);
        break;
      }
      await sleep(event.waitAfterMs ?? 0);
    }
    return results;
  }

  async startSession(target: string, options?: CaptureOptionsInput): Promise<boolean> {
    if (this.active) return true;
    try {
      await this.openSession(target, resolveCaptureOptions(options, this.defaults));
      this.active = true;
      this.log.info(`${this.name}: session started for ${target}`);
      return true;
    } catch (err) {
      this.log.warn(`${this.name}: could not start session for ${target}: ${errorMessage(err)}`);
      // Partial setup still gets torn down
      await this.cleanup.run();
      return false;
    }
  }

  async endSession(): Promise<CaptureResult[]> {
    if (this.active || this.cleanup.size > 0) {
      try {
        await this.closeSession();
      } catch (err) {
        this.log.warn(`${this.name}: error while closing session: ${errorMessage(err)}`);
      }
      if (this.cleanup.size > 0) {
        await this.cleanup.run();
      }
      if (this.active) this.log.info(`${this.name}: session ended`);
      this.active = false;
    }
    return [...this.captures];
  }

  /** Guard `fn` like the public capture methods do and add its result to history. */
  protected async recordCapture(fn: () => Promise<CaptureResult>, event?: string): Promise<CaptureResult> {
    return this.record(await this.guard(fn, event));
  }

  /**
   * Run `fn` inside the active session, or inside a throwaway one that is
   * torn down afterwards when none is active.
   */
  protected async withSession<T>(target: string, options: CaptureOptions, fn: () => Promise<T>): Promise<T> {
    if (this.active) return fn();
    try {
      await this.openSession(target, options);
      return await fn();
    } finally {
      await this.cleanup.run();
    }
  }

  /** Fresh artifact path under the capture output directory. */
  protected async artifactPath(options: CaptureOptions, prefix: string, ext: string): Promise<string> {
    await mkdir(options.outputDir, { recursive: true });
    this.artifactCounter += 1;
    return join(options.outputDir, `${prefix}_${Date.now()}_${this.artifactCounter}.${ext}`);
  }

  private async runEvent(target: string, event: CaptureEvent, options?: CaptureOptionsInput): Promise<CaptureResult> {
    const label = eventLabel(event);
    return this.guard(
      () => this.doCaptureOnEvent(target, event, resolveCaptureOptions(options, this.defaults)),
      label,
    );
  }

  private async guard(fn: () => Promise<CaptureResult>, event?: string): Promise<CaptureResult> {
    try {
      return await fn();
    } catch (err) {
      this.log.warn(`${this.name}: capture failed: ${errorMessage(err)}`);
      const kind = err instanceof CaptureError ? err.kind : 'internal';
      return captureFailed(kind, errorMessage(err), { event });
    }
  }

  private record(result: CaptureResult): CaptureResult {
    this.captures.push(result);
    return result;
  }
}
