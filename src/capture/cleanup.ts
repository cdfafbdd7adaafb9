import type { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/guards.js';

interface CleanupEntry {
  label: string;
  release: () => Promise<void> | void;
}

/**
 * Releases for every external resource acquired so far, newest last.
 * `run()` walks them in reverse and keeps going past failures.
 */
export class CleanupStack {
  private entries: CleanupEntry[] = [];

  constructor(private log: Logger) {}

  push(label: string, release: () => Promise<void> | void): void {
    this.entries.push({ label, release });
  }

  get size(): number {
    return this.entries.length;
  }

  /** Returns the labels whose release threw. */
  async run(): Promise<string[]> {
    const failed: string[] = [];
    const entries = this.entries.reverse();
    this.entries = [];
    for (const entry of entries) {
      try {
        await entry.release();
        this.log.debug(`Released ${entry.label}`);
      } catch (err) {
        failed.push(entry.label);
        this.log.warn(`Failed to release ${entry.label}: ${errorMessage(err)}`);
      }
    }
    return failed;
  }
}
