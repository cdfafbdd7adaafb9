export async function sleep(ms: number): Promise<void> {
  if (ms <= 0) return;
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function nowIso(): string {
  return new Date().toISOString();
}

/** Whole seconds since the epoch, used in baseline and evidence file names. */
export function unixSeconds(date = new Date()): number {
  return Math.floor(date.getTime() / 1000);
}
