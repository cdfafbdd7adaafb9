import { customAlphabet, nanoid } from 'nanoid';

// tmux and X11 names must stay shell- and target-safe
const safeId = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 8);

/** Id for a stored capture record. */
export function generateId(size = 12): string {
  return nanoid(size);
}

/** Lowercase alphanumeric name for an external resource, e.g. `sightcheck-3f9k2a1b`. */
export function resourceName(prefix: string): string {
  return `${prefix}-${safeId()}`;
}
