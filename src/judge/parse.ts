import type { z } from 'zod';

export type ParseOutcome<T> =
  | { kind: 'parsed'; value: T; raw: string }
  | { kind: 'unparseable'; raw: string; reason: string };

const FENCED_JSON = /```json\s*\n?([\s\S]*?)```/i;
const FENCED_ANY = /```\s*\n([\s\S]*?)```/;

/** Body of the first fenced JSON block, or null when there is none. */
export function extractJsonBlock(text: string): string | null {
  const tagged = FENCED_JSON.exec(text);
  if (tagged?.[1] !== undefined) return tagged[1].trim();
  const untagged = FENCED_ANY.exec(text);
  if (untagged?.[1] !== undefined && untagged[1].trim().startsWith('{')) return untagged[1].trim();
  return null;
}

/**
 * Parse a judge reply against `schema`. Anything short of a fenced JSON
 * block that validates is `unparseable`; no partial verdict is inferred.
 */
export function parseJudgeResponse<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ParseOutcome<T> {
  const block = extractJsonBlock(raw);
  if (block === null) {
    return { kind: 'unparseable', raw, reason: 'no fenced JSON block in response' };
  }

  let data: unknown;
  try {
    data = JSON.parse(block);
  } catch (err) {
    return {
      kind: 'unparseable',
      raw,
      reason: `invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return { kind: 'unparseable', raw, reason: `unexpected shape${where}: ${issue?.message ?? 'invalid'}` };
  }
  return { kind: 'parsed', value: result.data, raw };
}
