// JSON replies from the model: raw, fenced, or embedded in prose

import type { z } from 'zod';

export type JsonReply<T> = { ok: true; value: T } | { ok: false; error: string };

function candidates(text: string): string[] {
  const found = [text];

  const fence = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (fence && fence[1]) found.push(fence[1].trim());

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) found.push(text.slice(start, end + 1));

  return found;
}

/**
 * Find the first JSON object in `text` that satisfies `schema`. Candidates
 * are tried in order: the whole text, a code fence, then the outermost braces.
 */
export function parseJsonReply<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): JsonReply<T> {
  const trimmed = (text || '').trim();
  if (!trimmed) return { ok: false, error: 'Empty output' };

  let lastError = 'Could not locate a JSON object in output';
  for (const candidate of candidates(trimmed)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch (error) {
      lastError = error instanceof Error ? error.message : String(error);
      continue;
    }

    const checked = schema.safeParse(parsed);
    if (checked.success) return { ok: true, value: checked.data };
    lastError = checked.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
  }

  return { ok: false, error: lastError };
}
