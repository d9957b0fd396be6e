import { z } from 'zod';
import type { Directive, MutationSet } from '../types/HeaderMutation';

// RFC 9110 token characters; excludes ':' so pseudo-headers cannot be targeted.
const HEADER_NAME_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const HEADER_VALUE_PATTERN = /^[^\r\n\0]*$/;

const headerName = z.string().regex(HEADER_NAME_PATTERN, 'invalid header name');
const headerValue = z.string().regex(HEADER_VALUE_PATTERN, 'invalid header value');

export const DirectiveSchema = z.object({
  addHeaders: z.record(headerName, headerValue).optional(),
  removeHeaders: z.array(headerName).optional(),
});

export type DirectiveParseResult =
  | { ok: true; directive: Directive }
  | { ok: false; reason: string };

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Parses a directive payload such as
 * `{"addHeaders":{"x-tenant":"blue"},"removeHeaders":["x-debug"]}`.
 *
 * `addHeaders` come back sorted by key since JSON object member order is not
 * something callers can rely on. `removeHeaders` keep list order, with
 * case-insensitive duplicates dropped.
 */
export function parseDirective(payload: string): DirectiveParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }

  const parsed = DirectiveSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.issues.map((issue) => issue.message).join('; ') };
  }

  const addHeaders = Object.entries(parsed.data.addHeaders ?? {}).sort(([a], [b]) => compareKeys(a, b));

  const seen = new Set<string>();
  const removeHeaders: string[] = [];
  for (const name of parsed.data.removeHeaders ?? []) {
    const lower = name.toLowerCase();
    if (!seen.has(lower)) {
      seen.add(lower);
      removeHeaders.push(name);
    }
  }

  return { ok: true, directive: { addHeaders, removeHeaders } };
}

export function directiveToMutations(directive: Directive): MutationSet {
  return [
    ...directive.addHeaders.map(([key, value]) => ({ operation: 'append' as const, header: { key, value } })),
    ...directive.removeHeaders.map((key) => ({ operation: 'remove' as const, key })),
  ];
}
