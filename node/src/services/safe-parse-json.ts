/**
 * Shared JSON parse that strips markdown fences and normalizes quotes.
 * Used for every structured LLM answer (intent, tool plan).
 */
import type { z } from 'zod';
import { logger } from '@/services/logger';

function stripFences(raw: string): string {
  let txt = raw.trim();

  if (txt.startsWith('```')) {
    const firstNewline = txt.indexOf('\n');
    const lastFence = txt.lastIndexOf('```');
    if (firstNewline !== -1 && lastFence !== -1 && lastFence > firstNewline) {
      txt = txt.slice(firstNewline + 1, lastFence).trim();
    } else {
      txt = txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
    }
  }

  // Models sometimes wrap the object in prose.
  const open = txt.indexOf('{');
  const close = txt.lastIndexOf('}');
  if (open > 0 && close > open) {
    txt = txt.slice(open, close + 1);
  }
  return txt;
}

function tryParse(txt: string): unknown {
  try {
    return JSON.parse(txt);
  } catch {
    return undefined;
  }
}

/** Returns the parsed object, or undefined when the text holds no JSON object. */
export function safeParseJson(raw: string, context: string): Record<string, unknown> | undefined {
  const txt = stripFences(raw);
  const parsed = tryParse(txt) ?? tryParse(txt.replace(/'/g, '"'));

  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    return { ...parsed };
  }

  logger.warn('safeParseJson:parse_error', {
    context,
    error: parsed === undefined ? 'Invalid JSON after stripping fences' : 'Not a JSON object',
    raw: txt.slice(0, 300),
  });
  return undefined;
}

/** safeParseJson followed by schema validation; null when either step fails. */
export function parseJsonAs<S extends z.ZodTypeAny>(raw: string, schema: S, context: string): z.infer<S> | null {
  const parsed = safeParseJson(raw, context);
  if (parsed === undefined) return null;

  const result = schema.safeParse(parsed);
  if (!result.success) {
    logger.warn('safeParseJson:schema_mismatch', {
      context,
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
    return null;
  }
  return result.data;
}
