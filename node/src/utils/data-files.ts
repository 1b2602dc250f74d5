import { readFileSync } from 'node:fs';
import type { z } from 'zod';

/** Reads and validates a JSON file from node/src/data. */
export function readJsonData<S extends z.ZodTypeAny>(fileName: string, schema: S): z.infer<S> {
  const url = new URL(`../data/${fileName}`, import.meta.url);
  return schema.parse(JSON.parse(readFileSync(url, 'utf8')));
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
