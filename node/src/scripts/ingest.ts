/**
 * Indexes JSON source documents into the snapshot at INDEX_PATH.
 *
 *   npm run ingest -- data/sources
 *
 * Every *.json file holds one source document or an array of them. Sources already
 * in the snapshot are replaced; the others are kept.
 */
import 'dotenv/config';

import { existsSync } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { loadConfig } from '@/config/app.config';
import { InMemoryDocumentStore } from '@/rag/document-store';
import { DocumentIndexer, sourceDocumentSchema } from '@/rag/indexer';
import type { SourceDocument } from '@/rag/types';
import { logger } from '@/services/logger';
import { createEmbedding } from '@/services/pipeline-deps';
import { errorMessage } from '@/stability/errors';

const sourceFileSchema = z.union([sourceDocumentSchema, z.array(sourceDocumentSchema)]);

async function readSources(dir: string): Promise<SourceDocument[]> {
  const files = (await readdir(dir)).filter((name) => name.endsWith('.json')).sort();
  const sources: SourceDocument[] = [];
  for (const name of files) {
    const parsed = sourceFileSchema.safeParse(JSON.parse(await readFile(path.join(dir, name), 'utf8')));
    if (!parsed.success) {
      logger.warn('ingest:file_skipped', { file: name, issues: parsed.error.issues.length });
      continue;
    }
    sources.push(...(Array.isArray(parsed.data) ? parsed.data : [parsed.data]));
  }
  return sources;
}

async function main(): Promise<void> {
  const dir = process.argv[2] ?? 'data/sources';
  const config = loadConfig();
  const store = new InMemoryDocumentStore();

  if (existsSync(config.indexPath)) {
    await store.load(config.indexPath);
  }

  const indexer = new DocumentIndexer(store, createEmbedding(config), {
    chunkSize: config.rag.chunkSize,
    chunkOverlap: config.rag.chunkOverlap,
  });

  const sources = await readSources(dir);
  const chunks = await indexer.ingestAll(sources);
  await store.save(config.indexPath);
  logger.info('ingest:done', { sources: sources.length, chunks, total: await store.count(), path: config.indexPath });
}

main().catch((error: unknown) => {
  logger.fatal('ingest:failed', { error: errorMessage(error) });
  process.exit(1);
});
