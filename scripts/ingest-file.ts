#!/usr/bin/env node
/**
 * Ingest File Script
 *
 * Reads a UTF-8 text file, ingests it as one document and prints the ingest
 * result as JSON.
 *
 * Usage: node dist/scripts/ingest-file.js <document_id> <path> [title]
 */
import { promises as fs } from 'fs';
import { basename } from 'path';
import { describeError } from '../src/errors';
import { createKnowledgeGraphService } from '../src/service';
import { logger } from '../src/utils/logger';
import Config from '../src/config';

async function main(): Promise<void> {
  const [documentId, path, title] = process.argv.slice(2);
  if (!documentId || !path) {
    console.error('Error: document id and file path are required');
    console.error('Usage: node dist/scripts/ingest-file.js <document_id> <path> [title]');
    process.exit(1);
  }

  const content = await fs.readFile(path, 'utf8');
  const service = createKnowledgeGraphService(Config);

  try {
    const result = await service.ingest({
      documentId,
      content,
      title: title ?? basename(path),
      metadata: { source: path },
    });

    console.log(JSON.stringify(result, null, 2));
  } finally {
    await service.close();
  }
}

main().catch((error) => {
  logger.error({ error }, 'Failed to ingest file');
  console.error(`Error: ${describeError(error)}`);
  process.exit(1);
});
