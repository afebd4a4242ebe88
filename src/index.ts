#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { config } from './config.js';
import { UsageError } from './errors.js';
import { batchesFor, parseGameType } from './games.js';
import { runBatch } from './pipeline/batch-aggregator.js';
import type { SourceClientOptions } from './sources/github-api.js';
import { logger } from './utils/logger.js';

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function main(): Promise<void> {
  const game = parseGameType(process.argv.slice(2));
  logger.info({ game, root: config.MANIFEST_ROOT }, 'Starting manifest sync');

  const options: SourceClientOptions = {
    retry: {
      retries: config.HTTP_RETRIES,
      delayMs: config.HTTP_RETRY_DELAY_MS,
      timeoutMs: config.HTTP_TIMEOUT_MS,
    },
    apiBase: config.GITHUB_API_URL,
    token: config.GITHUB_TOKEN || undefined,
    log: logger,
  };
  if (!options.token) logger.info('GITHUB_TOKEN not set, using unauthenticated API calls');

  for (const target of batchesFor(game, config.MANIFEST_ROOT)) {
    let catalogueText: string;
    try {
      catalogueText = await readFile(target.cataloguePath, 'utf-8');
    } catch (err) {
      if (!target.required && isNotFound(err)) {
        logger.warn({ path: target.cataloguePath }, 'Catalogue not found, skipping batch');
        continue;
      }
      throw err;
    }

    const summary = await runBatch(
      {
        catalogueText,
        outputPath: target.outputPath,
        fileExtension: target.fileExtension,
        kind: target.kind,
      },
      { options, statsUrl: config.STATS_URL },
    );
    logger.info(summary, `Finished ${target.kind} batch`);
  }

  logger.info('Manifest sync finished');
}

main().catch((err: unknown) => {
  if (err instanceof UsageError) {
    logger.error(err.message);
  } else {
    logger.fatal({ err }, 'Manifest sync failed');
  }
  process.exitCode = 1;
});
