import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from 'pino';
import { serializeManifest } from '../codec/document.js';
import { OutputWriteError } from '../errors.js';
import { fetchStatsIndex } from '../stats/stats-fetcher.js';
import type { SourceClientOptions } from '../sources/github-api.js';
import type { CollectionKind, NormalizedRecord, StatsIndex } from '../types/index.js';
import { readCatalogue } from './catalogue.js';
import { processEntry } from './entry-processor.js';

export interface BatchJob {
  catalogueText: string;
  outputPath: string;
  /** Package extension whose commit date stamps each record, e.g. `.valkyrie` */
  fileExtension: string;
  kind: CollectionKind;
}

export interface BatchDeps {
  options: SourceClientOptions;
  statsUrl?: string;
  fetchStats?: typeof fetchStatsIndex;
  processEntry?: typeof processEntry;
}

export interface BatchSummary {
  outputPath: string;
  written: number;
  skipped: number;
  failed: number;
}

/**
 * Processes every catalogue entry in order and overwrites the output manifest
 * with the records that resolved. A failing entry is logged and left out;
 * only an unreadable catalogue or a failed write aborts the batch.
 */
export async function runBatch(job: BatchJob, deps: BatchDeps): Promise<BatchSummary> {
  const { options } = deps;
  const fetchStats = deps.fetchStats ?? fetchStatsIndex;
  const handleEntry = deps.processEntry ?? processEntry;
  const log = options.log.child({ kind: job.kind, output: job.outputPath });

  const stats: StatsIndex = await fetchStats(deps.statsUrl, options);
  const entries = readCatalogue(job.catalogueText);
  log.info({ entries: entries.length }, 'Catalogue loaded');

  const records: NormalizedRecord[] = [];
  let skipped = 0;
  let failed = 0;

  for (const entry of entries) {
    try {
      const record = await handleEntry(entry, stats, job.fileExtension, options);
      if (record) records.push(record);
      else skipped++;
    } catch (err) {
      failed++;
      log.error({ entry: entry.name, err }, 'Entry processing failed, skipping');
    }
  }

  await writeManifest(job.outputPath, serializeManifest(records, records.length, job.kind), log);

  log.info({ written: records.length, skipped, failed }, 'Manifest written');
  return { outputPath: job.outputPath, written: records.length, skipped, failed };
}

/** Writes through a temporary sibling so a failed run never leaves a partial manifest. */
async function writeManifest(outputPath: string, text: string, log: Logger): Promise<void> {
  const tmpPath = `${outputPath}.tmp`;
  try {
    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(tmpPath, text, 'utf-8');
    await rename(tmpPath, outputPath);
  } catch (err) {
    await rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
      log.warn({ tmpPath, err: cleanupErr }, 'Could not remove temporary manifest');
    });
    throw new OutputWriteError(outputPath, err);
  }
}
