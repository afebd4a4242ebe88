import { z } from 'zod';
import { fetchHttp } from '../workers/http-client.js';
import type { SourceClientOptions } from '../sources/github-api.js';
import type { ScenarioMetrics, StatsIndex } from '../types/record.js';

const metric = z.number().optional().catch(undefined);

const statsRecordSchema = z.object({
  scenario_name: z.string(),
  scenario_avg_rating: metric,
  scenario_play_count: metric,
  scenario_avg_duration: metric,
  scenario_avg_win_ratio: metric,
});

const statsDocumentSchema = z.object({
  scenarios_stats: z.array(z.unknown()),
});

export type StatsFetchOptions = Pick<SourceClientOptions, 'log' | 'retry' | 'dispatcher'>;

/**
 * Downloads the usage statistics document once and indexes it by package
 * filename. Any failure yields an empty index; no retries are made.
 */
export async function fetchStatsIndex(
  url: string | undefined,
  options: StatsFetchOptions,
): Promise<StatsIndex> {
  const index = new Map<string, ScenarioMetrics>();
  if (!url) {
    options.log.warn('No statistics URL configured, metrics will be omitted');
    return index;
  }

  const log = options.log.child({ url });

  let payload: unknown;
  try {
    const res = await fetchHttp(url, {
      headers: { Accept: 'application/json' },
      timeoutMs: options.retry.timeoutMs,
      dispatcher: options.dispatcher,
    });
    if (res.status !== 200) {
      log.warn({ status: res.status }, 'Statistics fetch failed');
      return index;
    }
    payload = JSON.parse(res.body) as unknown;
  } catch (err) {
    log.warn({ err }, 'Statistics fetch failed');
    return index;
  }

  const doc = statsDocumentSchema.safeParse(payload);
  if (!doc.success) {
    log.warn('Statistics document has no scenarios_stats list');
    return index;
  }

  let skipped = 0;
  for (const item of doc.data.scenarios_stats) {
    const record = statsRecordSchema.safeParse(item);
    if (!record.success) {
      skipped++;
      continue;
    }
    const { scenario_name: name, ...metrics } = record.data;
    index.set(name, metrics);
  }

  log.info({ count: index.size, skipped }, 'Statistics loaded');
  return index;
}
