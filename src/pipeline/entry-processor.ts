import { findSection, parseDocument, type DocumentSection } from '../codec/document.js';
import { MalformedDocumentError } from '../errors.js';
import { resolveSource } from '../sources/resolver.js';
import { resolveFileInfo } from '../sources/freshness.js';
import type { SourceClientOptions } from '../sources/github-api.js';
import type { CatalogueEntry, NormalizedRecord, ScenarioMetrics, StatsIndex } from '../types/index.js';

const ROOT_SECTION = 'Quest';

/** Statistics field -> published manifest key */
const METRIC_KEYS: ReadonlyArray<[keyof ScenarioMetrics, string]> = [
  ['scenario_avg_rating', 'rating'],
  ['scenario_play_count', 'play_count'],
  ['scenario_avg_duration', 'duration'],
  ['scenario_avg_win_ratio', 'win_ratio'],
];

/**
 * Turns one catalogue entry into a manifest record, or null when the entry
 * has to be skipped (no source URL, metadata unreachable or unreadable).
 */
export async function processEntry(
  entry: CatalogueEntry,
  stats: StatsIndex | null,
  fileExtension: string,
  options: SourceClientOptions,
): Promise<NormalizedRecord | null> {
  const log = options.log.child({ entry: entry.name });

  if (!entry.sourceUrl) {
    log.warn("Section is missing 'external' entry, skipping");
    return null;
  }
  const sourceUrl = entry.sourceUrl;

  const content = await resolveSource(sourceUrl, entry.name, options);
  if (content.status === 'unavailable' || !content.value) {
    log.warn({ url: sourceUrl }, 'Could not fetch metadata file, skipping');
    return null;
  }

  let sections: DocumentSection[];
  try {
    sections = parseDocument(content.value);
  } catch (err) {
    if (err instanceof MalformedDocumentError) {
      log.warn({ section: err.section, line: err.line, err: err.message }, 'Malformed metadata file, skipping');
    } else {
      log.warn({ err }, 'Could not parse metadata file, skipping');
    }
    return null;
  }

  // Documents with a different root section name publish their first section.
  const section = findSection(sections, ROOT_SECTION) ?? sections[0];
  if (!section) {
    log.warn('Metadata file has no sections, skipping');
    return null;
  }

  const data = new Map(section.fields);
  data.set('url', sourceUrl);

  const info = await resolveFileInfo(sourceUrl, fileExtension, options);
  data.set('latest_update', info.timestamp);

  const metrics = info.filename ? stats?.get(info.filename) : undefined;
  if (metrics) {
    for (const [field, key] of METRIC_KEYS) {
      const value = metrics[field];
      if (value !== undefined) data.set(key, String(value));
    }
  }

  log.info({ url: sourceUrl, latestUpdate: info.timestamp, metrics: Boolean(metrics) }, 'Parsed entry');
  return { name: entry.name, data };
}
