import { fetchLatestCommitDate, listDirectory, type SourceClientOptions } from './github-api.js';
import { joinRepoPath, normalizeSourceUrl, parseHostedLocation } from './hosted-location.js';
import type { FileInfo } from '../types/record.js';

/** Stands in for a revision date that could not be determined. */
export const SENTINEL_TIMESTAMP = '1970-01-01T12:28:29Z';

/**
 * Finds the first file in the source directory ending in `extension` and
 * returns its name with the date of the last commit that touched it.
 * An empty match and a failed listing both degrade to the sentinel.
 */
export async function resolveFileInfo(
  sourceUrl: string,
  extension: string,
  options: SourceClientOptions,
): Promise<FileInfo> {
  const location = parseHostedLocation(normalizeSourceUrl(sourceUrl));
  if (!location) {
    return { timestamp: SENTINEL_TIMESTAMP, filename: null };
  }

  const log = options.log.child({ source: sourceUrl, extension });
  const listing = await listDirectory(location, options);
  if (listing.status === 'unavailable') {
    log.warn({ reason: listing.reason }, 'Directory listing unavailable, using sentinel date');
    return { timestamp: SENTINEL_TIMESTAMP, filename: null };
  }

  const suffix = extension.toLowerCase();
  const match = listing.value.find((e) => e.name.toLowerCase().endsWith(suffix));
  if (!match) {
    log.warn('No package file found, using sentinel date');
    return { timestamp: SENTINEL_TIMESTAMP, filename: null };
  }

  const history = await fetchLatestCommitDate(location, joinRepoPath(location.path, match.name), options);
  if (history.status === 'unavailable') {
    log.warn({ file: match.name, reason: history.reason }, 'Commit history unavailable, using sentinel date');
    return { timestamp: SENTINEL_TIMESTAMP, filename: match.name };
  }

  log.debug({ file: match.name, date: history.value }, 'Latest commit date resolved');
  return { timestamp: history.value, filename: match.name };
}

export async function latestRevision(
  sourceUrl: string,
  extension: string,
  options: SourceClientOptions,
): Promise<string> {
  const info = await resolveFileInfo(sourceUrl, extension, options);
  return info.timestamp;
}
