import { fetchFileContent, listDirectory, type SourceClientOptions } from './github-api.js';
import { joinRepoPath, normalizeSourceUrl, parseHostedLocation, rawFileUrl } from './hosted-location.js';
import { unavailable, type Resolution } from '../types/resolution.js';

const METADATA_EXTENSION = '.ini';

/**
 * Locates and downloads `<entryName>.ini` for a catalogue entry.
 *
 * Hosted repositories are listed through the API and the first entry whose
 * name matches case-insensitively is downloaded. Other URLs are treated as a
 * plain directory and fetched at `<url>/<entryName>.ini`.
 */
export async function resolveSource(
  sourceUrl: string,
  entryName: string,
  options: SourceClientOptions,
): Promise<Resolution<string>> {
  const baseUrl = normalizeSourceUrl(sourceUrl);
  const log = options.log.child({ source: baseUrl, entry: entryName });
  const wanted = `${entryName}${METADATA_EXTENSION}`;
  const location = parseHostedLocation(baseUrl);

  if (!location) {
    const url = `${baseUrl}/${wanted}`;
    log.debug({ url }, 'Fetching metadata directly');
    const content = await fetchFileContent(url, options);
    if (content.status === 'unavailable') {
      log.warn({ url, reason: content.reason }, 'Direct metadata fetch failed');
    }
    return content;
  }

  const listing = await listDirectory(location, options);
  if (listing.status === 'unavailable') {
    log.warn({ reason: listing.reason }, 'Could not list source directory');
    return listing;
  }

  const target = wanted.toLowerCase();
  const match = listing.value.find((e) => e.name.toLowerCase() === target);
  if (!match) {
    log.warn({ wanted, entries: listing.value.length }, 'No matching metadata file in source directory');
    return unavailable(`No ${wanted} in ${baseUrl}`);
  }

  const url = match.download_url ?? rawFileUrl(location, joinRepoPath(location.path, match.name));
  log.debug({ url, file: match.name }, 'Fetching metadata file');
  const content = await fetchFileContent(url, options);
  if (content.status === 'unavailable') {
    log.warn({ url, reason: content.reason }, 'Metadata download failed');
  }
  return content;
}
