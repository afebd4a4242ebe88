import type { Dispatcher } from 'undici';
import type { Logger } from 'pino';
import { z } from 'zod';
import { fetchHttp, type HttpResult } from '../workers/http-client.js';
import { withRetry, type RetryPolicy } from '../utils/retry.js';
import { resolved, unavailable, type Resolution } from '../types/resolution.js';
import { commitsApiUrl, contentsApiUrl, type HostedLocation } from './hosted-location.js';

export interface SourceClientOptions {
  retry: RetryPolicy;
  /** Hosting API origin, e.g. https://api.github.com */
  apiBase: string;
  /** Bearer credential for API calls; optional */
  token?: string;
  log: Logger;
  /** undici dispatcher override, used by tests to stub the network */
  dispatcher?: Dispatcher;
}

const directoryEntrySchema = z
  .object({
    name: z.string(),
    path: z.string(),
    type: z.string(),
    download_url: z.string().nullable().optional(),
  })
  .passthrough();

const directoryListingSchema = z.array(directoryEntrySchema);

const commitListSchema = z.array(
  z
    .object({
      commit: z.object({
        committer: z.object({ date: z.string() }).nullable(),
      }),
    })
    .passthrough(),
);

export type DirectoryEntry = z.infer<typeof directoryEntrySchema>;

function apiHeaders(options: SourceClientOptions): Record<string, string> {
  const headers: Record<string, string> = { Accept: 'application/vnd.github+json' };
  if (options.token) headers['Authorization'] = `Bearer ${options.token}`;
  return headers;
}

function isOk(result: HttpResult): boolean {
  return result.status === 200;
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body) as unknown;
  } catch {
    return undefined;
  }
}

interface DecodedResponse<T> {
  status: number;
  /** undefined when the status or the body was rejected */
  payload: T | undefined;
}

/**
 * GETs `url` until a 200 arrives whose body `decode` accepts. A payload the
 * decoder rejects uses up an attempt just like a failed status.
 */
async function getWithRetry<T>(
  url: string,
  options: SourceClientOptions,
  label: string,
  decode: (body: string) => T | undefined,
  headers?: Record<string, string>,
): Promise<Resolution<T>> {
  const log = options.log.child({ url });
  const outcome = await withRetry(
    async (): Promise<DecodedResponse<T>> => {
      const response = await fetchHttp(url, {
        headers,
        timeoutMs: options.retry.timeoutMs,
        dispatcher: options.dispatcher,
      });
      return { status: response.status, payload: isOk(response) ? decode(response.body) : undefined };
    },
    (r) => r.payload !== undefined,
    options.retry,
    log,
    label,
  );
  if (outcome.status === 'unavailable') return outcome;

  const { payload } = outcome.value;
  return payload === undefined ? unavailable(`${label}: no payload`) : resolved(payload);
}

export async function listDirectory(
  location: HostedLocation,
  options: SourceClientOptions,
): Promise<Resolution<DirectoryEntry[]>> {
  const url = contentsApiUrl(options.apiBase, location);
  return getWithRetry(
    url,
    options,
    'Directory listing',
    (body) => {
      const listing = directoryListingSchema.safeParse(parseJson(body));
      if (listing.success) return listing.data;
      options.log.warn({ url }, 'Directory listing response is not a list of entries');
      return undefined;
    },
    apiHeaders(options),
  );
}

/** Raw download; the API credential is not sent outside the hosting API. */
export async function fetchFileContent(
  url: string,
  options: SourceClientOptions,
): Promise<Resolution<string>> {
  return getWithRetry(url, options, 'File download', (body) => body);
}

/** Committer date of the most recent commit touching `filePath`. */
export async function fetchLatestCommitDate(
  location: HostedLocation,
  filePath: string,
  options: SourceClientOptions,
): Promise<Resolution<string>> {
  const url = commitsApiUrl(options.apiBase, location, filePath);
  return getWithRetry(
    url,
    options,
    'Commit history',
    (body) => {
      const commits = commitListSchema.safeParse(parseJson(body));
      if (!commits.success) {
        options.log.warn({ url }, 'Commit history response is not a list of commits');
        return undefined;
      }
      const date = commits.data[0]?.commit.committer?.date;
      if (!date) options.log.warn({ url, filePath }, 'No commits found');
      return date;
    },
    apiHeaders(options),
  );
}
