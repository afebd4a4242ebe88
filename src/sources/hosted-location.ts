/** A directory inside a hosted repository, addressed through the hosting API. */
export interface HostedLocation {
  owner: string;
  repo: string;
  /** null when the URL names no branch; the API then uses the default branch */
  branch: string | null;
  /** Directory path inside the repository, '' for the root */
  path: string;
}

const RAW_HOST = 'raw.githubusercontent.com';
const WEB_HOSTS = new Set(['github.com', 'www.github.com']);

export function normalizeSourceUrl(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

/**
 * Recognises raw-content URLs (`raw.githubusercontent.com/<owner>/<repo>/[refs/heads/]<branch>/<path>`)
 * and repository web URLs (`github.com/<owner>/<repo>[/tree|blob/<branch>/<path>]`).
 * Anything else is served by the flat convention and yields null.
 */
export function parseHostedLocation(sourceUrl: string): HostedLocation | null {
  let parsed: URL;
  try {
    parsed = new URL(normalizeSourceUrl(sourceUrl.trim()));
  } catch {
    return null;
  }

  const parts = parsed.pathname
    .split('/')
    .filter(Boolean)
    .map((p) => safeDecode(p));

  if (parsed.hostname === RAW_HOST) {
    const [owner, repo, ...tail] = parts;
    if (!owner || !repo) return null;
    const ref = splitRef(tail);
    if (!ref) return null;
    return { owner, repo, branch: ref.branch, path: ref.rest.join('/') };
  }

  if (WEB_HOSTS.has(parsed.hostname)) {
    const [owner, repo, kind, branch, ...rest] = parts;
    if (!owner || !repo) return null;
    if (kind === undefined) return { owner, repo: stripGitSuffix(repo), branch: null, path: '' };
    if (!branch) return null;
    if (kind === 'tree') return { owner, repo, branch, path: rest.join('/') };
    // A blob names a file; list the directory holding it
    if (kind === 'blob') return { owner, repo, branch, path: rest.slice(0, -1).join('/') };
    return null;
  }

  return null;
}

export function joinRepoPath(dir: string, name: string): string {
  return dir ? `${dir}/${name}` : name;
}

export function contentsApiUrl(apiBase: string, location: HostedLocation): string {
  const base = `${apiBase}/repos/${encodeURIComponent(location.owner)}/${encodeURIComponent(location.repo)}/contents`;
  const url = location.path ? `${base}/${encodePath(location.path)}` : base;
  return location.branch ? `${url}?ref=${encodeURIComponent(location.branch)}` : url;
}

export function commitsApiUrl(apiBase: string, location: HostedLocation, filePath: string): string {
  const params = new URLSearchParams();
  if (location.branch) params.set('sha', location.branch);
  params.set('path', filePath);
  params.set('per_page', '1');
  return `${apiBase}/repos/${encodeURIComponent(location.owner)}/${encodeURIComponent(location.repo)}/commits?${params.toString()}`;
}

export function rawFileUrl(location: HostedLocation, filePath: string): string {
  const ref = location.branch ?? 'HEAD';
  return `https://${RAW_HOST}/${encodeURIComponent(location.owner)}/${encodeURIComponent(location.repo)}/${encodeURIComponent(ref)}/${encodePath(filePath)}`;
}

/** Raw URLs name the branch either bare or as `refs/heads/<branch>`. */
function splitRef(segments: string[]): { branch: string; rest: string[] } | null {
  const [first, second, third, ...rest] = segments;
  if (first === 'refs' && (second === 'heads' || second === 'tags') && third) {
    return { branch: third, rest };
  }
  if (!first) return null;
  return { branch: first, rest: segments.slice(1) };
}

function encodePath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}

function stripGitSuffix(repo: string): string {
  return repo.endsWith('.git') ? repo.slice(0, -4) : repo;
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
