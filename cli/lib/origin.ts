/**
 * Remote URL parsing
 *
 * Derives `(owner, repo)` from a git origin and review-unit coordinates from
 * a pull request URL.
 */
import { InvalidOriginError, UsageError } from './errors.js';

export interface RepoIdentity {
  owner: string;
  repo: string;
}

export interface ReviewUnitRef extends RepoIdentity {
  number: number;
}

// git@github.com:owner/repo.git
const SCP_LIKE = /^[\w.-]+@[\w.-]+:(?!\/)(.+)$/;

const URL_PROTOCOLS = new Set(['https:', 'http:', 'ssh:', 'git:']);

const UNIT_URL = /^https:\/\/github\.com\/([^/]+)\/([^/]+)\/pull\/(\d+)\/?$/;

function identityFromPath(origin: string, repoPath: string): RepoIdentity {
  const segments = repoPath.replace(/\/+$/, '').split('/').filter(Boolean);
  if (segments.length !== 2) {
    throw new InvalidOriginError(origin, 'expected exactly <owner>/<repo> in the path');
  }
  const [owner, rawRepo] = segments;
  const repo = rawRepo.replace(/\.git$/, '');
  if (!owner || !repo) {
    throw new InvalidOriginError(origin, 'owner and repo must be non-empty');
  }
  return { owner, repo };
}

/**
 * Parse an SSH (`git@host:owner/repo.git`, `ssh://git@host/owner/repo.git`)
 * or HTTPS (`https://host/owner/repo.git`) origin URL
 */
export function parseOrigin(origin: string): RepoIdentity {
  const trimmed = origin.trim();
  if (!trimmed) {
    throw new InvalidOriginError(origin, 'empty URL');
  }

  const scp = SCP_LIKE.exec(trimmed);
  if (scp) {
    return identityFromPath(origin, scp[1]);
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new InvalidOriginError(origin, 'not a forge URL');
  }
  if (!URL_PROTOCOLS.has(url.protocol) || !url.hostname) {
    throw new InvalidOriginError(origin, `unsupported protocol ${url.protocol}`);
  }
  return identityFromPath(origin, url.pathname);
}

/**
 * Parse `https://github.com/<owner>/<repo>/pull/<n>`
 */
export function parseReviewUnitUrl(url: string): ReviewUnitRef {
  const match = UNIT_URL.exec(url.trim());
  if (!match) {
    throw new UsageError('Invalid pull request URL. Expected: https://github.com/owner/repo/pull/123');
  }
  return { owner: match[1], repo: match[2], number: parseInt(match[3], 10) };
}

/**
 * Clone URL used for new checkouts
 */
export function sshCloneUrl(host: string, owner: string, repo: string): string {
  return `git@${host}:${owner}/${repo}.git`;
}
