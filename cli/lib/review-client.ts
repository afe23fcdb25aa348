/**
 * Review Client
 *
 * Read-only client for the forge's pull request REST API. Every request waits
 * on the shared RateLimiter, then is classified into the engine error taxonomy.
 *
 * PURE LIB: No config access, no manager imports.
 */
import { z } from 'zod';
import { RateLimiter } from './rate-limiter.js';
import { decodeWith } from './exec.js';
import {
  DecodeError,
  ForbiddenError,
  MalformedOutputError,
  NetworkError,
  NoOpenUnitsError,
  NotFoundError,
  RateLimitedError,
  UpstreamError
} from './errors.js';
import type { FormattedComment, FormattedReview, ReviewComment, ReviewUnit } from './types/review.js';

export const PER_PAGE = 100;

export const DEFAULT_API_URL = 'https://api.github.com';
export const DEFAULT_TOKEN_ENV = 'GITHUB_TOKEN';
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_RATE = 5;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface ReviewClientOptions {
  baseUrl?: string;
  /** Explicit token, wins over the environment */
  token?: string;
  tokenEnv?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  rateLimiter?: RateLimiter;
  fetch?: FetchLike;
}

/**
 * What the worktree model needs from a client
 */
export type ReviewSource = Pick<ReviewClient, 'listAllOpenUnitsForBranch' | 'fetchComments'>;

// ============================================================================
// Wire schemas
// ============================================================================

const isoDate = z.string().datetime({ offset: true }).transform(value => new Date(value));

const unitSchema = z.object({
  title: z.string(),
  number: z.number().int(),
  created_at: isoDate,
  html_url: z.string(),
  head: z.object({
    sha: z.string(),
    ref: z.string().nullish().transform(value => value ?? ''),
    repo: z.object({ pushed_at: isoDate.nullish() }).nullish()
  })
}).transform((raw): ReviewUnit => ({
  title: raw.title,
  number: raw.number,
  createdAt: raw.created_at,
  htmlUrl: raw.html_url,
  headSha: raw.head.sha,
  headRef: raw.head.ref,
  headPushedAt: raw.head.repo?.pushed_at ?? null
}));

const commentSchema = z.object({
  id: z.number().int(),
  body: z.string(),
  created_at: isoDate,
  path: z.string().nullish(),
  line: z.number().int().nullish(),
  commit_id: z.string(),
  side: z.string().nullish()
}).transform((raw): ReviewComment => ({
  id: raw.id,
  body: raw.body,
  createdAt: raw.created_at,
  path: raw.path ?? '',
  line: raw.line ?? 0,
  commitId: raw.commit_id,
  side: raw.side ?? ''
}));

const unitListSchema = z.array(unitSchema);
const commentListSchema = z.array(commentSchema);

// ============================================================================
// Helpers
// ============================================================================

export function resolveToken(explicit: string | undefined, env: NodeJS.ProcessEnv, tokenEnv = DEFAULT_TOKEN_ENV): string {
  if (explicit) return explicit;
  return env[tokenEnv] ?? '';
}

export function toFormattedComment(comment: ReviewComment): FormattedComment {
  return {
    type: 'suggestion',
    index: comment.id,
    content: comment.body,
    file: comment.path,
    line: comment.line,
    isOldSide: comment.side.toLowerCase() === 'left'
  };
}

/**
 * A comment counts only if it targets the current head commit and was written
 * after the head was last pushed (older ones belong to superseded history)
 */
export function isCurrentComment(unit: ReviewUnit, comment: ReviewComment): boolean {
  if (comment.commitId !== unit.headSha) return false;
  if (unit.headPushedAt && comment.createdAt.getTime() <= unit.headPushedAt.getTime()) return false;
  return true;
}

interface RequestSignal {
  signal: AbortSignal;
  /** Detach from the caller's signal once the request has settled */
  release(): void;
}

/**
 * Per-request signal: the caller's signal or the timeout, whichever fires first
 */
export function requestSignal(timeoutMs: number, signal?: AbortSignal): RequestSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  if (!signal) return { signal: timeout, release: () => undefined };
  if (signal.aborted) return { signal, release: () => undefined };

  const controller = new AbortController();
  const onAbort = () => controller.abort(signal.reason);
  const onTimeout = () => controller.abort(timeout.reason);
  signal.addEventListener('abort', onAbort, { once: true });
  timeout.addEventListener('abort', onTimeout, { once: true });

  return {
    signal: controller.signal,
    release: () => {
      signal.removeEventListener('abort', onAbort);
      timeout.removeEventListener('abort', onTimeout);
    }
  };
}

// ============================================================================
// Client
// ============================================================================

export class ReviewClient {
  readonly baseUrl: string;
  readonly rateLimiter: RateLimiter;
  private readonly token: string;
  private readonly tokenEnv: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;

  constructor(options: ReviewClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_URL).replace(/\/+$/, '');
    this.tokenEnv = options.tokenEnv ?? DEFAULT_TOKEN_ENV;
    this.token = resolveToken(options.token, options.env ?? process.env, this.tokenEnv);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter(DEFAULT_RATE);
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  }

  get authenticated(): boolean {
    return this.token !== '';
  }

  private async request<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal
  ): Promise<T> {
    await this.rateLimiter.wait();

    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = { Accept: 'application/vnd.github.v3+json' };
    if (this.token) {
      headers.Authorization = `token ${this.token}`;
    }

    let response: Response;
    let body: string;
    const abort = requestSignal(this.timeoutMs, signal);
    try {
      response = await this.fetchFn(url, { method: 'GET', headers, signal: abort.signal });
      body = await response.text();
    } catch (error) {
      throw new NetworkError(url, { cause: error });
    } finally {
      abort.release();
    }

    if (response.status === 404) {
      throw new NotFoundError('GET', url);
    }
    if (response.status === 403) {
      const reset = response.headers.get('x-ratelimit-reset');
      if (reset) {
        const seconds = Number(reset);
        throw new RateLimitedError(Number.isFinite(seconds) ? new Date(seconds * 1000) : null, this.tokenEnv);
      }
      throw new ForbiddenError(this.tokenEnv);
    }
    if (response.status !== 200) {
      throw new UpstreamError(response.status, body);
    }

    let value: unknown;
    try {
      value = JSON.parse(body);
    } catch (error) {
      throw new DecodeError(url, 'body is not JSON', { cause: error });
    }
    try {
      return decodeWith(schema, value, 'forge response');
    } catch (error) {
      if (error instanceof MalformedOutputError) {
        throw new DecodeError(url, error.message, { cause: error });
      }
      throw error;
    }
  }

  private repoPath(owner: string, repo: string): string {
    return `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
  }

  async fetchUnitMetadata(owner: string, repo: string, number: number, signal?: AbortSignal): Promise<ReviewUnit> {
    return this.request(`${this.repoPath(owner, repo)}/pulls/${number}`, unitSchema, signal);
  }

  async fetchReviewComments(owner: string, repo: string, number: number, signal?: AbortSignal): Promise<ReviewComment[]> {
    return this.request(`${this.repoPath(owner, repo)}/pulls/${number}/comments`, commentListSchema, signal);
  }

  async listUnits(owner: string, repo: string, query: URLSearchParams, signal?: AbortSignal): Promise<ReviewUnit[]> {
    return this.request(`${this.repoPath(owner, repo)}/pulls?${query.toString()}`, unitListSchema, signal);
  }

  /**
   * Every open unit whose head is `owner:branch`, newest first, across all pages
   */
  async listAllOpenUnitsForBranch(owner: string, repo: string, branch: string, signal?: AbortSignal): Promise<ReviewUnit[]> {
    const query = new URLSearchParams({
      state: 'open',
      head: `${owner}:${branch}`,
      sort: 'created',
      direction: 'desc',
      per_page: String(PER_PAGE)
    });

    const units: ReviewUnit[] = [];
    for (let page = 1; ; page++) {
      query.set('page', String(page));
      const batch = await this.listUnits(owner, repo, query, signal);
      units.push(...batch);
      if (batch.length < PER_PAGE) break;
    }
    return units;
  }

  async fetchLatestOpenUnit(owner: string, repo: string, signal?: AbortSignal): Promise<ReviewUnit> {
    const query = new URLSearchParams({ state: 'open', sort: 'created', direction: 'desc', per_page: '1' });
    const [latest] = await this.listUnits(owner, repo, query, signal);
    if (!latest) {
      throw new NoOpenUnitsError(owner, repo);
    }
    return latest;
  }

  /**
   * Current review comments of a unit, ready for the agent
   */
  async fetchComments(owner: string, repo: string, number: number, signal?: AbortSignal): Promise<FormattedReview> {
    const unit = await this.fetchUnitMetadata(owner, repo, number, signal);
    const comments = await this.fetchReviewComments(owner, repo, number, signal);

    return {
      commitSha: unit.headSha,
      comments: comments.filter(comment => isCurrentComment(unit, comment)).map(toFormattedComment)
    };
  }

  /**
   * Review of unit `number`, or of the latest open unit when number <= 0
   */
  async review(owner: string, repo: string, number: number, signal?: AbortSignal): Promise<FormattedReview> {
    let target = number;
    if (target <= 0) {
      target = (await this.fetchLatestOpenUnit(owner, repo, signal)).number;
    }
    return this.fetchComments(owner, repo, target, signal);
  }
}
