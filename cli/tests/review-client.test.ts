import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'events';
import {
  isCurrentComment,
  PER_PAGE,
  requestSignal,
  resolveToken,
  ReviewClient,
  toFormattedComment,
  type FetchLike
} from '../lib/review-client.js';
import { RateLimiter } from '../lib/rate-limiter.js';
import {
  DecodeError,
  ForbiddenError,
  MalformedOutputError,
  NetworkError,
  NoOpenUnitsError,
  NotFoundError,
  RateLimitedError,
  UpstreamError
} from '../lib/errors.js';
import type { ReviewComment, ReviewUnit } from '../lib/types/review.js';
import { jsonResponse } from './helpers.js';

const API = 'https://api.test';

function unitJson(number: number, overrides: { sha?: string; pushedAt?: string | null } = {}) {
  return {
    title: `Change ${number}`,
    number,
    created_at: '2024-05-01T10:00:00Z',
    html_url: `https://github.com/acme/widgets/pull/${number}`,
    head: {
      sha: overrides.sha ?? 'abc123def456',
      ref: 'feature',
      repo: { pushed_at: overrides.pushedAt === undefined ? '2024-05-01T12:00:00Z' : overrides.pushedAt }
    }
  };
}

function commentJson(id: number, commitId: string, createdAt: string, extra: Record<string, unknown> = {}) {
  return {
    id,
    body: `comment ${id}`,
    created_at: createdAt,
    path: 'src/app.ts',
    line: 10 + id,
    commit_id: commitId,
    side: 'RIGHT',
    ...extra
  };
}

interface Route {
  (url: URL, init: RequestInit): Response | Promise<Response>;
}

function makeClient(route: Route, options: { token?: string } = {}) {
  const fetch = vi.fn<FetchLike>(async (url, init) => route(new URL(url), init));
  const client = new ReviewClient({
    baseUrl: `${API}/`,
    token: options.token,
    env: {},
    rateLimiter: new RateLimiter(1000),
    fetch
  });
  return { client, fetch };
}

describe('ReviewClient requests', () => {
  it('sends the API media type and the token', async () => {
    const { client, fetch } = makeClient(() => jsonResponse(unitJson(7)), { token: 'test-secret' });
    await client.fetchUnitMetadata('acme', 'widgets', 7);

    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe(`${API}/repos/acme/widgets/pulls/7`);
    const headers = new Headers(init.headers);
    expect(headers.get('accept')).toBe('application/vnd.github.v3+json');
    expect(headers.get('authorization')).toBe('token test-secret');
    expect(client.authenticated).toBe(true);
  });

  it('goes anonymous without a token', async () => {
    const { client, fetch } = makeClient(() => jsonResponse(unitJson(7)));
    await client.fetchUnitMetadata('acme', 'widgets', 7);

    expect(new Headers(fetch.mock.calls[0][1].headers).has('authorization')).toBe(false);
    expect(client.authenticated).toBe(false);
  });

  it('decodes unit metadata', async () => {
    const { client } = makeClient(() => jsonResponse(unitJson(7)));
    expect(await client.fetchUnitMetadata('acme', 'widgets', 7)).toEqual({
      title: 'Change 7',
      number: 7,
      createdAt: new Date('2024-05-01T10:00:00Z'),
      htmlUrl: 'https://github.com/acme/widgets/pull/7',
      headSha: 'abc123def456',
      headRef: 'feature',
      headPushedAt: new Date('2024-05-01T12:00:00Z')
    });
  });

  it('accepts a unit whose head repository is gone', async () => {
    const body = { ...unitJson(7), head: { sha: 'abc123def456', ref: 'feature', repo: null } };
    const { client } = makeClient(() => jsonResponse(body));
    expect((await client.fetchUnitMetadata('acme', 'widgets', 7)).headPushedAt).toBeNull();
  });
});

describe('ReviewClient errors', () => {
  it('maps 404 to NotFoundError', async () => {
    const { client } = makeClient(() => jsonResponse({ message: 'Not Found' }, 404));
    await expect(client.fetchUnitMetadata('acme', 'widgets', 7)).rejects.toThrow(
      new NotFoundError('GET', `${API}/repos/acme/widgets/pulls/7`).message
    );
  });

  it('maps 403 with a reset header to RateLimitedError', async () => {
    const { client } = makeClient(() => jsonResponse({}, 403, { 'X-RateLimit-Reset': '1700000000' }));
    const error = await client.fetchUnitMetadata('acme', 'widgets', 7).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitedError);
    if (!(error instanceof RateLimitedError)) return;
    expect(error.resetAt?.getTime()).toBe(1_700_000_000_000);
    expect(error.message).toContain('GITHUB_TOKEN');
  });

  it('keeps RateLimitedError when the reset header is not a timestamp', async () => {
    const { client } = makeClient(() => jsonResponse({}, 403, { 'X-RateLimit-Reset': 'soon' }));
    const error = await client.fetchUnitMetadata('acme', 'widgets', 7).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitedError);
    if (!(error instanceof RateLimitedError)) return;
    expect(error.resetAt).toBeNull();
    expect(error.message).toBe('Forge API rate limit exceeded. Reset at: unknown. Consider setting GITHUB_TOKEN');
  });

  it('maps 403 without a reset header to ForbiddenError', async () => {
    const { client } = makeClient(() => jsonResponse({}, 403));
    await expect(client.fetchUnitMetadata('acme', 'widgets', 7)).rejects.toThrow(ForbiddenError);
  });

  it('keeps status and body of other failures', async () => {
    const { client } = makeClient(() => new Response('upstream exploded', { status: 502 }));
    const error = await client.fetchUnitMetadata('acme', 'widgets', 7).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    if (!(error instanceof UpstreamError)) return;
    expect(error.status).toBe(502);
    expect(error.body).toBe('upstream exploded');
  });

  it('maps an undecodable 200 to DecodeError', async () => {
    const notJson = makeClient(() => new Response('<html>', { status: 200 }));
    await expect(notJson.client.fetchUnitMetadata('acme', 'widgets', 7)).rejects.toThrow(DecodeError);

    const wrongShape = makeClient(() => jsonResponse({ number: 'seven' }));
    const error = await wrongShape.client.fetchUnitMetadata('acme', 'widgets', 7).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toBeInstanceOf(MalformedOutputError);
  });

  it('maps transport failures to NetworkError', async () => {
    const { client } = makeClient(() => {
      throw new TypeError('fetch failed');
    });
    await expect(client.fetchUnitMetadata('acme', 'widgets', 7)).rejects.toThrow(
      `Network error requesting ${API}/repos/acme/widgets/pulls/7: fetch failed. Please check your internet connection`
    );
  });

  it('passes an aborted caller signal through as a NetworkError', async () => {
    const { client, fetch } = makeClient((_url, init) => {
      if (init.signal?.aborted) throw new Error('This operation was aborted');
      return jsonResponse(unitJson(7));
    });
    const controller = new AbortController();
    controller.abort();

    await expect(client.fetchUnitMetadata('acme', 'widgets', 7, controller.signal)).rejects.toThrow(NetworkError);
    expect(fetch.mock.calls[0][1].signal?.aborted).toBe(true);
  });
});

describe('request signals', () => {
  it('detaches from the caller signal after each request', async () => {
    const { client, fetch } = makeClient(() => jsonResponse([]));
    const controller = new AbortController();

    for (let i = 0; i < 15; i++) {
      await client.listUnits('acme', 'widgets', new URLSearchParams({ state: 'open' }), controller.signal);
    }

    expect(fetch).toHaveBeenCalledTimes(15);
    expect(EventEmitter.getEventListeners(controller.signal, 'abort')).toHaveLength(0);
  });

  it('aborts the request when the caller aborts', () => {
    const controller = new AbortController();
    const { signal, release } = requestSignal(60_000, controller.signal);

    controller.abort(new Error('tick over'));
    expect(signal.aborted).toBe(true);
    expect(signal.reason).toEqual(new Error('tick over'));
    release();
  });

  it('aborts the request on timeout', async () => {
    const controller = new AbortController();
    const { signal, release } = requestSignal(5, controller.signal);

    await new Promise(resolve => setTimeout(resolve, 30));
    expect(signal.aborted).toBe(true);
    expect(controller.signal.aborted).toBe(false);
    release();
  });
});

describe('listAllOpenUnitsForBranch', () => {
  it('walks every page until a short one', async () => {
    const sizes = [PER_PAGE, PER_PAGE, 37];
    const { client, fetch } = makeClient(url => {
      const page = Number(url.searchParams.get('page'));
      const size = sizes[page - 1] ?? 0;
      return jsonResponse(Array.from({ length: size }, (_, i) => unitJson(page * 1000 + i)));
    });

    const units = await client.listAllOpenUnitsForBranch('acme', 'widgets', 'feature');
    expect(units).toHaveLength(237);
    expect(fetch).toHaveBeenCalledTimes(3);

    const first = new URL(fetch.mock.calls[0][0]);
    expect(first.pathname).toBe('/repos/acme/widgets/pulls');
    expect(Object.fromEntries(first.searchParams)).toEqual({
      state: 'open',
      head: 'acme:feature',
      sort: 'created',
      direction: 'desc',
      per_page: '100',
      page: '1'
    });
  });

  it('stops on an empty page after a full one', async () => {
    const { client, fetch } = makeClient(url => {
      const page = Number(url.searchParams.get('page'));
      const size = page === 1 ? PER_PAGE : 0;
      return jsonResponse(Array.from({ length: size }, (_, i) => unitJson(i + 1)));
    });

    expect(await client.listAllOpenUnitsForBranch('acme', 'widgets', 'feature')).toHaveLength(100);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('returns nothing for a branch without units', async () => {
    const { client } = makeClient(() => jsonResponse([]));
    expect(await client.listAllOpenUnitsForBranch('acme', 'widgets', 'feature')).toEqual([]);
  });
});

describe('fetchLatestOpenUnit', () => {
  it('asks for a single newest open unit', async () => {
    const { client, fetch } = makeClient(() => jsonResponse([unitJson(9)]));
    expect((await client.fetchLatestOpenUnit('acme', 'widgets')).number).toBe(9);

    const url = new URL(fetch.mock.calls[0][0]);
    expect(url.searchParams.get('per_page')).toBe('1');
    expect(url.searchParams.get('state')).toBe('open');
  });

  it('fails when nothing is open', async () => {
    const { client } = makeClient(() => jsonResponse([]));
    await expect(client.fetchLatestOpenUnit('acme', 'widgets')).rejects.toThrow(
      new NoOpenUnitsError('acme', 'widgets').message
    );
  });
});

describe('fetchComments', () => {
  const comments = [
    commentJson(1, 'abc123def456', '2024-05-01T13:00:00Z'),
    commentJson(2, 'abc123def456', '2024-05-01T11:00:00Z'),
    commentJson(3, 'oldsha000000', '2024-05-01T14:00:00Z'),
    commentJson(4, 'abc123def456', '2024-05-01T14:00:00Z', { side: 'left', line: null, path: 'README.md' })
  ];

  function reviewRoute(unit: ReturnType<typeof unitJson>): Route {
    return url => (url.pathname.endsWith('/comments') ? jsonResponse(comments) : jsonResponse(unit));
  }

  it('keeps only comments on the current head written after the last push', async () => {
    const { client } = makeClient(reviewRoute(unitJson(7)));

    expect(await client.fetchComments('acme', 'widgets', 7)).toEqual({
      commitSha: 'abc123def456',
      comments: [
        { type: 'suggestion', index: 1, content: 'comment 1', file: 'src/app.ts', line: 11, isOldSide: false },
        { type: 'suggestion', index: 4, content: 'comment 4', file: 'README.md', line: 0, isOldSide: true }
      ]
    });
  });

  it('filters by commit only when the push time is unknown', async () => {
    const { client } = makeClient(reviewRoute(unitJson(7, { pushedAt: null })));
    const review = await client.fetchComments('acme', 'widgets', 7);
    expect(review.comments.map(c => c.index)).toEqual([1, 2, 4]);
  });

  it('resolves the latest open unit for number 0', async () => {
    const { client, fetch } = makeClient(url => {
      if (url.pathname === '/repos/acme/widgets/pulls') return jsonResponse([unitJson(21)]);
      return reviewRoute(unitJson(21))(url, {});
    });

    const review = await client.review('acme', 'widgets', 0);
    expect(review.commitSha).toBe('abc123def456');
    expect(fetch.mock.calls.map(call => new URL(call[0]).pathname)).toEqual([
      '/repos/acme/widgets/pulls',
      '/repos/acme/widgets/pulls/21',
      '/repos/acme/widgets/pulls/21/comments'
    ]);
  });
});

describe('helpers', () => {
  const unit: ReviewUnit = {
    title: 't',
    number: 1,
    createdAt: new Date('2024-05-01T10:00:00Z'),
    htmlUrl: '',
    headSha: 'abc',
    headRef: 'feature',
    headPushedAt: new Date('2024-05-01T12:00:00Z')
  };
  const comment: ReviewComment = {
    id: 5,
    body: 'b',
    createdAt: new Date('2024-05-01T12:00:00Z'),
    path: 'a.ts',
    line: 3,
    commitId: 'abc',
    side: 'LEFT'
  };

  it('requires a comment strictly after the push', () => {
    expect(isCurrentComment(unit, comment)).toBe(false);
    expect(isCurrentComment(unit, { ...comment, createdAt: new Date('2024-05-01T12:00:01Z') })).toBe(true);
  });

  it('marks LEFT comments as old side', () => {
    expect(toFormattedComment(comment).isOldSide).toBe(true);
    expect(toFormattedComment({ ...comment, side: 'RIGHT' }).isOldSide).toBe(false);
  });

  it('prefers an explicit token over the environment', () => {
    expect(resolveToken('test-secret', { GITHUB_TOKEN: 'from-env' })).toBe('test-secret');
    expect(resolveToken(undefined, { GITHUB_TOKEN: 'from-env' })).toBe('from-env');
    expect(resolveToken(undefined, { FORGE_TOKEN: 'other' }, 'FORGE_TOKEN')).toBe('other');
    expect(resolveToken(undefined, {})).toBe('');
  });
});
