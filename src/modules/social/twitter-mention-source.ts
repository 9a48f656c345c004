// ===========================================
// TWITTER/X MENTION SOURCE
// Recent-search paging over the X API v2, exposed as a
// lazy stream of mention records
// ===========================================

import axios, { AxiosError, type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { getTwitterBearerToken, type TwitterCredentials } from './twitter-auth.js';
import type { MentionQuery, MentionRecord, MentionSource } from '../../types/index.js';

// ============ CONSTANTS ============

const TWITTER_API_BASE = 'https://api.twitter.com/2';
const PAGE_MAX_RESULTS = 100;   // API ceiling per request
const PAGE_MIN_RESULTS = 10;    // API floor per request
const REQUEST_TIMEOUT_MS = 10 * 1000;

// ============ ERRORS ============

export class MentionSourceError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'MentionSourceError';
  }
}

export class MentionRateLimitError extends MentionSourceError {
  constructor(readonly resetAt: Date | null) {
    super('Mention search rate limited', 429);
    this.name = 'MentionRateLimitError';
  }
}

export class MentionSourceTimeoutError extends MentionSourceError {
  constructor() {
    super('Mention search timed out');
    this.name = 'MentionSourceTimeoutError';
  }
}

// ============ RESPONSE SHAPES ============

const searchResponseSchema = z.object({
  data: z.array(z.object({
    id: z.string(),
    text: z.string(),
    author_id: z.string().optional(),
    created_at: z.string().optional(),
    public_metrics: z.object({
      retweet_count: z.number(),
      reply_count: z.number(),
      like_count: z.number(),
    }).partial().optional(),
  })).optional(),
  includes: z.object({
    users: z.array(z.object({
      id: z.string(),
      username: z.string(),
      verified: z.boolean().optional(),
      verified_type: z.string().optional(),
    })).optional(),
  }).optional(),
  meta: z.object({
    result_count: z.number().optional(),
    next_token: z.string().optional(),
  }).optional(),
});

type SearchResponse = z.infer<typeof searchResponseSchema>;
type TwitterUser = NonNullable<NonNullable<SearchResponse['includes']>['users']>[number];

/**
 * Legacy verification or any paid/organisation badge counts as trusted.
 */
export function isTrustedAuthor(user: Pick<TwitterUser, 'verified' | 'verified_type'> | undefined): boolean {
  if (!user) return false;
  return user.verified === true || (user.verified_type !== undefined && user.verified_type !== 'none');
}

export function buildSearchQuery(query: MentionQuery): string {
  return query.excludeReposts ? `${query.term} -is:retweet` : query.term;
}

// ============ CLIENT CLASS ============

export interface TwitterMentionSourceOptions {
  baseUrl?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

export class TwitterMentionSource implements MentionSource {
  private client: AxiosInstance;
  private bearerToken: string | null = null;

  constructor(
    private readonly credentials: TwitterCredentials,
    options: TwitterMentionSourceOptions = {}
  ) {
    this.client = axios.create({
      baseURL: options.baseUrl ?? TWITTER_API_BASE,
      timeout: options.timeoutMs ?? REQUEST_TIMEOUT_MS,
      validateStatus: () => true,
      adapter: options.adapter,
    });
  }

  /**
   * Resolve credentials into a bearer token. Returns false when no usable
   * credential exists, which callers treat as a startup failure.
   */
  async initialize(): Promise<boolean> {
    if (this.bearerToken) return true;

    this.bearerToken = await getTwitterBearerToken(this.credentials, this.client);
    if (!this.bearerToken) {
      logger.warn('Twitter mention source has no valid credentials');
      return false;
    }

    logger.info('Twitter mention source initialized');
    return true;
  }

  isReady(): boolean {
    return this.bearerToken !== null;
  }

  /**
   * Pages through recent search until `limit` records were yielded or the
   * result set is exhausted. Throws MentionRateLimitError on 429 and
   * MentionSourceTimeoutError on a request timeout; records already yielded
   * stay with the caller.
   */
  async *search(query: MentionQuery, limit: number): AsyncGenerator<MentionRecord> {
    if (!this.isReady() && !(await this.initialize())) {
      throw new MentionSourceError('Twitter mention source is not initialized');
    }

    const q = buildSearchQuery(query);
    let yielded = 0;
    let nextToken: string | undefined;

    while (yielded < limit) {
      const maxResults = Math.min(PAGE_MAX_RESULTS, Math.max(PAGE_MIN_RESULTS, limit - yielded));
      const page = await this.fetchPage(q, maxResults, nextToken);

      const users = new Map<string, TwitterUser>();
      for (const user of page.includes?.users ?? []) {
        users.set(user.id, user);
      }

      for (const tweet of page.data ?? []) {
        if (yielded >= limit) return;

        const author = tweet.author_id ? users.get(tweet.author_id) : undefined;
        const username = author?.username ?? 'unknown';

        yielded++;
        yield {
          id: tweet.id,
          author: username,
          authorVerified: isTrustedAuthor(author),
          text: tweet.text,
          timestamp: tweet.created_at ? new Date(tweet.created_at) : new Date(),
          likeCount: tweet.public_metrics?.like_count ?? 0,
          repostCount: tweet.public_metrics?.retweet_count ?? 0,
          replyCount: tweet.public_metrics?.reply_count ?? 0,
          permalink: `https://x.com/${username}/status/${tweet.id}`,
        };
      }

      nextToken = page.meta?.next_token;
      if (!nextToken || !page.data?.length) return;
    }
  }

  private async fetchPage(q: string, maxResults: number, nextToken?: string): Promise<SearchResponse> {
    const params: Record<string, string | number> = {
      query: q,
      max_results: maxResults,
      'tweet.fields': 'created_at,public_metrics,author_id',
      'user.fields': 'username,verified,verified_type',
      expansions: 'author_id',
    };
    if (nextToken) {
      params.next_token = nextToken;
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get('/tweets/search/recent', {
        params,
        headers: { Authorization: `Bearer ${this.bearerToken}` },
      });
    } catch (error) {
      if (error instanceof AxiosError && (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT)) {
        throw new MentionSourceTimeoutError();
      }
      throw new MentionSourceError(error instanceof Error ? error.message : String(error));
    }

    if (response.status === 429) {
      const reset = Number(response.headers['x-rate-limit-reset']);
      throw new MentionRateLimitError(Number.isFinite(reset) && reset > 0 ? new Date(reset * 1000) : null);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new MentionSourceError(`Mention search failed with HTTP ${response.status}`, response.status);
    }

    const parsed = searchResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new MentionSourceError('Malformed mention search response');
    }
    return parsed.data;
  }
}
