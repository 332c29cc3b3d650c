/**
 * Provider Gateway Module
 *
 * Talks to the Bright Data API:
 * - SERP requests for Google and Bing (synchronous, POST /request)
 * - Reddit keyword discovery and comment collection (dataset snapshots)
 *
 * Contract: operations resolve to null when the provider fails. The only
 * error they raise is ConfigurationError, before any request is made.
 *
 * Usage:
 * ```typescript
 * const gateway = new BrightDataGateway({ apiUrl: 'https://api.brightdata.com' });
 * const results = await gateway.search('best budget espresso machine', 'google', apiKey);
 * ```
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors/index.js';
import { createLogger, defaultMetrics, type Logger, type Metrics } from '../logging/index.js';
import type {
  DeepDiveResults,
  SearchEngine,
  SearchResults,
  SocialComment,
  SocialPost,
  SocialSearchResults,
} from '../types/index.js';
import { triggerAndDownload, type SnapshotPollOptions } from './snapshot.js';

export { triggerAndDownload, triggerDataset, pollSnapshotStatus, downloadSnapshot } from './snapshot.js';
export type { SnapshotPollOptions } from './snapshot.js';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * API key plus dataset identifier for snapshot-based operations
 */
export interface DatasetCredentials {
  apiKey?: string | undefined;
  datasetId?: string | undefined;
}

/**
 * Search and social-content discovery operations consumed by the pipeline
 */
export interface ProviderGateway {
  search(query: string, engine: SearchEngine, apiKey?: string): Promise<SearchResults | null>;
  socialSearch(keyword: string, credentials: DatasetCredentials): Promise<SocialSearchResults | null>;
  socialDeepDive(urls: readonly string[], credentials: DatasetCredentials): Promise<DeepDiveResults | null>;
}

/**
 * Configuration for the Bright Data gateway
 */
export interface GatewayConfig {
  /** API base URL (default: https://api.brightdata.com) */
  apiUrl?: string;
  /** SERP zone name (default: ai_agent) */
  serpZone?: string;
  /** Request timeout in milliseconds (default: 60000) */
  timeout?: number;
  /** Snapshot progress checks before giving up (default: 60) */
  snapshotMaxAttempts?: number;
  /** Delay between snapshot progress checks (default: 5000) */
  snapshotPollDelayMs?: number;
  /** Pre-built HTTP client; replaces apiUrl and timeout */
  httpClient?: AxiosInstance;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_API_URL = 'https://api.brightdata.com';
const DEFAULT_SERP_ZONE = 'ai_agent';
const DEFAULT_TIMEOUT = 60000;
const DEFAULT_SNAPSHOT_MAX_ATTEMPTS = 60;
const DEFAULT_SNAPSHOT_POLL_DELAY_MS = 5000;

const ENGINE_SEARCH_URLS: Record<SearchEngine, string> = {
  google: 'https://www.google.com/search',
  bing: 'https://www.bing.com/search',
};

/** Keyword discovery defaults */
const SOCIAL_SEARCH_DATE = 'All time';
const SOCIAL_SEARCH_SORT = 'Hot';
const SOCIAL_SEARCH_POST_COUNT = 75;

/** Comment collection defaults */
const DEEP_DIVE_DAYS_BACK = 10;

// ============================================================================
// Response Schemas
// ============================================================================

const SerpResponseSchema = z.object({
  organic: z.array(z.unknown()).optional(),
  knowledge: z.unknown().optional(),
});

const ProviderCommentSchema = z.object({
  comment_id: z.union([z.string(), z.number()]).nullish(),
  comment: z.string().nullish(),
  date_posted: z.string().nullish(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Payload Normalization
// ============================================================================

/**
 * Build the SERP target URL for an engine
 */
export function buildSerpUrl(query: string, engine: SearchEngine): string {
  const search = new URLSearchParams({ q: query });
  return `${ENGINE_SEARCH_URLS[engine]}?${search.toString()}&brd_json=1`;
}

/**
 * Keep only the organic results and knowledge panel of a SERP response
 */
export function extractSearchResults(data: unknown): SearchResults | null {
  const parsed = SerpResponseSchema.safeParse(data);
  if (!parsed.success) {
    return null;
  }
  return {
    organic: (parsed.data.organic ?? []).filter(isRecord),
    knowledge: isRecord(parsed.data.knowledge) ? parsed.data.knowledge : {},
  };
}

/**
 * Reduce discovered Reddit posts to title and URL
 */
export function parseSocialPosts(raw: unknown): SocialSearchResults {
  if (!Array.isArray(raw)) {
    return { parsed_posts: [], total_found: 0 };
  }

  const posts: SocialPost[] = [];
  for (const row of raw) {
    if (!isRecord(row)) continue;
    posts.push({
      title: typeof row.title === 'string' ? row.title : 'No title',
      url: typeof row.url === 'string' ? row.url : 'No URL',
    });
  }
  return { parsed_posts: posts, total_found: posts.length };
}

/**
 * Reduce collected Reddit comments to id, text and date.
 * Rows that are not objects or carry wrongly typed fields are dropped.
 */
export function parseSocialComments(raw: unknown): DeepDiveResults {
  if (!Array.isArray(raw)) {
    return { comments: [], total_retrieved: 0 };
  }

  const comments: SocialComment[] = [];
  for (const row of raw) {
    if (!isRecord(row)) continue;
    const parsed = ProviderCommentSchema.safeParse(row);
    if (!parsed.success) continue;
    comments.push({
      comment_id: parsed.data.comment_id != null ? String(parsed.data.comment_id) : 'No ID',
      content: parsed.data.comment ?? 'No content',
      date: parsed.data.date_posted ?? 'No date',
    });
  }
  return { comments, total_retrieved: comments.length };
}

// ============================================================================
// Bright Data Gateway
// ============================================================================

/**
 * ProviderGateway backed by the Bright Data REST API
 */
export class BrightDataGateway implements ProviderGateway {
  private readonly http: AxiosInstance;
  private readonly serpZone: string;
  private readonly pollOptions: SnapshotPollOptions;

  constructor(
    config: GatewayConfig = {},
    private readonly logger: Logger = createLogger('gateway'),
    private readonly metrics: Metrics = defaultMetrics
  ) {
    this.http =
      config.httpClient ??
      axios.create({
        baseURL: config.apiUrl ?? DEFAULT_API_URL,
        timeout: config.timeout ?? DEFAULT_TIMEOUT,
      });
    this.serpZone = config.serpZone ?? DEFAULT_SERP_ZONE;
    this.pollOptions = {
      maxAttempts: config.snapshotMaxAttempts ?? DEFAULT_SNAPSHOT_MAX_ATTEMPTS,
      pollDelayMs: config.snapshotPollDelayMs ?? DEFAULT_SNAPSHOT_POLL_DELAY_MS,
    };
  }

  async search(query: string, engine: SearchEngine, apiKey?: string): Promise<SearchResults | null> {
    if (!apiKey) {
      throw new ConfigurationError('providerApiKey', `providerApiKey is required for ${engine} search`);
    }

    this.metrics.increment('gateway.requests', { operation: 'search', engine });
    this.logger.info('Requesting SERP results', { engine });

    try {
      const response = await this.http.post<unknown>(
        '/request',
        {
          zone: this.serpZone,
          url: buildSerpUrl(query, engine),
          format: 'raw',
        },
        {
          headers: {
            Authorization: `Bearer ${apiKey}`,
            'Content-Type': 'application/json',
          },
        }
      );

      const results = extractSearchResults(response.data);
      if (!results) {
        this.metrics.increment('gateway.failures', { operation: 'search', engine });
        this.logger.warn('SERP response was not an object', { engine });
        return null;
      }

      this.logger.info('SERP results received', { engine, organic: results.organic.length });
      return results;
    } catch (error) {
      this.metrics.increment('gateway.failures', { operation: 'search', engine });
      this.logger.error('SERP request failed', { engine, error: errorMessage(error) });
      return null;
    }
  }

  async socialSearch(keyword: string, credentials: DatasetCredentials): Promise<SocialSearchResults | null> {
    const { apiKey, datasetId } = this.requireDatasetCredentials(credentials, 'socialDatasetId', 'Reddit search');

    this.metrics.increment('gateway.requests', { operation: 'social_search' });
    const raw = await triggerAndDownload(
      this.http,
      apiKey,
      {
        dataset_id: datasetId,
        include_errors: 'true',
        type: 'discover_new',
        discover_by: 'keyword',
      },
      [
        {
          keyword,
          date: SOCIAL_SEARCH_DATE,
          sort_by: SOCIAL_SEARCH_SORT,
          num_of_posts: SOCIAL_SEARCH_POST_COUNT,
        },
      ],
      this.pollOptions,
      this.logger
    );

    if (raw === null) {
      this.metrics.increment('gateway.failures', { operation: 'social_search' });
      return null;
    }
    if (!Array.isArray(raw)) {
      this.logger.warn('Expected a list of Reddit posts', { received: typeof raw });
    }

    const results = parseSocialPosts(raw);
    this.logger.info('Reddit posts discovered', { total: results.total_found });
    return results;
  }

  async socialDeepDive(urls: readonly string[], credentials: DatasetCredentials): Promise<DeepDiveResults | null> {
    if (urls.length === 0) {
      return null;
    }
    const { apiKey, datasetId } = this.requireDatasetCredentials(
      credentials,
      'socialCommentsDatasetId',
      'Reddit comments retrieval'
    );

    this.metrics.increment('gateway.requests', { operation: 'social_deep_dive' });
    const raw = await triggerAndDownload(
      this.http,
      apiKey,
      { dataset_id: datasetId, include_errors: 'true' },
      urls.map((url) => ({
        url,
        days_back: DEEP_DIVE_DAYS_BACK,
        load_all_replies: false,
        comment_limit: '',
      })),
      this.pollOptions,
      this.logger
    );

    if (raw === null) {
      this.metrics.increment('gateway.failures', { operation: 'social_deep_dive' });
      return null;
    }
    if (!Array.isArray(raw)) {
      this.logger.warn('Expected a list of Reddit comments', { received: typeof raw });
    }

    const results = parseSocialComments(raw);
    this.logger.info('Reddit comments retrieved', { total: results.total_retrieved });
    return results;
  }

  private requireDatasetCredentials(
    credentials: DatasetCredentials,
    datasetParameter: string,
    operation: string
  ): { apiKey: string; datasetId: string } {
    if (!credentials.datasetId) {
      throw new ConfigurationError(datasetParameter, `${datasetParameter} is required for ${operation}`);
    }
    if (!credentials.apiKey) {
      throw new ConfigurationError('providerApiKey', `providerApiKey is required for ${operation}`);
    }
    return { apiKey: credentials.apiKey, datasetId: credentials.datasetId };
  }
}
