/**
 * In-process stand-ins shared by the unit tests
 */

import axios, { AxiosError, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import type { DatasetCredentials, ProviderGateway } from '../src/gateway/index.js';
import type { CompletionResult, LanguageModelClient, StructuredOutputSchema } from '../src/llm/index.js';
import type { Logger, LogLevel, Metrics } from '../src/logging/index.js';
import type {
  ChatMessage,
  DeepDiveResults,
  SearchEngine,
  SearchResults,
  SocialSearchResults,
} from '../src/types/index.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Logger & Metrics
// ============================================================================

export interface LogEntry {
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
}

export interface RecordingLogger extends Logger {
  entries: LogEntry[];
}

export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string, meta?: Record<string, unknown>) => {
    entries.push({ level, message, meta });
  };
  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}

export interface MetricCall {
  metric: string;
  value?: number;
  tags?: Record<string, string>;
}

export interface RecordingMetrics extends Metrics {
  increments: MetricCall[];
  gauges: MetricCall[];
  timings: MetricCall[];
}

export function createRecordingMetrics(): RecordingMetrics {
  const increments: MetricCall[] = [];
  const gauges: MetricCall[] = [];
  const timings: MetricCall[] = [];
  return {
    increments,
    gauges,
    timings,
    increment: (metric, tags) => {
      increments.push({ metric, tags });
    },
    gauge: (metric, value, tags) => {
      gauges.push({ metric, value, tags });
    },
    timing: (metric, value, tags) => {
      timings.push({ metric, value, tags });
    },
  };
}

// ============================================================================
// HTTP
// ============================================================================

export interface RecordedRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  data: unknown;
  headers: Record<string, unknown>;
}

export interface FakeResponse {
  status?: number;
  data?: unknown;
  error?: Error;
}

export type FakeRoute = (request: RecordedRequest) => FakeResponse;

/**
 * Axios instance whose adapter answers from `route` instead of the network
 */
export function createFakeHttp(route: FakeRoute): { http: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const http = axios.create({
    baseURL: 'https://provider.test',
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const request: RecordedRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        params: isRecord(config.params) ? config.params : {},
        data: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
        headers: config.headers.toJSON(),
      };
      requests.push(request);

      const result = route(request);
      if (result.error) {
        throw result.error;
      }

      const status = result.status ?? 200;
      const response: AxiosResponse = {
        data: result.data,
        status,
        statusText: String(status),
        headers: {},
        config,
      };
      const validate = config.validateStatus ?? ((code: number) => code >= 200 && code < 300);
      if (!validate(status)) {
        throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
      }
      return response;
    },
  });

  return { http, requests };
}

// ============================================================================
// Language Model
// ============================================================================

export type ReplyKind = 'google' | 'bing' | 'reddit' | 'synthesis';

export interface FakeModelOptions {
  /** URLs returned by the selection call, or an error to throw */
  selection?: string[] | Error;
  /** Raw tool input returned by the selection call; overrides selection */
  selectionInput?: unknown;
  replies?: Partial<Record<ReplyKind, string | Error>>;
}

/**
 * Classify a prompt by the section headings its user turn carries
 */
export function classifyPrompt(messages: readonly ChatMessage[]): ReplyKind {
  const user = messages.find((message) => message.role === 'user')?.content ?? '';
  if (user.includes('Google analysis:')) return 'synthesis';
  if (user.includes('Google search results:')) return 'google';
  if (user.includes('Bing search results:')) return 'bing';
  return 'reddit';
}

export class FakeModelClient implements LanguageModelClient {
  readonly completeCalls: Array<{ kind: ReplyKind; messages: readonly ChatMessage[] }> = [];
  readonly structuredCalls: Array<readonly ChatMessage[]> = [];

  constructor(private readonly options: FakeModelOptions = {}) {}

  async complete(messages: readonly ChatMessage[]): Promise<CompletionResult> {
    const kind = classifyPrompt(messages);
    this.completeCalls.push({ kind, messages });
    const reply = this.options.replies?.[kind] ?? `${kind} analysis`;
    if (reply instanceof Error) {
      throw reply;
    }
    return { content: reply };
  }

  async completeStructured<T>(messages: readonly ChatMessage[], schema: StructuredOutputSchema<T>): Promise<T> {
    this.structuredCalls.push(messages);
    const selection = this.options.selection ?? [];
    if (selection instanceof Error) {
      throw selection;
    }
    const input = 'selectionInput' in this.options ? this.options.selectionInput : { selected_urls: selection };
    const parsed = schema.schema.safeParse(input);
    if (!parsed.success) {
      throw new Error(`Malformed ${schema.name} output`);
    }
    return parsed.data;
  }
}

// ============================================================================
// Provider Gateway
// ============================================================================

export interface FakeGatewayResponses {
  google?: SearchResults | null | Error;
  bing?: SearchResults | null | Error;
  social?: SocialSearchResults | null | Error;
  deepDive?: DeepDiveResults | null | Error;
}

export function searchResults(title: string): SearchResults {
  return {
    organic: [{ title, link: `https://example.com/${title.toLowerCase().replace(/\s+/g, '-')}` }],
    knowledge: {},
  };
}

function settle<T>(value: T | Error): T {
  if (value instanceof Error) {
    throw value;
  }
  return value;
}

export class FakeGateway implements ProviderGateway {
  readonly searchCalls: Array<{ query: string; engine: SearchEngine; apiKey: string | undefined }> = [];
  readonly socialSearchCalls: Array<{ keyword: string; credentials: DatasetCredentials }> = [];
  readonly deepDiveCalls: Array<{ urls: readonly string[]; credentials: DatasetCredentials }> = [];

  constructor(private readonly responses: FakeGatewayResponses = {}) {}

  async search(query: string, engine: SearchEngine, apiKey?: string): Promise<SearchResults | null> {
    this.searchCalls.push({ query, engine, apiKey });
    const response = engine === 'google' ? this.responses.google : this.responses.bing;
    return settle(response === undefined ? searchResults(`${engine} result`) : response);
  }

  async socialSearch(keyword: string, credentials: DatasetCredentials): Promise<SocialSearchResults | null> {
    this.socialSearchCalls.push({ keyword, credentials });
    const response = this.responses.social;
    return settle(
      response === undefined
        ? { parsed_posts: [{ title: 'Thread', url: 'https://reddit.com/r/test/1' }], total_found: 1 }
        : response
    );
  }

  async socialDeepDive(urls: readonly string[], credentials: DatasetCredentials): Promise<DeepDiveResults | null> {
    this.deepDiveCalls.push({ urls, credentials });
    const response = this.responses.deepDive;
    return settle(
      response === undefined
        ? { comments: [{ comment_id: 'c1', content: 'Worth it', date: '2025-01-01' }], total_retrieved: 1 }
        : response
    );
  }
}
