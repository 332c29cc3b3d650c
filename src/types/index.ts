/**
 * Core type definitions for the research agent
 *
 * This module exports the data contracts shared across the pipeline, the
 * provider gateway, the run store and the HTTP surface.
 */

/**
 * Opaque identifier for a persisted research run
 * Format: 32 lowercase hex characters
 */
export type RunId = string;

/**
 * Opaque identifier for a browser session
 */
export type SessionId = string;

// ============================================================================
// Language Model Messages
// ============================================================================

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

// ============================================================================
// Provider Payloads
// ============================================================================

/**
 * Search engines reachable through the SERP endpoint
 */
export type SearchEngine = 'google' | 'bing';

/**
 * Extracted SERP payload. Only the sections the analysis prompts need.
 */
export interface SearchResults {
  organic: Array<Record<string, unknown>>;
  knowledge: Record<string, unknown>;
}

export interface SocialPost {
  title: string;
  url: string;
}

/**
 * Reddit keyword discovery output
 */
export interface SocialSearchResults {
  parsed_posts: SocialPost[];
  total_found: number;
}

export interface SocialComment {
  comment_id: string;
  content: string;
  date: string;
}

/**
 * Comments collected for the selected Reddit threads
 */
export interface DeepDiveResults {
  comments: SocialComment[];
  total_retrieved: number;
}

// ============================================================================
// Pipeline State
// ============================================================================

/**
 * Provider credentials and dataset identifiers for a single run
 */
export interface ResearchConfig {
  providerApiKey?: string | undefined;
  socialDatasetId?: string | undefined;
  socialCommentsDatasetId?: string | undefined;
}

/**
 * The record threaded through every stage of a research run.
 *
 * `null` means "not produced": either the owning stage has not run yet or it
 * degraded. `selected_reddit_urls` is always an array once selection has run.
 */
export interface PipelineState {
  question: string;
  config: ResearchConfig;
  google_results: SearchResults | null;
  bing_results: SearchResults | null;
  reddit_results: SocialSearchResults | null;
  selected_reddit_urls: string[] | null;
  reddit_post_data: DeepDiveResults | null;
  google_analysis: string | null;
  bing_analysis: string | null;
  reddit_analysis: string | null;
  final_answer: string | null;
  messages: ChatMessage[];
}

/**
 * Artifacts returned to API clients and persisted with a run.
 * Absent fields are omitted rather than serialized as null.
 */
export interface ResearchResponse {
  final_answer?: string;
  google_results?: SearchResults;
  bing_results?: SearchResults;
  reddit_results?: SocialSearchResults;
  reddit_post_data?: DeepDiveResults;
  google_analysis?: string;
  bing_analysis?: string;
  reddit_analysis?: string;
}

// ============================================================================
// Run Store Records
// ============================================================================

export interface RunRecord {
  id: RunId;
  /** Unix time in seconds */
  ts: number;
  question: string;
  result: ResearchResponse;
}

export interface RunSummary {
  id: RunId;
  ts: number;
  question: string;
  has_answer: boolean;
}

/**
 * Storage metadata for a persisted object
 */
export interface ObjectMetadata {
  namespace: string;
  key: string;
  fileName: string;
  createdAt: string;
  contentType: string;
  size?: number;
}

/**
 * Storage adapter interface for run persistence
 */
export interface StorageAdapter {
  save(namespace: string, key: string, content: string | Buffer, metadata?: Record<string, string>): Promise<ObjectMetadata>;
  load(namespace: string, key: string): Promise<{ content: string; metadata: ObjectMetadata }>;
  exists(namespace: string, key: string): Promise<boolean>;
  list(namespace: string): Promise<ObjectMetadata[]>;
  delete(namespace: string, key?: string): Promise<void>;
}
