/**
 * Multi-Source Research Agent - Main Entry Point
 *
 * This module exports the public interfaces and implementations of the
 * research pipeline and its collaborators.
 *
 * Architecture:
 * - Google, Bing and Reddit are searched concurrently through Bright Data
 * - A language model picks Reddit threads worth reading in full
 * - Each source is analysed independently, then synthesised into one answer
 * - An optional Fastify surface persists runs per browser session
 */

// Core Types
export type * from './types/index.js';

// Errors
export { ConfigurationError, GraphDefinitionError, StageOwnershipError, errorMessage } from './errors/index.js';

// Logging
export { createLogger, defaultMetrics, type Logger, type Metrics, type LogLevel } from './logging/index.js';

// Configuration
export {
  loadEnv,
  resolveCredentials,
  CREDENTIAL_FIELDS,
  type AppEnv,
  type CredentialField,
  type CredentialOverrides,
  type ResolvedCredentials,
} from './config/index.js';

// Provider Gateway
export {
  BrightDataGateway,
  buildSerpUrl,
  extractSearchResults,
  parseSocialPosts,
  parseSocialComments,
  type ProviderGateway,
  type DatasetCredentials,
  type GatewayConfig,
  type SnapshotPollOptions,
} from './gateway/index.js';

// Language Model Client
export {
  AnthropicModelClient,
  DEFAULT_MODEL,
  type LanguageModelClient,
  type StructuredOutputSchema,
  type CompletionResult,
  type ModelClientConfig,
} from './llm/index.js';

// Prompt Construction
export {
  buildUrlSelectionMessages,
  buildGoogleAnalysisMessages,
  buildBingAnalysisMessages,
  buildRedditAnalysisMessages,
  buildSynthesisMessages,
} from './prompts/index.js';

// Orchestration Pipeline
export {
  runResearch,
  createInitialState,
  toResearchResponse,
  defineGraph,
  executeGraph,
  researchGraph,
  STAGE_NAMES,
  type RunResearchOptions,
  type ResearchContext,
  type StageDefinition,
  type StageGraph,
} from './pipeline/index.js';

// Storage
export {
  S3StorageAdapter,
  MemoryStorageAdapter,
  createStorageAdapter,
  ObjectNotFoundError,
  type S3Config,
} from './storage/index.js';

// Run Store
export { RunStore, RunNotFoundError, generateRunId, isValidRunId, type ShareRecord } from './run-store/index.js';

// Settings & Preflight
export { SettingsStore, type SessionSettings, type SettingsDescription } from './settings/index.js';
export { preflightCheck, summarizeFailures, type PreflightReport, type CheckResult } from './preflight/index.js';

// HTTP Server
export { buildServer, HttpError, SESSION_COOKIE, type ServerDependencies } from './server/index.js';
