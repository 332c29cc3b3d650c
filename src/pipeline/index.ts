/**
 * Research Pipeline Module
 *
 * Responsibilities:
 * - Build the initial state for a question
 * - Bind the per-run model client and gateway
 * - Execute the shared research graph and return the final state
 *
 * Usage:
 * ```typescript
 * const state = await runResearch('Is a standing desk worth it?', config, { modelApiKey });
 * console.log(state.final_answer);
 * ```
 */

import { BrightDataGateway, type ProviderGateway } from '../gateway/index.js';
import { AnthropicModelClient, type LanguageModelClient } from '../llm/index.js';
import { createLogger, defaultMetrics, type Logger, type Metrics } from '../logging/index.js';
import type { PipelineState, ResearchConfig, ResearchResponse } from '../types/index.js';
import { executeGraph } from './graph.js';
import { researchGraph, type ResearchContext } from './stages.js';

export { defineGraph, executeGraph } from './graph.js';
export type { ExecutionContext, GraphDefinition, Reducers, StageDefinition, StageGraph, StateUpdate } from './graph.js';
export { researchGraph, RESEARCH_STAGES, STAGE_NAMES, URL_SELECTION_SCHEMA, emptyDeepDive } from './stages.js';
export type { ResearchContext, ResearchStage } from './stages.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface RunResearchOptions {
  /** Pre-built model client; replaces modelApiKey */
  llm?: LanguageModelClient;
  /** Anthropic API key for a client built for this run (default: ANTHROPIC_API_KEY) */
  modelApiKey?: string | undefined;
  /** Provider gateway (default: BrightDataGateway with default settings) */
  gateway?: ProviderGateway;
  logger?: Logger;
  metrics?: Metrics;
}

// ============================================================================
// Driver
// ============================================================================

/**
 * Initial state for a run: the question, its config, and the user message
 */
export function createInitialState(question: string, config: ResearchConfig): PipelineState {
  return {
    question,
    config: { ...config },
    google_results: null,
    bing_results: null,
    reddit_results: null,
    selected_reddit_urls: null,
    reddit_post_data: null,
    google_analysis: null,
    bing_analysis: null,
    reddit_analysis: null,
    final_answer: null,
    messages: [{ role: 'user', content: question }],
  };
}

/**
 * Run the research pipeline to completion
 *
 * @throws ConfigurationError when a required credential is missing
 * @throws The original error of a failed analysis or synthesis stage
 */
export async function runResearch(
  question: string,
  config: ResearchConfig,
  options: RunResearchOptions = {}
): Promise<PipelineState> {
  const logger = options.logger ?? createLogger('pipeline');
  const metrics = options.metrics ?? defaultMetrics;
  const startTime = Date.now();

  const context: ResearchContext = {
    llm: options.llm ?? new AnthropicModelClient({ apiKey: options.modelApiKey }, logger, metrics),
    gateway: options.gateway ?? new BrightDataGateway({}, logger, metrics),
    logger,
    metrics,
  };

  logger.info('Research run started', { questionLength: question.length });
  metrics.increment('pipeline.runs');

  try {
    const state = await executeGraph(researchGraph, createInitialState(question, config), context);
    metrics.timing('pipeline.run.duration', Date.now() - startTime);
    logger.info('Research run completed', {
      duration: Date.now() - startTime,
      hasAnswer: state.final_answer !== null,
    });
    return state;
  } catch (error) {
    metrics.increment('pipeline.run.errors');
    throw error;
  }
}

/**
 * Project the final state onto the response shape, omitting absent fields
 */
export function toResearchResponse(state: PipelineState): ResearchResponse {
  const response: ResearchResponse = {};
  if (state.final_answer !== null) response.final_answer = state.final_answer;
  if (state.google_results !== null) response.google_results = state.google_results;
  if (state.bing_results !== null) response.bing_results = state.bing_results;
  if (state.reddit_results !== null) response.reddit_results = state.reddit_results;
  if (state.reddit_post_data !== null) response.reddit_post_data = state.reddit_post_data;
  if (state.google_analysis !== null) response.google_analysis = state.google_analysis;
  if (state.bing_analysis !== null) response.bing_analysis = state.bing_analysis;
  if (state.reddit_analysis !== null) response.reddit_analysis = state.reddit_analysis;
  return response;
}
