/**
 * Research stage set
 *
 * Topology:
 *   google_search, bing_search, reddit_search
 *     -> select_reddit_urls
 *     -> retrieve_reddit_posts
 *     -> analyze_google, analyze_bing, analyze_reddit
 *     -> synthesize
 *
 * Retrieval and selection degrade to null or empty values; analysis and
 * synthesis failures abort the run. ConfigurationError always propagates.
 */

import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../errors/index.js';
import type { ProviderGateway } from '../gateway/index.js';
import type { LanguageModelClient, StructuredOutputSchema } from '../llm/index.js';
import {
  buildBingAnalysisMessages,
  buildGoogleAnalysisMessages,
  buildRedditAnalysisMessages,
  buildSynthesisMessages,
  buildUrlSelectionMessages,
} from '../prompts/index.js';
import type { DeepDiveResults, PipelineState, SearchEngine } from '../types/index.js';
import { defineGraph, type ExecutionContext, type StageDefinition, type StateUpdate } from './graph.js';

/**
 * Per-run services passed beside the state
 */
export interface ResearchContext extends ExecutionContext {
  llm: LanguageModelClient;
  gateway: ProviderGateway;
}

export type ResearchStage = StageDefinition<PipelineState, ResearchContext>;

export const STAGE_NAMES = {
  googleSearch: 'google_search',
  bingSearch: 'bing_search',
  redditSearch: 'reddit_search',
  selectRedditUrls: 'select_reddit_urls',
  retrieveRedditPosts: 'retrieve_reddit_posts',
  analyzeGoogle: 'analyze_google',
  analyzeBing: 'analyze_bing',
  analyzeReddit: 'analyze_reddit',
  synthesize: 'synthesize',
} as const;

const SelectedUrlsSchema = z.object({
  selected_urls: z.array(z.string()).describe('Reddit post URLs to retrieve comments from, most relevant first'),
});

export const URL_SELECTION_SCHEMA: StructuredOutputSchema<z.infer<typeof SelectedUrlsSchema>> = {
  name: 'select_reddit_urls',
  description: 'Record the Reddit post URLs whose comments are worth reading to answer the question',
  schema: SelectedUrlsSchema,
};

export function emptyDeepDive(): DeepDiveResults {
  return { comments: [], total_retrieved: 0 };
}

function rethrowConfiguration(error: unknown): void {
  if (error instanceof ConfigurationError) {
    throw error;
  }
}

// ============================================================================
// Source Retrieval
// ============================================================================

function searchUpdate(
  field: 'google_results' | 'bing_results',
  results: PipelineState['google_results']
): StateUpdate<PipelineState> {
  return field === 'google_results' ? { google_results: results } : { bing_results: results };
}

function searchStage(
  name: string,
  engine: SearchEngine,
  field: 'google_results' | 'bing_results'
): ResearchStage {
  return {
    name,
    dependsOn: [],
    writes: [field],
    async run(state, { gateway, logger }) {
      try {
        const results = await gateway.search(state.question, engine, state.config.providerApiKey);
        return searchUpdate(field, results);
      } catch (error) {
        rethrowConfiguration(error);
        logger.warn('Search failed, continuing without results', { engine, error: errorMessage(error) });
        return searchUpdate(field, null);
      }
    },
  };
}

const redditSearch: ResearchStage = {
  name: STAGE_NAMES.redditSearch,
  dependsOn: [],
  writes: ['reddit_results'],
  async run(state, { gateway, logger }) {
    try {
      const results = await gateway.socialSearch(state.question, {
        apiKey: state.config.providerApiKey,
        datasetId: state.config.socialDatasetId,
      });
      return { reddit_results: results };
    } catch (error) {
      rethrowConfiguration(error);
      logger.warn('Reddit search failed, continuing without results', { error: errorMessage(error) });
      return { reddit_results: null };
    }
  },
};

// ============================================================================
// Selection and Deep Dive
// ============================================================================

/**
 * Depends on the Google and Bing searches only as a join; reads reddit_results.
 */
const selectRedditUrls: ResearchStage = {
  name: STAGE_NAMES.selectRedditUrls,
  dependsOn: [STAGE_NAMES.googleSearch, STAGE_NAMES.bingSearch, STAGE_NAMES.redditSearch],
  writes: ['selected_reddit_urls'],
  async run(state, { llm, logger }) {
    if (!state.reddit_results || state.reddit_results.parsed_posts.length === 0) {
      logger.info('No Reddit results, skipping URL selection');
      return { selected_reddit_urls: [] };
    }

    try {
      const messages = buildUrlSelectionMessages(state.question, state.reddit_results);
      const selection = await llm.completeStructured(messages, URL_SELECTION_SCHEMA);
      logger.info('Reddit URLs selected', { count: selection.selected_urls.length });
      return { selected_reddit_urls: selection.selected_urls };
    } catch (error) {
      logger.error('URL selection failed, continuing with empty selection', { error: errorMessage(error) });
      return { selected_reddit_urls: [] };
    }
  },
};

const retrieveRedditPosts: ResearchStage = {
  name: STAGE_NAMES.retrieveRedditPosts,
  dependsOn: [STAGE_NAMES.selectRedditUrls],
  writes: ['reddit_post_data'],
  async run(state, { gateway, logger }) {
    const urls = state.selected_reddit_urls ?? [];
    if (urls.length === 0) {
      logger.info('No Reddit URLs selected, skipping comment retrieval');
      return { reddit_post_data: emptyDeepDive() };
    }

    try {
      const data = await gateway.socialDeepDive(urls, {
        apiKey: state.config.providerApiKey,
        datasetId: state.config.socialCommentsDatasetId,
      });
      return { reddit_post_data: data ?? emptyDeepDive() };
    } catch (error) {
      rethrowConfiguration(error);
      logger.warn('Comment retrieval failed, continuing without comments', { error: errorMessage(error) });
      return { reddit_post_data: emptyDeepDive() };
    }
  },
};

// ============================================================================
// Analysis and Synthesis
// ============================================================================

const analyzeGoogle: ResearchStage = {
  name: STAGE_NAMES.analyzeGoogle,
  dependsOn: [STAGE_NAMES.retrieveRedditPosts],
  writes: ['google_analysis'],
  async run(state, { llm }) {
    const reply = await llm.complete(buildGoogleAnalysisMessages(state.question, state.google_results));
    return { google_analysis: reply.content };
  },
};

const analyzeBing: ResearchStage = {
  name: STAGE_NAMES.analyzeBing,
  dependsOn: [STAGE_NAMES.retrieveRedditPosts],
  writes: ['bing_analysis'],
  async run(state, { llm }) {
    const reply = await llm.complete(buildBingAnalysisMessages(state.question, state.bing_results));
    return { bing_analysis: reply.content };
  },
};

const analyzeReddit: ResearchStage = {
  name: STAGE_NAMES.analyzeReddit,
  dependsOn: [STAGE_NAMES.retrieveRedditPosts],
  writes: ['reddit_analysis'],
  async run(state, { llm }) {
    const reply = await llm.complete(
      buildRedditAnalysisMessages(state.question, state.reddit_results, state.reddit_post_data)
    );
    return { reddit_analysis: reply.content };
  },
};

const synthesize: ResearchStage = {
  name: STAGE_NAMES.synthesize,
  dependsOn: [STAGE_NAMES.analyzeGoogle, STAGE_NAMES.analyzeBing, STAGE_NAMES.analyzeReddit],
  writes: ['final_answer', 'messages'],
  async run(state, { llm }): Promise<StateUpdate<PipelineState>> {
    const reply = await llm.complete(
      buildSynthesisMessages(state.question, state.google_analysis, state.bing_analysis, state.reddit_analysis)
    );
    return {
      final_answer: reply.content,
      messages: [{ role: 'assistant', content: reply.content }],
    };
  },
};

// ============================================================================
// Graph
// ============================================================================

export const RESEARCH_STAGES: readonly ResearchStage[] = [
  searchStage(STAGE_NAMES.googleSearch, 'google', 'google_results'),
  searchStage(STAGE_NAMES.bingSearch, 'bing', 'bing_results'),
  redditSearch,
  selectRedditUrls,
  retrieveRedditPosts,
  analyzeGoogle,
  analyzeBing,
  analyzeReddit,
  synthesize,
];

/**
 * The research graph. Built once and shared by every run.
 */
export const researchGraph = defineGraph<PipelineState, ResearchContext>({
  stages: RESEARCH_STAGES,
  reducers: {
    messages: (current, update) => [...current, ...update],
  },
});
