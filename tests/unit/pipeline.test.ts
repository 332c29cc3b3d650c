/**
 * Unit tests for the research pipeline
 * Runs the real stage graph against in-process model and gateway stand-ins
 */

import { describe, it, expect } from '@jest/globals';
import {
  createInitialState,
  researchGraph,
  runResearch,
  STAGE_NAMES,
  toResearchResponse,
} from '../../src/pipeline/index.js';
import { ConfigurationError } from '../../src/errors/index.js';
import type { ResearchConfig } from '../../src/types/index.js';
import {
  FakeGateway,
  FakeModelClient,
  createRecordingLogger,
  createRecordingMetrics,
  searchResults,
  type FakeGatewayResponses,
  type FakeModelOptions,
  type ReplyKind,
} from '../fakes.js';

const config: ResearchConfig = {
  providerApiKey: 'test-secret',
  socialDatasetId: 'gd_posts',
  socialCommentsDatasetId: 'gd_comments',
};

function setup(responses: FakeGatewayResponses = {}, modelOptions: FakeModelOptions = {}) {
  const gateway = new FakeGateway(responses);
  const llm = new FakeModelClient(modelOptions);
  const logger = createRecordingLogger();
  const metrics = createRecordingMetrics();
  const run = (question: string) => runResearch(question, config, { gateway, llm, logger, metrics });
  return { gateway, llm, logger, metrics, run };
}

describe('Research Pipeline', () => {
  // ==========================================================================
  // Graph shape
  // ==========================================================================

  describe('researchGraph', () => {
    it('should contain every research stage', () => {
      expect([...researchGraph.stages.keys()].sort()).toEqual(Object.values(STAGE_NAMES).sort());
    });

    it('should order retrieval before selection and synthesis last', () => {
      const order = researchGraph.order;
      const position = (name: string) => order.indexOf(name);

      expect(position(STAGE_NAMES.googleSearch)).toBeLessThan(position(STAGE_NAMES.selectRedditUrls));
      expect(position(STAGE_NAMES.bingSearch)).toBeLessThan(position(STAGE_NAMES.selectRedditUrls));
      expect(position(STAGE_NAMES.redditSearch)).toBeLessThan(position(STAGE_NAMES.selectRedditUrls));
      expect(position(STAGE_NAMES.selectRedditUrls)).toBeLessThan(position(STAGE_NAMES.retrieveRedditPosts));
      expect(order[order.length - 1]).toBe(STAGE_NAMES.synthesize);
    });
  });

  describe('createInitialState()', () => {
    it('should seed the question as the first user message', () => {
      const state = createInitialState('Is X worth it?', config);

      expect(state.question).toBe('Is X worth it?');
      expect(state.messages).toEqual([{ role: 'user', content: 'Is X worth it?' }]);
      expect(state.final_answer).toBeNull();
      expect(state.selected_reddit_urls).toBeNull();
    });

    it('should copy the config', () => {
      const state = createInitialState('q', config);

      expect(state.config).toEqual(config);
      expect(state.config).not.toBe(config);
    });
  });

  // ==========================================================================
  // Successful runs
  // ==========================================================================

  describe('runResearch()', () => {
    it('should produce a final answer when every source returns data', async () => {
      const { run } = setup({}, { selection: ['https://reddit.com/r/test/1'] });

      const state = await run('Which laptop is best for travel?');

      expect(state.final_answer).toBe('synthesis analysis');
      expect(state.google_analysis).toBe('google analysis');
      expect(state.bing_analysis).toBe('bing analysis');
      expect(state.reddit_analysis).toBe('reddit analysis');
    });

    it('should run the worked scenario end to end', async () => {
      const { run, gateway } = setup(
        {
          google: searchResults('Google hit'),
          bing: searchResults('Bing hit'),
          social: { parsed_posts: [{ title: 'Thread', url: 'u1' }], total_found: 1 },
          deepDive: { comments: [{ comment_id: 'c1', content: 'Yes', date: '2025-01-01' }], total_retrieved: 1 },
        },
        {
          selection: ['u1'],
          replies: { google: 'A', bing: 'A', reddit: 'A', synthesis: 'Final' },
        }
      );

      const state = await run('Is X worth it?');

      expect(state.final_answer).toBe('Final');
      expect(state.google_results?.organic).toEqual([{ title: 'Google hit', link: 'https://example.com/google-hit' }]);
      expect(state.reddit_post_data?.comments).toHaveLength(1);
      expect(state.selected_reddit_urls).toEqual(['u1']);
      expect(gateway.deepDiveCalls).toEqual([
        { urls: ['u1'], credentials: { apiKey: 'test-secret', datasetId: 'gd_comments' } },
      ]);
    });

    it('should append the answer to the conversation', async () => {
      const { run } = setup({}, { replies: { synthesis: 'Final' } });

      const state = await run('Is X worth it?');

      expect(state.messages).toEqual([
        { role: 'user', content: 'Is X worth it?' },
        { role: 'assistant', content: 'Final' },
      ]);
    });

    it('should pass credentials from the config to the gateway', async () => {
      const { run, gateway } = setup();

      await run('q');

      expect(gateway.searchCalls).toEqual(
        expect.arrayContaining([
          { query: 'q', engine: 'google', apiKey: 'test-secret' },
          { query: 'q', engine: 'bing', apiKey: 'test-secret' },
        ])
      );
      expect(gateway.socialSearchCalls).toEqual([
        { keyword: 'q', credentials: { apiKey: 'test-secret', datasetId: 'gd_posts' } },
      ]);
    });

    it('should give the reddit analysis both posts and comments', async () => {
      const { run, llm } = setup({}, { selection: ['https://reddit.com/r/test/1'] });

      await run('q');

      const reddit = llm.completeCalls.find((call) => call.kind === 'reddit');
      const userTurn = reddit?.messages[1]?.content ?? '';
      expect(userTurn).toContain('"url": "https://reddit.com/r/test/1"');
      expect(userTurn).toContain('"content": "Worth it"');
    });

    it('should record run metrics', async () => {
      const { run, metrics } = setup();

      await run('q');

      expect(metrics.increments).toContainEqual({ metric: 'pipeline.runs', tags: undefined });
      expect(metrics.timings.filter((call) => call.metric === 'pipeline.stage.duration')).toHaveLength(9);
      expect(metrics.timings.some((call) => call.metric === 'pipeline.run.duration')).toBe(true);
    });
  });

  // ==========================================================================
  // Degraded sources
  // ==========================================================================

  describe('degraded sources', () => {
    it('should skip selection and deep dive when reddit search returns nothing', async () => {
      const { run, llm, gateway } = setup({ social: null });

      const state = await run('q');

      expect(state.reddit_results).toBeNull();
      expect(state.selected_reddit_urls).toEqual([]);
      expect(state.reddit_post_data).toEqual({ comments: [], total_retrieved: 0 });
      expect(llm.structuredCalls).toHaveLength(0);
      expect(gateway.deepDiveCalls).toHaveLength(0);
    });

    it('should not ask the model to select from a search with no posts', async () => {
      const { run, llm, gateway } = setup(
        { social: { parsed_posts: [], total_found: 0 } },
        { selection: ['https://reddit.com/r/made/up'] }
      );

      const state = await run('q');

      expect(state.selected_reddit_urls).toEqual([]);
      expect(llm.structuredCalls).toHaveLength(0);
      expect(gateway.deepDiveCalls).toHaveLength(0);
      expect(state.reddit_post_data).toEqual({ comments: [], total_retrieved: 0 });
    });

    it('should not call the deep dive when the selection is empty', async () => {
      const { run, gateway } = setup({}, { selection: [] });

      const state = await run('q');

      expect(gateway.deepDiveCalls).toHaveLength(0);
      expect(state.reddit_post_data).toEqual({ comments: [], total_retrieved: 0 });
    });

    it('should continue with an empty selection when the model call fails', async () => {
      const { run, logger } = setup({}, { selection: new Error('model unavailable') });

      const state = await run('q');

      expect(state.selected_reddit_urls).toEqual([]);
      expect(state.final_answer).toBe('synthesis analysis');
      expect(logger.entries.some((entry) => entry.message === 'URL selection failed, continuing with empty selection')).toBe(
        true
      );
    });

    it('should continue with an empty selection when the model output is malformed', async () => {
      const { run } = setup({}, { selectionInput: { selected_urls: 'u1' } });

      const state = await run('q');

      expect(state.selected_reddit_urls).toEqual([]);
      expect(state.final_answer).toBe('synthesis analysis');
    });

    it('should still synthesize when reddit search throws', async () => {
      const { run, llm } = setup({ social: new Error('provider down') });

      const state = await run('Edge case');

      expect(state.reddit_results).toBeNull();
      expect(state.selected_reddit_urls).toEqual([]);
      expect(state.reddit_post_data).toEqual({ comments: [], total_retrieved: 0 });
      expect(state.google_analysis).toBe('google analysis');
      expect(state.bing_analysis).toBe('bing analysis');
      expect(state.final_answer).toBe('synthesis analysis');
      expect(llm.completeCalls.map((call) => call.kind)).toContain('synthesis');
    });

    it('should leave a failed web search null and tell the analysis', async () => {
      const { run, llm } = setup({ google: new Error('timeout') });

      const state = await run('q');

      expect(state.google_results).toBeNull();
      const google = llm.completeCalls.find((call) => call.kind === 'google');
      expect(google?.messages[1]?.content).toBe('User question: q\n\nGoogle search results:\nNo results available.');
    });

    it('should substitute an empty payload when the deep dive throws', async () => {
      const { run } = setup({ deepDive: new Error('snapshot failed') }, { selection: ['u1'] });

      const state = await run('q');

      expect(state.reddit_post_data).toEqual({ comments: [], total_retrieved: 0 });
      expect(state.final_answer).toBe('synthesis analysis');
    });

    it('should substitute an empty payload when the deep dive returns null', async () => {
      const { run } = setup({ deepDive: null }, { selection: ['u1'] });

      const state = await run('q');

      expect(state.reddit_post_data).toEqual({ comments: [], total_retrieved: 0 });
    });
  });

  // ==========================================================================
  // Fatal failures
  // ==========================================================================

  describe('fatal failures', () => {
    it.each(['google', 'bing', 'reddit'] as const)('should propagate a %s analysis failure', async (kind) => {
      const failure = new Error(`${kind} analysis failed`);
      const replies: Partial<Record<ReplyKind, string | Error>> = {};
      replies[kind] = failure;
      const { run, llm, metrics } = setup({}, { replies });

      await expect(run('q')).rejects.toBe(failure);
      expect(llm.completeCalls.map((call) => call.kind)).not.toContain('synthesis');
      expect(metrics.increments).toContainEqual({ metric: 'pipeline.run.errors', tags: undefined });
    });

    it('should propagate a synthesis failure', async () => {
      const failure = new Error('synthesis failed');
      const { run } = setup({}, { replies: { synthesis: failure } });

      await expect(run('q')).rejects.toBe(failure);
    });

    it('should propagate a configuration error from a search stage', async () => {
      const { run, llm } = setup({ bing: new ConfigurationError('providerApiKey') });

      await expect(run('q')).rejects.toMatchObject({ name: 'ConfigurationError', parameter: 'providerApiKey' });
      expect(llm.completeCalls).toHaveLength(0);
    });

    it('should propagate a configuration error from the deep dive', async () => {
      const { run } = setup({ deepDive: new ConfigurationError('socialCommentsDatasetId') }, { selection: ['u1'] });

      await expect(run('q')).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  // ==========================================================================
  // Response projection
  // ==========================================================================

  describe('toResearchResponse()', () => {
    it('should omit fields that were not produced', async () => {
      const { run } = setup({ google: null, social: null });

      const response = toResearchResponse(await run('q'));

      expect(response).not.toHaveProperty('google_results');
      expect(response).not.toHaveProperty('reddit_results');
      expect(response.bing_results).toEqual(searchResults('bing result'));
      expect(response.reddit_post_data).toEqual({ comments: [], total_retrieved: 0 });
      expect(response.final_answer).toBe('synthesis analysis');
    });

    it('should keep empty analysis strings', () => {
      const state = createInitialState('q', config);
      state.google_analysis = '';

      expect(toResearchResponse(state)).toEqual({ google_analysis: '' });
    });
  });
});
