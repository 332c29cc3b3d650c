/**
 * Unit tests for the Preflight Module
 */

import { describe, it, expect, jest } from '@jest/globals';
import {
  checkDatasetId,
  checkModelKey,
  checkProviderToken,
  preflightCheck,
  summarizeFailures,
  type ModelLister,
} from '../../src/preflight/index.js';
import { createFakeHttp, createRecordingLogger } from '../fakes.js';

function modelLister(models: string[]) {
  return jest.fn<ModelLister>().mockResolvedValue({ models, configuredModel: 'claude-test' });
}

describe('Preflight Module', () => {
  describe('checkModelKey()', () => {
    it('should report a missing key without calling the API', async () => {
      const listModels = modelLister([]);

      expect(await checkModelKey('  ', listModels)).toEqual({ ok: false, message: 'Missing Anthropic API key' });
      expect(listModels).not.toHaveBeenCalled();
    });

    it('should confirm the configured model is available', async () => {
      const listModels = modelLister(['claude-test']);

      expect(await checkModelKey(' test-secret ', listModels)).toEqual({
        ok: true,
        message: 'Anthropic reachable (model available)',
      });
      expect(listModels).toHaveBeenCalledWith('test-secret');
    });

    it('should pass with a warning when the model is not listed', async () => {
      expect(await checkModelKey('test-secret', modelLister(['claude-other']))).toEqual({
        ok: true,
        message: 'Anthropic reachable (model access uncertain)',
      });
    });

    it('should report API errors', async () => {
      const listModels = jest.fn<ModelLister>().mockRejectedValue(new Error('401 invalid x-api-key'));

      expect(await checkModelKey('test-secret', listModels)).toEqual({
        ok: false,
        message: 'Anthropic check error: 401 invalid x-api-key',
      });
    });
  });

  describe('checkProviderToken()', () => {
    it('should list datasets with the bearer token', async () => {
      const { http, requests } = createFakeHttp(() => ({ data: [] }));

      expect(await checkProviderToken('test-secret', http)).toEqual({ ok: true, message: 'Bright Data reachable' });
      expect(requests[0]?.url).toBe('/datasets/list');
      expect(requests[0]?.params).toEqual({ page: 1 });
      expect(requests[0]?.headers.Authorization).toBe('Bearer test-secret');
    });

    it('should report non-200 statuses', async () => {
      const { http } = createFakeHttp(() => ({ status: 401, data: {} }));

      expect(await checkProviderToken('test-secret', http)).toEqual({
        ok: false,
        message: 'Bright Data check failed (401)',
      });
    });

    it('should report network errors', async () => {
      const { http } = createFakeHttp(() => ({ error: new Error('connect ECONNREFUSED') }));

      expect(await checkProviderToken('test-secret', http)).toEqual({
        ok: false,
        message: 'Bright Data check error: connect ECONNREFUSED',
      });
    });

    it('should report a missing token without a request', async () => {
      const { http, requests } = createFakeHttp(() => ({ data: [] }));

      expect(await checkProviderToken(undefined, http)).toEqual({ ok: false, message: 'Missing Bright Data token' });
      expect(requests).toHaveLength(0);
    });
  });

  describe('checkDatasetId()', () => {
    it('should accept ids with the dataset prefix', () => {
      expect(checkDatasetId('test-secret', 'gd_lvz8ah06191smkebj4')).toEqual({
        ok: true,
        message: 'Looks valid (format check)',
      });
    });

    it('should flag unusual ids', () => {
      expect(checkDatasetId('test-secret', 'gd_1')).toEqual({ ok: false, message: 'Dataset id format looks unusual' });
      expect(checkDatasetId('test-secret', 'posts')).toEqual({ ok: false, message: 'Dataset id format looks unusual' });
    });

    it('should require the token and the id', () => {
      expect(checkDatasetId(undefined, 'gd_posts')).toEqual({ ok: false, message: 'Missing Bright Data token' });
      expect(checkDatasetId('test-secret', '')).toEqual({ ok: false, message: 'Missing dataset id' });
    });
  });

  describe('preflightCheck()', () => {
    it('should pass when every check passes', async () => {
      const { http } = createFakeHttp(() => ({ data: [] }));
      const logger = createRecordingLogger();

      const report = await preflightCheck(
        {
          modelApiKey: 'test-secret',
          providerApiKey: 'test-secret',
          socialDatasetId: 'gd_posts',
          socialCommentsDatasetId: 'gd_comments',
        },
        { http, listModels: modelLister(['claude-test']), logger }
      );

      expect(report.ok).toBe(true);
      expect(summarizeFailures(report)).toBeNull();
      expect(logger.entries.map((entry) => entry.message)).toEqual(['Preflight passed']);
    });

    it('should name every failed check', async () => {
      const { http } = createFakeHttp(() => ({ data: [] }));

      const report = await preflightCheck(
        { providerApiKey: 'test-secret', socialDatasetId: 'gd_posts' },
        { http, listModels: modelLister([]), logger: createRecordingLogger() }
      );

      expect(report.ok).toBe(false);
      expect(summarizeFailures(report)).toBe(
        'model: Missing Anthropic API key; social_comments_dataset: Missing dataset id'
      );
    });
  });
});
