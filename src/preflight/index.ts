/**
 * Preflight Module
 *
 * Cheap credential checks run before a research request starts:
 * - Model key: list models (no tokens consumed)
 * - Provider token: GET /datasets/list?page=1
 * - Dataset ids: format check only, nothing is triggered
 *
 * Checks never throw; each reports ok plus a message.
 */

import axios, { type AxiosInstance } from 'axios';
import { errorMessage } from '../errors/index.js';
import { AnthropicModelClient } from '../llm/index.js';
import { createLogger, type Logger } from '../logging/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface CheckResult {
  ok: boolean;
  message: string;
}

export interface PreflightCredentials {
  modelApiKey?: string | undefined;
  providerApiKey?: string | undefined;
  socialDatasetId?: string | undefined;
  socialCommentsDatasetId?: string | undefined;
}

export interface PreflightReport {
  ok: boolean;
  model: CheckResult;
  provider: CheckResult;
  social_dataset: CheckResult;
  social_comments_dataset: CheckResult;
}

/**
 * Lists the model ids visible to an API key
 */
export type ModelLister = (apiKey: string) => Promise<{ models: string[]; configuredModel: string }>;

export interface PreflightOptions {
  /** Provider API base URL (default: https://api.brightdata.com) */
  apiUrl?: string;
  /** Pre-built HTTP client; replaces apiUrl */
  http?: AxiosInstance;
  listModels?: ModelLister;
  logger?: Logger;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_PROVIDER_URL = 'https://api.brightdata.com';
const PROVIDER_TIMEOUT = 8000;
const MODEL_TIMEOUT = 6000;
const DATASET_ID_PREFIX = 'gd_';
const DATASET_ID_MIN_LENGTH = 6;

const defaultModelLister: ModelLister = async (apiKey) => {
  const client = new AnthropicModelClient({ apiKey, timeout: MODEL_TIMEOUT });
  return { models: await client.listModels(), configuredModel: client.modelId };
};

function present(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

// ============================================================================
// Checks
// ============================================================================

export async function checkModelKey(apiKey: string | undefined, listModels: ModelLister): Promise<CheckResult> {
  const key = present(apiKey);
  if (!key) {
    return { ok: false, message: 'Missing Anthropic API key' };
  }
  try {
    const { models, configuredModel } = await listModels(key);
    return models.includes(configuredModel)
      ? { ok: true, message: 'Anthropic reachable (model available)' }
      : { ok: true, message: 'Anthropic reachable (model access uncertain)' };
  } catch (error) {
    return { ok: false, message: `Anthropic check error: ${errorMessage(error)}` };
  }
}

export async function checkProviderToken(token: string | undefined, http: AxiosInstance): Promise<CheckResult> {
  const bearer = present(token);
  if (!bearer) {
    return { ok: false, message: 'Missing Bright Data token' };
  }
  try {
    const response = await http.get<unknown>('/datasets/list', {
      params: { page: 1 },
      headers: {
        Authorization: `Bearer ${bearer}`,
        Accept: 'application/json',
      },
      validateStatus: () => true,
    });
    if (response.status === 200) {
      return { ok: true, message: 'Bright Data reachable' };
    }
    return { ok: false, message: `Bright Data check failed (${response.status})` };
  } catch (error) {
    return { ok: false, message: `Bright Data check error: ${errorMessage(error)}` };
  }
}

export function checkDatasetId(token: string | undefined, datasetId: string | undefined): CheckResult {
  if (!present(token)) {
    return { ok: false, message: 'Missing Bright Data token' };
  }
  const id = present(datasetId);
  if (!id) {
    return { ok: false, message: 'Missing dataset id' };
  }
  if (id.startsWith(DATASET_ID_PREFIX) && id.length >= DATASET_ID_MIN_LENGTH) {
    return { ok: true, message: 'Looks valid (format check)' };
  }
  return { ok: false, message: 'Dataset id format looks unusual' };
}

/**
 * Run every check and aggregate the result
 */
export async function preflightCheck(
  credentials: PreflightCredentials,
  options: PreflightOptions = {}
): Promise<PreflightReport> {
  const logger = options.logger ?? createLogger('preflight');
  const http = options.http ?? axios.create({ baseURL: options.apiUrl ?? DEFAULT_PROVIDER_URL, timeout: PROVIDER_TIMEOUT });
  const listModels = options.listModels ?? defaultModelLister;

  const [model, provider] = await Promise.all([
    checkModelKey(credentials.modelApiKey, listModels),
    checkProviderToken(credentials.providerApiKey, http),
  ]);
  const socialDataset = checkDatasetId(credentials.providerApiKey, credentials.socialDatasetId);
  const socialCommentsDataset = checkDatasetId(credentials.providerApiKey, credentials.socialCommentsDatasetId);

  const report: PreflightReport = {
    ok: model.ok && provider.ok && socialDataset.ok && socialCommentsDataset.ok,
    model,
    provider,
    social_dataset: socialDataset,
    social_comments_dataset: socialCommentsDataset,
  };

  const summary = {
    model: model.ok,
    provider: provider.ok,
    socialDataset: socialDataset.ok,
    socialCommentsDataset: socialCommentsDataset.ok,
  };
  if (report.ok) {
    logger.info('Preflight passed', summary);
  } else {
    logger.warn('Preflight failed', summary);
  }
  return report;
}

/**
 * One line naming every failed check, or null when all passed
 */
export function summarizeFailures(report: PreflightReport): string | null {
  const checks: Array<[string, CheckResult]> = [
    ['model', report.model],
    ['provider', report.provider],
    ['social_dataset', report.social_dataset],
    ['social_comments_dataset', report.social_comments_dataset],
  ];
  const failures = checks.filter(([, result]) => !result.ok).map(([name, result]) => `${name}: ${result.message}`);
  return failures.length > 0 ? failures.join('; ') : null;
}
