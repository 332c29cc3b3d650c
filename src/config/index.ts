/**
 * Configuration Module
 *
 * Responsibilities:
 * - Load and validate environment variables (dotenv + zod)
 * - Merge per-request, per-session and environment credentials
 *
 * Precedence for every credential: request payload > session settings > environment.
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { ResearchConfig } from '../types/index.js';

/**
 * Credential fields a client may supply per request or per session
 */
export const CREDENTIAL_FIELDS = [
  'anthropic_api_key',
  'brightdata_api_key',
  'reddit_dataset_id',
  'reddit_comments_dataset_id',
] as const;

export type CredentialField = (typeof CREDENTIAL_FIELDS)[number];

export type CredentialOverrides = Partial<Record<CredentialField, string | null | undefined>>;

/**
 * Credentials after precedence has been applied
 */
export interface ResolvedCredentials {
  modelApiKey: string | undefined;
  config: ResearchConfig;
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: optionalString,
  BRIGHTDATA_API_KEY: optionalString,
  BRIGHTDATA_API_URL: z.string().url().default('https://api.brightdata.com'),
  SERP_ZONE: z.string().min(1).default('ai_agent'),
  REDDIT_DATASET_ID: optionalString,
  REDDIT_COMMENTS_DATASET_ID: optionalString,
  SNAPSHOT_MAX_ATTEMPTS: z.coerce.number().int().positive().default(60),
  SNAPSHOT_POLL_DELAY_MS: z.coerce.number().int().nonnegative().default(5000),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  STORAGE_DRIVER: z.enum(['memory', 's3']).default('memory'),
  S3_BUCKET: optionalString,
  S3_PREFIX: z.string().min(1).default('research'),
  AWS_REGION: z.string().min(1).default('us-east-1'),
  S3_ENDPOINT: optionalString,
  CORS_ORIGIN: optionalString,
});

export type AppEnv = z.infer<typeof EnvSchema>;

/**
 * Parse environment variables into a typed configuration
 *
 * @param source - Variables to read (defaults to process.env)
 * @throws ConfigurationError naming the first invalid variable
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = issue ? issue.path.join('.') : 'environment';
    throw new ConfigurationError(
      variable,
      `Invalid environment variable ${variable}: ${issue?.message ?? 'unknown error'}`
    );
  }

  const env = result.data;
  if (env.STORAGE_DRIVER === 's3' && !env.S3_BUCKET) {
    throw new ConfigurationError('S3_BUCKET', 'S3_BUCKET is required when STORAGE_DRIVER=s3');
  }
  return env;
}

function firstNonEmpty(...values: Array<string | null | undefined>): string | undefined {
  for (const value of values) {
    if (value && value.trim().length > 0) {
      return value.trim();
    }
  }
  return undefined;
}

/**
 * Merge credentials from the request, the session store and the environment
 */
export function resolveCredentials(
  request: CredentialOverrides,
  session: CredentialOverrides,
  env: Pick<AppEnv, 'ANTHROPIC_API_KEY' | 'BRIGHTDATA_API_KEY' | 'REDDIT_DATASET_ID' | 'REDDIT_COMMENTS_DATASET_ID'>
): ResolvedCredentials {
  return {
    modelApiKey: firstNonEmpty(request.anthropic_api_key, session.anthropic_api_key, env.ANTHROPIC_API_KEY),
    config: {
      providerApiKey: firstNonEmpty(request.brightdata_api_key, session.brightdata_api_key, env.BRIGHTDATA_API_KEY),
      socialDatasetId: firstNonEmpty(request.reddit_dataset_id, session.reddit_dataset_id, env.REDDIT_DATASET_ID),
      socialCommentsDatasetId: firstNonEmpty(
        request.reddit_comments_dataset_id,
        session.reddit_comments_dataset_id,
        env.REDDIT_COMMENTS_DATASET_ID
      ),
    },
  };
}
