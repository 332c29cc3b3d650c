/**
 * HTTP Server Module
 *
 * Fastify surface for the research pipeline:
 * - GET  /health
 * - POST /api/research              run a question (preflight first)
 * - GET  /api/settings              describe the session's saved settings
 * - POST /api/settings              save credentials for the session
 * - POST /api/test-settings         preflight with saved + provided settings
 * - GET  /api/runs                  list the session's runs, newest first
 * - GET  /api/runs/:runId           load one run
 * - DELETE /api/runs                clear the session's runs
 * - POST /api/runs/:runId/share     create a share link
 * - GET  /api/share/:shareId        load a shared run (no session needed)
 *
 * Sessions are identified by an httpOnly cookie issued on first contact.
 */

import Fastify, { type FastifyInstance, type FastifyRequest, type FastifyServerOptions } from 'fastify';
import fastifyCookie from '@fastify/cookie';
import fastifyCors from '@fastify/cors';
import { z, ZodError } from 'zod';
import { resolveCredentials, type AppEnv } from '../config/index.js';
import { errorMessage } from '../errors/index.js';
import { toResearchResponse } from '../pipeline/index.js';
import { summarizeFailures, type PreflightCredentials, type PreflightReport } from '../preflight/index.js';
import { RunNotFoundError, generateRunId, type RunStore } from '../run-store/index.js';
import type { SettingsStore } from '../settings/index.js';
import type { PipelineState, ResearchConfig } from '../types/index.js';

declare module 'fastify' {
  interface FastifyRequest {
    sessionId: string;
  }
}

// ============================================================================
// Type Definitions
// ============================================================================

export type ResearchRunner = (
  question: string,
  config: ResearchConfig,
  options: { modelApiKey?: string | undefined }
) => Promise<PipelineState>;

export type PreflightRunner = (credentials: PreflightCredentials) => Promise<PreflightReport>;

export interface ServerDependencies {
  runResearch: ResearchRunner;
  preflight: PreflightRunner;
  runStore: RunStore;
  settingsStore: SettingsStore;
  env: Pick<
    AppEnv,
    'ANTHROPIC_API_KEY' | 'BRIGHTDATA_API_KEY' | 'REDDIT_DATASET_ID' | 'REDDIT_COMMENTS_DATASET_ID' | 'CORS_ORIGIN'
  >;
  /** Base URL used in share links (default: derived from the request) */
  publicBaseUrl?: string;
  /** Fastify logger option (default: info level) */
  logger?: FastifyServerOptions['logger'];
}

/**
 * Error carrying the HTTP status it should be reported with
 */
export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

// ============================================================================
// Constants & Schemas
// ============================================================================

export const SESSION_COOKIE = 'research_session';
const SESSION_MAX_AGE_SECONDS = 60 * 60 * 24 * 7;
const SESSION_ID_PATTERN = /^[a-f0-9]{32}$/;

const credentialFields = {
  anthropic_api_key: z.string().nullish(),
  brightdata_api_key: z.string().nullish(),
  reddit_dataset_id: z.string().nullish(),
  reddit_comments_dataset_id: z.string().nullish(),
};

const ResearchRequestSchema = z.object({
  question: z.string().trim().min(1, 'question must not be empty'),
  ...credentialFields,
});

const SettingsPayloadSchema = z.object(credentialFields);

function formatZodError(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

function requestBaseUrl(request: FastifyRequest): string {
  return `${request.protocol}://${request.headers.host ?? 'localhost'}`;
}

// ============================================================================
// Server
// ============================================================================

/**
 * Build the Fastify app. Call `listen` on the result to serve it.
 */
export async function buildServer(deps: ServerDependencies): Promise<FastifyInstance> {
  const { runStore, settingsStore, env } = deps;

  const app = Fastify({
    logger: deps.logger ?? { level: 'info' },
    bodyLimit: 1048576,
  });

  await app.register(fastifyCors, {
    origin: env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',').map((origin) => origin.trim()) : true,
    credentials: true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  });
  await app.register(fastifyCookie);

  app.decorateRequest('sessionId', '');

  app.addHook('onRequest', async (request, reply) => {
    const existing = request.cookies[SESSION_COOKIE];
    if (existing && SESSION_ID_PATTERN.test(existing)) {
      request.sessionId = existing;
      return;
    }
    request.sessionId = generateRunId();
    reply.setCookie(SESSION_COOKIE, request.sessionId, {
      httpOnly: true,
      sameSite: 'lax',
      secure: false,
      path: '/',
      maxAge: SESSION_MAX_AGE_SECONDS,
    });
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({ detail: formatZodError(error) });
    }
    if (error instanceof HttpError) {
      return reply.status(error.statusCode).send({ detail: error.message });
    }
    if (error instanceof RunNotFoundError) {
      return reply.status(404).send({ detail: error.message });
    }
    if (typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ detail: error.message });
    }
    request.log.error({ detail: errorMessage(error) }, `${request.method} ${request.url} failed`);
    return reply.status(500).send({ detail: error.message });
  });

  app.get('/health', async () => ({ status: 'ok' }));

  // --------------------------------------------------------------------------
  // Research
  // --------------------------------------------------------------------------

  app.post('/api/research', async (request) => {
    const payload = ResearchRequestSchema.parse(request.body);
    const { modelApiKey, config } = resolveCredentials(payload, settingsStore.get(request.sessionId), env);

    const report = await deps.preflight({ modelApiKey, ...config });
    if (!report.ok) {
      throw new HttpError(400, `Preflight failed: ${summarizeFailures(report) ?? 'unknown failure'}`);
    }

    request.log.info('Preflight passed, starting research pipeline');
    const state = await deps.runResearch(payload.question, config, { modelApiKey });
    const response = toResearchResponse(state);

    await runStore.saveRun(request.sessionId, generateRunId(), payload.question, response);
    return response;
  });

  // --------------------------------------------------------------------------
  // Settings
  // --------------------------------------------------------------------------

  app.get('/api/settings', async (request) => settingsStore.describe(request.sessionId));

  app.post('/api/settings', async (request) => {
    const payload = SettingsPayloadSchema.parse(request.body ?? {});
    settingsStore.update(request.sessionId, payload);
    return settingsStore.describe(request.sessionId);
  });

  app.post('/api/test-settings', async (request) => {
    const payload = SettingsPayloadSchema.parse(request.body ?? {});
    const { modelApiKey, config } = resolveCredentials(payload, settingsStore.get(request.sessionId), env);
    const report = await deps.preflight({ modelApiKey, ...config });

    return {
      ok: report.ok,
      anthropic_ok: report.model.ok,
      brightdata_ok: report.provider.ok,
      reddit_dataset_ok: report.social_dataset.ok,
      reddit_comments_dataset_ok: report.social_comments_dataset.ok,
      message: summarizeFailures(report),
    };
  });

  // --------------------------------------------------------------------------
  // Runs & Sharing
  // --------------------------------------------------------------------------

  app.get('/api/runs', async (request) => runStore.listRuns(request.sessionId));

  app.get<{ Params: { runId: string } }>('/api/runs/:runId', async (request) =>
    runStore.getRun(request.sessionId, request.params.runId)
  );

  app.delete('/api/runs', async (request) => {
    await runStore.clearRuns(request.sessionId);
    return { ok: true };
  });

  app.post<{ Params: { runId: string } }>('/api/runs/:runId/share', async (request) => {
    const shareId = await runStore.createShare(request.params.runId, request.sessionId);
    const base = (deps.publicBaseUrl ?? requestBaseUrl(request)).replace(/\/+$/, '');
    return { share_id: shareId, url: `${base}/api/share/${shareId}` };
  });

  app.get<{ Params: { shareId: string } }>('/api/share/:shareId', async (request) =>
    runStore.getShared(request.params.shareId)
  );

  return app;
}
