/**
 * Run Store Module
 *
 * Responsibilities:
 * - Generate opaque run and share identifiers
 * - Persist completed research runs per session
 * - List, load and clear a session's runs
 * - Create share links that expose a single run without session binding
 *
 * Layout on the storage adapter:
 * - sessions/{session_id}/{run_id}  -> RunRecord
 * - shares/{share_id}               -> ShareRecord
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { createLogger, type Logger } from '../logging/index.js';
import { ObjectNotFoundError } from '../storage/index.js';
import type { ResearchResponse, RunId, RunRecord, RunSummary, SessionId, StorageAdapter } from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface ShareRecord {
  run_id: RunId;
  session_id: SessionId;
  created_at: string;
}

// ============================================================================
// Identifiers
// ============================================================================

const ID_PATTERN = /^[a-f0-9]{32}$/;
const SHARES_NAMESPACE = 'shares';

/**
 * Generate a run or share identifier: 32 lowercase hex characters
 */
export function generateRunId(): RunId {
  return randomUUID().replace(/-/g, '');
}

export function isValidRunId(value: string): boolean {
  return ID_PATTERN.test(value);
}

function sessionNamespace(sessionId: SessionId): string {
  return `sessions/${sessionId}`;
}

// ============================================================================
// Record Schemas
// ============================================================================

const SearchResultsSchema = z.object({
  organic: z.array(z.record(z.unknown())),
  knowledge: z.record(z.unknown()),
});

const ResearchResponseSchema = z.object({
  final_answer: z.string().optional(),
  google_results: SearchResultsSchema.optional(),
  bing_results: SearchResultsSchema.optional(),
  reddit_results: z
    .object({
      parsed_posts: z.array(z.object({ title: z.string(), url: z.string() })),
      total_found: z.number(),
    })
    .optional(),
  reddit_post_data: z
    .object({
      comments: z.array(z.object({ comment_id: z.string(), content: z.string(), date: z.string() })),
      total_retrieved: z.number(),
    })
    .optional(),
  google_analysis: z.string().optional(),
  bing_analysis: z.string().optional(),
  reddit_analysis: z.string().optional(),
});

const RunRecordSchema = z.object({
  id: z.string(),
  ts: z.number(),
  question: z.string(),
  result: ResearchResponseSchema,
});

const ShareRecordSchema = z.object({
  run_id: z.string(),
  session_id: z.string(),
  created_at: z.string(),
});

/**
 * Error raised when a run or share does not exist for the caller
 */
export class RunNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RunNotFoundError';
  }
}

// ============================================================================
// Run Store
// ============================================================================

export class RunStore {
  constructor(
    private readonly storage: StorageAdapter,
    private readonly logger: Logger = createLogger('run-store'),
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Persist a completed run for a session
   */
  async saveRun(sessionId: SessionId, runId: RunId, question: string, result: ResearchResponse): Promise<RunRecord> {
    const record: RunRecord = {
      id: runId,
      ts: Math.floor(this.now().getTime() / 1000),
      question,
      result,
    };
    await this.storage.save(sessionNamespace(sessionId), runId, JSON.stringify(record));
    this.logger.info('Run saved', { runId, hasAnswer: result.final_answer !== undefined });
    return record;
  }

  /**
   * Summaries of a session's runs, newest first
   */
  async listRuns(sessionId: SessionId): Promise<RunSummary[]> {
    const objects = await this.storage.list(sessionNamespace(sessionId));
    const summaries: RunSummary[] = [];

    for (const object of objects) {
      const record = await this.readRun(sessionId, object.key);
      if (!record) continue;
      summaries.push({
        id: record.id,
        ts: record.ts,
        question: record.question,
        has_answer: Boolean(record.result.final_answer),
      });
    }

    return summaries.sort((a, b) => b.ts - a.ts);
  }

  /**
   * @throws RunNotFoundError if the session has no such run
   */
  async getRun(sessionId: SessionId, runId: RunId): Promise<RunRecord> {
    const record = isValidRunId(runId) ? await this.readRun(sessionId, runId) : null;
    if (!record) {
      throw new RunNotFoundError(`Run not found: ${runId}`);
    }
    return record;
  }

  /**
   * Delete every run of a session. Existing share links stop resolving.
   */
  async clearRuns(sessionId: SessionId): Promise<void> {
    await this.storage.delete(sessionNamespace(sessionId));
    this.logger.info('Session runs cleared');
  }

  /**
   * Create a share link for one of the session's runs
   *
   * @throws RunNotFoundError if the session has no such run
   */
  async createShare(runId: RunId, sessionId: SessionId): Promise<string> {
    if (!isValidRunId(runId) || !(await this.storage.exists(sessionNamespace(sessionId), runId))) {
      throw new RunNotFoundError(`Run not found: ${runId}`);
    }

    const shareId = generateRunId();
    const record: ShareRecord = {
      run_id: runId,
      session_id: sessionId,
      created_at: this.now().toISOString(),
    };
    await this.storage.save(SHARES_NAMESPACE, shareId, JSON.stringify(record));
    this.logger.info('Share created', { runId, shareId });
    return shareId;
  }

  /**
   * Resolve a share id to its run
   *
   * @throws RunNotFoundError if the share or its run no longer exists
   */
  async getShared(shareId: string): Promise<RunRecord> {
    if (!isValidRunId(shareId)) {
      throw new RunNotFoundError(`Share not found: ${shareId}`);
    }

    const share = await this.readJson(SHARES_NAMESPACE, shareId, ShareRecordSchema);
    if (!share) {
      throw new RunNotFoundError(`Share not found: ${shareId}`);
    }

    const run = await this.readRun(share.session_id, share.run_id);
    if (!run) {
      throw new RunNotFoundError(`Run not found for share: ${shareId}`);
    }
    return run;
  }

  private async readRun(sessionId: SessionId, runId: RunId): Promise<RunRecord | null> {
    return this.readJson(sessionNamespace(sessionId), runId, RunRecordSchema);
  }

  private async readJson<T>(
    namespace: string,
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T | null> {
    let content: string;
    try {
      ({ content } = await this.storage.load(namespace, key));
    } catch (error) {
      if (error instanceof ObjectNotFoundError) {
        return null;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      if (error instanceof SyntaxError) {
        this.logger.warn('Stored record is not valid JSON', { namespace, key, error: error.message });
        return null;
      }
      throw error;
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('Stored record failed validation', { namespace, key });
      return null;
    }
    return parsed.data;
  }
}
