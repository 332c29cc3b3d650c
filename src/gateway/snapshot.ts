/**
 * Dataset snapshot protocol
 *
 * Slow dataset queries are asynchronous on the provider side:
 * 1. POST /datasets/v3/trigger returns a snapshot_id
 * 2. GET /datasets/v3/progress/{id} until status is "ready" or "failed"
 * 3. GET /datasets/v3/snapshot/{id}?format=json downloads the rows
 *
 * Every function here resolves to null on failure instead of throwing.
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { errorMessage } from '../errors/index.js';
import type { Logger } from '../logging/index.js';

export interface SnapshotPollOptions {
  /** Maximum progress checks before giving up */
  maxAttempts: number;
  /** Delay between progress checks in milliseconds */
  pollDelayMs: number;
}

const TriggerResponseSchema = z.object({
  snapshot_id: z.string().min(1),
});

const ProgressResponseSchema = z.object({
  status: z.string().optional(),
});

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function authHeaders(apiKey: string): Record<string, string> {
  return {
    Authorization: `Bearer ${apiKey}`,
    'Content-Type': 'application/json',
  };
}

/**
 * Trigger a dataset collection job
 *
 * @returns The snapshot id, or null if the trigger request failed
 */
export async function triggerDataset(
  http: AxiosInstance,
  apiKey: string,
  params: Record<string, string>,
  rows: Array<Record<string, unknown>>,
  logger: Logger
): Promise<string | null> {
  try {
    const response = await http.post<unknown>('/datasets/v3/trigger', rows, {
      params,
      headers: authHeaders(apiKey),
    });
    const parsed = TriggerResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      logger.warn('Trigger response did not include a snapshot id', {
        datasetId: params.dataset_id,
      });
      return null;
    }
    return parsed.data.snapshot_id;
  } catch (error) {
    logger.error('Dataset trigger failed', {
      datasetId: params.dataset_id,
      error: errorMessage(error),
    });
    return null;
  }
}

/**
 * Poll snapshot progress until it is ready, failed, or attempts run out
 *
 * Request errors and unknown statuses count as an attempt and are retried
 * after the poll delay.
 *
 * @returns True if the snapshot is ready for download
 */
export async function pollSnapshotStatus(
  http: AxiosInstance,
  apiKey: string,
  snapshotId: string,
  options: SnapshotPollOptions,
  logger: Logger
): Promise<boolean> {
  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      logger.debug('Checking snapshot progress', {
        snapshotId,
        attempt,
        maxAttempts: options.maxAttempts,
      });
      const response = await http.get<unknown>(`/datasets/v3/progress/${snapshotId}`, {
        headers: authHeaders(apiKey),
      });
      const parsed = ProgressResponseSchema.safeParse(response.data);
      const status = parsed.success ? parsed.data.status : undefined;

      if (status === 'ready') {
        logger.info('Snapshot ready', { snapshotId, attempt });
        return true;
      }
      if (status === 'failed') {
        logger.warn('Snapshot failed', { snapshotId, attempt });
        return false;
      }
      if (status !== 'running') {
        logger.warn('Unknown snapshot status', { snapshotId, status: status ?? null });
      }
    } catch (error) {
      logger.warn('Error checking snapshot progress', {
        snapshotId,
        attempt,
        error: errorMessage(error),
      });
    }
    await sleep(options.pollDelayMs);
  }

  logger.error('Timed out waiting for snapshot', {
    snapshotId,
    maxAttempts: options.maxAttempts,
  });
  return false;
}

/**
 * Download a completed snapshot as JSON
 *
 * @returns The parsed body, or null on request failure
 */
export async function downloadSnapshot(
  http: AxiosInstance,
  apiKey: string,
  snapshotId: string,
  logger: Logger
): Promise<unknown> {
  try {
    const response = await http.get<unknown>(`/datasets/v3/snapshot/${snapshotId}`, {
      params: { format: 'json' },
      headers: authHeaders(apiKey),
    });
    const data = response.data;
    logger.info('Snapshot downloaded', {
      snapshotId,
      items: Array.isArray(data) ? data.length : 1,
    });
    return data ?? null;
  } catch (error) {
    logger.error('Snapshot download failed', { snapshotId, error: errorMessage(error) });
    return null;
  }
}

/**
 * Trigger a dataset job, wait for it, and download the result
 *
 * @returns Raw snapshot body, or null if any step failed
 */
export async function triggerAndDownload(
  http: AxiosInstance,
  apiKey: string,
  params: Record<string, string>,
  rows: Array<Record<string, unknown>>,
  options: SnapshotPollOptions,
  logger: Logger
): Promise<unknown> {
  const snapshotId = await triggerDataset(http, apiKey, params, rows, logger);
  if (!snapshotId) {
    return null;
  }

  const ready = await pollSnapshotStatus(http, apiKey, snapshotId, options, logger);
  if (!ready) {
    return null;
  }

  return downloadSnapshot(http, apiKey, snapshotId, logger);
}
