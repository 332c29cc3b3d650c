/**
 * Session settings store
 *
 * Keeps the credentials a browser session saved through the settings
 * endpoints. Held in process memory; secrets are never echoed back, only
 * whether they are set.
 */

import { CREDENTIAL_FIELDS, type CredentialOverrides } from '../config/index.js';
import type { SessionId } from '../types/index.js';

export interface SessionSettings {
  anthropic_api_key?: string;
  brightdata_api_key?: string;
  reddit_dataset_id?: string;
  reddit_comments_dataset_id?: string;
}

/**
 * What a client may see about its saved settings
 */
export interface SettingsDescription {
  has_anthropic_api_key: boolean;
  has_brightdata_api_key: boolean;
  reddit_dataset_id: string | null;
  reddit_comments_dataset_id: string | null;
}

export class SettingsStore {
  private readonly sessions = new Map<SessionId, SessionSettings>();

  get(sessionId: SessionId): SessionSettings {
    return { ...this.sessions.get(sessionId) };
  }

  /**
   * Set the provided values; null, undefined and blank values leave the
   * saved value untouched
   */
  update(sessionId: SessionId, values: CredentialOverrides): SessionSettings {
    const current = this.get(sessionId);
    for (const field of CREDENTIAL_FIELDS) {
      const value = values[field];
      if (typeof value === 'string' && value.trim().length > 0) {
        current[field] = value.trim();
      }
    }
    this.sessions.set(sessionId, current);
    return { ...current };
  }

  describe(sessionId: SessionId): SettingsDescription {
    const current = this.get(sessionId);
    return {
      has_anthropic_api_key: Boolean(current.anthropic_api_key),
      has_brightdata_api_key: Boolean(current.brightdata_api_key),
      reddit_dataset_id: current.reddit_dataset_id ?? null,
      reddit_comments_dataset_id: current.reddit_comments_dataset_id ?? null,
    };
  }
}
