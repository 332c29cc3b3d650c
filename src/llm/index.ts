/**
 * Language Model Client Module
 *
 * Wraps the Anthropic Messages API behind a small interface the pipeline
 * stages depend on:
 * - complete(): free-text reply to a message list
 * - completeStructured(): reply validated against a zod schema, produced by
 *   forcing a single tool call whose input schema is derived from that schema
 *
 * Usage:
 * ```typescript
 * const llm = new AnthropicModelClient({ apiKey });
 * const { content } = await llm.complete(messages);
 * ```
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ConfigurationError } from '../errors/index.js';
import { createLogger, defaultMetrics, type Logger, type Metrics } from '../logging/index.js';
import type { ChatMessage } from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface CompletionResult {
  content: string;
}

/**
 * Named zod schema for structured completions
 */
export interface StructuredOutputSchema<T> {
  name: string;
  description: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * Operations the pipeline needs from a language model
 */
export interface LanguageModelClient {
  complete(messages: readonly ChatMessage[]): Promise<CompletionResult>;
  /** @throws Error when the model output does not match the schema */
  completeStructured<T>(messages: readonly ChatMessage[], schema: StructuredOutputSchema<T>): Promise<T>;
}

/**
 * Configuration for the Anthropic client
 */
export interface ModelClientConfig {
  /** Anthropic API key (from ANTHROPIC_API_KEY env var) */
  apiKey?: string;
  /** Model ID (default: claude-sonnet-4-20250514) */
  model?: string;
  /** Maximum tokens for response (default: 4096) */
  maxTokens?: number;
  /** Temperature for generation (default: 0) */
  temperature?: number;
  /** Request timeout in milliseconds (default: 120000) */
  timeout?: number;
}

/**
 * Minimal shape of a response content block
 */
export interface ResponseBlock {
  type: string;
  text?: string;
  name?: string;
  input?: unknown;
}

interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TEMPERATURE = 0;
const DEFAULT_TIMEOUT = 120000;

// ============================================================================
// Message Helpers
// ============================================================================

/**
 * Separate system messages from the conversation turns.
 * Multiple system messages are joined with a blank line.
 */
export function splitSystemMessages(messages: readonly ChatMessage[]): {
  system: string | undefined;
  turns: ConversationTurn[];
} {
  const systemParts: string[] = [];
  const turns: ConversationTurn[] = [];

  for (const message of messages) {
    if (message.role === 'system') {
      systemParts.push(message.content);
    } else {
      turns.push({ role: message.role, content: message.content });
    }
  }

  return {
    system: systemParts.length > 0 ? systemParts.join('\n\n') : undefined,
    turns,
  };
}

/**
 * Concatenate the text blocks of a response
 *
 * @throws Error if the response has no text block
 */
export function extractText(blocks: readonly ResponseBlock[]): string {
  const parts: string[] = [];
  for (const block of blocks) {
    if (block.type === 'text' && typeof block.text === 'string') {
      parts.push(block.text);
    }
  }
  if (parts.length === 0) {
    throw new Error('No text content in model response');
  }
  return parts.join('');
}

/**
 * Find the input of the named tool call and validate it
 *
 * @throws Error if the tool was not called or its input fails validation
 */
export function extractToolInput<T>(blocks: readonly ResponseBlock[], schema: StructuredOutputSchema<T>): T {
  const toolUse = blocks.find((block) => block.type === 'tool_use' && block.name === schema.name);
  if (!toolUse) {
    throw new Error(`Model response did not call ${schema.name}`);
  }

  const parsed = schema.schema.safeParse(toolUse.input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Malformed ${schema.name} output: ${issues.join('; ')}`);
  }
  return parsed.data;
}

// ============================================================================
// Anthropic Client
// ============================================================================

/**
 * LanguageModelClient backed by the Anthropic Messages API
 */
export class AnthropicModelClient implements LanguageModelClient {
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;

  constructor(
    config: ModelClientConfig = {},
    private readonly logger: Logger = createLogger('llm'),
    private readonly metrics: Metrics = defaultMetrics
  ) {
    const apiKey = config.apiKey || process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError('ANTHROPIC_API_KEY', 'ANTHROPIC_API_KEY is required. Set it in config or environment variable.');
    }

    this.client = new Anthropic({
      apiKey,
      timeout: config.timeout ?? DEFAULT_TIMEOUT,
      maxRetries: 0,
    });
    this.model = config.model || process.env.ANTHROPIC_MODEL || DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
  }

  async complete(messages: readonly ChatMessage[]): Promise<CompletionResult> {
    const { system, turns } = splitSystemMessages(messages);
    const startTime = Date.now();

    this.logger.debug('Calling model', { model: this.model, turns: turns.length });
    this.metrics.increment('llm.calls', { model: this.model, kind: 'text' });

    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: this.temperature,
        ...(system !== undefined ? { system } : {}),
        messages: turns,
      });

      this.recordUsage(startTime, response.usage.input_tokens, response.usage.output_tokens);
      this.logger.info('Model response received', {
        model: this.model,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        stopReason: response.stop_reason,
      });

      return { content: extractText(response.content) };
    } catch (error) {
      this.metrics.increment('llm.errors', { model: this.model, kind: 'text' });
      throw error;
    }
  }

  async completeStructured<T>(messages: readonly ChatMessage[], schema: StructuredOutputSchema<T>): Promise<T> {
    const { system, turns } = splitSystemMessages(messages);
    const startTime = Date.now();
    const jsonSchema = zodToJsonSchema(schema.schema, { $refStrategy: 'none', target: 'jsonSchema7' });

    this.logger.debug('Calling model for structured output', { model: this.model, tool: schema.name });
    this.metrics.increment('llm.calls', { model: this.model, kind: 'structured' });

    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: this.temperature,
        ...(system !== undefined ? { system } : {}),
        messages: turns,
        tools: [
          {
            name: schema.name,
            description: schema.description,
            input_schema: { ...jsonSchema, type: 'object' as const },
          },
        ],
        tool_choice: { type: 'tool', name: schema.name },
      });

      this.recordUsage(startTime, response.usage.input_tokens, response.usage.output_tokens);
      return extractToolInput(response.content, schema);
    } catch (error) {
      this.metrics.increment('llm.errors', { model: this.model, kind: 'structured' });
      throw error;
    }
  }

  /**
   * List model ids visible to the configured key
   */
  async listModels(): Promise<string[]> {
    const page = await this.client.models.list();
    return page.data.map((model) => model.id);
  }

  get modelId(): string {
    return this.model;
  }

  private recordUsage(startTime: number, inputTokens: number, outputTokens: number): void {
    this.metrics.timing('llm.duration', Date.now() - startTime, { model: this.model });
    this.metrics.gauge('llm.input_tokens', inputTokens, { model: this.model });
    this.metrics.gauge('llm.output_tokens', outputTokens, { model: this.model });
  }
}
