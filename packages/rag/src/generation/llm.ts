/**
 * Chat Completion Client
 *
 * OpenAI-compatible chat completions through LlamaIndex, blocking and
 * streaming. Errors are classified so callers can tell a transient outage
 * from a rejected request.
 *
 * @module @docpilot/rag/generation/llm
 */

import { OpenAI } from '@llamaindex/openai';
import { AbortError, withRetry, withTimeout, type RetryOptions } from '@docpilot/database';
import type { ChatMessage, ComponentHealth } from '../types';

// ============================================================================
// Error Types
// ============================================================================

export type CompletionErrorType =
  | 'CONNECTION_ERROR'
  | 'TIMEOUT_ERROR'
  | 'RATE_LIMIT_ERROR'
  | 'MODEL_ERROR'
  | 'CONTEXT_LENGTH_ERROR'
  | 'SERVICE_UNAVAILABLE'
  | 'UNKNOWN_ERROR';

export class CompletionServiceError extends Error {
  public readonly errorType: CompletionErrorType;
  public readonly retryable: boolean;
  public readonly statusCode?: number;

  constructor(
    message: string,
    errorType: CompletionErrorType,
    options: { retryable?: boolean; statusCode?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'CompletionServiceError';
    this.errorType = errorType;
    this.retryable = options.retryable ?? false;
    this.statusCode = options.statusCode;
  }
}

interface ErrorRule {
  type: CompletionErrorType;
  markers: string[];
  message: string;
  retryable: boolean;
}

const ERROR_RULES: ErrorRule[] = [
  {
    type: 'CONNECTION_ERROR',
    markers: ['econnrefused', 'enotfound', 'econnreset', 'network', 'connection refused', 'fetch failed'],
    message: 'Completion service is unreachable.',
    retryable: true,
  },
  {
    type: 'TIMEOUT_ERROR',
    markers: ['timeout', 'timed out', 'etimedout'],
    message: 'Completion request timed out.',
    retryable: true,
  },
  {
    type: 'RATE_LIMIT_ERROR',
    markers: ['rate limit', 'too many requests', '429'],
    message: 'Completion rate limit exceeded.',
    retryable: true,
  },
  {
    type: 'CONTEXT_LENGTH_ERROR',
    markers: ['context length', 'maximum context', 'too long', 'token limit'],
    message: 'Request exceeds the model context length limit.',
    retryable: false,
  },
  {
    type: 'MODEL_ERROR',
    markers: ['model not found', 'model_not_found', 'invalid model', 'does not exist'],
    message: 'Requested model is not available.',
    retryable: false,
  },
  {
    type: 'SERVICE_UNAVAILABLE',
    markers: ['500', '502', '503', '504', 'bad gateway', 'service unavailable', 'overloaded'],
    message: 'Completion service is temporarily unavailable.',
    retryable: true,
  },
];

/**
 * Map any error thrown by the client onto a CompletionServiceError
 */
export function classifyCompletionError(error: unknown): CompletionServiceError {
  if (error instanceof CompletionServiceError) return error;

  const original = error instanceof Error ? error.message : String(error);
  const lower = original.toLowerCase();
  const rule = ERROR_RULES.find((r) => r.markers.some((marker) => lower.includes(marker)));

  if (!rule) {
    return new CompletionServiceError(original || 'Unknown completion service error', 'UNKNOWN_ERROR', {
      cause: error,
    });
  }
  return new CompletionServiceError(`${rule.message} (${original})`, rule.type, {
    retryable: rule.retryable,
    cause: error,
  });
}

// ============================================================================
// Service
// ============================================================================

export interface ChatCompletionService {
  complete(messages: ChatMessage[], signal?: AbortSignal): Promise<string>;
  /** Text fragments as the model produces them; breaking out closes the upstream stream */
  stream(messages: ChatMessage[], signal?: AbortSignal): AsyncIterable<string>;
}

export interface CompletionClientConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  /** Longest wait for the next streamed fragment */
  streamIdleTimeoutMs: number;
  retry: Pick<RetryOptions, 'maxRetries' | 'initialDelayMs' | 'maxDelayMs' | 'sleep'>;
}

const DEFAULT_CONFIG: CompletionClientConfig = {
  baseUrl: 'http://localhost:8000/v1',
  model: 'gpt-4o-mini',
  maxTokens: 2048,
  temperature: 0.2,
  timeoutMs: 120000,
  streamIdleTimeoutMs: 30000,
  retry: { maxRetries: 2, initialDelayMs: 1000, maxDelayMs: 10000 },
};

/**
 * Flatten LlamaIndex message content (string or content parts) to text
 */
export function contentToText(content: unknown): string {
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return '';

  return content
    .map((part: unknown) =>
      typeof part === 'object' && part !== null && 'text' in part && typeof part.text === 'string'
        ? part.text
        : ''
    )
    .join('');
}

export class OpenAICompletionService implements ChatCompletionService {
  private config: CompletionClientConfig;
  private client: OpenAI;

  constructor(config: Partial<CompletionClientConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.client = new OpenAI({
      apiKey: this.config.apiKey || 'not-needed',
      additionalSessionOptions: {
        baseURL: this.config.baseUrl,
      },
      model: this.config.model,
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
    });
  }

  async complete(messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
    return withRetry(
      async () => {
        try {
          const response = await withTimeout(
            () => this.client.chat({ messages: messages.map((m) => ({ role: m.role, content: m.content })) }),
            this.config.timeoutMs,
            'Chat completion',
            signal
          );
          return contentToText(response.message.content);
        } catch (error) {
          if (error instanceof AbortError) throw error;
          throw classifyCompletionError(error);
        }
      },
      {
        ...this.config.retry,
        signal,
        label: 'Chat completion',
        shouldRetry: (error) => error instanceof CompletionServiceError && error.retryable,
      }
    );
  }

  async *stream(messages: ChatMessage[], signal?: AbortSignal): AsyncGenerator<string> {
    const upstream = (await this.openStream(messages, signal))[Symbol.asyncIterator]();

    try {
      while (true) {
        const next = await withTimeout(
          () => upstream.next(),
          this.config.streamIdleTimeoutMs,
          'Chat completion stream',
          signal
        );
        if (next.done) return;
        if (next.value.delta) yield next.value.delta;
      }
    } catch (error) {
      if (error instanceof AbortError) throw error;
      throw classifyCompletionError(error);
    } finally {
      // a pending next() keeps the generator busy; closing is queued behind it
      upstream.return?.().catch((error: unknown) => {
        console.warn(`[llm] Closing the completion stream failed: ${classifyCompletionError(error).message}`);
      });
    }
  }

  private async openStream(messages: ChatMessage[], signal?: AbortSignal) {
    try {
      return await withTimeout(
        () =>
          this.client.chat({
            messages: messages.map((m) => ({ role: m.role, content: m.content })),
            stream: true,
          }),
        this.config.timeoutMs,
        'Chat completion stream',
        signal
      );
    } catch (error) {
      if (error instanceof AbortError) throw error;
      throw classifyCompletionError(error);
    }
  }

  async healthCheck(): Promise<ComponentHealth> {
    const start = Date.now();
    try {
      await this.complete([{ role: 'user', content: 'Say "ok"' }]);
      return { healthy: true, latencyMs: Date.now() - start };
    } catch (error) {
      return {
        healthy: false,
        latencyMs: Date.now() - start,
        message: classifyCompletionError(error).message,
      };
    }
  }

  get model(): string {
    return this.config.model;
  }
}

export function createCompletionService(
  config: Partial<CompletionClientConfig> = {}
): OpenAICompletionService {
  return new OpenAICompletionService(config);
}
