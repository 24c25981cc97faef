/**
 * Claude Agent SDK Client
 *
 * Wraps the @anthropic-ai/claude-agent-sdk for one-shot, tool-less prompts
 * (structured extraction). run() aggregates the final result text.
 *
 * NOTE: The Agent SDK spawns the Claude Code CLI bundled with the package as a
 * subprocess and needs ANTHROPIC_API_KEY in the environment.
 */

import { query } from '@anthropic-ai/claude-agent-sdk';
import { truncate } from '../utils/logging';

/**
 * Configuration for the Claude Agent Client
 */
export interface ClaudeAgentClientConfig {
  /** Default timeout in milliseconds */
  defaultTimeoutMs?: number;
  /** Model override passed to the SDK */
  model?: string;
}

/**
 * Options for running a query
 */
export interface ClaudeQueryOptions {
  prompt: string;
  systemPrompt?: string;
  timeout?: number;
  signal?: AbortSignal;
}

/**
 * Result from an aggregated run
 */
export interface ClaudeRunResult {
  response: string;
  sessionId: string;
}

/**
 * Anything that can answer a prompt with text.
 * The fallback extractor depends on this, not on the SDK.
 */
export interface IntelligenceClient {
  run(options: ClaudeQueryOptions): Promise<ClaudeRunResult>;
}

/**
 * Claude Agent SDK Client
 */
export class ClaudeAgentClient implements IntelligenceClient {
  private config: { defaultTimeoutMs: number; model?: string };

  constructor(config: ClaudeAgentClientConfig = {}) {
    this.config = {
      defaultTimeoutMs: config.defaultTimeoutMs ?? 30000,
      model: config.model,
    };
  }

  /**
   * Run a query and return the aggregated response
   */
  async run(options: ClaudeQueryOptions): Promise<ClaudeRunResult> {
    const abortController = new AbortController();
    const timeoutMs = options.timeout ?? this.config.defaultTimeoutMs;
    const timer = setTimeout(() => abortController.abort(), timeoutMs);
    const onAbort = () => abortController.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    let responseText = '';
    let sessionId = '';

    console.log('[ClaudeAgentClient] run() called with prompt:', truncate(options.prompt));

    try {
      for await (const message of query(this.buildQueryOptions(options, abortController))) {
        if (message.type === 'system' && message.subtype === 'init') {
          sessionId = message.session_id;
        }

        if (message.type === 'result') {
          sessionId = message.session_id || sessionId;
          if (message.subtype === 'success') {
            responseText = message.result;
          } else {
            throw new Error(`Claude query ended with ${message.subtype}`);
          }
        }
      }
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }

    console.log('[ClaudeAgentClient] run() completed, response length:', responseText.length);
    return {
      response: responseText,
      sessionId,
    };
  }

  /**
   * Build query options for the SDK
   */
  private buildQueryOptions(
    options: ClaudeQueryOptions,
    abortController: AbortController
  ): Parameters<typeof query>[0] {
    return {
      prompt: options.prompt,
      options: {
        cwd: process.cwd(),
        abortController,
        allowedTools: [],
        maxTurns: 1,
        ...(options.systemPrompt ? { systemPrompt: options.systemPrompt } : {}),
        ...(this.config.model ? { model: this.config.model } : {}),
      },
    };
  }
}

/**
 * Mock Claude client for development without API key.
 * Always answers an extraction prompt with "nothing found".
 */
export class MockClaudeClient implements IntelligenceClient {
  async run(options: ClaudeQueryOptions): Promise<ClaudeRunResult> {
    console.log('[MockClaudeClient] run() called');
    console.log('[MockClaudeClient] Prompt:', truncate(options.prompt));

    return {
      response: JSON.stringify({ email: null, phone: null }),
      sessionId: 'mock-session-' + Date.now(),
    };
  }
}

/**
 * Create a Claude client based on environment
 */
export function createClaudeClient(
  apiKey: string | undefined,
  config?: ClaudeAgentClientConfig
): IntelligenceClient {
  if (!apiKey) {
    console.warn(
      '[ClaudeClient] ANTHROPIC_API_KEY not set, using mock client.'
    );
    return new MockClaudeClient();
  }

  console.log('[ClaudeClient] Using Claude Agent SDK');
  return new ClaudeAgentClient(config);
}
