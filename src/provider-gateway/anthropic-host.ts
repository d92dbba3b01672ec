/**
 * Host completion source backed by the Anthropic Messages API, for embedders
 * that bring no completion capability of their own.
 *
 * SDK-level retries are disabled: the gateway owns retry and backoff.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import type { Logger } from '../types/index.js';
import { createConsoleLogger } from '../logging/index.js';
import type { HostCompletion, HostCompletionRequest, HostCompletionSource } from './index.js';

const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
const DEFAULT_TIMEOUT_MS = 120000;

export interface AnthropicHostConfig {
  /** Falls back to ANTHROPIC_API_KEY */
  apiKey?: string;
  /** Falls back to ANTHROPIC_MODEL, then the built-in default */
  model?: string;
  /** SDK request timeout in milliseconds */
  timeout?: number;
  systemPrompt?: string;
}

interface AnthropicReply {
  content: ReadonlyArray<{ type: string; text?: string }>;
  usage?: { input_tokens?: number | null; output_tokens?: number | null } | null;
}

/**
 * The part of the SDK client this source calls
 */
export interface AnthropicMessagesClient {
  messages: {
    create(
      body: MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal }
    ): PromiseLike<AnthropicReply>;
  };
}

const DEFAULT_SYSTEM_PROMPT =
  'You extract structured data from chat transcripts. Output ONLY the JSON array the instructions ask for. No markdown code fences, no explanatory text.';

class AnthropicHostSource implements HostCompletionSource {
  constructor(
    private readonly client: AnthropicMessagesClient,
    private readonly model: string,
    private readonly systemPrompt: string
  ) {}

  async textChat(request: HostCompletionRequest): Promise<HostCompletion> {
    const reply = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: this.systemPrompt,
        messages: [{ role: 'user', content: request.prompt }],
      },
      { signal: request.signal }
    );

    const completionText = reply.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');

    const promptTokens = reply.usage?.input_tokens ?? 0;
    const completionTokens = reply.usage?.output_tokens ?? 0;

    return {
      completionText,
      usage: {
        prompt_tokens: promptTokens,
        completion_tokens: completionTokens,
        total_tokens: promptTokens + completionTokens,
      },
    };
  }
}

/**
 * Build a host source over the Anthropic SDK.
 * Returns undefined, with a warning, when no API key is available.
 */
export function createAnthropicHostSource(
  config: AnthropicHostConfig = {},
  client?: AnthropicMessagesClient,
  logger: Logger = createConsoleLogger('anthropic-host')
): HostCompletionSource | undefined {
  const model = config.model || process.env['ANTHROPIC_MODEL'] || DEFAULT_MODEL;
  const systemPrompt = config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;

  if (client) {
    return new AnthropicHostSource(client, model, systemPrompt);
  }

  const apiKey = config.apiKey || process.env['ANTHROPIC_API_KEY'];
  if (!apiKey) {
    logger.warn('ANTHROPIC_API_KEY is not set; no host completion source available');
    return undefined;
  }

  const sdkClient = new Anthropic({
    apiKey,
    timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
    maxRetries: 0,
  });

  logger.debug('Anthropic host source ready', { model });
  return new AnthropicHostSource(sdkClient, model, systemPrompt);
}
