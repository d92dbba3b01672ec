/**
 * Provider Gateway Module
 *
 * Sends one prompt to the language model and returns a normalized
 * ProviderResponse. Two provider variants exist:
 *
 * - Host-managed: the embedding environment's own completion capability,
 *   injected as a HostCompletionSource
 * - Direct-HTTP: an OpenAI-chat-style endpoint configured by the operator
 *
 * Variant selection happens once per call from configuration presence.
 * Every attempt is bounded by the request timeout; failed attempts are
 * retried with linear backoff. invokeProvider never rejects.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type {
  Logger,
  Metrics,
  ModuleResult,
  ProviderRequest,
  ProviderResponse,
  RunId,
} from '../types/index.js';
import type { DirectEndpointConfig, ProviderConfig } from '../config/index.js';
import { createConsoleLogger, describeError, noopMetrics } from '../logging/index.js';

// ============================================================================
// Errors
// ============================================================================

export type ProviderErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'TIMEOUT'
  | 'PROVIDER_FORMAT_ERROR'
  | 'CANCELLED';

/**
 * Base class for every failure a provider attempt can raise
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    readonly code: ProviderErrorCode,
    readonly retryable: boolean
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/** Missing or unusable provider setup; never retried */
export class ConfigurationError extends ProviderError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', false);
    this.name = 'ConfigurationError';
  }
}

export class TransportError extends ProviderError {
  constructor(message: string, readonly status?: number) {
    super(message, 'TRANSPORT_ERROR', true);
    this.name = 'TransportError';
  }
}

export class TimeoutError extends ProviderError {
  constructor(readonly timeoutSeconds: number) {
    super(`Provider did not answer within ${timeoutSeconds}s`, 'TIMEOUT', true);
    this.name = 'TimeoutError';
  }
}

/** The provider answered, but not in the expected shape */
export class ProviderFormatError extends ProviderError {
  constructor(message: string) {
    super(message, 'PROVIDER_FORMAT_ERROR', true);
    this.name = 'ProviderFormatError';
  }
}

export class CancelledError extends ProviderError {
  constructor() {
    super('Provider call cancelled by caller', 'CANCELLED', false);
    this.name = 'CancelledError';
  }
}

// ============================================================================
// Provider Variants
// ============================================================================

export interface HostCompletionRequest {
  prompt: string;
  maxTokens: number;
  temperature: number;
  signal: AbortSignal;
}

export interface HostCompletion {
  completionText: string;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

/**
 * Completion capability offered by the embedding environment
 */
export interface HostCompletionSource {
  textChat(request: HostCompletionRequest): Promise<HostCompletion>;
}

export type ProviderKind = 'host' | 'direct';

export interface CompletionProvider {
  readonly kind: ProviderKind;
  invoke(request: ProviderRequest, signal: AbortSignal): Promise<ProviderResponse>;
}

const TokenCount = z.number().int().nonnegative().catch(0);

const UsageSchema = z
  .object({
    prompt_tokens: TokenCount,
    completion_tokens: TokenCount,
    total_tokens: TokenCount,
  })
  .optional()
  .catch(undefined);

const HostCompletionSchema = z.object({
  completionText: z.string(),
  usage: UsageSchema,
});

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      })
    )
    .min(1),
  usage: UsageSchema,
});

type Usage = z.infer<typeof UsageSchema>;

function toProviderResponse(completionText: string, usage: Usage): ProviderResponse {
  return {
    completion_text: completionText,
    prompt_tokens: usage?.prompt_tokens ?? 0,
    completion_tokens: usage?.completion_tokens ?? 0,
    total_tokens: usage?.total_tokens ?? 0,
  };
}

export class HostManagedProvider implements CompletionProvider {
  readonly kind = 'host';

  constructor(private readonly source: HostCompletionSource | undefined) {}

  async invoke(request: ProviderRequest, signal: AbortSignal): Promise<ProviderResponse> {
    if (!this.source) {
      throw new ConfigurationError('No host completion source is available and no direct endpoint is configured');
    }

    let completion: unknown;
    try {
      completion = await this.source.textChat({
        prompt: request.prompt_text,
        maxTokens: request.max_output_tokens,
        temperature: request.temperature,
        signal,
      });
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      throw new TransportError(`Host completion failed: ${describeError(error).message}`);
    }

    const parsed = HostCompletionSchema.safeParse(completion);
    if (!parsed.success) {
      throw new ProviderFormatError('Host completion carries no completion text');
    }
    return toProviderResponse(parsed.data.completionText, parsed.data.usage);
  }
}

const CHAT_COMPLETIONS_PATH = '/chat/completions';

/**
 * The base URL is used as given when its path already names the chat
 * completions endpoint; otherwise the path is appended ahead of any query.
 */
export function resolveChatCompletionsUrl(baseUrl: string): string {
  const trimmed = baseUrl.trim();

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    const bare = trimmed.replace(/\/+$/, '');
    return bare.endsWith(CHAT_COMPLETIONS_PATH) ? bare : `${bare}${CHAT_COMPLETIONS_PATH}`;
  }

  const path = url.pathname.replace(/\/+$/, '');
  if (path.endsWith(CHAT_COMPLETIONS_PATH)) {
    return trimmed;
  }
  url.pathname = `${path}${CHAT_COMPLETIONS_PATH}`;
  return url.toString();
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export class DirectHttpProvider implements CompletionProvider {
  readonly kind = 'direct';

  constructor(
    private readonly endpoint: DirectEndpointConfig,
    private readonly client: AxiosInstance = axios.create()
  ) {}

  async invoke(request: ProviderRequest, signal: AbortSignal): Promise<ProviderResponse> {
    const url = resolveChatCompletionsUrl(this.endpoint.baseUrl);

    let status: number;
    let data: unknown;
    try {
      const response = await this.client.post<unknown>(
        url,
        {
          model: this.endpoint.modelName,
          messages: [{ role: 'user', content: request.prompt_text }],
          max_tokens: request.max_output_tokens,
          temperature: request.temperature,
        },
        {
          headers: {
            Authorization: `Bearer ${this.endpoint.apiKey}`,
            'Content-Type': 'application/json',
          },
          timeout: request.timeout_seconds * 1000,
          signal,
          validateStatus: () => true,
        }
      );
      status = response.status;
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.code && TIMEOUT_CODES.has(error.code)) {
        throw new TimeoutError(request.timeout_seconds);
      }
      throw new TransportError(`Request to ${url} failed: ${describeError(error).message}`);
    }

    if (status < 200 || status >= 300) {
      throw new TransportError(`Endpoint answered HTTP ${status}`, status);
    }

    const parsed = ChatCompletionSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderFormatError('Response has no choices[0].message.content string');
    }

    const [choice] = parsed.data.choices;
    if (!choice) {
      throw new ProviderFormatError('Response has no choices');
    }
    return toProviderResponse(choice.message.content, parsed.data.usage);
  }
}

export interface ProviderSelection {
  config: ProviderConfig;
  host?: HostCompletionSource;
  httpClient?: AxiosInstance;
}

/**
 * A configured direct endpoint wins; otherwise the host source is used
 */
export function selectProvider(selection: ProviderSelection): CompletionProvider {
  const endpoint = selection.config.directEndpoint;
  if (endpoint) {
    return new DirectHttpProvider(endpoint, selection.httpClient);
  }
  return new HostManagedProvider(selection.host);
}

// ============================================================================
// Retry Loop
// ============================================================================

export interface GatewayContext extends ProviderSelection {
  logger?: Logger;
  metrics?: Metrics;
  /** Aborts the in-flight attempt and stops retrying */
  signal?: AbortSignal;
  /** Replaceable for tests; the signal is the caller's */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  runId?: RunId;
}

export interface ProviderFailureDetails {
  attempts: number;
  lastErrorClass: string;
  lastErrorMessage: string;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Wait out a backoff delay, returning early once the caller cancels
 */
async function backoff(
  wait: (ms: number, signal?: AbortSignal) => Promise<void>,
  ms: number,
  signal: AbortSignal | undefined
): Promise<void> {
  if (!signal) {
    await wait(ms);
    return;
  }
  if (signal.aborted) {
    return;
  }

  let onAbort: (() => void) | undefined;
  const cancelled = new Promise<void>((resolve) => {
    onAbort = resolve;
    signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    await Promise.race([wait(ms, signal), cancelled]);
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Run one attempt, racing it against the timeout and the caller's signal.
 * The attempt's own signal is aborted once the race settles.
 */
async function runAttempt(
  provider: CompletionProvider,
  request: ProviderRequest,
  callerSignal: AbortSignal | undefined
): Promise<ProviderResponse> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(request.timeout_seconds)), request.timeout_seconds * 1000);
  });

  const cancelled = new Promise<never>((_, reject) => {
    onAbort = () => reject(new CancelledError());
    callerSignal?.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([provider.invoke(request, controller.signal), timeout, cancelled]);
  } finally {
    clearTimeout(timer);
    if (onAbort) {
      callerSignal?.removeEventListener('abort', onAbort);
    }
    controller.abort();
  }
}

/**
 * Invoke the selected provider with timeout, retry and linear backoff.
 *
 * Attempts = max(1, retries). After a retryable failure the gateway sleeps
 * backoffBase * attempt seconds, except after the last attempt.
 */
export async function invokeProvider(
  request: ProviderRequest,
  context: GatewayContext
): Promise<ModuleResult<ProviderResponse>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();
  const logger = context.logger ?? createConsoleLogger('provider-gateway');
  const metrics = context.metrics ?? noopMetrics;
  const wait = context.sleep ?? sleep;
  const runId = context.runId ?? '';
  const { config, signal } = context;

  const provider = selectProvider(context);
  const attempts = Math.max(1, config.retries);
  const tags = { provider: provider.kind };

  const fail = (code: string, message: string, details: ProviderFailureDetails): ModuleResult<ProviderResponse> => ({
    success: false,
    error: { code, message, details },
    metadata: {
      runId,
      module: 'provider-gateway',
      timestamp,
      duration: Date.now() - startTime,
    },
  });

  let lastError: ProviderError | undefined;
  let attempt = 0;

  while (attempt < attempts) {
    if (signal?.aborted) {
      lastError = new CancelledError();
      break;
    }
    attempt++;

    logger.debug('Calling provider', {
      runId,
      provider: provider.kind,
      attempt,
      attempts,
      promptLength: request.prompt_text.length,
    });
    metrics.increment('provider.attempts', tags);

    try {
      const response = await runAttempt(provider, request, signal);

      logger.info('Provider call succeeded', {
        runId,
        provider: provider.kind,
        attempt,
        completionLength: response.completion_text.length,
        totalTokens: response.total_tokens,
      });
      metrics.timing('provider.duration', Date.now() - startTime, tags);

      return {
        success: true,
        data: response,
        metadata: {
          runId,
          module: 'provider-gateway',
          timestamp,
          duration: Date.now() - startTime,
        },
      };
    } catch (error) {
      lastError = error instanceof ProviderError
        ? error
        : new TransportError(describeError(error).message);

      logger.warn('Provider attempt failed', {
        runId,
        provider: provider.kind,
        attempt,
        attempts,
        errorClass: lastError.name,
        error: lastError.message,
      });

      if (!lastError.retryable) {
        break;
      }

      if (attempt < attempts) {
        const delayMs = config.backoffBase * attempt * 1000;
        logger.info(`Waiting ${delayMs / 1000}s before retry`, { runId, attempt });
        await backoff(wait, delayMs, signal);
      }
    }
  }

  const finalError = lastError ?? new TransportError('Provider was never called');
  const details: ProviderFailureDetails = {
    attempts: attempt,
    lastErrorClass: finalError.name,
    lastErrorMessage: finalError.message,
  };

  metrics.increment('provider.failures', { ...tags, code: finalError.code });

  if (finalError.code === 'CANCELLED' || finalError.code === 'CONFIGURATION_ERROR') {
    logger.error('Provider call aborted', { runId, ...details });
    return fail(finalError.code, finalError.message, details);
  }

  logger.error(`All ${attempts} provider attempts failed`, { runId, ...details });
  return fail('PROVIDER_EXHAUSTED', `Provider failed after ${attempt} attempts: ${finalError.message}`, details);
}
