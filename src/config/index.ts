/**
 * Configuration Module
 *
 * Resolves the read-only engine configuration snapshot shared by the three
 * analysis tasks. Values come from an explicit partial object, from the
 * environment, or from defaults.
 *
 * Key behaviors:
 * - Invalid values never abort: they are replaced by the default and logged
 * - A direct endpoint is only active when base URL, API key and model are all set
 * - The resolved object is frozen and never mutated by the engine
 *
 * Usage:
 * ```typescript
 * const config = loadEngineConfigFromEnv(process.env);
 * const analysis = await analyzeChat(messages, { config, host });
 * ```
 */

import { z } from 'zod';
import type { AnalysisTask, Logger } from '../types/index.js';
import { createConsoleLogger } from '../logging/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * OpenAI-chat-style endpoint configured directly by the operator
 */
export interface DirectEndpointConfig {
  baseUrl: string;
  apiKey: string;
  modelName: string;
}

export interface ProviderConfig {
  /** Per-attempt timeout in seconds */
  timeoutSeconds: number;
  /** Attempt budget; 0 still makes one attempt */
  retries: number;
  /** Linear backoff base in seconds: sleep = backoffBase * attempt */
  backoffBase: number;
  /** Absent selects the host-managed provider */
  directEndpoint?: DirectEndpointConfig;
}

export interface GenerationSettings {
  maxOutputTokens: number;
  temperature: number;
}

export interface QualityThresholds {
  /** Minimum trimmed length in code points */
  minLength: number;
  /** Maximum trimmed length in code points, Infinity for none */
  maxLength: number;
  /** Drop text that is nothing but a URL */
  dropBareUrls: boolean;
  /** Drop text whose emoji share exceeds this ratio, 1 disables the check */
  maxEmojiDensity: number;
}

export interface EngineConfig {
  provider: ProviderConfig;
  limits: Record<AnalysisTask, number>;
  generation: Record<AnalysisTask, GenerationSettings>;
  filters: Record<AnalysisTask, QualityThresholds>;
  /** Minimum messages a sender needs before receiving a title */
  minMessagesForTitle: number;
  /** IANA zone used for [HH:MM] transcript stamps and night-activity hours */
  timeZone: string;
  enabledTasks: Record<AnalysisTask, boolean>;
  /** Substitute a placeholder topic when nothing could be parsed */
  fallbackTopic: boolean;
}

/**
 * Loosely typed configuration input: the structure is known, leaf values are
 * validated at run time (environment variables arrive as strings).
 */
export type EngineConfigInput<T = EngineConfig> = T extends object
  ? { [K in keyof T]?: EngineConfigInput<T[K]> }
  : T extends undefined
    ? undefined
    : unknown;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  provider: {
    timeoutSeconds: 30,
    retries: 2,
    backoffBase: 2,
  },
  limits: {
    topics: 5,
    user_titles: 8,
    quotes: 5,
  },
  generation: {
    topics: { maxOutputTokens: 10000, temperature: 0.6 },
    user_titles: { maxOutputTokens: 1500, temperature: 0.5 },
    quotes: { maxOutputTokens: 8000, temperature: 0.7 },
  },
  filters: {
    topics: { minLength: 3, maxLength: Infinity, dropBareUrls: false, maxEmojiDensity: 1 },
    user_titles: { minLength: 1, maxLength: Infinity, dropBareUrls: false, maxEmojiDensity: 1 },
    quotes: { minLength: 10, maxLength: 200, dropBareUrls: true, maxEmojiDensity: 1 / 3 },
  },
  minMessagesForTitle: 5,
  timeZone: 'UTC',
  enabledTasks: {
    topics: true,
    user_titles: true,
    quotes: true,
  },
  fallbackTopic: true,
};

// ============================================================================
// Zod Field Schemas
// ============================================================================

const PositiveInt = z.coerce.number().int().positive();
const NonNegativeInt = z.coerce.number().int().nonnegative();
const Temperature = z.coerce.number().min(0).max(2);
const Ratio = z.coerce.number().min(0).max(1);
const Flag = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform((v) => v === 'true' || v === '1'),
]);
const Length = z.union([z.literal(Infinity), NonNegativeInt]);

const TimeZone = z.string().trim().min(1).refine(
  (zone) => {
    try {
      new Intl.DateTimeFormat('en-GB', { timeZone: zone });
      return true;
    } catch {
      return false;
    }
  },
  { message: 'timeZone must be a valid IANA time zone' }
);

const DirectEndpointSchema = z.object({
  baseUrl: z.string().trim().url(),
  apiKey: z.string().trim().min(1),
  modelName: z.string().trim().min(1),
});

// ============================================================================
// Resolution
// ============================================================================

/**
 * Validate one value, falling back to the default with a warning
 */
function pick<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  fallback: z.output<S>,
  field: string,
  logger: Logger
): z.output<S> {
  if (value === undefined) {
    return fallback;
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    logger.warn(`Invalid ${field} value, using default`, {
      field,
      value,
      default: fallback,
      issue: result.error.issues[0]?.message,
    });
    return fallback;
  }
  return result.data;
}

function hasText(value: unknown): boolean {
  return typeof value === 'string' && value.trim().length > 0;
}

function resolveDirectEndpoint(
  input: EngineConfigInput<DirectEndpointConfig> | undefined,
  logger: Logger
): DirectEndpointConfig | undefined {
  if (!input) {
    return undefined;
  }

  const hasBaseUrl = hasText(input.baseUrl);
  const hasApiKey = hasText(input.apiKey);
  const hasModelName = hasText(input.modelName);

  if (!hasBaseUrl && !hasApiKey && !hasModelName) {
    return undefined;
  }

  const result = DirectEndpointSchema.safeParse(input);
  if (!result.success) {
    logger.warn('Direct endpoint config incomplete, falling back to host-managed provider', {
      hasBaseUrl,
      hasApiKey,
      hasModelName,
    });
    return undefined;
  }
  return result.data;
}

function mapTasks<T>(resolveOne: (task: AnalysisTask) => T): Record<AnalysisTask, T> {
  return {
    topics: resolveOne('topics'),
    user_titles: resolveOne('user_titles'),
    quotes: resolveOne('quotes'),
  };
}

/**
 * Merge a partial configuration over the defaults, validating every field
 */
export function resolveEngineConfig(
  input: EngineConfigInput = {},
  logger: Logger = createConsoleLogger('config')
): EngineConfig {
  const defaults = DEFAULT_ENGINE_CONFIG;
  const providerInput = input.provider;

  const directEndpoint = resolveDirectEndpoint(providerInput?.directEndpoint, logger);
  const provider: ProviderConfig = {
    timeoutSeconds: pick(PositiveInt, providerInput?.timeoutSeconds, defaults.provider.timeoutSeconds, 'provider.timeoutSeconds', logger),
    retries: pick(NonNegativeInt, providerInput?.retries, defaults.provider.retries, 'provider.retries', logger),
    backoffBase: pick(PositiveInt, providerInput?.backoffBase, defaults.provider.backoffBase, 'provider.backoffBase', logger),
    ...(directEndpoint ? { directEndpoint } : {}),
  };

  const limits = mapTasks((task) =>
    pick(PositiveInt, input.limits?.[task], defaults.limits[task], `limits.${task}`, logger)
  );

  const generation = mapTasks((task): GenerationSettings => {
    const value = input.generation?.[task];
    const base = defaults.generation[task];
    return {
      maxOutputTokens: pick(PositiveInt, value?.maxOutputTokens, base.maxOutputTokens, `generation.${task}.maxOutputTokens`, logger),
      temperature: pick(Temperature, value?.temperature, base.temperature, `generation.${task}.temperature`, logger),
    };
  });

  const filters = mapTasks((task): QualityThresholds => {
    const value = input.filters?.[task];
    const base = defaults.filters[task];
    return {
      minLength: pick(NonNegativeInt, value?.minLength, base.minLength, `filters.${task}.minLength`, logger),
      maxLength: pick(Length, value?.maxLength, base.maxLength, `filters.${task}.maxLength`, logger),
      dropBareUrls: pick(Flag, value?.dropBareUrls, base.dropBareUrls, `filters.${task}.dropBareUrls`, logger),
      maxEmojiDensity: pick(Ratio, value?.maxEmojiDensity, base.maxEmojiDensity, `filters.${task}.maxEmojiDensity`, logger),
    };
  });

  const enabledTasks = mapTasks((task) =>
    pick(Flag, input.enabledTasks?.[task], defaults.enabledTasks[task], `enabledTasks.${task}`, logger)
  );

  const config: EngineConfig = {
    provider,
    limits,
    generation,
    filters,
    minMessagesForTitle: pick(PositiveInt, input.minMessagesForTitle, defaults.minMessagesForTitle, 'minMessagesForTitle', logger),
    timeZone: pick(TimeZone, input.timeZone, defaults.timeZone, 'timeZone', logger),
    enabledTasks,
    fallbackTopic: pick(Flag, input.fallbackTopic, defaults.fallbackTopic, 'fallbackTopic', logger),
  };

  return Object.freeze(config);
}

/**
 * Environment variables read by loadEngineConfigFromEnv
 */
export const ENV_KEYS = {
  timeoutSeconds: 'CHAT_DIGEST_LLM_TIMEOUT',
  retries: 'CHAT_DIGEST_LLM_RETRIES',
  backoffBase: 'CHAT_DIGEST_LLM_BACKOFF',
  baseUrl: 'CHAT_DIGEST_API_BASE_URL',
  apiKey: 'CHAT_DIGEST_API_KEY',
  modelName: 'CHAT_DIGEST_MODEL',
  maxTopics: 'CHAT_DIGEST_MAX_TOPICS',
  maxUserTitles: 'CHAT_DIGEST_MAX_USER_TITLES',
  maxQuotes: 'CHAT_DIGEST_MAX_QUOTES',
  timeZone: 'CHAT_DIGEST_TIMEZONE',
} as const;

/**
 * Build the configuration from environment variables.
 * Empty strings count as unset.
 */
export function loadEngineConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
  logger: Logger = createConsoleLogger('config')
): EngineConfig {
  const read = (key: string): string | undefined => {
    const value = env[key]?.trim();
    return value ? value : undefined;
  };

  // Numeric strings are coerced by the field schemas
  const partial: EngineConfigInput = {
    provider: {
      timeoutSeconds: read(ENV_KEYS.timeoutSeconds),
      retries: read(ENV_KEYS.retries),
      backoffBase: read(ENV_KEYS.backoffBase),
      directEndpoint: {
        baseUrl: read(ENV_KEYS.baseUrl),
        apiKey: read(ENV_KEYS.apiKey),
        modelName: read(ENV_KEYS.modelName),
      },
    },
    limits: {
      topics: read(ENV_KEYS.maxTopics),
      user_titles: read(ENV_KEYS.maxUserTitles),
      quotes: read(ENV_KEYS.maxQuotes),
    },
    timeZone: read(ENV_KEYS.timeZone),
  };

  return resolveEngineConfig(partial, logger);
}
