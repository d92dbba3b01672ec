/**
 * Chat Digest - Main Entry Point
 *
 * Structured extraction of discussion topics, participant titles and notable
 * quotes from a batch of chat messages, with the language model treated as an
 * unreliable text source.
 *
 * Architecture:
 * - Each module is a set of stateless functions with explicit context
 * - Only the provider gateway may fail a whole task; everything else degrades locally
 * - Logger and Metrics are injected; console and no-op defaults apply otherwise
 */

// Core Types
export type * from './types/index.js';
export { ANALYSIS_TASKS } from './types/index.js';

// Configuration
export {
  DEFAULT_ENGINE_CONFIG,
  ENV_KEYS,
  resolveEngineConfig,
  loadEngineConfigFromEnv,
  type EngineConfig,
  type EngineConfigInput,
  type ProviderConfig,
  type DirectEndpointConfig,
  type GenerationSettings,
  type QualityThresholds,
} from './config/index.js';

// Logging
export { createConsoleLogger, noopMetrics, resolveLogLevel } from './logging/index.js';

// Text helpers
export {
  normalizeQuotes,
  sanitizeMessageText,
  countEmoji,
  emojiDensity,
  formatClock,
} from './text/index.js';

// Normalizer Module - Raw record intake
export { normalizeMessages, toUnixSeconds, type NormalizedBatch } from './normalizer/index.js';

// Run Manager Module
export { generateRunId, isValidRunId } from './run-manager/index.js';

// Quality Filter Module
export {
  filterMessages,
  filterMessagesWithStats,
  rejectionReason,
  type DropReason,
  type FilterStats,
  type FilterOutcome,
} from './quality-filter/index.js';

// Participant Activity Module
export {
  computeParticipantActivity,
  selectActiveParticipants,
  describeParticipant,
  type ParticipantActivity,
} from './activity/index.js';

// Extraction Schemas
export {
  TOPIC_SCHEMA,
  USER_TITLE_SCHEMA,
  QUOTE_SCHEMA,
  hasRequiredFields,
  type ExtractionSchema,
  type SchemaField,
  type FieldKind,
  type TopicRecord,
  type UserTitleRecord,
  type QuoteRecord,
} from './schemas/index.js';

// Prompt Builder Module
export {
  buildPrompt,
  renderTemplate,
  formatTranscript,
  formatTranscriptLine,
  defaultPromptsDir,
  type PromptOptions,
} from './prompt-builder/index.js';

// Provider Gateway Module
export {
  invokeProvider,
  selectProvider,
  resolveChatCompletionsUrl,
  HostManagedProvider,
  DirectHttpProvider,
  ProviderError,
  ConfigurationError,
  TransportError,
  TimeoutError,
  ProviderFormatError,
  CancelledError,
  type HostCompletionSource,
  type HostCompletionRequest,
  type HostCompletion,
  type CompletionProvider,
  type GatewayContext,
  type ProviderFailureDetails,
} from './provider-gateway/index.js';
export {
  createAnthropicHostSource,
  type AnthropicHostConfig,
  type AnthropicMessagesClient,
} from './provider-gateway/anthropic-host.js';

// Response Parser Module
export {
  parseCompletion,
  findArraySpan,
  repairJsonArray,
  validateRecords,
  PARSE_TIERS,
  type ParseOutcome,
  type ParseFailure,
} from './response-parser/index.js';

// Result Assembler & Token Accountant
export {
  addTokenUsage,
  sumTokenUsage,
  emptyTokenUsage,
  tokenUsageFromResponse,
  assembleTopics,
  assembleQuotes,
  assembleUserTitles,
  buildSenderLookup,
  fallbackTopic,
} from './assembler/index.js';

// Analysis Tasks
export {
  analyzeChat,
  analyzeTopics,
  analyzeUserTitles,
  analyzeQuotes,
  type AnalysisContext,
} from './analysis/index.js';
