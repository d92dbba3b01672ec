/**
 * Core type definitions for Chat Digest
 *
 * This module exports all shared types used across the extraction engine.
 */

/**
 * Identifier for one analysis invocation, used to correlate log lines
 * Format: run_<16 hex chars>
 */
export type RunId = string;

/**
 * The three analysis tasks that share the extraction pipeline
 */
export type AnalysisTask = 'topics' | 'user_titles' | 'quotes';

export const ANALYSIS_TASKS: readonly AnalysisTask[] = ['topics', 'user_titles', 'quotes'];

// ============================================================================
// Input Data Model
// ============================================================================

/**
 * Normalized chat message handed over by the upstream message source.
 * The engine never mutates it.
 */
export interface Message {
  readonly id: string;
  /** Unix timestamp in seconds */
  readonly timestamp: number;
  readonly sender_id: string;
  readonly sender_display_name: string;
  readonly sender_avatar_ref: string;
  readonly text: string;
  /** text, post, reply, system, ... */
  readonly kind: string;
}

// ============================================================================
// Provider Data Model
// ============================================================================

export interface ProviderRequest {
  prompt_text: string;
  max_output_tokens: number;
  temperature: number;
  timeout_seconds: number;
}

/**
 * Normalized completion from either provider variant.
 * Token counters are zero when the provider reports no usage.
 */
export interface ProviderResponse {
  completion_text: string;
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface TokenUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

// ============================================================================
// Extraction Results
// ============================================================================

/**
 * Parsing tier that produced a ParseOutcome
 */
export type ParseTier = 'STRICT' | 'REPAIRED' | 'REGEX' | 'FALLBACK_DEFAULT';

/**
 * Discussion topic extracted from the transcript
 */
export interface Topic {
  title: string;
  participants: string[];
  description: string;
  message_count: number;
}

/**
 * Per-sender activity figures that back a user title
 */
export interface ParticipantMetrics {
  message_count: number;
  char_count: number;
  avg_message_length: number;
  emoji_count: number;
  reply_count: number;
  /** Hour of day (0-23) to message count */
  hourly_distribution: Record<number, number>;
}

/**
 * Behavioral title assigned to one participant
 */
export interface UserTitle {
  subject_id: string;
  display_name: string;
  avatar_ref: string;
  title: string;
  personality_tag: string;
  rationale: string;
  metrics: ParticipantMetrics;
}

/**
 * Notable quotation attributed to a sender
 */
export interface Quote {
  content: string;
  sender_display_name: string;
  sender_avatar_ref: string;
  /** Unix timestamp in seconds, 0 when unknown */
  timestamp: number;
  rationale: string;
}

/**
 * Outcome of one analysis task as handed to the downstream consumer.
 * skipped: task disabled or no candidates survived filtering.
 */
export type TaskStatus = 'completed' | 'skipped' | 'prompt_failed' | 'provider_failed';

export interface TaskResult<T> {
  task: AnalysisTask;
  records: T[];
  token_usage: TokenUsage;
  /** null when no completion was parsed */
  tier: ParseTier | null;
  status: TaskStatus;
}

export interface ChatAnalysis {
  runId: RunId;
  topics: TaskResult<Topic>;
  user_titles: TaskResult<UserTitle>;
  quotes: TaskResult<Quote>;
  token_usage: TokenUsage;
}

// ============================================================================
// Observability
// ============================================================================

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

/**
 * Module result wrapper used at component boundaries that may fail
 */
export interface ModuleResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  metadata: {
    runId: RunId;
    module: string;
    timestamp: string;
    duration?: number;
  };
}
