/**
 * Analysis Module
 *
 * The three analysis tasks share one pipeline:
 *
 *   filter -> build prompt -> invoke provider -> parse -> assemble
 *
 * Each task plugs in its own schema, candidate selection and assembly.
 * Tasks hold no shared mutable state, so analyzeChat runs them concurrently.
 * A failed task yields no records and zero usage; it never rejects.
 *
 * Usage:
 * ```typescript
 * const config = loadEngineConfigFromEnv();
 * const host = createAnthropicHostSource();
 * const analysis = await analyzeChat(messages, { config, host });
 * ```
 */

import type { AxiosInstance } from 'axios';
import type {
  AnalysisTask,
  ChatAnalysis,
  Logger,
  Message,
  Metrics,
  ParseTier,
  Quote,
  RunId,
  TaskResult,
  TokenUsage,
  Topic,
  UserTitle,
} from '../types/index.js';
import { resolveEngineConfig, type EngineConfig } from '../config/index.js';
import { createConsoleLogger, noopMetrics } from '../logging/index.js';
import { generateRunId } from '../run-manager/index.js';
import { filterMessagesWithStats } from '../quality-filter/index.js';
import {
  computeParticipantActivity,
  selectActiveParticipants,
  type ParticipantActivity,
} from '../activity/index.js';
import {
  QUOTE_SCHEMA,
  TOPIC_SCHEMA,
  USER_TITLE_SCHEMA,
  type ExtractionSchema,
} from '../schemas/index.js';
import { buildPrompt } from '../prompt-builder/index.js';
import { invokeProvider, type HostCompletionSource } from '../provider-gateway/index.js';
import { parseCompletion } from '../response-parser/index.js';
import {
  assembleQuotes,
  assembleTopics,
  assembleUserTitles,
  buildSenderLookup,
  emptyTokenUsage,
  fallbackTopic,
  sumTokenUsage,
  tokenUsageFromResponse,
} from '../assembler/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface AnalysisContext {
  /** Defaults to resolveEngineConfig() */
  config?: EngineConfig;
  host?: HostCompletionSource;
  httpClient?: AxiosInstance;
  logger?: Logger;
  metrics?: Metrics;
  /** Cancels in-flight provider calls */
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Defaults to a run ID derived from the messages */
  runId?: RunId;
  promptsDir?: string;
}

interface ResolvedContext extends AnalysisContext {
  config: EngineConfig;
  logger: Logger;
  metrics: Metrics;
  runId: RunId;
}

/**
 * Task-specific pieces plugged into the shared pipeline
 */
interface TaskPlan<R, D> {
  schema: ExtractionSchema<R>;
  candidates: readonly Message[];
  participants?: readonly ParticipantActivity[];
  assemble(records: R[]): D[];
  /**
   * Records kept by the parser ahead of assembly; defaults to the task limit.
   * Unbounded where assembly merges records, the task limit applies after it.
   */
  parseLimit?: number;
  /** Records substituted when parsing fell through every tier */
  fallback?(): D[];
}

/** Most recent messages of the selected participants shown to the title task */
const MAX_TITLE_TRANSCRIPT_MESSAGES = 200;

// ============================================================================
// Shared Pipeline
// ============================================================================

function resolveContext(messages: readonly Message[], context: AnalysisContext): ResolvedContext {
  const logger = context.logger ?? createConsoleLogger('analysis');
  return {
    ...context,
    config: context.config ?? resolveEngineConfig({}, logger),
    logger,
    metrics: context.metrics ?? noopMetrics,
    runId: context.runId ?? generateRunId(messages),
  };
}

function chronological(messages: readonly Message[]): Message[] {
  return [...messages].sort((a, b) => a.timestamp - b.timestamp);
}

function emptyResult<D>(task: AnalysisTask, status: TaskResult<D>['status']): TaskResult<D> {
  return { task, records: [], token_usage: emptyTokenUsage(), tier: null, status };
}

async function runTask<R, D>(plan: TaskPlan<R, D>, ctx: ResolvedContext): Promise<TaskResult<D>> {
  const { config, logger, metrics, runId } = ctx;
  const task = plan.schema.task;
  const limit = config.limits[task];
  const generation = config.generation[task];

  if (plan.candidates.length === 0) {
    logger.info('No candidate messages, skipping task', { runId, task });
    metrics.increment('analysis.task.skipped', { task });
    return emptyResult(task, 'skipped');
  }

  const prompt = await buildPrompt(plan.candidates, limit, plan.schema, {
    timeZone: config.timeZone,
    participants: plan.participants,
    promptsDir: ctx.promptsDir,
    runId,
  });
  if (!prompt.success || prompt.data === undefined) {
    logger.error('Failed to build prompt', { runId, task, error: prompt.error?.message });
    metrics.increment('analysis.task.failed', { task, stage: 'prompt' });
    return emptyResult(task, 'prompt_failed');
  }

  const response = await invokeProvider(
    {
      prompt_text: prompt.data,
      max_output_tokens: generation.maxOutputTokens,
      temperature: generation.temperature,
      timeout_seconds: config.provider.timeoutSeconds,
    },
    {
      config: config.provider,
      host: ctx.host,
      httpClient: ctx.httpClient,
      logger,
      metrics,
      signal: ctx.signal,
      sleep: ctx.sleep,
      runId,
    }
  );
  if (!response.success || !response.data) {
    logger.error('Provider failed, task yields no records', {
      runId,
      task,
      code: response.error?.code,
      details: response.error?.details,
    });
    metrics.increment('analysis.task.failed', { task, stage: 'provider' });
    return emptyResult(task, 'provider_failed');
  }

  const usage: TokenUsage = tokenUsageFromResponse(response.data);
  const outcome = parseCompletion(response.data.completion_text, plan.schema, plan.parseLimit ?? limit, logger);
  metrics.increment('analysis.parse.tier', { task, tier: outcome.tier });

  let records = plan.assemble(outcome.records).slice(0, limit);
  const tier: ParseTier = outcome.tier;
  if (tier === 'FALLBACK_DEFAULT' && plan.fallback) {
    records = plan.fallback();
    logger.info('Using fallback records', { runId, task, records: records.length });
  }

  logger.info('Task completed', {
    runId,
    task,
    tier,
    records: records.length,
    candidates: plan.candidates.length,
    totalTokens: usage.total_tokens,
  });

  return { task, records, token_usage: usage, tier, status: 'completed' };
}

function filterFor(task: AnalysisTask, messages: readonly Message[], ctx: ResolvedContext): Message[] {
  const { candidates, stats } = filterMessagesWithStats(messages, task, ctx.config.filters[task]);
  ctx.logger.debug('Filtered candidates', { runId: ctx.runId, task, kept: stats.kept, dropped: stats.dropped });
  return candidates;
}

// ============================================================================
// Tasks
// ============================================================================

async function topicsTask(messages: readonly Message[], ctx: ResolvedContext): Promise<TaskResult<Topic>> {
  if (!ctx.config.enabledTasks.topics) {
    return emptyResult('topics', 'skipped');
  }
  const candidates = filterFor('topics', chronological(messages), ctx);
  return runTask(
    {
      schema: TOPIC_SCHEMA,
      candidates,
      assemble: assembleTopics,
      fallback: ctx.config.fallbackTopic ? () => [fallbackTopic(candidates.length)] : undefined,
    },
    ctx
  );
}

async function userTitlesTask(messages: readonly Message[], ctx: ResolvedContext): Promise<TaskResult<UserTitle>> {
  if (!ctx.config.enabledTasks.user_titles) {
    return emptyResult('user_titles', 'skipped');
  }
  const filtered = filterFor('user_titles', chronological(messages), ctx);
  const participants = selectActiveParticipants(
    computeParticipantActivity(filtered, ctx.config.timeZone),
    ctx.config.minMessagesForTitle,
    ctx.config.limits.user_titles
  );
  const selectedIds = new Set(participants.map((p) => p.sender_id));
  const candidates = filtered
    .filter((m) => selectedIds.has(m.sender_id))
    .slice(-MAX_TITLE_TRANSCRIPT_MESSAGES);

  return runTask(
    {
      schema: USER_TITLE_SCHEMA,
      candidates,
      participants,
      assemble: (records) => assembleUserTitles(records, participants),
      parseLimit: Infinity,
    },
    ctx
  );
}

async function quotesTask(messages: readonly Message[], ctx: ResolvedContext): Promise<TaskResult<Quote>> {
  if (!ctx.config.enabledTasks.quotes) {
    return emptyResult('quotes', 'skipped');
  }
  const candidates = filterFor('quotes', chronological(messages), ctx);
  const lookup = buildSenderLookup(candidates);
  return runTask(
    {
      schema: QUOTE_SCHEMA,
      candidates,
      assemble: (records) => assembleQuotes(records, lookup),
    },
    ctx
  );
}

/**
 * Extract discussion topics
 */
export function analyzeTopics(messages: readonly Message[], context: AnalysisContext = {}): Promise<TaskResult<Topic>> {
  return topicsTask(messages, resolveContext(messages, context));
}

/**
 * Assign behavioral titles to the most active participants
 */
export function analyzeUserTitles(
  messages: readonly Message[],
  context: AnalysisContext = {}
): Promise<TaskResult<UserTitle>> {
  return userTitlesTask(messages, resolveContext(messages, context));
}

/**
 * Pick notable quotations
 */
export function analyzeQuotes(messages: readonly Message[], context: AnalysisContext = {}): Promise<TaskResult<Quote>> {
  return quotesTask(messages, resolveContext(messages, context));
}

/**
 * Run every enabled task concurrently and total their token usage
 */
export async function analyzeChat(messages: readonly Message[], context: AnalysisContext = {}): Promise<ChatAnalysis> {
  const startTime = Date.now();
  const ctx = resolveContext(messages, context);

  ctx.logger.info('Starting chat analysis', { runId: ctx.runId, messages: messages.length });

  const [topics, userTitles, quotes] = await Promise.all([
    topicsTask(messages, ctx),
    userTitlesTask(messages, ctx),
    quotesTask(messages, ctx),
  ]);

  const tokenUsage = sumTokenUsage([topics.token_usage, userTitles.token_usage, quotes.token_usage]);

  ctx.logger.info('Chat analysis finished', {
    runId: ctx.runId,
    topics: topics.records.length,
    userTitles: userTitles.records.length,
    quotes: quotes.records.length,
    totalTokens: tokenUsage.total_tokens,
  });
  ctx.metrics.timing('analysis.duration', Date.now() - startTime);

  return {
    runId: ctx.runId,
    topics,
    user_titles: userTitles,
    quotes,
    token_usage: tokenUsage,
  };
}
