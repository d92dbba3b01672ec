/**
 * Result Assembler & Token Accountant
 *
 * Maps validated wire records onto the domain objects handed downstream and
 * keeps the TokenUsage algebra. Unresolved references degrade to empty
 * strings; only records whose primary content is empty are dropped.
 */

import type {
  Message,
  ProviderResponse,
  Quote,
  TokenUsage,
  Topic,
  UserTitle,
} from '../types/index.js';
import type { QuoteRecord, TopicRecord, UserTitleRecord } from '../schemas/index.js';
import {
  emptyParticipantMetrics,
  toParticipantMetrics,
  type ParticipantActivity,
} from '../activity/index.js';

// ============================================================================
// Token Usage
// ============================================================================

export function emptyTokenUsage(): TokenUsage {
  return { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 };
}

export function addTokenUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    prompt_tokens: a.prompt_tokens + b.prompt_tokens,
    completion_tokens: a.completion_tokens + b.completion_tokens,
    total_tokens: a.total_tokens + b.total_tokens,
  };
}

export function sumTokenUsage(usages: readonly TokenUsage[]): TokenUsage {
  return usages.reduce(addTokenUsage, emptyTokenUsage());
}

export function tokenUsageFromResponse(response: ProviderResponse): TokenUsage {
  return {
    prompt_tokens: response.prompt_tokens,
    completion_tokens: response.completion_tokens,
    total_tokens: response.total_tokens,
  };
}

// ============================================================================
// Topics
// ============================================================================

const MAX_TOPIC_PARTICIPANTS = 5;

export function assembleTopics(records: readonly TopicRecord[]): Topic[] {
  return records
    .filter((record) => record.title.trim().length > 0)
    .map((record) => ({
      title: record.title.trim(),
      participants: record.participants.slice(0, MAX_TOPIC_PARTICIPANTS),
      description: record.description,
      message_count: record.message_count,
    }));
}

/**
 * Placeholder used by the topics task when nothing could be parsed
 */
export function fallbackTopic(candidateCount: number): Topic {
  return {
    title: 'Group Discussion',
    participants: ['Group Members'],
    description: 'The group talked about a range of subjects; no individual topic could be extracted.',
    message_count: candidateCount,
  };
}

// ============================================================================
// Quotes
// ============================================================================

export interface SenderInfo {
  avatar_ref: string;
  /** Timestamp of the sender's most recent message */
  latest_timestamp: number;
}

/**
 * Index senders by display name as it appears in the prompt
 */
export function buildSenderLookup(messages: readonly Message[]): Map<string, SenderInfo> {
  const lookup = new Map<string, SenderInfo>();
  for (const message of messages) {
    const name = message.sender_display_name.trim();
    const known = lookup.get(name);
    if (!known) {
      lookup.set(name, { avatar_ref: message.sender_avatar_ref, latest_timestamp: message.timestamp });
    } else if (message.timestamp >= known.latest_timestamp) {
      lookup.set(name, {
        avatar_ref: message.sender_avatar_ref || known.avatar_ref,
        latest_timestamp: message.timestamp,
      });
    }
  }
  return lookup;
}

export function assembleQuotes(records: readonly QuoteRecord[], lookup: ReadonlyMap<string, SenderInfo>): Quote[] {
  return records
    .filter((record) => record.content.trim().length > 0)
    .map((record) => {
      const sender = lookup.get(record.sender_display_name.trim());
      return {
        content: record.content.trim(),
        sender_display_name: record.sender_display_name.trim(),
        sender_avatar_ref: sender?.avatar_ref ?? '',
        timestamp: record.timestamp > 0 ? record.timestamp : sender?.latest_timestamp ?? 0,
        rationale: record.rationale,
      };
    });
}

// ============================================================================
// User Titles
// ============================================================================

function resolveParticipant(
  record: UserTitleRecord,
  participants: readonly ParticipantActivity[]
): ParticipantActivity | undefined {
  return (
    participants.find((p) => p.sender_id === record.subject_id) ??
    participants.find((p) => p.display_name === record.display_name) ??
    participants.find((p) => p.display_name === record.subject_id)
  );
}

/**
 * Resolve each title to a participant by ID, then by display name.
 * One title per subject: later records for the same subject are dropped.
 */
export function assembleUserTitles(
  records: readonly UserTitleRecord[],
  participants: readonly ParticipantActivity[]
): UserTitle[] {
  const seen = new Set<string>();
  const titles: UserTitle[] = [];

  for (const record of records) {
    if (record.title.trim().length === 0) {
      continue;
    }

    const participant = resolveParticipant(record, participants);
    const subjectId = participant?.sender_id ?? record.subject_id;
    if (seen.has(subjectId)) {
      continue;
    }
    seen.add(subjectId);

    titles.push({
      subject_id: subjectId,
      display_name: participant?.display_name ?? record.display_name,
      avatar_ref: participant?.avatar_ref ?? '',
      title: record.title.trim(),
      personality_tag: record.personality_tag,
      rationale: record.rationale,
      metrics: participant ? toParticipantMetrics(participant) : emptyParticipantMetrics(),
    });
  }

  return titles;
}
