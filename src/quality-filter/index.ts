/**
 * Quality Filter Module
 *
 * Screens raw messages into the candidate set of one analysis task.
 * Pure and idempotent: filtering an already filtered list changes nothing.
 *
 * Rules applied to every task:
 * - Empty or whitespace-only text is dropped
 * - Command text (leading "/" after trimming) is dropped
 *
 * Per-task thresholds (see DEFAULT_ENGINE_CONFIG.filters):
 * - Minimum and maximum trimmed length, counted in code points
 * - Bare URL rejection
 * - Maximum emoji density
 */

import type { AnalysisTask, Message } from '../types/index.js';
import { DEFAULT_ENGINE_CONFIG, type QualityThresholds } from '../config/index.js';
import { codePointLength, emojiDensity } from '../text/index.js';

export type DropReason = 'empty' | 'command' | 'too_short' | 'too_long' | 'bare_url' | 'emoji_heavy';

export interface FilterStats {
  kept: number;
  dropped: Record<DropReason, number>;
}

export interface FilterOutcome {
  candidates: Message[];
  stats: FilterStats;
}

const BARE_URL = /^https?:\/\/\S+$/i;

/**
 * Why a message fails the task's predicates, or null when it is a candidate
 */
export function rejectionReason(message: Message, thresholds: QualityThresholds): DropReason | null {
  const text = message.text.trim();

  if (text.length === 0) {
    return 'empty';
  }
  if (text.startsWith('/')) {
    return 'command';
  }

  const length = codePointLength(text);
  if (length < thresholds.minLength) {
    return 'too_short';
  }
  if (length > thresholds.maxLength) {
    return 'too_long';
  }
  if (thresholds.dropBareUrls && BARE_URL.test(text)) {
    return 'bare_url';
  }
  if (emojiDensity(text) > thresholds.maxEmojiDensity) {
    return 'emoji_heavy';
  }

  return null;
}

/**
 * Filter messages and count the drops per reason
 */
export function filterMessagesWithStats(
  messages: readonly Message[],
  task: AnalysisTask,
  thresholds: QualityThresholds = DEFAULT_ENGINE_CONFIG.filters[task]
): FilterOutcome {
  const dropped: Record<DropReason, number> = {
    empty: 0,
    command: 0,
    too_short: 0,
    too_long: 0,
    bare_url: 0,
    emoji_heavy: 0,
  };
  const candidates: Message[] = [];

  for (const message of messages) {
    const reason = rejectionReason(message, thresholds);
    if (reason) {
      dropped[reason]++;
    } else {
      candidates.push(message);
    }
  }

  return { candidates, stats: { kept: candidates.length, dropped } };
}

export function filterMessages(
  messages: readonly Message[],
  task: AnalysisTask,
  thresholds?: QualityThresholds
): Message[] {
  return filterMessagesWithStats(messages, task, thresholds).candidates;
}
