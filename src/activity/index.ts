/**
 * Participant Activity Module
 *
 * Aggregates per-sender activity figures over a message batch and selects
 * the participants eligible for a behavioral title.
 */

import type { Message, ParticipantMetrics } from '../types/index.js';
import { codePointLength, countEmoji, hourOfDay } from '../text/index.js';

export interface ParticipantActivity extends ParticipantMetrics {
  sender_id: string;
  display_name: string;
  avatar_ref: string;
  /** Emoji per message, 2 decimals */
  emoji_ratio: number;
  /** Share of messages sent between 00:00 and 05:59, 2 decimals */
  night_ratio: number;
  /** Share of messages that reply to someone, 2 decimals */
  reply_ratio: number;
}

const NIGHT_HOURS: readonly number[] = [0, 1, 2, 3, 4, 5];

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function ratio(part: number, whole: number): number {
  return whole > 0 ? round(part / whole, 2) : 0;
}

function isReply(message: Message): boolean {
  return message.kind === 'reply' || message.text.includes('@');
}

/**
 * Aggregate activity per sender, in order of first appearance.
 * Display name and avatar follow the sender's latest message.
 */
export function computeParticipantActivity(
  messages: readonly Message[],
  timeZone = 'UTC'
): ParticipantActivity[] {
  const bySender = new Map<string, ParticipantActivity>();

  for (const message of messages) {
    let entry = bySender.get(message.sender_id);
    if (!entry) {
      entry = {
        sender_id: message.sender_id,
        display_name: message.sender_display_name,
        avatar_ref: message.sender_avatar_ref,
        message_count: 0,
        char_count: 0,
        avg_message_length: 0,
        emoji_count: 0,
        reply_count: 0,
        hourly_distribution: {},
        emoji_ratio: 0,
        night_ratio: 0,
        reply_ratio: 0,
      };
      bySender.set(message.sender_id, entry);
    }

    entry.display_name = message.sender_display_name || entry.display_name;
    entry.avatar_ref = message.sender_avatar_ref || entry.avatar_ref;
    entry.message_count++;
    entry.char_count += codePointLength(message.text);
    entry.emoji_count += countEmoji(message.text);
    if (isReply(message)) {
      entry.reply_count++;
    }

    const hour = hourOfDay(message.timestamp, timeZone);
    entry.hourly_distribution[hour] = (entry.hourly_distribution[hour] ?? 0) + 1;
  }

  return Array.from(bySender.values(), (entry) => {
    const nightMessages = NIGHT_HOURS.reduce(
      (sum, hour) => sum + (entry.hourly_distribution[hour] ?? 0),
      0
    );
    return {
      ...entry,
      avg_message_length: entry.message_count > 0 ? round(entry.char_count / entry.message_count, 1) : 0,
      emoji_ratio: ratio(entry.emoji_count, entry.message_count),
      night_ratio: ratio(nightMessages, entry.message_count),
      reply_ratio: ratio(entry.reply_count, entry.message_count),
    };
  });
}

/**
 * Keep senders with at least minMessages, most active first, at most limit.
 * Array.prototype.sort is stable, so ties keep first-seen order.
 */
export function selectActiveParticipants(
  activity: readonly ParticipantActivity[],
  minMessages = 5,
  limit = Infinity
): ParticipantActivity[] {
  return activity
    .filter((entry) => entry.message_count >= minMessages)
    .sort((a, b) => b.message_count - a.message_count)
    .slice(0, limit);
}

/**
 * Strip the derived fields, leaving what a UserTitle carries
 */
export function toParticipantMetrics(activity: ParticipantActivity): ParticipantMetrics {
  return {
    message_count: activity.message_count,
    char_count: activity.char_count,
    avg_message_length: activity.avg_message_length,
    emoji_count: activity.emoji_count,
    reply_count: activity.reply_count,
    hourly_distribution: { ...activity.hourly_distribution },
  };
}

export function emptyParticipantMetrics(): ParticipantMetrics {
  return {
    message_count: 0,
    char_count: 0,
    avg_message_length: 0,
    emoji_count: 0,
    reply_count: 0,
    hourly_distribution: {},
  };
}

/**
 * One summary line per participant for the user-title prompt
 */
export function describeParticipant(activity: ParticipantActivity): string {
  return (
    `- ${activity.display_name} (ID: ${activity.sender_id}): ` +
    `${activity.message_count} messages, avg ${activity.avg_message_length} chars, ` +
    `emoji ratio ${activity.emoji_ratio}, night ratio ${activity.night_ratio}, ` +
    `reply ratio ${activity.reply_ratio}`
  );
}
