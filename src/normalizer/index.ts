/**
 * Normalizer Module
 *
 * Responsibilities:
 * - Accept raw message records handed over by the upstream message source
 * - Canonicalize them into the immutable Message shape
 * - Drop records that cannot be repaired, one by one, without failing the batch
 *
 * Usage:
 * const result = normalizeMessages(rawRecords);
 * if (result.success) await analyzeChat(result.data.messages, context);
 */

import { z } from 'zod';
import type { Message, ModuleResult, RunId } from '../types/index.js';

/**
 * Timestamps above this value are taken as a finer unit (ms, µs, ns) and
 * scaled down by 1000 until they fall below it
 */
const MILLISECOND_THRESHOLD = 1e12;

/**
 * Zod schema for one raw upstream record.
 * Identifiers may arrive as numbers; timestamps as numbers, numeric strings or ISO-8601.
 */
const RawMessageSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  timestamp: z.union([
    z.number().finite().nonnegative(),
    z.string().trim().min(1),
  ]),
  sender_id: z.union([z.string(), z.number()]).transform(String),
  sender_display_name: z.string().nullable().optional(),
  sender_avatar_ref: z.string().nullable().optional(),
  text: z.string().nullable().optional(),
  kind: z.string().nullable().optional(),
});

type RawMessage = z.infer<typeof RawMessageSchema>;

export interface NormalizedBatch {
  messages: Message[];
  /** Records dropped because they failed validation */
  dropped: number;
}

/**
 * Convert a raw timestamp to unix seconds, or null when unusable
 */
export function toUnixSeconds(value: number | string): number | null {
  let numeric: number;

  if (typeof value === 'number') {
    numeric = value;
  } else if (/^\d+(\.\d+)?$/.test(value)) {
    numeric = Number(value);
  } else {
    const parsed = Date.parse(value);
    if (isNaN(parsed)) {
      return null;
    }
    return Math.floor(parsed / 1000);
  }

  if (!Number.isFinite(numeric) || numeric < 0) {
    return null;
  }
  while (numeric > MILLISECOND_THRESHOLD) {
    numeric /= 1000;
  }
  return Math.floor(numeric);
}

function canonicalize(raw: RawMessage): Message | null {
  const timestamp = toUnixSeconds(raw.timestamp);
  const senderId = raw.sender_id.trim();
  if (timestamp === null || senderId.length === 0) {
    return null;
  }

  const displayName = raw.sender_display_name?.trim();

  return Object.freeze({
    id: raw.id.trim(),
    timestamp,
    sender_id: senderId,
    sender_display_name: displayName ? displayName : senderId,
    sender_avatar_ref: raw.sender_avatar_ref?.trim() ?? '',
    text: raw.text ?? '',
    kind: raw.kind?.trim().toLowerCase() || 'text',
  });
}

/**
 * Normalize a batch of raw records into Messages, preserving input order.
 * The batch only fails when the input is not an array.
 */
export function normalizeMessages(
  raw: unknown,
  runId: RunId = ''
): ModuleResult<NormalizedBatch> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  if (!Array.isArray(raw)) {
    return {
      success: false,
      error: {
        code: 'INVALID_INPUT',
        message: 'Expected an array of message records',
        details: { receivedType: raw === null ? 'null' : typeof raw },
      },
      metadata: {
        runId,
        module: 'normalizer',
        timestamp,
        duration: Date.now() - startTime,
      },
    };
  }

  const messages: Message[] = [];
  let dropped = 0;

  for (const record of raw) {
    const parsed = RawMessageSchema.safeParse(record);
    const message = parsed.success ? canonicalize(parsed.data) : null;
    if (message) {
      messages.push(message);
    } else {
      dropped++;
    }
  }

  return {
    success: true,
    data: { messages, dropped },
    metadata: {
      runId,
      module: 'normalizer',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}
