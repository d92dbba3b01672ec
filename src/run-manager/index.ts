/**
 * Run Manager Module
 *
 * Generates deterministic RunIDs for one analysis invocation so that every
 * log line of the three tasks can be correlated.
 *
 * Algorithm:
 * 1. Take the message count, the first and last timestamps and every message id
 * 2. Join them with a pipe separator
 * 3. Hash using SHA-256
 * 4. Prefix with "run_" and keep the first 16 hex characters
 */

import { createHash } from 'crypto';
import type { Message, RunId } from '../types/index.js';

const RUN_ID_PATTERN = /^run_[0-9a-f]{16}$/;

/**
 * Generate a deterministic run ID for a message batch.
 * The same batch always yields the same ID; an empty batch yields a fixed one.
 */
export function generateRunId(messages: readonly Message[]): RunId {
  const first = messages[0]?.timestamp ?? 0;
  const last = messages[messages.length - 1]?.timestamp ?? 0;

  const hashInput = [
    String(messages.length),
    String(first),
    String(last),
    ...messages.map((m) => m.id),
  ].join('|');

  const hash = createHash('sha256').update(hashInput).digest('hex');
  return `run_${hash.substring(0, 16)}`;
}

export function isValidRunId(value: string): boolean {
  return RUN_ID_PATTERN.test(value);
}
