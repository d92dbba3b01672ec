/**
 * Extraction Schemas
 *
 * Declarative description of the record shape each analysis task asks the
 * model for. The response parser, the prompt builder and the regex salvage
 * tier are all driven by these objects; none of them knows a task by name.
 *
 * Fields the assembler resolves itself (avatars, metrics) are never requested.
 */

import { z } from 'zod';
import type { AnalysisTask } from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export type FieldKind = 'text' | 'text_list' | 'integer';

export interface SchemaField {
  /** Wire name as it appears in the model's JSON */
  name: string;
  kind: FieldKind;
  description: string;
}

export interface ExtractionSchema<T> {
  task: AnalysisTask;
  /** In the exact order requested from the model */
  fields: readonly SchemaField[];
  /** Fields that must be non-empty after coercion for a record to survive */
  required: readonly string[];
  /** Coerces one raw record; failing records are dropped */
  record: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface TopicRecord {
  title: string;
  participants: string[];
  description: string;
  message_count: number;
}

export interface UserTitleRecord {
  subject_id: string;
  display_name: string;
  title: string;
  personality_tag: string;
  rationale: string;
}

export interface QuoteRecord {
  content: string;
  sender_display_name: string;
  /** 0 when the model gave no usable timestamp */
  timestamp: number;
  rationale: string;
}

// ============================================================================
// Field Coercion
// ============================================================================

/**
 * Strings and numbers become trimmed strings; anything else becomes ''
 */
const text = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .catch('');

/**
 * Non-negative integers from numbers or numeric strings; anything else becomes 0
 */
const integer = z
  .union([z.number(), z.string()])
  .transform((value) => (typeof value === 'number' ? Math.trunc(value) : parseInt(value, 10)))
  .pipe(z.number().int().nonnegative())
  .catch(0);

/**
 * Arrays keep their non-empty strings; a comma-separated string is split
 */
const textList = z
  .union([
    z.array(z.unknown()),
    z.string().transform((value) => value.split(',')),
  ])
  .transform((items: unknown[]) =>
    items
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  )
  .catch([]);

/**
 * Empty strings and empty lists count as missing; numbers are always present
 */
function isPresent(value: unknown): boolean {
  if (typeof value === 'string' || Array.isArray(value)) {
    return value.length > 0;
  }
  return value !== undefined && value !== null;
}

/**
 * Check a coerced record against a schema's required field list
 */
export function hasRequiredFields(record: unknown, required: readonly string[]): boolean {
  if (typeof record !== 'object' || record === null) {
    return false;
  }
  const values = new Map<string, unknown>(Object.entries(record));
  return required.every((name) => isPresent(values.get(name)));
}

// ============================================================================
// Schemas
// ============================================================================

export const TOPIC_SCHEMA: ExtractionSchema<TopicRecord> = {
  task: 'topics',
  fields: [
    { name: 'title', kind: 'text', description: 'short topic title' },
    { name: 'participants', kind: 'text_list', description: 'display names of the main participants, at most 5' },
    { name: 'description', kind: 'text', description: 'what was discussed and what came out of it' },
    { name: 'message_count', kind: 'integer', description: 'approximate number of messages about this topic' },
  ],
  required: ['title', 'description'],
  record: z.object({
    title: text,
    participants: textList,
    description: text,
    message_count: integer,
  }),
};

export const USER_TITLE_SCHEMA: ExtractionSchema<UserTitleRecord> = {
  task: 'user_titles',
  fields: [
    { name: 'subject_id', kind: 'text', description: 'the participant ID exactly as listed' },
    { name: 'display_name', kind: 'text', description: 'the participant display name as listed' },
    { name: 'title', kind: 'text', description: 'a short behavioral title' },
    { name: 'personality_tag', kind: 'text', description: 'a four-letter MBTI-style personality tag' },
    { name: 'rationale', kind: 'text', description: 'why the title fits, citing the activity figures' },
  ],
  required: ['subject_id', 'title'],
  record: z.object({
    subject_id: text,
    display_name: text,
    title: text,
    personality_tag: text,
    rationale: text,
  }),
};

export const QUOTE_SCHEMA: ExtractionSchema<QuoteRecord> = {
  task: 'quotes',
  fields: [
    { name: 'content', kind: 'text', description: 'the message text, quoted verbatim' },
    { name: 'sender_display_name', kind: 'text', description: 'display name of the sender' },
    { name: 'timestamp', kind: 'integer', description: 'unix timestamp of the message if known, else 0' },
    { name: 'rationale', kind: 'text', description: 'why the quote is notable' },
  ],
  required: ['content', 'sender_display_name'],
  record: z.object({
    content: text,
    sender_display_name: text,
    timestamp: integer,
    rationale: text,
  }),
};
