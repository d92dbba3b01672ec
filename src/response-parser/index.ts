/**
 * Response Parser Module
 *
 * Turns a raw completion into validated records through an ordered chain of
 * tiers. The first tier that produces an array wins; lower tiers are never
 * consulted after that, even when the array holds few usable records.
 *
 * 1. STRICT            the whole reply is one balanced JSON array
 * 2. REPAIRED          one pass of textual repairs over the array span
 * 3. REGEX             per-record pattern salvage, strict field order first
 * 4. FALLBACK_DEFAULT  nothing recovered, records = []
 *
 * parseCompletion never throws. Raw completion text is never logged.
 */

import type { Logger, ParseTier } from '../types/index.js';
import { hasRequiredFields, type ExtractionSchema, type FieldKind, type SchemaField } from '../schemas/index.js';
import { createConsoleLogger } from '../logging/index.js';
import { normalizeQuotes } from '../text/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Why a tier did not produce records; diagnostics only, never thrown
 */
export interface ParseFailure {
  tier: ParseTier;
  reason: string;
}

export interface ParseOutcome<T> {
  records: T[];
  tier: ParseTier;
  failures: ParseFailure[];
}

export interface ArraySpan {
  start: number;
  /** Index of the matching "]", or null when the array never closes */
  end: number | null;
}

export interface ParseContext<T> {
  text: string;
  span: ArraySpan | null;
  schema: ExtractionSchema<T>;
  limit: number;
}

export type TierAttempt<T> =
  | { ok: true; records: T[] }
  | { ok: false; reason: string };

export interface TierStep {
  tier: ParseTier;
  attempt: <T>(context: ParseContext<T>) => TierAttempt<T>;
}

// ============================================================================
// Span Detection
// ============================================================================

/**
 * Locate the first "[" and the "]" that brings bracket depth back to zero.
 * Brackets inside double-quoted strings are ignored.
 */
export function findArraySpan(text: string): ArraySpan | null {
  const start = text.indexOf('[');
  if (start < 0) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '[') {
      depth++;
    } else if (ch === ']') {
      depth--;
      if (depth === 0) {
        return { start, end: i };
      }
    }
  }

  return { start, end: null };
}

function spanText(text: string, span: ArraySpan): string {
  return span.end === null ? text.slice(span.start) : text.slice(span.start, span.end + 1);
}

function parseArray(candidate: string): unknown[] | null {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Coerce each raw item through the schema, dropping failures and records
 * missing a required field individually, then keep the first `limit`
 * survivors in order
 */
export function validateRecords<T>(items: readonly unknown[], schema: ExtractionSchema<T>, limit: number): T[] {
  const records: T[] = [];
  for (const item of items) {
    if (records.length >= limit) {
      break;
    }
    const result = schema.record.safeParse(item);
    if (result.success && hasRequiredFields(result.data, schema.required)) {
      records.push(result.data);
    }
  }
  return records;
}

// ============================================================================
// Repairs
// ============================================================================

const CODE_FENCE = /```(?:json)?\s*/gi;
const LINE_BREAKS_AND_TABS = /[\r\n\t]+/g;
const ADJACENT_OBJECTS = /\}\s*\{/g;
const BARE_KEY = /([{,]\s*)([A-Za-z_]\w*)\s*:/g;
const TRAILING_COMMA = /,\s*([}\]])/g;

/**
 * Apply a transformation to the text between double-quoted string literals.
 * An unterminated literal runs to the end of the text and is left alone.
 */
export function mapOutsideStrings(text: string, transform: (segment: string) => string): string {
  let result = '';
  let segmentStart = 0;
  let i = 0;

  while (i < text.length) {
    if (text[i] !== '"') {
      i++;
      continue;
    }

    result += transform(text.slice(segmentStart, i));

    let j = i + 1;
    while (j < text.length && text[j] !== '"') {
      j += text[j] === '\\' ? 2 : 1;
    }
    const literalEnd = Math.min(j + 1, text.length);
    result += text.slice(i, literalEnd);
    i = literalEnd;
    segmentStart = literalEnd;
  }

  return result + transform(text.slice(segmentStart));
}

/**
 * One ordered, non-iterative repair pass over near-valid JSON.
 * `closed` is false when the outer array never closes; the text is then cut
 * after its last complete object even if it happens to end with an inner "]".
 */
export function repairJsonArray(candidate: string, closed = true): string {
  let repaired = candidate
    .replace(CODE_FENCE, '')
    .replace(LINE_BREAKS_AND_TABS, ' ');

  repaired = normalizeQuotes(repaired).trim();

  if (!closed || !repaired.endsWith(']')) {
    const lastBrace = repaired.lastIndexOf('}');
    if (lastBrace >= 0) {
      repaired = `${repaired.slice(0, lastBrace + 1)}]`;
    }
  }

  return mapOutsideStrings(repaired, (segment) =>
    segment
      .replace(ADJACENT_OBJECTS, '}, {')
      .replace(BARE_KEY, '$1"$2":')
      .replace(TRAILING_COMMA, '$1')
  );
}

// ============================================================================
// Regex Salvage
// ============================================================================

const STRING_VALUE = '"((?:[^"\\\\]|\\\\.)*)"';
const LIST_VALUE = '\\[([^\\]]*)\\]';
const INTEGER_VALUE = '"?(-?\\d+)"?';

const VALUE_PATTERNS: Record<FieldKind, string> = {
  text: STRING_VALUE,
  text_list: LIST_VALUE,
  integer: INTEGER_VALUE,
};

const QUOTED_ITEM = new RegExp(STRING_VALUE, 'g');

/** Flat objects; the last one may be cut off before its closing brace */
const FLAT_OBJECT = /\{[^{}]*(?:\}|$)/g;

/**
 * Undo JSON string escapes; line breaks and tabs become spaces
 */
export function unescapeValue(value: string): string {
  return value.replace(/\\(.)/g, (_match, ch: string) => {
    if (ch === 'n' || ch === 't' || ch === 'r') {
      return ' ';
    }
    return ch;
  });
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function keyPattern(name: string): string {
  const escaped = escapeRegExp(name);
  return `(?:"${escaped}"|\\b${escaped})\\s*:\\s*`;
}

function convertCapture(kind: FieldKind, raw: string): unknown {
  switch (kind) {
    case 'text':
      return unescapeValue(raw);
    case 'integer':
      return raw;
    case 'text_list': {
      const quoted = Array.from(raw.matchAll(QUOTED_ITEM), (m) => unescapeValue(m[1] ?? ''));
      return quoted.length > 0 ? quoted : raw.split(',');
    }
  }
}

function buildStrictRecordPattern(fields: readonly SchemaField[]): RegExp {
  const body = fields
    .map((field) => `${keyPattern(field.name)}${VALUE_PATTERNS[field.kind]}`)
    .join('\\s*,\\s*');
  return new RegExp(`\\{\\s*${body}\\s*,?\\s*\\}`, 'g');
}

function extractStrict(text: string, fields: readonly SchemaField[]): Record<string, unknown>[] {
  const pattern = buildStrictRecordPattern(fields);
  const items: Record<string, unknown>[] = [];
  for (const match of text.matchAll(pattern)) {
    const item: Record<string, unknown> = {};
    fields.forEach((field, index) => {
      item[field.name] = convertCapture(field.kind, match[index + 1] ?? '');
    });
    items.push(item);
  }
  return items;
}

function extractLenient(text: string, fields: readonly SchemaField[]): Record<string, unknown>[] {
  const fieldPatterns = fields.map((field) => ({
    field,
    pattern: new RegExp(`${keyPattern(field.name)}${VALUE_PATTERNS[field.kind]}`),
  }));

  const items: Record<string, unknown>[] = [];
  for (const chunk of text.match(FLAT_OBJECT) ?? []) {
    const item: Record<string, unknown> = {};
    let found = 0;
    for (const { field, pattern } of fieldPatterns) {
      const match = pattern.exec(chunk);
      if (match) {
        item[field.name] = convertCapture(field.kind, match[1] ?? '');
        found++;
      }
    }
    if (found > 0) {
      items.push(item);
    }
  }
  return items;
}

// ============================================================================
// Tiers
// ============================================================================

function attemptStrict<T>({ text, span, schema, limit }: ParseContext<T>): TierAttempt<T> {
  if (!span || span.end === null) {
    return { ok: false, reason: 'no balanced array span' };
  }
  const candidate = spanText(text, span);
  if (candidate !== text.trim()) {
    return { ok: false, reason: 'text outside the array span' };
  }
  const items = parseArray(candidate);
  if (!items) {
    return { ok: false, reason: 'span is not a JSON array' };
  }
  return { ok: true, records: validateRecords(items, schema, limit) };
}

function attemptRepaired<T>({ text, span, schema, limit }: ParseContext<T>): TierAttempt<T> {
  if (!span) {
    return { ok: false, reason: 'no array start' };
  }
  const items = parseArray(repairJsonArray(spanText(text, span), span.end !== null));
  if (!items) {
    return { ok: false, reason: 'repaired span is not a JSON array' };
  }
  return { ok: true, records: validateRecords(items, schema, limit) };
}

function attemptRegex<T>({ text, schema, limit }: ParseContext<T>): TierAttempt<T> {
  const normalized = normalizeQuotes(text);
  let items = extractStrict(normalized, schema.fields);
  if (items.length === 0) {
    items = extractLenient(normalized, schema.fields);
  }
  const records = validateRecords(items, schema, limit);
  if (records.length === 0) {
    return { ok: false, reason: `no valid records among ${items.length} pattern matches` };
  }
  return { ok: true, records };
}

export const PARSE_TIERS: readonly TierStep[] = [
  { tier: 'STRICT', attempt: attemptStrict },
  { tier: 'REPAIRED', attempt: attemptRepaired },
  { tier: 'REGEX', attempt: attemptRegex },
];

/**
 * Parse a completion into at most `cardinalityLimit` validated records
 */
export function parseCompletion<T>(
  completionText: string,
  schema: ExtractionSchema<T>,
  cardinalityLimit: number,
  logger: Logger = createConsoleLogger('response-parser')
): ParseOutcome<T> {
  const context: ParseContext<T> = {
    text: completionText,
    span: findArraySpan(completionText),
    schema,
    limit: Math.max(0, cardinalityLimit),
  };
  const failures: ParseFailure[] = [];

  for (const step of PARSE_TIERS) {
    const result = step.attempt(context);
    if (result.ok) {
      logger.debug('Completion parsed', {
        task: schema.task,
        tier: step.tier,
        records: result.records.length,
        completionLength: completionText.length,
      });
      return { records: result.records, tier: step.tier, failures };
    }
    failures.push({ tier: step.tier, reason: result.reason });
  }

  logger.warn('No records recovered from completion', {
    task: schema.task,
    completionLength: completionText.length,
    failures,
  });
  return { records: [], tier: 'FALLBACK_DEFAULT', failures };
}
