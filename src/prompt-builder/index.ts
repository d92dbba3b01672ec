/**
 * Prompt Builder Module
 *
 * Renders a task's instruction template (prompts/<task>.md) around a
 * transcript of candidate messages. Templates use {{variable}} placeholders:
 *
 * - {{max_records}}  cardinality limit
 * - {{fields}}       one line per schema field
 * - {{shape}}        a one-record JSON example of the expected array
 * - {{transcript}}   one "[HH:MM] name: text" line per message
 * - {{participants}} activity summary lines (user titles only)
 *
 * Unknown placeholders are left as they are.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import type { Message, ModuleResult, RunId } from '../types/index.js';
import type { ExtractionSchema, FieldKind } from '../schemas/index.js';
import { describeParticipant, type ParticipantActivity } from '../activity/index.js';
import { formatClock, sanitizeMessageText } from '../text/index.js';

export interface PromptOptions {
  /** IANA zone for the [HH:MM] stamps, UTC by default */
  timeZone?: string;
  /** Template text used instead of the task's file */
  template?: string;
  /** Directory holding <task>.md templates */
  promptsDir?: string;
  /** Activity summaries rendered into {{participants}} */
  participants?: readonly ParticipantActivity[];
  runId?: RunId;
}

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

const KIND_LABELS: Record<FieldKind, string> = {
  text: 'string',
  text_list: 'array of strings',
  integer: 'integer',
};

const KIND_EXAMPLES: Record<FieldKind, string> = {
  text: '"..."',
  text_list: '["..."]',
  integer: '0',
};

/**
 * prompts/ sits two levels above this file in both src/ and dist/
 */
export function defaultPromptsDir(): string {
  return join(__dirname, '..', '..', 'prompts');
}

const templateCache = new Map<string, string>();

async function loadTemplate(path: string): Promise<string> {
  const cached = templateCache.get(path);
  if (cached !== undefined) {
    return cached;
  }
  const template = await readFile(path, 'utf-8');
  templateCache.set(path, template);
  return template;
}

/**
 * Render one message as a transcript line
 */
export function formatTranscriptLine(message: Message, timeZone = 'UTC'): string {
  return `[${formatClock(message.timestamp, timeZone)}] ${message.sender_display_name}: ${sanitizeMessageText(message.text)}`;
}

export function formatTranscript(messages: readonly Message[], timeZone = 'UTC'): string {
  return messages.map((m) => formatTranscriptLine(m, timeZone)).join('\n');
}

export function describeFields<T>(schema: ExtractionSchema<T>): string {
  return schema.fields
    .map((field) => `- "${field.name}" (${KIND_LABELS[field.kind]}): ${field.description}`)
    .join('\n');
}

export function describeShape<T>(schema: ExtractionSchema<T>): string {
  const members = schema.fields.map((field) => `"${field.name}": ${KIND_EXAMPLES[field.kind]}`);
  return `[{${members.join(', ')}}]`;
}

/**
 * Substitute {{variables}} in a single pass, so placeholder-like text inside
 * the transcript is never expanded
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(PLACEHOLDER, (match, key: string) => values[key] ?? match);
}

/**
 * Build the prompt text for one task
 */
export async function buildPrompt<T>(
  candidates: readonly Message[],
  cardinalityLimit: number,
  schema: ExtractionSchema<T>,
  options: PromptOptions = {}
): Promise<ModuleResult<string>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();
  const runId = options.runId ?? '';

  let template: string;
  if (options.template !== undefined) {
    template = options.template;
  } else {
    const templateFile = join(options.promptsDir ?? defaultPromptsDir(), `${schema.task}.md`);
    try {
      template = await loadTemplate(templateFile);
    } catch (readError) {
      return {
        success: false,
        error: {
          code: 'TEMPLATE_NOT_FOUND',
          message: `Failed to load prompt template: ${templateFile}`,
          details: readError,
        },
        metadata: {
          runId,
          module: 'prompt-builder',
          timestamp,
          duration: Date.now() - startTime,
        },
      };
    }
  }

  const prompt = renderTemplate(template, {
    max_records: String(cardinalityLimit),
    fields: describeFields(schema),
    shape: describeShape(schema),
    transcript: formatTranscript(candidates, options.timeZone),
    participants: (options.participants ?? []).map(describeParticipant).join('\n'),
  });

  return {
    success: true,
    data: prompt,
    metadata: {
      runId,
      module: 'prompt-builder',
      timestamp,
      duration: Date.now() - startTime,
    },
  };
}
