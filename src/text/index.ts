/**
 * Text Normalization
 *
 * Character-level helpers shared by the quality filter, the prompt builder
 * and the response parser:
 * - Non-ASCII quotation marks folded to ASCII
 * - Message sanitization for transcript lines
 * - Emoji counting by code point
 * - Clock formatting in a configurable time zone
 */

// ============================================================================
// Quotation Marks
// ============================================================================

/** Curly, low-9, double-prime and full-width double quotes */
const DOUBLE_QUOTES = /[“”„‟″‶＂]/g;

/** Curly, low-9 and prime single quotes */
const SINGLE_QUOTES = /[‘’‚‛′‵＇]/g;

export function normalizeQuotes(text: string): string {
  return text.replace(DOUBLE_QUOTES, '"').replace(SINGLE_QUOTES, "'");
}

// ============================================================================
// Sanitization
// ============================================================================

const LINE_BREAKS_AND_TABS = /[\r\n\t]+/g;

const CONTROL_CHARACTERS = /[\u0000-\u001F\u007F-\u009F]/g;

/**
 * Prepare message text for a single transcript line:
 * ASCII quotes, no line breaks or tabs, no C0/C1 control characters.
 */
export function sanitizeMessageText(text: string): string {
  return normalizeQuotes(text)
    .replace(LINE_BREAKS_AND_TABS, ' ')
    .replace(CONTROL_CHARACTERS, '')
    .trim();
}

// ============================================================================
// Emoji
// ============================================================================

const EMOJI = /[\p{Extended_Pictographic}\u{1F1E6}-\u{1F1FF}]/gu;

export function countEmoji(text: string): number {
  return text.match(EMOJI)?.length ?? 0;
}

/**
 * Length in code points, so that an astral emoji counts once
 */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Share of code points that are emoji, 0 for empty text
 */
export function emojiDensity(text: string): number {
  const length = codePointLength(text);
  return length === 0 ? 0 : countEmoji(text) / length;
}

// ============================================================================
// Clock
// ============================================================================

const clockFormatters = new Map<string, Intl.DateTimeFormat>();

function clockFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = clockFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-GB', {
      timeZone,
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
    clockFormatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Timestamps outside the Date range read as midnight
 */
function clockParts(timestamp: number, timeZone: string): { hour: number; minute: number } {
  const date = new Date(timestamp * 1000);
  if (Number.isNaN(date.getTime())) {
    return { hour: 0, minute: 0 };
  }
  const parts = clockFormatter(timeZone).formatToParts(date);
  const hour = Number(parts.find((p) => p.type === 'hour')?.value ?? '0');
  const minute = Number(parts.find((p) => p.type === 'minute')?.value ?? '0');
  return { hour: hour % 24, minute };
}

/**
 * Format a unix timestamp (seconds) as HH:MM
 */
export function formatClock(timestamp: number, timeZone = 'UTC'): string {
  const { hour, minute } = clockParts(timestamp, timeZone);
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

/**
 * Hour of day (0-23) of a unix timestamp (seconds)
 */
export function hourOfDay(timestamp: number, timeZone = 'UTC'): number {
  return clockParts(timestamp, timeZone).hour;
}
