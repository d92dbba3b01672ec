/**
 * Unit tests for the Response Parser Module
 */

import { describe, test, expect } from '@jest/globals';
import {
  parseCompletion,
  findArraySpan,
  repairJsonArray,
  validateRecords,
  unescapeValue,
} from '../../src/response-parser/index.js';
import { QUOTE_SCHEMA, TOPIC_SCHEMA, USER_TITLE_SCHEMA, hasRequiredFields } from '../../src/schemas/index.js';
import { createMockLogger } from '../helpers.js';

const launchJson = '{"title":"Launch","participants":["Alice","Bob"],"description":"Plan","message_count":12}';

const launch = {
  title: 'Launch',
  participants: ['Alice', 'Bob'],
  description: 'Plan',
  message_count: 12,
};

function parseTopics(text: string, limit = 5) {
  return parseCompletion(text, TOPIC_SCHEMA, limit, createMockLogger());
}

describe('Response Parser Module', () => {
  describe('findArraySpan()', () => {
    test('should find the balanced span, ignoring brackets in strings', () => {
      expect(findArraySpan('x [1, [2], "]"] y')).toEqual({ start: 2, end: 14 });
    });

    test('should report an unclosed array', () => {
      expect(findArraySpan('[{"a": 1}')).toEqual({ start: 0, end: null });
    });

    test('should return null without an opening bracket', () => {
      expect(findArraySpan('no brackets here')).toBeNull();
    });
  });

  describe('repairJsonArray()', () => {
    test('should strip code fences and trailing commas', () => {
      expect(repairJsonArray('```json\n[{"a": 1},]\n```')).toBe('[{"a": 1}]');
    });

    test('should leave string contents alone', () => {
      expect(repairJsonArray('[{"note": "x,}"},]')).toBe('[{"note": "x,}"}]');
    });

    test('should truncate to the last complete object', () => {
      expect(repairJsonArray('[{"a": 1}, {"a": 2}, {"a"')).toBe('[{"a": 1}, {"a": 2}]');
    });

    test('should cut an unclosed array after its last object even when it ends with a list', () => {
      expect(repairJsonArray('[{"a": [1]}, {"a": [2]', false)).toBe('[{"a": [1]}]');
    });

    test('should quote bare keys', () => {
      expect(repairJsonArray('[{a: 1, b_2: "x"}]')).toBe('[{"a": 1, "b_2": "x"}]');
    });

    test('should separate adjacent objects', () => {
      expect(repairJsonArray('[{"a": 1}{"a": 2}]')).toBe('[{"a": 1}, {"a": 2}]');
    });
  });

  describe('unescapeValue()', () => {
    test('should turn escaped line breaks into spaces and drop other escapes', () => {
      expect(unescapeValue('line\\nbreak \\"q\\"')).toBe('line break "q"');
    });
  });

  describe('hasRequiredFields()', () => {
    test('should treat empty strings and lists as missing', () => {
      expect(hasRequiredFields({ a: 'x', b: ['y'] }, ['a', 'b'])).toBe(true);
      expect(hasRequiredFields({ a: '', b: ['y'] }, ['a', 'b'])).toBe(false);
      expect(hasRequiredFields({ a: 'x', b: [] }, ['a', 'b'])).toBe(false);
    });

    test('should count zero as present and absent keys as missing', () => {
      expect(hasRequiredFields({ n: 0 }, ['n'])).toBe(true);
      expect(hasRequiredFields({ n: 0 }, ['m'])).toBe(false);
    });

    test('should accept any record when nothing is required', () => {
      expect(hasRequiredFields({}, [])).toBe(true);
      expect(hasRequiredFields('junk', [])).toBe(false);
    });
  });

  describe('validateRecords()', () => {
    test('should coerce field values', () => {
      const records = validateRecords(
        [{ content: ' hi ', sender_display_name: 7, timestamp: '1700000000', rationale: null }],
        QUOTE_SCHEMA,
        5
      );
      expect(records).toEqual([{ content: 'hi', sender_display_name: '7', timestamp: 1700000000, rationale: '' }]);
    });

    test('should default unusable integers to zero', () => {
      const records = validateRecords(
        [
          { content: 'a', sender_display_name: 'A', timestamp: -5 },
          { content: 'b', sender_display_name: 'B', timestamp: 3.9 },
        ],
        QUOTE_SCHEMA,
        5
      );
      expect(records.map((r) => r.timestamp)).toEqual([0, 3]);
    });

    test('should split a comma-separated participant string', () => {
      const [record] = validateRecords(
        [{ title: 'T', participants: 'Alice, Bob,', description: 'D' }],
        TOPIC_SCHEMA,
        5
      );
      expect(record?.participants).toEqual(['Alice', 'Bob']);
    });

    test('should keep only the string items of a participant list', () => {
      const [record] = validateRecords(
        [{ title: 'T', participants: ['Alice', 3, ' Bob ', null, ''], description: 'D' }],
        TOPIC_SCHEMA,
        5
      );
      expect(record?.participants).toEqual(['Alice', 'Bob']);
    });

    test('should follow the required list of the schema it is given', () => {
      const items = [{ title: 'A', description: '' }];

      expect(validateRecords(items, TOPIC_SCHEMA, 5)).toEqual([]);
      expect(validateRecords(items, { ...TOPIC_SCHEMA, required: ['title'] }, 5)).toEqual([
        { title: 'A', participants: [], description: '', message_count: 0 },
      ]);
      expect(validateRecords(items, { ...TOPIC_SCHEMA, required: ['title', 'participants'] }, 5)).toEqual([]);
    });

    test('should drop records missing required fields', () => {
      const records = validateRecords(
        [{ subject_id: 'u-1', title: '' }, { subject_id: '', title: 'Night Owl' }, { subject_id: 'u-2', title: 'Lurker' }],
        USER_TITLE_SCHEMA,
        5
      );
      expect(records).toEqual([
        { subject_id: 'u-2', display_name: '', title: 'Lurker', personality_tag: '', rationale: '' },
      ]);
    });
  });

  describe('parseCompletion()', () => {
    test('should parse a well-formed array strictly', () => {
      const outcome = parseTopics(`\n  [${launchJson}]  \n`);

      expect(outcome.tier).toBe('STRICT');
      expect(outcome.records).toEqual([launch]);
      expect(outcome.failures).toEqual([]);
    });

    test('should repair an array wrapped in prose', () => {
      const outcome = parseTopics(
        'Here you go:\n[{"title":"X","participants":["A"],"description":"Y","message_count":3}]\nThanks!'
      );

      expect(outcome.tier).toBe('REPAIRED');
      expect(outcome.records).toEqual([{ title: 'X', participants: ['A'], description: 'Y', message_count: 3 }]);
      expect(outcome.failures).toEqual([{ tier: 'STRICT', reason: 'text outside the array span' }]);
    });

    test('should repair a fenced array', () => {
      const outcome = parseTopics(`\`\`\`json\n[${launchJson}]\n\`\`\``);
      expect(outcome.tier).toBe('REPAIRED');
      expect(outcome.records).toEqual([launch]);
    });

    test('should keep the complete records of a truncated array', () => {
      const outcome = parseTopics(
        '[{"title":"A","participants":[],"description":"first","message_count":1},{"title":"B","participants":[],"descr'
      );

      expect(outcome.tier).toBe('REPAIRED');
      expect(outcome.records).toEqual([{ title: 'A', participants: [], description: 'first', message_count: 1 }]);
      expect(outcome.failures).toEqual([{ tier: 'STRICT', reason: 'no balanced array span' }]);
    });

    test('should keep the complete records of an array cut off after an inner list', () => {
      const outcome = parseTopics(
        '[{"title":"A","participants":["x"],"description":"first"},{"title":"B","participants":["y"]'
      );

      expect(outcome.tier).toBe('REPAIRED');
      expect(outcome.records).toEqual([{ title: 'A', participants: ['x'], description: 'first', message_count: 0 }]);
    });

    test('should repair typographic quotes', () => {
      const outcome = parseTopics(
        '[{“title”: “Launch”, “participants”: [“Alice”], “description”: “Plan”, “message_count”: 3}]'
      );

      expect(outcome.tier).toBe('REPAIRED');
      expect(outcome.records).toEqual([{ title: 'Launch', participants: ['Alice'], description: 'Plan', message_count: 3 }]);
      expect(outcome.failures).toEqual([{ tier: 'STRICT', reason: 'span is not a JSON array' }]);
    });

    test('should repair bare keys and trailing commas', () => {
      const outcome = parseTopics(
        '[{title: "Launch", participants: ["Alice",], description: "Plan", message_count: 3,}]'
      );

      expect(outcome.tier).toBe('REPAIRED');
      expect(outcome.records).toEqual([{ title: 'Launch', participants: ['Alice'], description: 'Plan', message_count: 3 }]);
    });

    test('should repair objects missing their separating comma', () => {
      const outcome = parseTopics('[{"title":"A","description":"x"}{"title":"B","description":"y"}]');

      expect(outcome.tier).toBe('REPAIRED');
      expect(outcome.records).toEqual([
        { title: 'A', participants: [], description: 'x', message_count: 0 },
        { title: 'B', participants: [], description: 'y', message_count: 0 },
      ]);
    });

    test('should salvage records in field order when repairs fail', () => {
      const outcome = parseTopics(
        '[{"title": "A", "participants": ["Alice"], "description": "first", "message_count": 2}; ' +
          '{"title": "B", "participants": ["Bob"], "description": "second", "message_count": 5}]'
      );

      expect(outcome.tier).toBe('REGEX');
      expect(outcome.records).toEqual([
        { title: 'A', participants: ['Alice'], description: 'first', message_count: 2 },
        { title: 'B', participants: ['Bob'], description: 'second', message_count: 5 },
      ]);
      expect(outcome.failures.map((f) => f.tier)).toEqual(['STRICT', 'REPAIRED']);
    });

    test('should salvage fields one by one from a broken object', () => {
      const outcome = parseTopics(
        '[{"title": "Launch", "participants": ["Alice"], "description": "Plan "quoted" here", "message_count": 4}]'
      );

      expect(outcome.tier).toBe('REGEX');
      expect(outcome.records).toEqual([{ title: 'Launch', participants: ['Alice'], description: 'Plan', message_count: 4 }]);
    });

    test('should salvage a lone object', () => {
      const outcome = parseTopics('{"title":"A","description":"x"}');

      expect(outcome.tier).toBe('REGEX');
      expect(outcome.records).toEqual([{ title: 'A', participants: [], description: 'x', message_count: 0 }]);
    });

    test('should fall back to no records for empty input', () => {
      const outcome = parseTopics('');

      expect(outcome.tier).toBe('FALLBACK_DEFAULT');
      expect(outcome.records).toEqual([]);
    });

    test('should log lengths and failures but never the completion', () => {
      const logger = createMockLogger();
      const outcome = parseCompletion('I cannot help with that.', TOPIC_SCHEMA, 5, logger);

      const failures = [
        { tier: 'STRICT', reason: 'no balanced array span' },
        { tier: 'REPAIRED', reason: 'no array start' },
        { tier: 'REGEX', reason: 'no valid records among 0 pattern matches' },
      ];
      expect(outcome).toEqual({ records: [], tier: 'FALLBACK_DEFAULT', failures });
      expect(logger.logs).toEqual([
        {
          level: 'warn',
          message: 'No records recovered from completion',
          meta: { task: 'topics', completionLength: 24, failures },
        },
      ]);
    });

    test('should keep the first records up to the limit', () => {
      const items = ['A', 'B', 'C', 'D'].map((t) => `{"title":"${t}","description":"d"}`).join(',');
      const outcome = parseTopics(`[${items}]`, 2);

      expect(outcome.records.map((r) => r.title)).toEqual(['A', 'B']);
    });

    test('should return no records for a zero limit', () => {
      const outcome = parseTopics(`[${launchJson}]`, 0);
      expect(outcome.tier).toBe('STRICT');
      expect(outcome.records).toEqual([]);
    });

    test('should drop invalid records individually', () => {
      const outcome = parseTopics(
        '[{"title":"A","description":"x"},{"title":"","description":"y"},"junk",{"title":"C","description":"z"}]'
      );

      expect(outcome.tier).toBe('STRICT');
      expect(outcome.records.map((r) => r.title)).toEqual(['A', 'C']);
    });

    test('should stop at the first tier that yields an array, even an empty one', () => {
      const outcome = parseTopics('[]');
      expect(outcome.tier).toBe('STRICT');
      expect(outcome.records).toEqual([]);
    });
  });
});
