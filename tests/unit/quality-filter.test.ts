/**
 * Unit tests for the Quality Filter Module
 */

import { describe, test, expect } from '@jest/globals';
import {
  filterMessages,
  filterMessagesWithStats,
  rejectionReason,
} from '../../src/quality-filter/index.js';
import { DEFAULT_ENGINE_CONFIG } from '../../src/config/index.js';
import { makeMessage } from '../helpers.js';

const texts = (messages: Array<{ text: string }>): string[] => messages.map((m) => m.text);

describe('Quality Filter Module', () => {
  describe('base rules', () => {
    test('should drop empty and whitespace-only text for every task', () => {
      const batch = [makeMessage({ text: '' }), makeMessage({ text: '   \n' }), makeMessage({ text: 'keep me please' })];

      expect(texts(filterMessages(batch, 'topics'))).toEqual(['keep me please']);
      expect(texts(filterMessages(batch, 'user_titles'))).toEqual(['keep me please']);
      expect(texts(filterMessages(batch, 'quotes'))).toEqual(['keep me please']);
    });

    test('should drop command text, including after leading whitespace', () => {
      const batch = [makeMessage({ text: '/help' }), makeMessage({ text: '  /stats today' })];
      expect(filterMessages(batch, 'topics')).toEqual([]);
    });
  });

  describe('topics thresholds', () => {
    test('should drop text shorter than 3 characters', () => {
      const batch = [makeMessage({ text: 'ok' }), makeMessage({ text: 'yes' })];
      expect(texts(filterMessages(batch, 'topics'))).toEqual(['yes']);
    });
  });

  describe('user title thresholds', () => {
    test('should keep single-character text', () => {
      expect(texts(filterMessages([makeMessage({ text: 'k' })], 'user_titles'))).toEqual(['k']);
    });
  });

  describe('quotes thresholds', () => {
    test('should enforce the 10 to 200 character window', () => {
      const batch = [
        makeMessage({ text: 'short one' }),
        makeMessage({ text: 'exactly 10' }),
        makeMessage({ text: 'a'.repeat(200) }),
        makeMessage({ text: 'b'.repeat(201) }),
      ];
      expect(texts(filterMessages(batch, 'quotes'))).toEqual(['exactly 10', 'a'.repeat(200)]);
    });

    test('should drop bare URLs but keep text around a URL', () => {
      const batch = [
        makeMessage({ text: 'https://example.test/some/page' }),
        makeMessage({ text: 'see https://example.test/x' }),
      ];
      expect(texts(filterMessages(batch, 'quotes'))).toEqual(['see https://example.test/x']);
    });

    test('should drop text whose emoji density exceeds one third', () => {
      const heavy = makeMessage({ text: '😀😀😀😀ab cdef' });
      const light = makeMessage({ text: '😀😀😀abcdefghi' });

      expect(rejectionReason(heavy, DEFAULT_ENGINE_CONFIG.filters.quotes)).toBe('emoji_heavy');
      expect(rejectionReason(light, DEFAULT_ENGINE_CONFIG.filters.quotes)).toBeNull();
    });

    test('should count length in code points', () => {
      // 9 emoji + "x" is 10 code points but 19 UTF-16 units
      const message = makeMessage({ text: `x${'😀'.repeat(9)}` });
      expect(rejectionReason(message, { ...DEFAULT_ENGINE_CONFIG.filters.quotes, maxLength: 10, maxEmojiDensity: 1 })).toBeNull();
    });
  });

  describe('filterMessagesWithStats()', () => {
    test('should count drops per reason', () => {
      const batch = [
        makeMessage({ text: '' }),
        makeMessage({ text: '/cmd' }),
        makeMessage({ text: 'tiny' }),
        makeMessage({ text: 'https://example.test/a' }),
        makeMessage({ text: 'a perfectly quotable line' }),
      ];

      const { candidates, stats } = filterMessagesWithStats(batch, 'quotes');

      expect(texts(candidates)).toEqual(['a perfectly quotable line']);
      expect(stats).toEqual({
        kept: 1,
        dropped: { empty: 1, command: 1, too_short: 1, too_long: 0, bare_url: 1, emoji_heavy: 0 },
      });
    });

    test('should honor overridden thresholds', () => {
      const batch = [makeMessage({ text: 'hello' })];
      const thresholds = { minLength: 6, maxLength: Infinity, dropBareUrls: false, maxEmojiDensity: 1 };
      expect(filterMessagesWithStats(batch, 'topics', thresholds).stats.dropped.too_short).toBe(1);
    });
  });

  describe('idempotence', () => {
    test('should return the same list when filtering twice', () => {
      const batch = [
        makeMessage({ text: '' }),
        makeMessage({ text: 'fine message here' }),
        makeMessage({ text: '/cmd' }),
        makeMessage({ text: 'https://example.test/a' }),
        makeMessage({ text: '😀😀😀😀😀😀 ok' }),
        makeMessage({ text: 'another quotable message' }),
      ];

      for (const task of ['topics', 'user_titles', 'quotes'] as const) {
        const once = filterMessages(batch, task);
        expect(filterMessages(once, task)).toEqual(once);
      }
    });

    test('should not mutate the input', () => {
      const batch = [makeMessage({ text: '' }), makeMessage({ text: 'fine message here' })];
      filterMessages(batch, 'quotes');
      expect(batch).toHaveLength(2);
    });
  });
});
