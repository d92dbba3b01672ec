/**
 * Unit tests for the Anthropic host completion source
 */

import { describe, test, expect } from '@jest/globals';
import {
  createAnthropicHostSource,
  type AnthropicMessagesClient,
} from '../../src/provider-gateway/anthropic-host.js';
import { createMockLogger } from '../helpers.js';

type CreateBody = Parameters<AnthropicMessagesClient['messages']['create']>[0];

function fakeClient(reply: Awaited<ReturnType<AnthropicMessagesClient['messages']['create']>>) {
  const bodies: CreateBody[] = [];
  const signals: Array<AbortSignal | undefined> = [];
  const client: AnthropicMessagesClient = {
    messages: {
      create: async (body, options) => {
        bodies.push(body);
        signals.push(options?.signal);
        return reply;
      },
    },
  };
  return { client, bodies, signals };
}

describe('Anthropic Host Source', () => {
  describe('createAnthropicHostSource()', () => {
    test('should return undefined and warn without an API key', () => {
      const logger = createMockLogger();
      expect(createAnthropicHostSource({}, undefined, logger)).toBeUndefined();
      expect(logger.logs.map((l) => l.level)).toEqual(['warn']);
    });

    test('should build an SDK-backed source from an API key', () => {
      expect(createAnthropicHostSource({ apiKey: 'test-secret' }, undefined, createMockLogger())).toBeDefined();
    });
  });

  describe('textChat()', () => {
    test('should send one user message with the request settings', async () => {
      const { client, bodies, signals } = fakeClient({ content: [{ type: 'text', text: '[]' }] });
      const source = createAnthropicHostSource({ model: 'test-model', systemPrompt: 'be terse' }, client);
      const signal = new AbortController().signal;

      await source?.textChat({ prompt: 'extract things', maxTokens: 200, temperature: 0.3, signal });

      expect(bodies).toEqual([
        {
          model: 'test-model',
          max_tokens: 200,
          temperature: 0.3,
          system: 'be terse',
          messages: [{ role: 'user', content: 'extract things' }],
        },
      ]);
      expect(signals).toEqual([signal]);
    });

    test('should join text blocks and map usage', async () => {
      const { client } = fakeClient({
        content: [
          { type: 'text', text: '[{"a":' },
          { type: 'tool_use' },
          { type: 'text', text: '1}]' },
        ],
        usage: { input_tokens: 10, output_tokens: 5 },
      });
      const source = createAnthropicHostSource({ model: 'test-model' }, client);

      const completion = await source?.textChat({
        prompt: 'p',
        maxTokens: 10,
        temperature: 0,
        signal: new AbortController().signal,
      });

      expect(completion).toEqual({
        completionText: '[{"a":1}]',
        usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
      });
    });

    test('should report zero usage when the reply has none', async () => {
      const { client } = fakeClient({ content: [{ type: 'text', text: '[]' }], usage: null });
      const source = createAnthropicHostSource({}, client);

      const completion = await source?.textChat({
        prompt: 'p',
        maxTokens: 10,
        temperature: 0,
        signal: new AbortController().signal,
      });

      expect(completion?.usage).toEqual({ prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 });
    });
  });
});
