/**
 * Shared fixtures for unit and integration tests
 */

import type { Logger, Message, Metrics } from '../src/types/index.js';

/** 2023-11-15T00:00:00Z */
export const MIDNIGHT_UTC = 1700006400;

let nextId = 1;

export function makeMessage(overrides: Partial<Message> = {}): Message {
  const id = String(nextId++);
  return {
    id: `msg-${id}`,
    timestamp: MIDNIGHT_UTC + 12 * 3600,
    sender_id: 'u-alice',
    sender_display_name: 'Alice',
    sender_avatar_ref: 'avatar-alice',
    text: 'hello there everyone',
    kind: 'text',
    ...overrides,
  };
}

export interface LogEntry {
  level: 'info' | 'warn' | 'error' | 'debug';
  message: string;
  meta?: Record<string, unknown>;
}

// Mock logger that captures logs
export const createMockLogger = (): Logger & { logs: LogEntry[] } => {
  const logs: LogEntry[] = [];
  return {
    logs,
    info: (message, meta) => logs.push({ level: 'info', message, meta }),
    warn: (message, meta) => logs.push({ level: 'warn', message, meta }),
    error: (message, meta) => logs.push({ level: 'error', message, meta }),
    debug: (message, meta) => logs.push({ level: 'debug', message, meta }),
  };
};

// Mock metrics that tracks calls
export const createMockMetrics = (): Metrics & {
  calls: Array<{ method: string; name: string; value?: number; tags?: Record<string, string> }>;
} => {
  const calls: Array<{ method: string; name: string; value?: number; tags?: Record<string, string> }> = [];
  return {
    calls,
    increment: (name, tags) => calls.push({ method: 'increment', name, tags }),
    gauge: (name, value, tags) => calls.push({ method: 'gauge', name, value, tags }),
    timing: (name, value, tags) => calls.push({ method: 'timing', name, value, tags }),
  };
};
