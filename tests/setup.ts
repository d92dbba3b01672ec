/**
 * Jest test setup file
 * Runs before each test file
 */

process.env.NODE_ENV = 'test';

// Console loggers created without an explicit level stay quiet
process.env.CHAT_DIGEST_LOG_LEVEL = 'error';

// Never let a developer's key reach the Anthropic host source
delete process.env.ANTHROPIC_API_KEY;
delete process.env.ANTHROPIC_MODEL;

export {};
