import { describe, expect, it } from 'vitest';

import { DEFAULT_SUMMARY_PROMPT, DEFAULT_SYSTEM_PROMPT, resolveResearchConfig } from '../src/index';

describe('resolveResearchConfig', () => {
  it('fills defaults', () => {
    expect(resolveResearchConfig()).toEqual({
      summarizeThreshold: 3,
      maxSteps: 25,
      maxHistoryMessages: 40,
      llmTimeoutMs: 20_000,
      toolTimeoutMs: 12_000,
      maxIdempotentRetries: 2,
      retryBaseDelayMs: 75,
      retryJitterMs: 25,
      systemPrompt: DEFAULT_SYSTEM_PROMPT,
      summaryPrompt: DEFAULT_SUMMARY_PROMPT
    });
  });

  it('keeps explicit values, including zero where allowed', () => {
    const config = resolveResearchConfig({ summarizeThreshold: 0, maxIdempotentRetries: 0, retryJitterMs: 0, maxSteps: 8 });
    expect(config.summarizeThreshold).toBe(0);
    expect(config.maxIdempotentRetries).toBe(0);
    expect(config.maxSteps).toBe(8);
  });

  it('rejects empty prompts', () => {
    expect(() => resolveResearchConfig({ systemPrompt: '  ' })).toThrowError('Invalid research config: missing systemPrompt');
  });

  it('lists every invalid number', () => {
    expect(() => resolveResearchConfig({ maxSteps: 0, toolTimeoutMs: 1.5, summarizeThreshold: -1 })).toThrowError(
      'Invalid research config: invalid maxSteps, toolTimeoutMs, summarizeThreshold'
    );
  });
});
