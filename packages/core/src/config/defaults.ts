/**
 * Default constants shared by the engine, the adapters and the research agent.
 */

export const LOGGING_DEFAULTS = {
  LEVEL: 'info' as const,

  /** Pretty-print outside production. */
  PRETTY_PRINT: process.env.NODE_ENV !== 'production',
} as const;

export const ENGINE_DEFAULTS = {
  /** Supersteps allowed per run/resume call before the run fails. */
  MAX_STEPS: 25,
} as const;

export const RESEARCH_DEFAULTS = {
  SUMMARIZE_THRESHOLD: 3,
  MAX_HISTORY_MESSAGES: 40,
  LLM_TIMEOUT_MS: 20_000,
  TOOL_TIMEOUT_MS: 12_000,
  MAX_IDEMPOTENT_RETRIES: 2,
  RETRY_BASE_DELAY_MS: 75,
  RETRY_JITTER_MS: 25,
  THREAD_ID: 'research-session-1',
  CHECKPOINT_DIR: './data/checkpoints',
} as const;
