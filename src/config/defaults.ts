/**
 * Default configuration values.
 * Run-level values are overridable via config file or CLI flags.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 30_000,
  ACTION_TIMEOUT: 10_000,
  LOW_CONFIDENCE_ACTION_TIMEOUT: 4_000,
  SETTLE_CEILING: 3_000,
  LOW_CONFIDENCE_SETTLE_CEILING: 1_500,
  DECISION_TIMEOUT: 60_000,
  TOTAL_RUN_TIMEOUT: 600_000,
} as const;

export const LIMITS = {
  MAX_STEPS: 15,
  LOOP_WINDOW_SIZE: 5,
  LOOP_REPEAT_THRESHOLD: 3,
  STALL_STEPS: 2,
  MAX_FAILED_STEPS: 5,
  HISTORY_ENTRIES: 5,
  MAX_LLM_RETRIES: 3,
} as const;

export const TOKEN_GUARDS = {
  MAX_ELEMENTS_PER_ROLE: 20,
  MAX_VISIBLE_TEXT_CHARS: 4_000,
  MAX_VISIBLE_TEXT_LINES: 400,
} as const;

export const WAIT_DURATIONS = {
  short: 1_000,
  medium: 2_000,
  long: 5_000,
} as const;
