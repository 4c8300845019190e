/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated.
 */

export { TIMEOUTS, LIMITS, TOKEN_GUARDS, WAIT_DURATIONS } from './defaults.js';
export { loadConfigFile, parseConfig, ConfigError } from './loader.js';
export { loadCredentials, credentialsSchema } from './credentials.js';
export type { Credentials } from './credentials.js';
