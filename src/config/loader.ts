import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';

// ── Error ───────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly configPath: string;

  constructor(configPath: string, reason: string) {
    super(`Invalid config ${configPath}: ${reason}`);
    this.name = 'ConfigError';
    this.configPath = configPath;
  }
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.pagepilot.yaml` (or JSON) config file.
 * Throws a ConfigError if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(configPath, message);
  }

  return parseConfig(configPath, raw);
}

/** Parse config text; the format is picked from the file extension. */
export function parseConfig(configPath: string, raw: string): FileConfig {
  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(configPath, message);
  }

  try {
    return fileConfigSchema.parse(parsed);
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      throw new ConfigError(configPath, issues);
    }
    throw err;
  }
}
