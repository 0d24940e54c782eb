/**
 * User settings stored as JSON (snake_case keys, as users edit them by hand).
 * Missing keys fall back to defaults; a missing file is created.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { getLogger } from '../shared/logger.js';
import { ValidationError } from '../shared/errors.js';
import { BROWSER_PRIORITY, DEFAULT_COOKIE_MAX_AGE_HOURS, NEVER_EXPIRE, isBrowserName } from '../shared/constants.js';
import type { BrowserName } from '../shared/constants.js';

const log = getLogger('config');

const settingsFileSchema = z
  .object({
    cookie_cache_enabled: z.boolean().default(true),
    /** -1 = never expire (only refreshed on authentication failure) */
    cookie_cache_max_age_hours: z.number().int().min(NEVER_EXPIRE).default(DEFAULT_COOKIE_MAX_AGE_HOURS),
    preferred_browser: z
      .string()
      .refine(isBrowserName, { message: `must be one of: ${BROWSER_PRIORITY.join(', ')}` })
      .nullable()
      .default(null),
  })
  // Keys belonging to other tools sharing the file are kept but ignored
  .passthrough();

export interface Settings {
  cookieCacheEnabled: boolean;
  cookieCacheMaxAgeHours: number;
  preferredBrowser: BrowserName | null;
}

export const DEFAULT_SETTINGS: Settings = {
  cookieCacheEnabled: true,
  cookieCacheMaxAgeHours: DEFAULT_COOKIE_MAX_AGE_HOURS,
  preferredBrowser: null,
};

/**
 * Validates a parsed settings object. Throws ValidationError naming the
 * first offending key.
 */
export function parseSettings(raw: unknown): Settings {
  const result = settingsFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : 'settings';
    throw new ValidationError(`Invalid setting "${field}": ${issue?.message ?? 'malformed'}`, field);
  }

  return {
    cookieCacheEnabled: result.data.cookie_cache_enabled,
    cookieCacheMaxAgeHours: result.data.cookie_cache_max_age_hours,
    preferredBrowser: result.data.preferred_browser,
  };
}

/**
 * Writes the default settings file if none exists.
 */
export function ensureSettingsFile(path: string): void {
  if (existsSync(path)) {
    return;
  }

  mkdirSync(dirname(path), { recursive: true });
  const defaults = {
    cookie_cache_enabled: DEFAULT_SETTINGS.cookieCacheEnabled,
    cookie_cache_max_age_hours: DEFAULT_SETTINGS.cookieCacheMaxAgeHours,
    preferred_browser: DEFAULT_SETTINGS.preferredBrowser,
  };
  writeFileSync(path, `${JSON.stringify(defaults, null, 4)}\n`);
  log.info({ path }, 'Created settings file with defaults');
}

export function loadSettings(path: string): Settings {
  ensureSettingsFile(path);

  const text = readFileSync(path, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(
      `Settings file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      'settings',
    );
  }

  const settings = parseSettings(raw);
  log.debug({ path, settings }, 'Settings loaded');
  return settings;
}
