import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ZodError } from 'zod';
import { fail, ok, type Result } from '../core/result';
import {
  mergeWithDefaults,
  selectorSettingsFileSchema,
  type SelectorSettings,
} from './configuration/selectorSettings';

/** Settings file names, in lookup order, relative to the search root. */
export const SETTINGS_FILE_CANDIDATES = ['vs-select.json', path.join('.vs-select', 'config.json')];

/** Environment variable that forces debug logging on. */
export const DEBUG_ENV_VAR = 'VS_SELECT_DEBUG';

/**
 * Discovers the settings file for a root directory.
 *
 * @returns Path to the first candidate that exists, or undefined
 */
export function discoverSettingsFile(root: string): string | undefined {
  for (const candidate of SETTINGS_FILE_CANDIDATES) {
    const fullPath = path.join(root, candidate);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  return undefined;
}

/**
 * Joins zod issues into one message keyed by the offending field.
 */
function describeIssues(error: ZodError): { message: string; field?: string } {
  const first = error.errors[0];
  const field = first && first.path.length > 0 ? first.path.join('.') : undefined;
  const message = error.errors
    .map(e => `${e.path.length > 0 ? e.path.join('.') : 'settings'}: ${e.message}`)
    .join('; ');
  return { message, field };
}

/**
 * Parses settings file content.
 */
export function parseSettings(content: string, source = 'settings'): Result<SelectorSettings> {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail({ code: 'ParseError', message: `Invalid JSON in ${source}: ${reason}`, raw: content });
  }

  const parsed = selectorSettingsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const { message, field } = describeIssues(parsed.error);
    return fail({ code: 'Validation', message: `Invalid ${source}: ${message}`, field });
  }
  return ok(mergeWithDefaults(parsed.data));
}

/**
 * Reads selector settings for a root directory.
 *
 * Priority order:
 * 1. `VS_SELECT_DEBUG` environment variable (debug flag only)
 * 2. `vs-select.json`, then `.vs-select/config.json` under the root
 * 3. Defaults
 */
export function loadSettings(root: string, env: NodeJS.ProcessEnv = process.env): Result<SelectorSettings> {
  const settingsPath = discoverSettingsFile(root);

  let settings: SelectorSettings;
  if (settingsPath) {
    let content: string;
    try {
      content = fs.readFileSync(settingsPath, 'utf-8');
    } catch (error) {
      return fail({
        code: 'FileOpenError',
        message: `Could not read settings file: ${settingsPath}`,
        filePath: settingsPath,
        cause: error,
      });
    }
    const parsed = parseSettings(content, settingsPath);
    if (!parsed.success) return parsed;
    settings = parsed.value;
  } else {
    settings = mergeWithDefaults({});
  }

  const envDebug = env[DEBUG_ENV_VAR];
  if (envDebug === '1' || envDebug?.toLowerCase() === 'true') {
    settings = { ...settings, logging: { debug: true } };
  }

  return ok(settings);
}
