/**
 * Configuration schema and types for the selector.
 *
 * This module defines the settings that control how project files are
 * discovered and how much the tool logs.
 */

import { z } from 'zod';

/**
 * Settings for solution/project file discovery.
 */
export interface DiscoverySettings {
  /** Extension identifying solution files (e.g., ".sln") */
  solutionExtension: string;

  /** Extension identifying project files (e.g., ".vcxproj") */
  projectExtension: string;

  /** Extra glob patterns excluded from the recursive scan */
  exclude: string[];
}

export interface LoggingSettings {
  /** Emit DEBUG lines */
  debug: boolean;
}

export interface SelectorSettings {
  discovery: DiscoverySettings;
  logging: LoggingSettings;
}

/**
 * Default values for selector settings.
 */
export const DEFAULT_SELECTOR_SETTINGS: SelectorSettings = {
  discovery: {
    solutionExtension: '.sln',
    projectExtension: '.vcxproj',
    exclude: [],
  },
  logging: {
    debug: false,
  },
};

const extensionSchema = z
  .string()
  .regex(/^\.[A-Za-z0-9_-]+$/, 'must be a file extension starting with "."');

/**
 * Schema for the on-disk settings file. Every key is optional; missing keys
 * fall back to {@link DEFAULT_SELECTOR_SETTINGS}.
 */
export const selectorSettingsFileSchema = z
  .object({
    discovery: z
      .object({
        solutionExtension: extensionSchema.optional(),
        projectExtension: extensionSchema.optional(),
        exclude: z.array(z.string().min(1)).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        debug: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type SelectorSettingsFile = z.infer<typeof selectorSettingsFileSchema>;

/**
 * Overlay a parsed settings file on the defaults.
 */
export function mergeWithDefaults(file: SelectorSettingsFile): SelectorSettings {
  return {
    discovery: {
      solutionExtension: file.discovery?.solutionExtension ?? DEFAULT_SELECTOR_SETTINGS.discovery.solutionExtension,
      projectExtension: file.discovery?.projectExtension ?? DEFAULT_SELECTOR_SETTINGS.discovery.projectExtension,
      exclude: file.discovery?.exclude ?? [...DEFAULT_SELECTOR_SETTINGS.discovery.exclude],
    },
    logging: {
      debug: file.logging?.debug ?? DEFAULT_SELECTOR_SETTINGS.logging.debug,
    },
  };
}
