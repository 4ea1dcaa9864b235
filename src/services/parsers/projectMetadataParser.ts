/**
 * Line-oriented extractor for the platform and configuration axes declared in
 * a `.vcxproj` file.
 *
 * This is a text scraper, not an XML parser. A single forward pass toggles a
 * "capture" flag on recognized container openers/closers and collects
 * `<Platform>` and `<Configuration>` values only while the flag is set.
 *
 * @module services/parsers/projectMetadataParser
 */

import * as fs from 'node:fs';
import type { AppError } from '../../core/result';
import type { ILogger } from '../loggerService';
import { nullLogger } from '../loggerService';

/**
 * Platform and configuration names declared by a project, deduplicated and
 * sorted ascending.
 */
export interface ProjectMetadata {
  readonly platforms: string[];
  readonly configurations: string[];
}

export type FileOpenError = Extract<AppError, { code: 'FileOpenError' }>;

/**
 * Parse outcome. The lists are always present; `error` is set when the file
 * could not be read, in which case both lists are empty.
 */
export interface ProjectParseResult extends ProjectMetadata {
  readonly error?: FileOpenError;
}

/**
 * Transient per-parse state.
 */
interface ScanContext {
  inConfigGroup: boolean;
}

/** Openers of configuration-bearing sections. */
const SECTION_START_MARKERS = [
  '<PropertyGroup Label="Configuration"',
  '<ItemDefinitionGroup Condition=',
  '<ProjectConfiguration',
] as const;

/** Closers of configuration-bearing sections. */
const SECTION_END_MARKERS = ['</PropertyGroup>', '</ItemDefinitionGroup>', '</ProjectConfiguration>'] as const;

const PLATFORM_PATTERN = /<Platform>(.*)<\/Platform>/;
const CONFIGURATION_PATTERN = /<Configuration>(.*)<\/Configuration>/;

function containsAny(line: string, markers: readonly string[]): boolean {
  return markers.some(marker => line.includes(marker));
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Appends `value` to `target` unless it was seen before.
 */
function collect(value: string | undefined, target: string[], seen: Set<string>): void {
  if (value === undefined || seen.has(value)) return;
  target.push(value);
  seen.add(value);
}

/**
 * Extract platforms and configurations from project file text.
 *
 * A line that both opens and closes a section leaves capture mode off: the
 * closer is checked after the opener, and tags on that line are not captured.
 */
export function parseProjectContent(content: string): ProjectMetadata {
  const context: ScanContext = { inConfigGroup: false };
  const platforms: string[] = [];
  const configurations: string[] = [];
  const platformSet = new Set<string>();
  const configurationSet = new Set<string>();

  for (const line of content.split(/\r?\n/)) {
    if (containsAny(line, SECTION_START_MARKERS)) {
      context.inConfigGroup = true;
    }
    if (containsAny(line, SECTION_END_MARKERS)) {
      context.inConfigGroup = false;
    }

    if (context.inConfigGroup) {
      collect(PLATFORM_PATTERN.exec(line)?.[1], platforms, platformSet);
      collect(CONFIGURATION_PATTERN.exec(line)?.[1], configurations, configurationSet);
    }
  }

  return {
    platforms: unique(platforms).sort(),
    configurations: unique(configurations).sort(),
  };
}

export interface ProjectMetadataParser {
  /**
   * Parse platforms and configurations from a single project file.
   *
   * Never throws. An unreadable file yields empty lists and a `FileOpenError`.
   *
   * @param projectPath - Path to a `.vcxproj` file
   */
  parseProject(projectPath: string): ProjectParseResult;
}

export function createProjectMetadataParser(logger: ILogger = nullLogger): ProjectMetadataParser {
  return {
    parseProject(projectPath: string): ProjectParseResult {
      logger.debug(`Parsing project file: ${projectPath}`);

      let content: string;
      let fd: number | undefined;
      try {
        fd = fs.openSync(projectPath, 'r');
        content = fs.readFileSync(fd, 'utf-8');
      } catch (error) {
        logger.error(
          `Error opening project file: ${projectPath}`,
          error instanceof Error ? error : new Error(String(error)),
        );
        return {
          platforms: [],
          configurations: [],
          error: {
            code: 'FileOpenError',
            message: `Error opening project file: ${projectPath}`,
            filePath: projectPath,
            cause: error,
          },
        };
      } finally {
        if (fd !== undefined) fs.closeSync(fd);
      }

      const metadata = parseProjectContent(content);

      logger.debug(`Found Platforms: ${metadata.platforms.join(', ')}`);
      logger.debug(`Found Configurations: ${metadata.configurations.join(', ')}`);

      return metadata;
    },
  };
}
