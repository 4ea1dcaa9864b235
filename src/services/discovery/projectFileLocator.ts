/**
 * Locates Visual Studio solution and project files under a root directory.
 *
 * Walks every subdirectory of the root and returns absolute paths of files
 * carrying the configured solution and project extensions.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import fg from 'fast-glob';
import { fail, ok, toUnknownError, type Result } from '../../core/result';
import type { ILogger } from '../loggerService';
import { DEFAULT_SELECTOR_SETTINGS, type DiscoverySettings } from '../configuration/selectorSettings';

/**
 * Files found by a scan. Order is whatever the directory walk yields.
 */
export interface LocatedFiles {
  /** Absolute paths to solution files (may be empty) */
  solutions: string[];

  /** Absolute paths to project files (may be empty) */
  projects: string[];
}

/**
 * Service interface for solution/project file discovery.
 */
export interface ProjectFileLocator {
  /**
   * Recursively enumerate solution and project files under `root`.
   * Fails with `DirectoryNotFound` when `root` is not an existing directory.
   */
  locate(root: string): Promise<Result<LocatedFiles>>;

  /**
   * Same as {@link locate}, but fails with `NoProjectsFound` when no project
   * file exists, so a workflow can stop before asking for anything.
   * Missing solutions are tolerated.
   */
  locateForSelection(root: string): Promise<Result<LocatedFiles>>;

  isSolutionFile(filePath: string): boolean;

  isProjectFile(filePath: string): boolean;
}

export function createProjectFileLocator(
  logger: ILogger,
  settings: DiscoverySettings = DEFAULT_SELECTOR_SETTINGS.discovery,
): ProjectFileLocator {
  return new ProjectFileLocatorImpl(logger, settings);
}

class ProjectFileLocatorImpl implements ProjectFileLocator {
  constructor(private readonly logger: ILogger, private readonly settings: DiscoverySettings) {}

  async locate(root: string): Promise<Result<LocatedFiles>> {
    const directory = path.resolve(root);

    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(directory)).isDirectory();
    } catch {
      isDirectory = false;
    }
    if (!isDirectory) {
      this.logger.error(`Directory not found: ${directory}`);
      return fail({ code: 'DirectoryNotFound', message: `Directory not found: ${directory}`, directory });
    }

    this.logger.debug(
      `Scanning for *${this.settings.solutionExtension} and *${this.settings.projectExtension} files in ${directory}`,
    );

    try {
      const [solutions, projects] = await Promise.all([
        this.findByExtension(directory, this.settings.solutionExtension),
        this.findByExtension(directory, this.settings.projectExtension),
      ]);
      return ok({ solutions, projects });
    } catch (error) {
      this.logger.error('Failed to scan directory', error instanceof Error ? error : new Error(String(error)));
      return fail(toUnknownError(error));
    }
  }

  async locateForSelection(root: string): Promise<Result<LocatedFiles>> {
    const result = await this.locate(root);
    if (!result.success) return result;

    const { solutions, projects } = result.value;
    const directory = path.resolve(root);

    if (solutions.length === 0) {
      this.logger.warn(`No ${this.settings.solutionExtension} files found in the current directory tree.`);
    }
    if (projects.length === 0) {
      this.logger.warn(`No ${this.settings.projectExtension} files found in the current directory tree.`);
      return fail({
        code: 'NoProjectsFound',
        message: `No ${this.settings.projectExtension} files found under ${directory}`,
        directory,
      });
    }

    this.logger.debug(`Found ${solutions.length} solution(s) and ${projects.length} project(s).`);
    return result;
  }

  isSolutionFile(filePath: string): boolean {
    return this.hasExtension(filePath, this.settings.solutionExtension);
  }

  isProjectFile(filePath: string): boolean {
    return this.hasExtension(filePath, this.settings.projectExtension);
  }

  private hasExtension(filePath: string, extension: string): boolean {
    return path.basename(filePath).toLowerCase().endsWith(extension.toLowerCase());
  }

  private async findByExtension(directory: string, extension: string): Promise<string[]> {
    const entries = await fg(`**/*${extension}`, {
      cwd: directory,
      absolute: true,
      onlyFiles: true,
      dot: true,
      caseSensitiveMatch: false,
      suppressErrors: true,
      ignore: this.settings.exclude,
    });
    return entries.map(entry => path.normalize(entry));
  }
}
