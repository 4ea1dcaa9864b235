/**
 * Abstract base class for CLI commands.
 * Implements the Template Method pattern shared by every `vs-select` command:
 *
 * 1. Log the invocation
 * 2. Run the command-specific body
 * 3. Map an `AppError` result (or anything thrown) to a message and exit code
 *
 * Subclasses override only the hook methods.
 *
 * @module commands/base/selectorCommand
 */

import type { AppError, Result } from '../../core/result';
import { toUnknownError } from '../../core/result';
import type { ILogger } from '../../services/loggerService';
import type { SelectorSettings } from '../../services/configuration/selectorSettings';

/**
 * Where command output goes. Results go to `out`, diagnostics to `err`.
 */
export interface CommandOutput {
  out(line: string): void;
  err(line: string): void;
}

export interface CommandContext {
  /** Absolute search root */
  readonly root: string;
  readonly settings: SelectorSettings;
  readonly logger: ILogger;
  readonly output: CommandOutput;
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export abstract class SelectorCommand<TParams> {
  constructor(protected readonly context: CommandContext) {}

  /**
   * Template method: the fixed algorithm.
   * Subclasses do NOT override this.
   *
   * @returns Process exit code
   */
  async execute(params: TParams): Promise<number> {
    this.context.logger.debug(`${this.getCommandName()} invoked`, { root: this.context.root });

    let result: Result<void>;
    try {
      result = await this.run(params);
    } catch (error) {
      this.context.logger.error(
        `${this.getCommandName()} failed`,
        error instanceof Error ? error : new Error(String(error)),
      );
      result = { success: false, error: toUnknownError(error) };
    }

    if (result.success) {
      return EXIT_SUCCESS;
    }
    this.reportFailure(result.error);
    return EXIT_FAILURE;
  }

  /**
   * Print a failure on the error stream. Subclasses may add hints.
   */
  protected reportFailure(error: AppError): void {
    this.context.output.err(error.message);
  }

  /**
   * Command name for logging (e.g., "Scan command").
   */
  protected abstract getCommandName(): string;

  /**
   * Command body.
   */
  protected abstract run(params: TParams): Promise<Result<void>>;
}
