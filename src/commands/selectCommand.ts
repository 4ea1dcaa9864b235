/**
 * Runs the solution → project → platform → configuration selection and
 * stores the result.
 *
 * Each step is answered by the matching flag when one was given, otherwise by
 * the interactive choice provider. A cancelled step ends the command without
 * touching the stored selection.
 *
 * @module commands/selectCommand
 */

import * as path from 'node:path';
import { ok, type Result } from '../core/result';
import { createProjectFileLocator, type ProjectFileLocator } from '../services/discovery/projectFileLocator';
import {
  createProjectMetadataParser,
  type ProjectMetadataParser,
} from '../services/parsers/projectMetadataParser';
import { formatSelectionSummary, getRelativePath } from '../services/session/selectionFormatter';
import {
  createSession,
  driveSelection,
  type ChoiceProvider,
  type PromptStep,
} from '../services/session/selectionSession';
import { saveSelection } from '../services/session/selectionStore';
import { SelectorCommand, type CommandContext } from './base/selectorCommand';

export interface SelectParams {
  /** Solution file, absolute or relative to the root */
  solution?: string;

  /** Project file, absolute or relative to the root */
  project?: string;

  platform?: string;

  configuration?: string;
}

export interface SelectCommandDeps {
  /** Answers steps no flag answers; resolve `undefined` to cancel */
  prompt: ChoiceProvider;
  locator?: ProjectFileLocator;
  parser?: ProjectMetadataParser;
}

export class SelectCommand extends SelectorCommand<SelectParams> {
  static id = 'select';

  private readonly prompt: ChoiceProvider;
  private readonly locator: ProjectFileLocator;
  private readonly parser: ProjectMetadataParser;

  constructor(context: CommandContext, deps: SelectCommandDeps) {
    super(context);
    this.prompt = deps.prompt;
    this.locator = deps.locator ?? createProjectFileLocator(context.logger, context.settings.discovery);
    this.parser = deps.parser ?? createProjectMetadataParser(context.logger);
  }

  protected getCommandName(): string {
    return 'Select command';
  }

  protected async run(params: SelectParams): Promise<Result<void>> {
    const { root, logger, output } = this.context;

    const located = await this.locator.locateForSelection(root);
    if (!located.success) return located;

    const session = createSession(root, located.value, { logger });
    if (!session.success) return session;

    const completed = await driveSelection(session.value, step => this.answer(step, params), this.parser, {
      logger,
    });
    if (!completed.success) return completed;

    const { selection } = completed.value;
    const saved = await saveSelection(root, selection);
    if (!saved.success) return saved;

    logger.debug('Stored selection', { file: saved.value });
    output.out(formatSelectionSummary(selection, root));
    return ok(undefined);
  }

  /**
   * Answer from a flag when one was given for this step.
   */
  private answer(step: PromptStep, params: SelectParams): Promise<string | undefined> {
    const flag = params[step.kind];
    if (flag === undefined) {
      return this.prompt(step);
    }

    if (step.kind === 'solution' || step.kind === 'project') {
      return Promise.resolve(getRelativePath(path.resolve(this.context.root, flag), this.context.root));
    }
    return Promise.resolve(flag);
  }
}
