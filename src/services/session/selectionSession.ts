/**
 * Solution → project → platform → configuration selection as a sequence of
 * independent request/response steps.
 *
 * A {@link SelectionSession} is a plain immutable value owned by the caller.
 * {@link nextStep} says what input is needed next, {@link applyChoice} returns
 * a new session advanced by one step. A host (CLI prompt, editor picker, test)
 * drives the sequence; nothing here waits on user input.
 *
 * @module services/session/selectionSession
 */

import { fail, ok, type Result } from '../../core/result';
import type { ILogger } from '../loggerService';
import { nullLogger } from '../loggerService';
import type { LocatedFiles } from '../discovery/projectFileLocator';
import type { ProjectMetadataParser } from '../parsers/projectMetadataParser';
import { getRelativePath } from './selectionFormatter';

/**
 * The values handed to downstream consumers (compile-database generation,
 * status display). Nothing else crosses that boundary.
 */
export interface Selection {
  /** Absolute path to the chosen solution file */
  readonly solution?: string;

  /** Absolute path to the chosen project file */
  readonly project?: string;

  readonly platform?: string;

  readonly configuration?: string;
}

export type SelectionStepKind = 'solution' | 'project' | 'platform' | 'configuration';

export interface SelectionSession {
  /** Root the located paths are displayed relative to */
  readonly root: string;
  readonly solutions: readonly string[];
  readonly projects: readonly string[];
  readonly availablePlatforms: readonly string[];
  readonly availableConfigurations: readonly string[];
  readonly selection: Selection;
  readonly pending: SelectionStepKind | 'complete';
  /** Host platform, decides case sensitivity of relative path display */
  readonly hostPlatform: NodeJS.Platform;
}

/**
 * A request for one choice among `choices`.
 * Path steps offer root-relative display strings.
 */
export interface PromptStep {
  readonly kind: SelectionStepKind;
  readonly prompt: string;
  readonly choices: readonly string[];
}

export type SelectionStep = PromptStep | { readonly kind: 'complete'; readonly selection: Selection };

export type StepOutcome =
  | { readonly kind: 'advanced'; readonly session: SelectionSession }
  | { readonly kind: 'cancelled'; readonly step: SelectionStepKind };

export interface SessionOptions {
  hostPlatform?: NodeJS.Platform;
  logger?: ILogger;
}

const PROMPTS: Record<SelectionStepKind, string> = {
  solution: 'Select Solution:',
  project: 'Select Project:',
  platform: 'Select Platform:',
  configuration: 'Select Configuration:',
};

function cancelledMessage(kind: SelectionStepKind): string {
  return `${kind.charAt(0).toUpperCase()}${kind.slice(1)} selection cancelled.`;
}

/**
 * Start a session from located files. Fails with `NoProjectsFound` when there
 * is no project to choose from, whatever the solution count.
 */
export function createSession(
  root: string,
  located: LocatedFiles,
  options: SessionOptions = {},
): Result<SelectionSession> {
  if (located.projects.length === 0) {
    return fail({ code: 'NoProjectsFound', message: 'No project files found to select from.', directory: root });
  }

  return ok({
    root,
    solutions: [...located.solutions],
    projects: [...located.projects],
    availablePlatforms: [],
    availableConfigurations: [],
    selection: {},
    pending: located.solutions.length > 0 ? 'solution' : 'project',
    hostPlatform: options.hostPlatform ?? process.platform,
  });
}

/**
 * Describe the input the session needs next.
 */
export function nextStep(session: SelectionSession): SelectionStep {
  const toDisplay = (paths: readonly string[]) =>
    paths.map(p => getRelativePath(p, session.root, session.hostPlatform));

  switch (session.pending) {
    case 'solution':
      return { kind: 'solution', prompt: PROMPTS.solution, choices: toDisplay(session.solutions) };
    case 'project':
      return { kind: 'project', prompt: PROMPTS.project, choices: toDisplay(session.projects) };
    case 'platform':
      return { kind: 'platform', prompt: PROMPTS.platform, choices: [...session.availablePlatforms] };
    case 'configuration':
      return { kind: 'configuration', prompt: PROMPTS.configuration, choices: [...session.availableConfigurations] };
    case 'complete':
      return { kind: 'complete', selection: session.selection };
  }
}

function afterPlatform(session: SelectionSession): SelectionSession['pending'] {
  return session.availableConfigurations.length > 0 ? 'configuration' : 'complete';
}

function afterProject(session: SelectionSession): SelectionSession['pending'] {
  return session.availablePlatforms.length > 0 ? 'platform' : afterPlatform(session);
}

/**
 * Answer the pending step.
 *
 * `undefined` cancels the sequence. A choice that was not offered fails with
 * `Validation`. After the project step the project is parsed once; an empty
 * axis is skipped and left unset.
 */
export function applyChoice(
  session: SelectionSession,
  choice: string | undefined,
  parser: ProjectMetadataParser,
  options: Pick<SessionOptions, 'logger'> = {},
): Result<StepOutcome> {
  const logger = options.logger ?? nullLogger;
  const step = nextStep(session);

  if (step.kind === 'complete') {
    return fail({ code: 'Validation', message: 'Selection is already complete' });
  }

  if (choice === undefined) {
    logger.warn(cancelledMessage(step.kind));
    return ok({ kind: 'cancelled', step: step.kind });
  }

  const index = step.choices.indexOf(choice);
  if (index < 0) {
    return fail({ code: 'Validation', message: `"${choice}" is not a valid ${step.kind} choice`, field: step.kind });
  }

  switch (step.kind) {
    case 'solution': {
      const solution = session.solutions[index];
      return ok({
        kind: 'advanced',
        session: { ...session, selection: { ...session.selection, solution }, pending: 'project' },
      });
    }

    case 'project': {
      const project = session.projects[index];
      if (project === undefined) {
        return fail({ code: 'Validation', message: `"${choice}" is not a valid project choice`, field: 'project' });
      }

      const { platforms, configurations } = parser.parseProject(project);
      const relative = getRelativePath(project, session.root, session.hostPlatform);
      if (platforms.length === 0) logger.warn(`No platforms found in ${relative}`);
      if (configurations.length === 0) logger.warn(`No configurations found in ${relative}`);

      const parsed: SelectionSession = {
        ...session,
        availablePlatforms: platforms,
        availableConfigurations: configurations,
        selection: { solution: session.selection.solution, project },
      };
      return ok({ kind: 'advanced', session: { ...parsed, pending: afterProject(parsed) } });
    }

    case 'platform':
      return ok({
        kind: 'advanced',
        session: { ...session, selection: { ...session.selection, platform: choice }, pending: afterPlatform(session) },
      });

    case 'configuration':
      return ok({
        kind: 'advanced',
        session: { ...session, selection: { ...session.selection, configuration: choice }, pending: 'complete' },
      });
  }
}

/**
 * Reset the chosen values and parsed axes. Located files are kept.
 */
export function clearSelection(session: SelectionSession): SelectionSession {
  return {
    ...session,
    availablePlatforms: [],
    availableConfigurations: [],
    selection: {},
    pending: session.solutions.length > 0 ? 'solution' : 'project',
  };
}

/**
 * Supplies the answer for one prompt; `undefined` cancels.
 */
export type ChoiceProvider = (step: PromptStep) => Promise<string | undefined>;

/**
 * Run the whole sequence against a choice provider.
 *
 * @returns The completed session, or a `Cancelled`/`Validation` failure
 */
export async function driveSelection(
  session: SelectionSession,
  provide: ChoiceProvider,
  parser: ProjectMetadataParser,
  options: Pick<SessionOptions, 'logger'> = {},
): Promise<Result<SelectionSession>> {
  let current = session;
  for (;;) {
    const step = nextStep(current);
    if (step.kind === 'complete') {
      return ok(current);
    }

    const choice = await provide(step);
    const outcome = applyChoice(current, choice, parser, options);
    if (!outcome.success) return outcome;

    if (outcome.value.kind === 'cancelled') {
      return fail({ code: 'Cancelled', message: cancelledMessage(outcome.value.step) });
    }
    current = outcome.value.session;
  }
}
