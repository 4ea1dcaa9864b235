import { ok, type Result } from '../core/result';
import { createProjectFileLocator, type ProjectFileLocator } from '../services/discovery/projectFileLocator';
import { getRelativePath } from '../services/session/selectionFormatter';
import { SelectorCommand, type CommandContext } from './base/selectorCommand';

export interface ScanParams {
  /** Print `{ solutions, projects }` as JSON with absolute paths */
  json?: boolean;
}

/**
 * Lists the solution and project files under the root.
 * Fails when no project file exists.
 */
export class ScanCommand extends SelectorCommand<ScanParams> {
  static id = 'scan';

  private readonly locator: ProjectFileLocator;

  constructor(context: CommandContext, locator?: ProjectFileLocator) {
    super(context);
    this.locator = locator ?? createProjectFileLocator(context.logger, context.settings.discovery);
  }

  protected getCommandName(): string {
    return 'Scan command';
  }

  protected async run(params: ScanParams): Promise<Result<void>> {
    const located = await this.locator.locateForSelection(this.context.root);
    if (!located.success) return located;

    const { solutions, projects } = located.value;
    const { output, root } = this.context;

    if (params.json) {
      output.out(JSON.stringify({ solutions, projects }, null, 2));
      return ok(undefined);
    }

    output.out(`Solutions (${solutions.length}):`);
    solutions.forEach(p => output.out(`  ${getRelativePath(p, root)}`));
    output.out(`Projects (${projects.length}):`);
    projects.forEach(p => output.out(`  ${getRelativePath(p, root)}`));
    return ok(undefined);
  }
}
