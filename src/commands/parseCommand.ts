import * as path from 'node:path';
import { fail, ok, type Result } from '../core/result';
import {
  createProjectMetadataParser,
  type ProjectMetadataParser,
} from '../services/parsers/projectMetadataParser';
import { SelectorCommand, type CommandContext } from './base/selectorCommand';

export interface ParseParams {
  /** Project file, absolute or relative to the root */
  projectPath: string;
}

/**
 * Prints the platforms and configurations a project declares as JSON.
 * An unreadable file prints the empty result and fails.
 */
export class ParseCommand extends SelectorCommand<ParseParams> {
  static id = 'parse';

  private readonly parser: ProjectMetadataParser;

  constructor(context: CommandContext, parser?: ProjectMetadataParser) {
    super(context);
    this.parser = parser ?? createProjectMetadataParser(context.logger);
  }

  protected getCommandName(): string {
    return 'Parse command';
  }

  protected async run(params: ParseParams): Promise<Result<void>> {
    const projectPath = path.resolve(this.context.root, params.projectPath);
    const { platforms, configurations, error } = this.parser.parseProject(projectPath);

    this.context.output.out(JSON.stringify({ platforms, configurations }, null, 2));
    return error ? fail(error) : ok(undefined);
  }
}
