import { ok, type Result } from '../core/result';
import { clearStoredSelection } from '../services/session/selectionStore';
import { SelectorCommand } from './base/selectorCommand';

/**
 * Forgets the stored selection.
 */
export class ClearCommand extends SelectorCommand<void> {
  static id = 'clear';

  protected getCommandName(): string {
    return 'Clear command';
  }

  protected async run(): Promise<Result<void>> {
    const cleared = await clearStoredSelection(this.context.root);
    if (!cleared.success) return cleared;

    this.context.logger.debug('Removed stored selection');
    this.context.output.out('VS Selector state cleared.');
    return ok(undefined);
  }
}
