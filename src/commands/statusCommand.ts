import { ok, type Result } from '../core/result';
import { formatStatusLine } from '../services/session/selectionFormatter';
import { loadSelection } from '../services/session/selectionStore';
import { SelectorCommand } from './base/selectorCommand';

export interface StatusParams {
  /** `line` prints the status-line string, `json` the stored payload */
  format: 'line' | 'json';
}

/**
 * Shows the stored selection.
 */
export class StatusCommand extends SelectorCommand<StatusParams> {
  static id = 'status';

  protected getCommandName(): string {
    return 'Status command';
  }

  protected async run(params: StatusParams): Promise<Result<void>> {
    const stored = await loadSelection(this.context.root);
    if (!stored.success) return stored;

    if (params.format === 'json') {
      this.context.output.out(JSON.stringify(stored.value, null, 2));
    } else {
      this.context.output.out(formatStatusLine(stored.value));
    }
    return ok(undefined);
  }
}
