/**
 * Numbered-list prompt on a terminal, used by `vs-select select` for steps
 * no flag answers.
 */

import * as readline from 'node:readline/promises';
import type { ChoiceProvider, PromptStep } from '../services/session/selectionSession';

/**
 * Map a typed answer to one of `choices`.
 *
 * Empty input cancels (`undefined`). A 1-based index or the exact choice text
 * selects. Anything else is `null` so the caller can ask again.
 */
export function resolveAnswer(answer: string, choices: readonly string[]): string | undefined | null {
  const trimmed = answer.trim();
  if (trimmed === '') return undefined;

  if (/^\d+$/.test(trimmed)) {
    const index = Number(trimmed) - 1;
    return index >= 0 && index < choices.length ? (choices[index] ?? null) : null;
  }
  return choices.includes(trimmed) ? trimmed : null;
}

export function formatChoices(step: PromptStep): string[] {
  return [step.prompt, ...step.choices.map((choice, i) => `  ${i + 1}) ${choice}`)];
}

export interface TerminalPrompter {
  readonly provide: ChoiceProvider;
  close(): void;
}

export function createTerminalPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): TerminalPrompter {
  const rl = readline.createInterface({ input, output });
  const closed = new AbortController();
  rl.on('close', () => closed.abort());

  async function ask(question: string): Promise<string | undefined> {
    if (closed.signal.aborted) return undefined;
    try {
      return await rl.question(question, { signal: closed.signal });
    } catch (error) {
      // Input closed while waiting: treat as cancel.
      if (error instanceof Error && error.name === 'AbortError') return undefined;
      throw error;
    }
  }

  return {
    async provide(step: PromptStep): Promise<string | undefined> {
      formatChoices(step).forEach(line => output.write(`${line}\n`));
      for (;;) {
        const answer = await ask('Enter number (empty to cancel): ');
        if (answer === undefined) return undefined;

        const resolved = resolveAnswer(answer, step.choices);
        if (resolved !== null) return resolved;
        output.write(`Invalid choice: ${answer.trim()}\n`);
      }
    },
    close() {
      rl.close();
    },
  };
}

/**
 * Provider for non-interactive runs: every unanswered step cancels.
 */
export const cancelEveryStep: ChoiceProvider = () => Promise.resolve(undefined);
