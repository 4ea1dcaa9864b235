import { describe, expect, it } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import type { PromptStep } from '../../services/session/selectionSession';
import { cancelEveryStep, createTerminalPrompter, formatChoices, resolveAnswer } from '../terminalPrompter';

const platformStep: PromptStep = { kind: 'platform', prompt: 'Select Platform:', choices: ['Win32', 'x64'] };

describe('resolveAnswer', () => {
  it('treats empty input as cancel', () => {
    expect(resolveAnswer('', ['a'])).toBeUndefined();
    expect(resolveAnswer('   ', ['a'])).toBeUndefined();
  });

  it('selects by 1-based index', () => {
    expect(resolveAnswer('2', ['Win32', 'x64'])).toBe('x64');
    expect(resolveAnswer(' 1 ', ['Win32', 'x64'])).toBe('Win32');
  });

  it('selects by exact text', () => {
    expect(resolveAnswer('x64', ['Win32', 'x64'])).toBe('x64');
  });

  it('returns null for out-of-range or unknown answers', () => {
    expect(resolveAnswer('0', ['Win32', 'x64'])).toBeNull();
    expect(resolveAnswer('3', ['Win32', 'x64'])).toBeNull();
    expect(resolveAnswer('X64', ['Win32', 'x64'])).toBeNull();
  });
});

describe('formatChoices', () => {
  it('numbers the choices under the prompt', () => {
    expect(formatChoices(platformStep)).toEqual(['Select Platform:', '  1) Win32', '  2) x64']);
  });
});

describe('createTerminalPrompter', () => {
  it('cancels when the input closes', async () => {
    const input = new PassThrough();
    const output = new Writable({
      write(_chunk: Buffer, _encoding, callback) {
        callback();
      },
    });
    const prompter = createTerminalPrompter(input, output);

    const answer = prompter.provide(platformStep);
    input.end();

    await expect(answer).resolves.toBeUndefined();
    prompter.close();
  });
});

describe('cancelEveryStep', () => {
  it('resolves undefined', async () => {
    await expect(cancelEveryStep(platformStep)).resolves.toBeUndefined();
  });
});
