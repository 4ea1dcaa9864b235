import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as path from 'node:path';
import { SAMPLE_VCXPROJ, createTempDir, createTestContext, removeTempDir, writeFile } from '../../__tests__/testHelpers';
import { ParseCommand } from '../parseCommand';
import { ScanCommand } from '../scanCommand';

describe('ScanCommand', () => {
  let root: string;

  beforeEach(() => {
    root = createTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('lists solutions and projects relative to the root', async () => {
    writeFile(root, 'Game.sln');
    writeFile(root, 'engine/Engine.vcxproj');
    const { context, captured } = createTestContext(root);

    const code = await new ScanCommand(context).execute({});

    expect(code).toBe(0);
    expect(captured.stdout).toEqual(['Solutions (1):', '  Game.sln', 'Projects (1):', '  engine/Engine.vcxproj']);
  });

  it('prints absolute paths as JSON', async () => {
    const proj = writeFile(root, 'App.vcxproj');
    const { context, captured } = createTestContext(root);

    await new ScanCommand(context).execute({ json: true });

    expect(JSON.parse(captured.stdout.join('\n'))).toEqual({ solutions: [], projects: [proj] });
  });

  it('fails before listing anything when there is no project', async () => {
    writeFile(root, 'Game.sln');
    const { context, captured } = createTestContext(root);

    const code = await new ScanCommand(context).execute({});

    expect(code).toBe(1);
    expect(captured.stdout).toEqual([]);
    expect(captured.stderr).toEqual([`No .vcxproj files found under ${root}`]);
  });
});

describe('ParseCommand', () => {
  let root: string;

  beforeEach(() => {
    root = createTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('prints platforms and configurations for a path relative to the root', async () => {
    writeFile(root, 'engine/Engine.vcxproj', SAMPLE_VCXPROJ);
    const { context, captured } = createTestContext(root);

    const code = await new ParseCommand(context).execute({ projectPath: 'engine/Engine.vcxproj' });

    expect(code).toBe(0);
    expect(JSON.parse(captured.stdout.join('\n'))).toEqual({
      platforms: ['Win32', 'x64'],
      configurations: ['Debug', 'Release'],
    });
  });

  it('prints the empty result and fails for an unreadable file', async () => {
    const { context, captured } = createTestContext(root);

    const code = await new ParseCommand(context).execute({ projectPath: 'missing.vcxproj' });

    expect(code).toBe(1);
    expect(JSON.parse(captured.stdout.join('\n'))).toEqual({ platforms: [], configurations: [] });
    expect(captured.stderr).toEqual([`Error opening project file: ${path.join(root, 'missing.vcxproj')}`]);
  });
});
