import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { PassThrough, Writable } from 'node:stream';
import { SAMPLE_VCXPROJ, createTempDir, removeTempDir, writeFile } from '../../__tests__/testHelpers';
import { run, VERSION, type CliIo } from '../index';

function createCapturingStream(chunks: string[]): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
}

describe('run', () => {
  let root: string;
  let stdout: string[];
  let stderr: string[];
  let io: CliIo;

  const argv = (...args: string[]) => ['node', 'vs-select', ...args];
  const outLines = () => stdout.join('').split('\n').filter(line => line !== '');

  beforeEach(() => {
    root = createTempDir();
    stdout = [];
    stderr = [];
    io = {
      stdin: new PassThrough(),
      stdout: createCapturingStream(stdout),
      stderr: createCapturingStream(stderr),
      env: {},
      cwd: root,
      interactive: false,
    };
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('prints the version', async () => {
    expect(await run(argv('--version'), io)).toBe(0);
    expect(stdout.join('')).toBe(`${VERSION}\n`);
  });

  it('parses a project relative to the working directory', async () => {
    writeFile(root, 'app/App.vcxproj', SAMPLE_VCXPROJ);

    expect(await run(argv('parse', 'app/App.vcxproj'), io)).toBe(0);
    expect(JSON.parse(stdout.join(''))).toEqual({ platforms: ['Win32', 'x64'], configurations: ['Debug', 'Release'] });
  });

  it('scans the directory given with --cwd', async () => {
    const nested = path.join(root, 'repo');
    writeFile(nested, 'Game.sln');
    writeFile(nested, 'src/Game.vcxproj', SAMPLE_VCXPROJ);

    expect(await run(argv('-C', 'repo', 'scan'), io)).toBe(0);
    expect(outLines()).toEqual(['Solutions (1):', '  Game.sln', 'Projects (1):', '  src/Game.vcxproj']);
  });

  it('scans the directory given as an argument', async () => {
    writeFile(root, 'repo/src/Game.vcxproj', SAMPLE_VCXPROJ);

    expect(await run(argv('scan', 'repo'), io)).toBe(0);
    expect(outLines()).toEqual(['Solutions (0):', 'Projects (1):', '  src/Game.vcxproj']);
  });

  it('fails to scan a directory that does not exist', async () => {
    expect(await run(argv('scan', 'nowhere'), io)).toBe(1);
    expect(stderr.join('')).toContain(`Directory not found: ${path.join(root, 'nowhere')}\n`);
  });

  it('selects from flags, then reports status and clears it', async () => {
    writeFile(root, 'Game.sln');
    writeFile(root, 'src/Game.vcxproj', SAMPLE_VCXPROJ);

    const selected = await run(
      argv('select', '--solution', 'Game.sln', '--project', 'src/Game.vcxproj', '--platform', 'Win32', '--configuration', 'Debug'),
      io,
    );
    expect(selected).toBe(0);
    expect(outLines()).toEqual(['Selected: Sln: Game.sln | Proj: src/Game.vcxproj | Plat: Win32 | Cfg: Debug']);

    stdout.length = 0;
    expect(await run(argv('status'), io)).toBe(0);
    expect(outLines()).toEqual(['\u{F070C} VS[S:Game|P:Game|Win32|Debug]']);

    stdout.length = 0;
    expect(await run(argv('clear'), io)).toBe(0);
    expect(outLines()).toEqual(['VS Selector state cleared.']);
    expect(fs.existsSync(path.join(root, '.vs-select', 'selection.json'))).toBe(false);
  });

  it('cancels a step no flag answers when not interactive', async () => {
    writeFile(root, 'src/Game.vcxproj', SAMPLE_VCXPROJ);

    expect(await run(argv('select'), io)).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr.join('')).toContain('Project selection cancelled.\n');
  });

  it('fails before running a command when the settings file is invalid', async () => {
    writeFile(root, 'vs-select.json', JSON.stringify({ discovery: { projectExtension: 'vcxproj' } }));
    writeFile(root, 'src/Game.vcxproj', SAMPLE_VCXPROJ);

    expect(await run(argv('scan'), io)).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr.join('')).toContain(`Invalid ${path.join(root, 'vs-select.json')}: discovery.projectExtension: `);
  });

  it('returns the commander exit code for an unknown command', async () => {
    expect(await run(argv('bogus'), io)).toBe(1);
    expect(stderr.join('')).toContain("unknown command 'bogus'");
  });
});
