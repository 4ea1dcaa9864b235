import { describe, expect, it } from 'vitest';
import { fileStem, formatSelectionSummary, formatStatusLine, getRelativePath } from '../selectionFormatter';

describe('getRelativePath', () => {
  it('strips the root prefix', () => {
    expect(getRelativePath('/work/game/engine/Engine.vcxproj', '/work/game', 'linux')).toBe('engine/Engine.vcxproj');
  });

  it('accepts a root with a trailing slash', () => {
    expect(getRelativePath('/work/game/Game.sln', '/work/game/', 'linux')).toBe('Game.sln');
  });

  it('normalizes backslashes and ignores case on win32', () => {
    expect(getRelativePath('C:\\Work\\Game\\Engine\\Engine.vcxproj', 'c:\\work\\game', 'win32')).toBe(
      'Engine/Engine.vcxproj',
    );
  });

  it('is case-sensitive elsewhere', () => {
    expect(getRelativePath('/Work/Game/Game.sln', '/work/game', 'linux')).toBe('/Work/Game/Game.sln');
  });

  it('returns paths outside the root unchanged apart from separators', () => {
    expect(getRelativePath('D:\\other\\Lib.vcxproj', 'C:\\work', 'win32')).toBe('D:/other/Lib.vcxproj');
  });

  it('does not treat a sibling directory sharing a prefix as inside the root', () => {
    expect(getRelativePath('/work/game2/Game.sln', '/work/game', 'linux')).toBe('/work/game2/Game.sln');
  });
});

describe('fileStem', () => {
  it('drops directory and last extension', () => {
    expect(fileStem('/work/game/Game.sln')).toBe('Game');
    expect(fileStem('C:\\work\\Engine.Core.vcxproj')).toBe('Engine.Core');
  });
});

describe('formatSelectionSummary', () => {
  it('lists every chosen value', () => {
    const summary = formatSelectionSummary(
      {
        solution: '/work/game/Game.sln',
        project: '/work/game/engine/Engine.vcxproj',
        platform: 'x64',
        configuration: 'Debug',
      },
      '/work/game',
      'linux',
    );

    expect(summary).toBe('Selected: Sln: Game.sln | Proj: engine/Engine.vcxproj | Plat: x64 | Cfg: Debug');
  });

  it('omits values that were not chosen', () => {
    expect(formatSelectionSummary({ project: '/work/game/App.vcxproj' }, '/work/game', 'linux')).toBe(
      'Selected: Proj: App.vcxproj',
    );
  });

  it('reports an empty selection', () => {
    expect(formatSelectionSummary({}, '/work/game')).toBe('No complete selection made.');
  });
});

describe('formatStatusLine', () => {
  it('shows file names without extension followed by platform and configuration', () => {
    const line = formatStatusLine({
      solution: '/work/game/Game.sln',
      project: '/work/game/engine/Engine.vcxproj',
      platform: 'x64',
      configuration: 'Release',
    });

    expect(line).toBe('\u{F070C} VS[S:Game|P:Engine|x64|Release]');
  });

  it('is empty when nothing is selected', () => {
    expect(formatStatusLine({})).toBe('');
  });
});
