/**
 * Display helpers for a selection: root-relative paths, the confirmation
 * summary and the compact status-line string.
 */

import * as path from 'node:path';
import type { Selection } from './selectionSession';

/** Nerd Font "Visual Studio" glyph shown in front of the status line. */
export const STATUS_ICON = '\u{F070C}';

function normalizeSeparators(value: string): string {
  return value.replace(/\\/g, '/');
}

/**
 * Path of `filePath` relative to `root`, with forward slashes.
 *
 * The prefix comparison is case-insensitive on win32. Paths outside the root
 * are returned with normalized separators only.
 */
export function getRelativePath(filePath: string, root: string, platform: NodeJS.Platform = process.platform): string {
  const pathNorm = normalizeSeparators(filePath);
  let rootNorm = normalizeSeparators(root);
  if (!rootNorm.endsWith('/')) {
    rootNorm += '/';
  }

  const caseInsensitive = platform === 'win32';
  const pathCompare = caseInsensitive ? pathNorm.toLowerCase() : pathNorm;
  const rootCompare = caseInsensitive ? rootNorm.toLowerCase() : rootNorm;

  if (pathCompare.startsWith(rootCompare)) {
    return pathNorm.slice(rootNorm.length);
  }
  return pathNorm;
}

/**
 * File name without directory and without its last extension.
 */
export function fileStem(filePath: string): string {
  return path.posix.parse(normalizeSeparators(filePath)).name;
}

/**
 * One-line confirmation, e.g. `Selected: Sln: app.sln | Proj: src/app.vcxproj | Plat: x64 | Cfg: Debug`.
 */
export function formatSelectionSummary(selection: Selection, root: string, platform?: NodeJS.Platform): string {
  const parts: string[] = [];
  if (selection.solution) parts.push(`Sln: ${getRelativePath(selection.solution, root, platform)}`);
  if (selection.project) parts.push(`Proj: ${getRelativePath(selection.project, root, platform)}`);
  if (selection.platform) parts.push(`Plat: ${selection.platform}`);
  if (selection.configuration) parts.push(`Cfg: ${selection.configuration}`);

  if (parts.length === 0) {
    return 'No complete selection made.';
  }
  return `Selected: ${parts.join(' | ')}`;
}

/**
 * Compact status string, e.g. `󰜌 VS[S:app|P:core|x64|Debug]`; empty when nothing is selected.
 */
export function formatStatusLine(selection: Selection): string {
  const parts: string[] = [];
  if (selection.solution) parts.push(`S:${fileStem(selection.solution)}`);
  if (selection.project) parts.push(`P:${fileStem(selection.project)}`);
  if (selection.platform) parts.push(selection.platform);
  if (selection.configuration) parts.push(selection.configuration);

  if (parts.length === 0) {
    return '';
  }
  return `${STATUS_ICON} VS[${parts.join('|')}]`;
}
