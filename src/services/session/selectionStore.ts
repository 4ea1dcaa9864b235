/**
 * Persists the completed selection under the search root so that separate
 * CLI invocations (status, show, clear) see the same selection.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { fail, ok, toUnknownError, type Result } from '../../core/result';
import type { Selection } from './selectionSession';

export const STATE_DIRECTORY = '.vs-select';
export const SELECTION_FILE = 'selection.json';

const selectionSchema = z
  .object({
    solution: z.string().min(1).optional(),
    project: z.string().min(1).optional(),
    platform: z.string().optional(),
    configuration: z.string().optional(),
  })
  .strict();

export function selectionFilePath(root: string): string {
  return path.join(root, STATE_DIRECTORY, SELECTION_FILE);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read the stored selection. A missing file is an empty selection.
 */
export async function loadSelection(root: string): Promise<Result<Selection>> {
  const filePath = selectionFilePath(root);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return ok({});
    return fail({ code: 'FileOpenError', message: `Could not read ${filePath}`, filePath, cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return fail({ code: 'ParseError', message: `Invalid JSON in ${filePath}`, raw: content });
  }

  const parsed = selectionSchema.safeParse(raw);
  if (!parsed.success) {
    return fail({ code: 'ParseError', message: `Unexpected selection format in ${filePath}`, raw });
  }
  return ok(parsed.data);
}

export async function saveSelection(root: string, selection: Selection): Promise<Result<string>> {
  const filePath = selectionFilePath(root);
  const stored: Selection = {
    solution: selection.solution,
    project: selection.project,
    platform: selection.platform,
    configuration: selection.configuration,
  };
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, `${JSON.stringify(stored, null, 2)}\n`, 'utf-8');
    return ok(filePath);
  } catch (error) {
    return fail(toUnknownError(error));
  }
}

/**
 * Remove the stored selection. Succeeds when nothing was stored.
 */
export async function clearStoredSelection(root: string): Promise<Result<void>> {
  try {
    await fs.rm(selectionFilePath(root), { force: true });
    return ok(undefined);
  } catch (error) {
    return fail(toUnknownError(error));
  }
}
