// level/catalog.ts — Discovering level files on disk

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { LEVEL_FILE_EXTENSION } from '../shared/constants.js';

/** Level files in `dir`, sorted by file name. */
export async function listLevels(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.endsWith(LEVEL_FILE_EXTENSION))
    .map((e) => e.name)
    .sort((a, b) => a.localeCompare(b, 'en', { numeric: true }))
    .map((name) => join(dir, name));
}
