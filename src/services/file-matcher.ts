/**
 * File Matcher
 *
 * Lists regular files under a directory whose base name matches a pattern.
 * Directories are walked (when recursive) but never returned.
 */

import { readdir } from 'fs/promises';
import { join } from 'path';

export interface FilterOptions {
  recursive?: boolean;
}

export async function filterFileList(
  directory: string,
  pattern: RegExp,
  options: FilterOptions = {}
): Promise<string[]> {
  const recursive = options.recursive ?? true;
  const matches: string[] = [];

  const walk = async (current: string): Promise<void> => {
    const entries = await readdir(current, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const entryPath = join(current, entry.name);
      if (entry.isDirectory()) {
        if (recursive) {
          await walk(entryPath);
        }
        continue;
      }
      if (entry.isFile() && pattern.test(entry.name)) {
        matches.push(entryPath);
      }
    }
  };

  await walk(directory);
  return matches;
}
