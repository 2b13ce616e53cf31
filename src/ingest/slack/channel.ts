/**
 * Channel directory reader
 * Locates channel folders in an export and loads their day files
 */

import { readdir } from 'fs/promises';
import { join } from 'path';
import { filterByPattern } from '../../scope/pattern.js';
import { loadMessageFile } from './messages.js';
import type { LoadResult } from './types.js';

/**
 * List the channel directories of an export whose names match a pattern
 */
export async function listChannels(exportDir: string, pattern = '*'): Promise<string[]> {
  const entries = await readdir(exportDir, { withFileTypes: true });
  const dirs = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
  return filterByPattern(dirs, pattern);
}

/**
 * List the day files of a channel in filename (date) order
 */
export async function listDayFiles(channelDir: string): Promise<string[]> {
  const entries = await readdir(channelDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(channelDir, name));
}

/**
 * Load and concatenate every day file of a channel
 * @throws ArchiveFileError on the first unreadable or malformed day file
 */
export async function loadChannelMessages(channelDir: string): Promise<LoadResult> {
  const combined: LoadResult = { messages: [], diagnostics: [], skippedSubtypes: 0 };

  for (const file of await listDayFiles(channelDir)) {
    const result = await loadMessageFile(file);
    combined.messages.push(...result.messages);
    combined.diagnostics.push(...result.diagnostics);
    combined.skippedSubtypes += result.skippedSubtypes;
  }

  return combined;
}
