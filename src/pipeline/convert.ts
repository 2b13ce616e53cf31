/**
 * Convert pipeline
 * Export root -> user directory -> channels -> threads -> markdown
 */

import { stat } from 'fs/promises';
import { join, resolve } from 'path';
import { getConfig, type Layout } from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import { ExportNotFoundError } from '../ingest/slack/errors.js';
import { listChannels, loadChannelMessages } from '../ingest/slack/channel.js';
import { loadUserDirectory } from '../ingest/slack/users.js';
import type { LoadDiagnostic, UserDirectory } from '../ingest/slack/types.js';
import { buildChannel, getChannelStats } from '../thread/assemble.js';
import type { Channel, ChannelStats } from '../thread/types.js';
import {
  writeChannelMarkdown,
  writeThreadMarkdownFiles,
  type WriteMarkdownResult,
} from '../export/markdown.js';

/**
 * Convert options; unset values fall back to the global config
 */
export interface ConvertOptions {
  exportDir: string;
  pattern: string;
  outputDir?: string;
  layout?: Layout;
  usersFile?: string;
  resolveUsers?: boolean;
  dryRun?: boolean;
  onProgress?: (progress: ConvertProgress) => void;
}

/**
 * Convert progress
 */
export interface ConvertProgress {
  phase: 'users' | 'channel' | 'complete';
  current: number;
  total: number;
  channel?: string;
}

/**
 * Outcome for one channel
 */
export interface ChannelReport {
  channel: string;
  stats: ChannelStats;
  diagnostics: LoadDiagnostic[];
  skippedSubtypes: number;
  written: WriteMarkdownResult[];
}

/**
 * Convert result
 */
export interface ConvertResult {
  outputDir: string;
  channels: ChannelReport[];
  errors: Array<{ channel: string; error: string }>;
  filesWritten: number;
  duration: number;
}

/**
 * Default output location: a "md" directory next to the export root
 */
export function getDefaultOutputDir(exportDir: string): string {
  return resolve(exportDir, '..', 'md');
}

/**
 * Fail unless the export root exists and is a directory
 * @throws ExportNotFoundError
 */
export async function assertExportDir(exportDir: string): Promise<void> {
  try {
    const stats = await stat(exportDir);
    if (stats.isDirectory()) return;
  } catch (err) {
    throw new ExportNotFoundError(exportDir, { cause: err });
  }
  throw new ExportNotFoundError(exportDir);
}

/**
 * Load one channel directory and assemble its threads
 */
export async function loadChannel(
  exportDir: string,
  name: string
): Promise<{ channel: Channel; diagnostics: LoadDiagnostic[]; skippedSubtypes: number }> {
  const { messages, diagnostics, skippedSubtypes } = await loadChannelMessages(join(exportDir, name));
  return { channel: buildChannel(name, messages), diagnostics, skippedSubtypes };
}

/**
 * Render and write one channel in the requested layout
 */
async function writeChannel(
  channel: Channel,
  outputDir: string,
  layout: Layout,
  users: UserDirectory | undefined,
  dryRun: boolean
): Promise<WriteMarkdownResult[]> {
  if (layout === 'thread') {
    return writeThreadMarkdownFiles(channel, outputDir, { users, dryRun });
  }
  return [await writeChannelMarkdown(channel, outputDir, { users, dryRun })];
}

/**
 * Run the full conversion.
 * A missing export root or a broken user directory aborts the run; a failing
 * channel is recorded in `errors` and the next channel is processed.
 */
export async function convertExport(options: ConvertOptions): Promise<ConvertResult> {
  const startTime = Date.now();
  const config = getConfig();
  const log = createLogger({ module: 'convert' });

  const exportDir = resolve(options.exportDir);
  const layout = options.layout ?? config.layout;
  const resolveUsers = options.resolveUsers ?? config.resolveUsers;
  const dryRun = options.dryRun ?? config.dryRun;
  const outputDir = resolve(options.outputDir ?? config.outputDir ?? getDefaultOutputDir(exportDir));

  await assertExportDir(exportDir);

  const names = await listChannels(exportDir, options.pattern);
  const total = names.length;

  let users: UserDirectory | undefined;
  if (resolveUsers) {
    options.onProgress?.({ phase: 'users', current: 0, total });
    users = await loadUserDirectory(join(exportDir, options.usersFile ?? config.usersFile));
    log.info({ users: users.size }, 'User directory loaded');
  }

  if (total === 0) {
    log.warn({ pattern: options.pattern }, 'No channels match the pattern');
  }

  const result: ConvertResult = {
    outputDir,
    channels: [],
    errors: [],
    filesWritten: 0,
    duration: 0,
  };

  for (const [index, name] of names.entries()) {
    options.onProgress?.({ phase: 'channel', current: index + 1, total, channel: name });

    try {
      const { channel, diagnostics, skippedSubtypes } = await loadChannel(exportDir, name);
      const stats = getChannelStats(channel);
      log.debug(
        { channel: name, skippedRecords: diagnostics.length, skippedSubtypes },
        `Channel ${name}: Found ${stats.messageCount} total messages with ${stats.threadCount} discrete threads`
      );

      const written = await writeChannel(channel, outputDir, layout, users, dryRun);
      result.filesWritten += dryRun ? 0 : written.length;
      result.channels.push({ channel: name, stats, diagnostics, skippedSubtypes, written });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error({ channel: name, err }, `Channel ${name} failed: ${message}`);
      result.errors.push({ channel: name, error: message });
    }
  }

  options.onProgress?.({ phase: 'complete', current: total, total });
  result.duration = Date.now() - startTime;
  return result;
}
