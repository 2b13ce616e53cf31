/**
 * Inspection CLI commands
 * channels, users
 */

import { Command } from 'commander';
import { join, resolve } from 'path';
import { getConfig } from '../../config/index.js';
import { listChannels } from '../../ingest/slack/channel.js';
import { loadUserDirectory } from '../../ingest/slack/users.js';
import { assertExportDir, loadChannel } from '../../pipeline/convert.js';
import { getChannelStats } from '../../thread/assemble.js';

/** Options for the users command */
export interface UsersOptions {
  usersFile?: string;
  json?: boolean;
}

/**
 * Register inspection commands on the program
 */
export function registerInspectCommands(program: Command): void {
  program
    .command('channels')
    .description('List channels of an export with message and thread counts')
    .argument('<export-dir>', 'Directory of the unzipped Slack export')
    .argument('[pattern]', 'Pattern matching channel names', '*')
    .action(async (exportDir: string, pattern: string) => {
      const root = resolve(exportDir);

      try {
        await assertExportDir(root);
        const names = await listChannels(root, pattern);

        if (names.length === 0) {
          console.log(`No channels match "${pattern}"`);
          return;
        }

        for (const name of names) {
          try {
            const { channel, diagnostics } = await loadChannel(root, name);
            const stats = getChannelStats(channel);
            console.log(
              `${name}: ${stats.messageCount} messages, ${stats.threadCount} threads, ` +
                `${stats.replyCount} replies, ${stats.participantCount} participants` +
                (diagnostics.length > 0 ? ` (${diagnostics.length} skipped)` : '')
            );
          } catch (err) {
            console.log(`  ! ${name}: ${err instanceof Error ? err.message : String(err)}`);
            process.exitCode = 1;
          }
        }
      } catch (err) {
        console.error('Failed to list channels:', err instanceof Error ? err.message : err);
        process.exitCode = 1;
      }
    });

  program
    .command('users')
    .description('List the user directory of an export')
    .argument('<export-dir>', 'Directory of the unzipped Slack export')
    .option('--users-file <name>', 'User directory file inside the export directory')
    .option('--json', 'Output as JSON')
    .action(async (exportDir: string, options: UsersOptions) => {
      const root = resolve(exportDir);

      try {
        await assertExportDir(root);
        const users = await loadUserDirectory(
          join(root, options.usersFile ?? getConfig().usersFile)
        );

        if (options.json) {
          console.log(JSON.stringify([...users.values()], null, 2));
          return;
        }

        for (const user of users.values()) {
          console.log(`${user.id}\t${user.initials}\t${user.realName}`);
        }
      } catch (err) {
        console.error('Failed to load users:', err instanceof Error ? err.message : err);
        process.exitCode = 1;
      }
    });
}
