/**
 * Core CLI commands
 * convert (the default command)
 */

import { Command, Option } from 'commander';
import { getConfig, setConfig, type Layout } from '../../config/index.js';
import { resetLogger } from '../../utils/logger.js';
import { convertExport } from '../../pipeline/convert.js';

/** Options for the convert command */
export interface ConvertCommandOptions {
  out?: string;
  layout?: Layout;
  usersFile?: string;
  users: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

/**
 * Raise the log level before any logger is created
 */
export function applyVerbosity(verbose: boolean | undefined): void {
  if (!verbose) return;
  setConfig({ ...getConfig(), logLevel: 'debug' });
  resetLogger();
}

/**
 * Register core commands on the program
 */
export function registerCoreCommands(program: Command): void {
  program
    .command('convert', { isDefault: true })
    .description('Convert matching channels of an export to markdown')
    .argument('<export-dir>', 'Directory of the unzipped Slack export')
    .argument('<pattern>', 'Pattern matching the names of the channels to convert (e.g. "help*")')
    .option('--out <dir>', 'Output directory (default: "md" next to the export directory)')
    .addOption(
      new Option('--layout <layout>', 'One document per channel or per thread').choices([
        'channel',
        'thread',
      ])
    )
    .option('--users-file <name>', 'User directory file inside the export directory')
    .option('--no-users', 'Keep raw user ids instead of initials')
    .option('--dry-run', 'Render without writing any files')
    .option('--verbose', 'Log debug output')
    .allowExcessArguments(false)
    .action(async (exportDir: string, pattern: string, options: ConvertCommandOptions) => {
      try {
        applyVerbosity(options.verbose);
        const result = await convertExport({
          exportDir,
          pattern,
          outputDir: options.out,
          layout: options.layout,
          usersFile: options.usersFile,
          resolveUsers: options.users ? undefined : false,
          dryRun: options.dryRun,
        });

        for (const report of result.channels) {
          console.log(
            `Channel ${report.channel}: Found ${report.stats.messageCount} total messages with ${report.stats.threadCount} discrete threads`
          );
        }

        if (result.channels.length === 0 && result.errors.length === 0) {
          console.log(`No channels match "${pattern}"`);
        }

        console.log('');
        console.log(`Output: ${result.outputDir}`);
        console.log(`  Files written: ${result.filesWritten}`);
        console.log(`  Duration: ${result.duration}ms`);

        if (result.errors.length > 0) {
          console.log(`\nErrors (${result.errors.length}):`);
          for (const err of result.errors) {
            console.log(`  ! ${err.channel}: ${err.error}`);
          }
          process.exitCode = 1;
        }
      } catch (err) {
        console.error('Failed to convert export:', err instanceof Error ? err.message : err);
        process.exitCode = 1;
      }
    });
}
