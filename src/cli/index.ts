#!/usr/bin/env node
/**
 * slackmd CLI - Main entry point
 * Converts Slack workspace exports to threaded markdown
 */

import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { version } from '../version.js';
import { registerCoreCommands, registerInspectCommands } from './commands/index.js';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('slackmd')
    .description('Convert a Slack export to markdown, with replies grouped under their thread')
    .version(version)
    .showHelpAfterError();

  // Register command groups
  registerCoreCommands(program);
  registerInspectCommands(program);

  return program;
}

/**
 * Whether the script node was started with is this module.
 * Installed bins are symlinks, so both sides are compared as real paths.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath) return false;
  try {
    return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    return false;
  }
}

// Run CLI when executed directly (not when imported as module)
if (isEntryPoint(process.argv[1], import.meta.url)) {
  await createProgram().parseAsync();
}
