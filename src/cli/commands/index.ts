/**
 * CLI Commands index
 * Re-exports all command registration functions
 */

export { registerCoreCommands } from './core.js';
export { registerInspectCommands } from './inspect.js';
