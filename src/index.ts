/**
 * slack-export-md - Slack export to threaded markdown
 * Main library entry point
 */

// Re-export modules for programmatic use
export * from './config/index.js';
export * from './utils/index.js';
export * from './ingest/slack/index.js';
export * from './thread/index.js';
export * from './export/index.js';
export * from './pipeline/convert.js';
export { version } from './version.js';
