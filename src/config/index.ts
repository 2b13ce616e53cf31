/**
 * Configuration module
 * Handles loading and validating configuration from environment
 */

import { z, ZodError } from 'zod';
import dotenv from 'dotenv';
import { resolve } from 'path';

/**
 * Accepts booleans as well as the strings "true"/"1" coming from the environment
 */
const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === 'boolean') return val;
    return val.toLowerCase() === 'true' || val === '1';
  });

/**
 * Output layout: one document per channel, or one per thread
 */
export const LayoutSchema = z.enum(['channel', 'thread']);
export type Layout = z.infer<typeof LayoutSchema>;

/**
 * Configuration schema with zod validation
 * All options have sensible defaults
 */
export const ConfigSchema = z.object({
  // Export Layout
  usersFile: z
    .string()
    .min(1)
    .default('users.json')
    .describe('Name of the user directory file inside the export root'),
  outputDir: z
    .string()
    .optional()
    .describe('Directory for rendered markdown (defaults to ../md next to the export)'),
  layout: LayoutSchema
    .default('channel')
    .describe('Write one document per channel or one per thread'),
  resolveUsers: booleanFlag
    .default(true)
    .describe('Replace user ids with initials from the user directory'),

  // Logging Configuration
  logLevel: z
    .enum(['debug', 'info', 'warn', 'error', 'silent'])
    .default('info')
    .describe('Logging verbosity level'),
  logFormat: z
    .enum(['json', 'pretty'])
    .default('pretty')
    .describe('Log output format'),

  // Feature Flags
  dryRun: booleanFlag
    .default(false)
    .describe('Render without writing any files'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Configuration error with helpful messages
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  static fromZodError(error: ZodError): ConfigError {
    const messages = error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    return new ConfigError(
      `Configuration validation failed:\n${messages.join('\n')}`,
      error.issues
    );
  }
}

/**
 * Load .env file from specified path or default locations
 */
export function loadEnvFile(envPath?: string): void {
  if (envPath) {
    dotenv.config({ path: resolve(envPath) });
  } else {
    dotenv.config({ path: resolve(process.cwd(), '.env') });
    dotenv.config({ path: resolve(process.cwd(), '.env.local') });
  }
}

/**
 * Build raw config object from environment variables
 */
function buildRawConfig(): Record<string, unknown> {
  return {
    usersFile: process.env.SLACKMD_USERS_FILE,
    outputDir: process.env.SLACKMD_OUTPUT_DIR || undefined,
    layout: process.env.SLACKMD_LAYOUT,
    resolveUsers: process.env.SLACKMD_RESOLVE_USERS,
    logLevel: process.env.SLACKMD_LOG_LEVEL,
    logFormat: process.env.SLACKMD_LOG_FORMAT,
    dryRun: process.env.SLACKMD_DRY_RUN,
  };
}

/**
 * Load and validate configuration from environment
 * @param envPath Optional path to .env file
 * @throws ConfigError if validation fails
 */
export function loadConfig(envPath?: string): Config {
  loadEnvFile(envPath);

  const result = ConfigSchema.safeParse(buildRawConfig());

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Validate a partial config object
 */
export function validateConfig(config: unknown): Config {
  const result = ConfigSchema.safeParse(config);

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Get default configuration values
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

let _config: Config | null = null;

/**
 * Get the global configuration instance (singleton)
 * Loads from environment on first access
 */
export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/**
 * Set the global configuration instance
 */
export function setConfig(config: Config): void {
  _config = validateConfig(config);
}

/**
 * Reset the global configuration instance
 * Forces reload on next getConfig() call
 */
export function resetConfig(): void {
  _config = null;
}
