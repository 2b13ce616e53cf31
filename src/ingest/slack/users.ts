/**
 * Slack user directory
 * Builds the id -> user lookup from users.json
 */

import { readFile } from 'fs/promises';
import { createLogger } from '../../utils/logger.js';
import { describeType } from '../../utils/index.js';
import { UserDirectoryError } from './errors.js';
import { UserRecordSchema, UsersFileSchema, type User, type UserDirectory } from './types.js';

/**
 * First letter of each name token, skipping parenthetical ones like "(he/him)"
 */
export function computeInitials(realNameNormalized: string): string {
  return realNameNormalized
    .split(/\s+/)
    .filter((token) => token.length > 0 && !token.startsWith('('))
    .map((token) => [...token][0])
    .join('');
}

/**
 * Create a user from a single users.json record
 * @throws UserDirectoryError if id, name or the profile names are missing
 */
export function createUser(record: unknown): User {
  const result = UserRecordSchema.safeParse(record);
  if (!result.success) {
    throw UserDirectoryError.fromZodError(result.error, record);
  }

  const { id, name, profile } = result.data;
  return Object.freeze({
    id,
    name,
    realName: profile.real_name,
    realNameNormalized: profile.real_name_normalized,
    initials: computeInitials(profile.real_name_normalized),
  });
}

/**
 * Build the directory from decoded users.json content
 */
export function parseUserDirectory(records: unknown): UserDirectory {
  const validation = UsersFileSchema.safeParse(records);
  if (!validation.success) {
    throw new UserDirectoryError(
      `Expected the user directory to be a list of users, not ${describeType(records)}`
    );
  }

  const users = new Map<string, User>();
  for (const record of validation.data) {
    const user = createUser(record);
    users.set(user.id, user);
  }
  return users;
}

/**
 * Load users.json from disk
 * @throws UserDirectoryError if the file is unreadable or any record is invalid
 */
export async function loadUserDirectory(filePath: string): Promise<UserDirectory> {
  const log = createLogger({ module: 'users', file: filePath });

  let rawData: unknown;
  try {
    rawData = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (err) {
    throw new UserDirectoryError(
      `Cannot load user directory ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const users = parseUserDirectory(rawData);
  log.debug({ count: users.size }, 'Loaded user directory');
  return users;
}
