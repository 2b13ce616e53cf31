/**
 * Slack ingestion module
 * Reads Slack workspace exports
 */

export {
  createMessage,
  parseMessageRecords,
  parseDayFile,
  loadMessageFile,
} from './messages.js';

export {
  computeInitials,
  createUser,
  parseUserDirectory,
  loadUserDirectory,
} from './users.js';

export {
  listChannels,
  listDayFiles,
  loadChannelMessages,
} from './channel.js';

export {
  ArchiveFileError,
  UserDirectoryError,
  ExportNotFoundError,
} from './errors.js';

export {
  KNOWN_MESSAGE_SUBTYPES,
  REQUIRED_MESSAGE_FIELDS,
  MessageRecordSchema,
  UserRecordSchema,
  type RequiredMessageField,
  type RawRecord,
  type UserRecord,
  type Message,
  type User,
  type UserDirectory,
  type LoadDiagnostic,
  type LoadResult,
} from './types.js';
