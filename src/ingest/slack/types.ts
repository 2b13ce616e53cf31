/**
 * Slack export type definitions
 * Based on the per-channel day files and users.json of a Slack workspace export
 */

import { z } from 'zod';
import { TIMESTAMP_PATTERN } from '../../utils/index.js';

/**
 * Message subtypes Slack writes for system and meta events.
 * Any record with a subtype is skipped; this set only documents what to expect.
 */
export const KNOWN_MESSAGE_SUBTYPES: ReadonlySet<string> = new Set([
  'bot_message',
  'me_message',
  'message_changed',
  'message_deleted',
  'channel_join',
  'channel_leave',
  'channel_topic',
  'channel_purpose',
  'channel_name',
  'channel_archive',
  'channel_unarchive',
  'group_join',
  'group_leave',
  'group_topic',
  'group_purpose',
  'group_name',
  'group_archive',
  'group_unarchive',
  'file_share',
  'file_reply',
  'file_mention',
  'pinned_item',
  'unpinned_item',
]);

/**
 * Fields every content message must carry
 */
export const REQUIRED_MESSAGE_FIELDS = ['text', 'user', 'ts'] as const;
export type RequiredMessageField = (typeof REQUIRED_MESSAGE_FIELDS)[number];

const TimestampSchema = z
  .string()
  .regex(TIMESTAMP_PATTERN, 'Expected decimal seconds since epoch');

/**
 * A raw record as found in a day file
 */
export const RawRecordSchema = z.record(z.string(), z.unknown());
export type RawRecord = z.infer<typeof RawRecordSchema>;

/**
 * A day file: ordered list of raw records
 */
export const DayFileSchema = z.array(RawRecordSchema);

/**
 * A content message record
 */
export const MessageRecordSchema = z
  .object({
    text: z.string(),
    user: z.string(),
    ts: TimestampSchema,
    thread_ts: TimestampSchema.nullish(),
  })
  .passthrough();

/**
 * A field that must be present; any present value is coerced to a string
 */
const requiredString = z
  .unknown()
  .refine((val) => val !== undefined, { message: 'Required' })
  .transform((val) => String(val));

/**
 * User profile (only the name fields are used)
 */
export const UserProfileSchema = z
  .object({
    real_name: requiredString,
    real_name_normalized: requiredString,
  })
  .passthrough();

/**
 * A user record from users.json
 */
export const UserRecordSchema = z
  .object({
    id: requiredString,
    name: requiredString,
    profile: UserProfileSchema,
  })
  .passthrough();
export type UserRecord = z.input<typeof UserRecordSchema>;

/**
 * users.json: ordered list of user records
 */
export const UsersFileSchema = z.array(z.unknown());

/**
 * A validated chat message
 */
export interface Message {
  readonly text: string;
  readonly authorId: string;
  /** Decimal seconds since epoch, as exported */
  readonly timestamp: string;
  /** Timestamp of the thread head, or null outside threads */
  readonly parentThreadId: string | null;
}

/**
 * A workspace member
 */
export interface User {
  readonly id: string;
  readonly name: string;
  readonly realName: string;
  readonly realNameNormalized: string;
  readonly initials: string;
}

/**
 * User lookup keyed by user id
 */
export type UserDirectory = ReadonlyMap<string, User>;

/**
 * A per-record problem found while loading a day file
 */
export interface LoadDiagnostic {
  file: string;
  recordIndex: number;
  field?: RequiredMessageField;
  message: string;
}

/**
 * Messages loaded from one or more day files
 */
export interface LoadResult {
  messages: Message[];
  diagnostics: LoadDiagnostic[];
  skippedSubtypes: number;
}
