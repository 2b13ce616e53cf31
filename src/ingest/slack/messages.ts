/**
 * Slack day-file loader
 * Turns the raw records of one export day file into validated messages
 */

import { readFile } from 'fs/promises';
import { createLogger } from '../../utils/logger.js';
import { ArchiveFileError } from './errors.js';
import {
  DayFileSchema,
  KNOWN_MESSAGE_SUBTYPES,
  MessageRecordSchema,
  REQUIRED_MESSAGE_FIELDS,
  type LoadDiagnostic,
  type LoadResult,
  type Message,
  type RawRecord,
} from './types.js';

/**
 * Build a message from a validated record
 */
export function createMessage(
  text: string,
  authorId: string,
  timestamp: string,
  parentThreadId: string | null = null
): Message {
  return Object.freeze({ text, authorId, timestamp, parentThreadId });
}

/**
 * Parse already-decoded records from a day file.
 * Subtype records are dropped; incomplete records are reported and dropped.
 */
export function parseMessageRecords(records: RawRecord[], source: string): LoadResult {
  const log = createLogger({ module: 'ingest', file: source });
  const messages: Message[] = [];
  const diagnostics: LoadDiagnostic[] = [];
  let skippedSubtypes = 0;

  records.forEach((record, recordIndex) => {
    // Meta events (joins, renames, file shares...) are never content
    if ('subtype' in record) {
      if (!KNOWN_MESSAGE_SUBTYPES.has(String(record.subtype))) {
        log.debug({ subtype: record.subtype, recordIndex }, 'Unrecognised message subtype');
      }
      skippedSubtypes++;
      return;
    }

    const missing = REQUIRED_MESSAGE_FIELDS.filter((field) => !(field in record));
    if (missing.length > 0) {
      for (const field of missing) {
        const diagnostic: LoadDiagnostic = {
          file: source,
          recordIndex,
          field,
          message: `message in file ${source} does not have required attribute '${field}'. Skipping.`,
        };
        diagnostics.push(diagnostic);
        log.warn({ recordIndex, field, record }, diagnostic.message);
      }
      return;
    }

    const result = MessageRecordSchema.safeParse(record);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      const diagnostic: LoadDiagnostic = {
        file: source,
        recordIndex,
        message: `message in file ${source} is invalid (${details}). Skipping.`,
      };
      diagnostics.push(diagnostic);
      log.warn({ recordIndex, record }, diagnostic.message);
      return;
    }

    const { text, user, ts, thread_ts } = result.data;
    messages.push(createMessage(text, user, ts, thread_ts ?? null));
  });

  return { messages, diagnostics, skippedSubtypes };
}

/**
 * Decode a day file's JSON content
 * @throws ArchiveFileError if the content is not a list of records
 */
export function parseDayFile(jsonContent: string, source: string): LoadResult {
  let rawData: unknown;
  try {
    rawData = JSON.parse(jsonContent);
  } catch (err) {
    throw new ArchiveFileError(
      `Invalid JSON in ${source}: ${err instanceof Error ? err.message : String(err)}`,
      source,
      { cause: err }
    );
  }

  const validation = DayFileSchema.safeParse(rawData);
  if (!validation.success) {
    throw new ArchiveFileError(
      `Expected ${source} to contain a list of message records: ${validation.error.issues[0]?.message ?? 'invalid structure'}`,
      source
    );
  }

  return parseMessageRecords(validation.data, source);
}

/**
 * Load one day file from disk
 * @throws ArchiveFileError if the file cannot be read or decoded
 */
export async function loadMessageFile(filePath: string): Promise<LoadResult> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ArchiveFileError(
      `Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      { cause: err }
    );
  }

  return parseDayFile(content, filePath);
}
