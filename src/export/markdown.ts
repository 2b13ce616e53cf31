/**
 * Markdown export module
 * Renders messages, threads and channels with user ids resolved to initials
 */

import { writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import type { Message, UserDirectory } from '../ingest/slack/types.js';
import type { Channel, Thread, TimelineEntry } from '../thread/types.js';
import { formatUtcTimestamp } from '../utils/index.js';

/**
 * Inline user mention, e.g. <@U024BE7LH>
 */
export const MENTION_PATTERN = /<@(U[A-Z0-9]+)>/g;

/**
 * A message referenced a user id the directory does not contain
 */
export class UnknownUserError extends Error {
  constructor(public readonly userId: string) {
    super(`Unknown user id ${userId}`);
    this.name = 'UnknownUserError';
  }
}

/**
 * Initials for a user id
 * @throws UnknownUserError if the id is not in the directory
 */
export function resolveInitials(userId: string, users: UserDirectory): string {
  const user = users.get(userId);
  if (!user) {
    throw new UnknownUserError(userId);
  }
  return user.initials;
}

/**
 * Replace every <@U...> mention with the mentioned user's initials
 */
export function replaceMentions(text: string, users: UserDirectory): string {
  return text.replace(MENTION_PATTERN, (_match, userId: string) => `**@${resolveInitials(userId, users)}**`);
}

/**
 * Render a single message as one line
 */
export function renderMessage(message: Message, users?: UserDirectory): string {
  const utc = formatUtcTimestamp(message.timestamp);

  // Use initials instead of ids everywhere when a directory is given
  const name = users ? resolveInitials(message.authorId, users) : message.authorId;
  const text = users ? replaceMentions(message.text, users) : message.text;

  return `**${name}:** ${text} *[${utc}]*`;
}

/**
 * Replies joined by blank lines, in the order they were assembled
 */
function renderReplies(thread: Thread, users?: UserDirectory): string {
  return thread.replies.map((reply) => renderMessage(reply, users)).join('\n\n');
}

/**
 * Render a thread as a heading with its replies underneath
 */
export function renderThread(thread: Thread, users?: UserDirectory): string {
  return (
    `## ${renderMessage(thread.head, users)}\n\n` +
    '### Replies\n' +
    renderReplies(thread, users)
  );
}

/**
 * Render any timeline entry
 */
export function renderEntry(entry: TimelineEntry, users?: UserDirectory): string {
  switch (entry.kind) {
    case 'thread':
      return renderThread(entry, users);
    case 'message':
      return renderMessage(entry.message, users);
  }
}

/**
 * Render a whole channel; threads are closed off with a horizontal rule
 */
export function renderChannelDocument(channel: Channel, users?: UserDirectory): string {
  const sections = [`# ${channel.name} channel, in markdown\n\n`];

  for (const entry of channel.timeline) {
    sections.push(`${renderEntry(entry, users)}\n\n`);
    if (entry.kind === 'thread') {
      sections.push('---\n\n');
    }
  }

  return sections.join('');
}

/**
 * Render a thread as a standalone document
 */
export function renderThreadDocument(thread: Thread, users?: UserDirectory): string {
  return (
    '# A thread begins here\n' +
    `${renderMessage(thread.head, users)}\n\n` +
    '## Replies\n' +
    renderReplies(thread, users)
  );
}

/**
 * Write result information
 */
export interface WriteMarkdownResult {
  filePath: string;
  filename: string;
  bytesWritten: number;
}

/**
 * Options shared by the markdown writers
 */
export interface WriteOptions {
  users?: UserDirectory;
  /** Render only; nothing is written */
  dryRun?: boolean;
}

async function writeDocument(
  outputDir: string,
  filename: string,
  content: string,
  dryRun: boolean
): Promise<WriteMarkdownResult> {
  const filePath = join(outputDir, filename);

  if (!dryRun) {
    await mkdir(outputDir, { recursive: true });
    await writeFile(filePath, content, 'utf-8');
  }

  return {
    filePath,
    filename,
    bytesWritten: dryRun ? 0 : Buffer.byteLength(content, 'utf-8'),
  };
}

/**
 * Write a channel to <outputDir>/<channel>.md
 */
export async function writeChannelMarkdown(
  channel: Channel,
  outputDir: string,
  options: WriteOptions = {}
): Promise<WriteMarkdownResult> {
  const content = renderChannelDocument(channel, options.users);
  return writeDocument(outputDir, `${channel.name}.md`, content, options.dryRun ?? false);
}

/**
 * Write each thread of a channel to <outputDir>/<channel>/<threadId>.md
 */
export async function writeThreadMarkdownFiles(
  channel: Channel,
  outputDir: string,
  options: WriteOptions = {}
): Promise<WriteMarkdownResult[]> {
  const channelDir = join(outputDir, channel.name);

  // Every thread renders before the first file is written
  const documents = channel.threads.map((thread) => ({
    filename: `${thread.threadId}.md`,
    content: renderThreadDocument(thread, options.users),
  }));

  const written: WriteMarkdownResult[] = [];
  for (const doc of documents) {
    written.push(await writeDocument(channelDir, doc.filename, doc.content, options.dryRun ?? false));
  }
  return written;
}
