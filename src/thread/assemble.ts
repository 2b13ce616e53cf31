/**
 * Thread assembly
 * Groups replies under their thread head and orders a channel chronologically
 */

import type { Message } from '../ingest/slack/types.js';
import { compareTimestamps } from '../utils/index.js';
import type {
  Channel,
  ChannelStats,
  StandaloneEntry,
  Thread,
  TimelineEntry,
} from './types.js';

/**
 * Raised when a thread is requested for a message outside any thread
 */
export class ThreadError extends Error {
  constructor(
    message: string,
    public readonly source: Message
  ) {
    super(message);
    this.name = 'ThreadError';
  }
}

/**
 * Thread under construction; replies stay appendable until assembly ends
 */
interface ThreadBuilder {
  threadId: string;
  head: Message;
  replies: Message[];
}

/**
 * Start a thread with the given message as its head
 * @throws ThreadError if the message has no thread parent
 */
export function createThread(head: Message, replies: readonly Message[] = []): Thread {
  if (head.parentThreadId === null) {
    throw new ThreadError(
      `Message must have a thread parent to start a thread. Message: ${JSON.stringify(head)}`,
      head
    );
  }
  return { kind: 'thread', threadId: head.parentThreadId, head, replies: [...replies] };
}

/**
 * Group threaded messages into threads, in first-seen order of thread id.
 * A message whose thread id is already known becomes a reply, even when it
 * is that thread's head seen a second time.
 */
export function assembleThreads(messages: readonly Message[]): Thread[] {
  const builders = new Map<string, ThreadBuilder>();

  for (const message of messages) {
    const threadId = message.parentThreadId;
    if (threadId === null) continue;

    const existing = builders.get(threadId);
    if (existing) {
      existing.replies.push(message);
    } else {
      builders.set(threadId, { threadId, head: message, replies: [] });
    }
  }

  return [...builders.values()].map((builder) => createThread(builder.head, builder.replies));
}

/**
 * Timestamp a timeline entry sorts by
 */
export function entryTimestamp(entry: TimelineEntry): string {
  return entry.kind === 'thread' ? entry.head.timestamp : entry.message.timestamp;
}

/**
 * Merge standalone messages and threads into one chronological timeline.
 * The sort is stable: entries with equal timestamps keep standalone-then-thread
 * input order.
 */
export function mergeTimeline(
  messages: readonly Message[],
  threads: readonly Thread[]
): TimelineEntry[] {
  const standalone: StandaloneEntry[] = messages
    .filter((message) => message.parentThreadId === null)
    .map((message): StandaloneEntry => ({ kind: 'message', message }));

  const combined: TimelineEntry[] = [...standalone, ...threads];
  return combined.sort((a, b) => compareTimestamps(entryTimestamp(a), entryTimestamp(b)));
}

/**
 * Assemble a channel from its messages in file-iteration order
 */
export function buildChannel(name: string, messages: readonly Message[]): Channel {
  const threads = assembleThreads(messages);
  return {
    name,
    allMessages: [...messages],
    threads,
    timeline: mergeTimeline(messages, threads),
  };
}

/**
 * Summarise a channel
 */
export function getChannelStats(channel: Channel): ChannelStats {
  const authors = new Set(channel.allMessages.map((message) => message.authorId));
  const replyCount = channel.threads.reduce((sum, thread) => sum + thread.replies.length, 0);

  return {
    messageCount: channel.allMessages.length,
    standaloneCount: channel.timeline.length - channel.threads.length,
    threadCount: channel.threads.length,
    replyCount,
    participantCount: authors.size,
  };
}
