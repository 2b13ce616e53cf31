/**
 * Thread and timeline types
 */

import type { Message } from '../ingest/slack/types.js';

/**
 * A message outside any thread
 */
export interface StandaloneEntry {
  readonly kind: 'message';
  readonly message: Message;
}

/**
 * A thread head together with its replies in the order they were read
 */
export interface Thread {
  readonly kind: 'thread';
  readonly threadId: string;
  readonly head: Message;
  readonly replies: readonly Message[];
}

/**
 * One unit of a channel timeline
 */
export type TimelineEntry = StandaloneEntry | Thread;

/**
 * A channel after thread assembly
 */
export interface Channel {
  readonly name: string;
  readonly allMessages: readonly Message[];
  readonly threads: readonly Thread[];
  /** Standalone messages and whole threads, oldest first */
  readonly timeline: readonly TimelineEntry[];
}

/**
 * Counts reported per channel
 */
export interface ChannelStats {
  messageCount: number;
  standaloneCount: number;
  threadCount: number;
  replyCount: number;
  participantCount: number;
}
