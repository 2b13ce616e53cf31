/**
 * Thread module
 */

export {
  ThreadError,
  createThread,
  assembleThreads,
  entryTimestamp,
  mergeTimeline,
  buildChannel,
  getChannelStats,
} from './assemble.js';

export type {
  StandaloneEntry,
  Thread,
  TimelineEntry,
  Channel,
  ChannelStats,
} from './types.js';
