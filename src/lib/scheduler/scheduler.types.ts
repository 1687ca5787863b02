/**
 * Refresh Scheduler Types
 */

import { Snapshot, TopicKey } from '../cache/cache.types';

export enum SchedulerState {
  IDLE = 'idle',             // Sleeping between passes
  REFRESHING = 'refreshing', // Pass in progress
  STOPPED = 'stopped',
}

export enum SchedulerEvent {
  PASS_START = 'pass:start',
  PASS_COMPLETE = 'pass:complete',
  TOPIC_ERROR = 'topic:error',
}

export interface RefreshTopic {
  key: TopicKey;
  produce: () => Promise<Snapshot>;
}

export interface RefreshSchedulerConfig {
  domain: string;
  topics: RefreshTopic[];
  intervalMs: number;
  topicTimeoutMs: number; // Ceiling for one topic's produce call
  concurrency: number;    // Topics refreshed together per batch
}

export interface TopicFailure {
  key: TopicKey;
  error: string;
}

export interface PassResult {
  domain: string;
  pass: number;
  startedAt: number;
  durationMs: number;
  refreshed: TopicKey[];
  failed: TopicFailure[];
}

export interface TopicErrorEvent {
  domain: string;
  key: TopicKey;
  error: unknown;
}

export interface SchedulerStatus {
  domain: string;
  state: SchedulerState;
  topics: TopicKey[];
  intervalMs: number;
  passes: number;
  lastPass: {
    startedAt: string;
    durationMs: number;
    refreshed: number;
    failed: TopicFailure[];
  } | null;
  nextRunAt: string | null;
}
