/**
 * Refresh Scheduler
 * Background loop that re-produces a fixed set of topics on an interval.
 * Request handlers never wait on it; they read whatever the store holds.
 */

import { EventEmitter } from 'events';
import { SnapshotStore } from '../cache/snapshot.store';
import { withTimeout } from '../utils/timeout';
import { describeError } from '../upstream/upstream.errors';
import {
  PassResult,
  RefreshSchedulerConfig,
  RefreshTopic,
  SchedulerEvent,
  SchedulerState,
  SchedulerStatus,
  TopicErrorEvent,
  TopicFailure,
} from './scheduler.types';

export interface RefreshSchedulerOptions {
  clock?: () => number;
}

export class RefreshScheduler extends EventEmitter {
  private store: SnapshotStore;
  private config: RefreshSchedulerConfig;
  private clock: () => number;
  private state: SchedulerState = SchedulerState.IDLE;
  private started = false;
  private timer?: NodeJS.Timeout;
  private currentPass: Promise<PassResult> | null = null;
  private passes = 0;
  private lastPass: PassResult | null = null;
  private nextRunAt: number | null = null;

  constructor(store: SnapshotStore, config: RefreshSchedulerConfig, options: RefreshSchedulerOptions = {}) {
    super();
    this.store = store;
    this.config = {
      ...config,
      concurrency: Math.max(1, config.concurrency),
    };
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Run the initial pass, then keep refreshing every intervalMs.
   * Resolves once the initial pass is done; topic failures do not reject.
   */
  async start(): Promise<PassResult> {
    if (this.isStopped()) {
      throw new Error(`Refresh scheduler "${this.config.domain}" has been stopped`);
    }
    if (this.started) {
      return this.runPass();
    }
    this.started = true;

    console.log(
      `🔄 Starting ${this.config.domain} refresh (${this.config.topics.length} topics every ${
        this.config.intervalMs / 1000
      }s)`
    );

    const result = await this.runPass();
    this.scheduleNext();
    return result;
  }

  /**
   * Refresh every topic once. A call during a running pass joins that pass.
   */
  runPass(): Promise<PassResult> {
    if (this.currentPass) {
      return this.currentPass;
    }
    if (this.isStopped()) {
      return Promise.reject(new Error(`Refresh scheduler "${this.config.domain}" has been stopped`));
    }

    this.currentPass = this.executePass().finally(() => {
      this.currentPass = null;
    });
    return this.currentPass;
  }

  /**
   * Cancel the loop and wait for an in-flight pass to finish
   */
  async stop(): Promise<void> {
    if (this.isStopped()) {
      return;
    }

    this.state = SchedulerState.STOPPED;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.nextRunAt = null;

    if (this.currentPass) {
      await this.currentPass;
    }

    console.log(`🛑 ${this.config.domain} refresh stopped`);
  }

  getState(): SchedulerState {
    return this.state;
  }

  getStatus(): SchedulerStatus {
    return {
      domain: this.config.domain,
      state: this.state,
      topics: this.config.topics.map((topic) => topic.key),
      intervalMs: this.config.intervalMs,
      passes: this.passes,
      lastPass: this.lastPass
        ? {
            startedAt: new Date(this.lastPass.startedAt).toISOString(),
            durationMs: this.lastPass.durationMs,
            refreshed: this.lastPass.refreshed.length,
            failed: this.lastPass.failed,
          }
        : null,
      nextRunAt: this.nextRunAt === null ? null : new Date(this.nextRunAt).toISOString(),
    };
  }

  private isStopped(): boolean {
    return this.state === SchedulerState.STOPPED;
  }

  private scheduleNext(): void {
    if (this.isStopped()) {
      return;
    }

    this.nextRunAt = this.clock() + this.config.intervalMs;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.nextRunAt = null;
      void this.tick();
    }, this.config.intervalMs);
  }

  private async tick(): Promise<void> {
    try {
      await this.runPass();
    } catch (error: unknown) {
      console.error(`❌ ${this.config.domain} refresh pass failed:`, describeError(error));
    } finally {
      this.scheduleNext();
    }
  }

  private async executePass(): Promise<PassResult> {
    const pass = ++this.passes;
    const startedAt = this.clock();
    const refreshed: string[] = [];
    const failed: TopicFailure[] = [];
    const { domain, topics, concurrency } = this.config;

    this.state = SchedulerState.REFRESHING;
    this.emit(SchedulerEvent.PASS_START, { domain, pass });

    try {
      for (let i = 0; i < topics.length; i += concurrency) {
        if (this.isStopped()) {
          break;
        }

        const batch = topics.slice(i, i + concurrency);
        const outcomes = await Promise.allSettled(batch.map((topic) => this.refreshTopic(topic)));

        outcomes.forEach((outcome, index) => {
          const { key } = batch[index];
          if (outcome.status === 'fulfilled') {
            refreshed.push(key);
            return;
          }

          const message = describeError(outcome.reason);
          failed.push({ key, error: message });
          console.error(`❌ Refresh failed for ${key}: ${message}`);
          const event: TopicErrorEvent = { domain, key, error: outcome.reason };
          this.emit(SchedulerEvent.TOPIC_ERROR, event);
        });
      }
    } finally {
      if (!this.isStopped()) {
        this.state = SchedulerState.IDLE;
      }
    }

    const result: PassResult = {
      domain,
      pass,
      startedAt,
      durationMs: this.clock() - startedAt,
      refreshed,
      failed,
    };
    this.lastPass = result;

    if (failed.length > 0) {
      console.warn(`⚠️ ${domain} pass #${pass}: ${refreshed.length}/${topics.length} topics refreshed`);
    } else {
      console.log(`✅ ${domain} pass #${pass}: ${refreshed.length} topics refreshed in ${result.durationMs}ms`);
    }

    this.emit(SchedulerEvent.PASS_COMPLETE, result);
    return result;
  }

  private async refreshTopic(topic: RefreshTopic): Promise<void> {
    const payload = await withTimeout(topic.produce(), this.config.topicTimeoutMs, `Refreshing ${topic.key}`);
    this.store.set(topic.key, payload);
  }
}
