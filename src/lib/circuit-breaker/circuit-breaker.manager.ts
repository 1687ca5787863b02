/**
 * Circuit Breaker
 * Typed opossum wrapper shared by the upstream clients
 */

import Opossum from 'opossum';
import { CircuitBreakerConfig, CircuitBreakerStats, CircuitState } from './circuit-breaker.types';

const ROLLING_WINDOW_MS = 60_000;
const ROLLING_BUCKETS = 10;

export class CircuitBreaker<TArgs extends unknown[], TResult> {
  private breaker: Opossum<TArgs, TResult>;
  private name: string;
  private enabled: boolean;
  private resetTimeout: number;
  private openedAt?: number;

  constructor(fn: (...args: TArgs) => Promise<TResult>, config: CircuitBreakerConfig = {}) {
    this.name = config.name ?? 'CircuitBreaker';
    this.enabled = config.enabled ?? true;
    this.resetTimeout = config.resetTimeout ?? 30_000;

    this.breaker = new Opossum(fn, {
      name: this.name,
      enabled: this.enabled,
      timeout: config.timeout ?? 10_000,
      errorThresholdPercentage: config.errorThresholdPercentage ?? 50,
      resetTimeout: this.resetTimeout,
      volumeThreshold: config.minimumRequests ?? 5,
      rollingCountTimeout: ROLLING_WINDOW_MS,
      rollingCountBuckets: ROLLING_BUCKETS,
    });

    this.breaker.on('open', () => {
      this.openedAt = Date.now();
      console.warn(`⚠️ Circuit ${this.name} opened, retrying in ${this.resetTimeout}ms`);
    });

    this.breaker.on('close', () => {
      this.openedAt = undefined;
      console.log(`✅ Circuit ${this.name} closed`);
    });
  }

  execute(...args: TArgs): Promise<TResult> {
    return this.breaker.fire(...args);
  }

  getState(): CircuitState {
    if (!this.enabled) {
      return CircuitState.CLOSED;
    }
    if (this.breaker.opened) {
      return CircuitState.OPEN;
    }
    return this.breaker.halfOpen ? CircuitState.HALF_OPEN : CircuitState.CLOSED;
  }

  getStats(): CircuitBreakerStats {
    const { fires, successes, failures, timeouts, rejects } = this.breaker.stats;
    const completed = successes + failures;
    const state = this.getState();

    return {
      name: this.name,
      state,
      totalRequests: fires,
      successes,
      failures,
      timeouts,
      rejects,
      errorRate: completed > 0 ? (failures / completed) * 100 : 0,
      openedAt: this.openedAt,
      nextAttempt: state === CircuitState.OPEN && this.openedAt !== undefined ? this.openedAt + this.resetTimeout : undefined,
    };
  }

  /**
   * Stop opossum's rolling-window timers
   */
  shutdown(): void {
    this.breaker.shutdown();
  }
}
