/**
 * Circuit Breaker Types
 */

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half_open',
}

export interface CircuitBreakerConfig {
  name?: string;
  /** Per-call timeout in ms; false leaves timing to the wrapped call */
  timeout?: number | false;
  errorThresholdPercentage?: number;
  /** How long the circuit stays open before a trial call */
  resetTimeout?: number;
  /** Calls in the rolling window before the error rate can open the circuit */
  minimumRequests?: number;
  enabled?: boolean;
}

/**
 * Counts cover opossum's rolling window, not the process lifetime
 */
export interface CircuitBreakerStats {
  name: string;
  state: CircuitState;
  totalRequests: number;
  successes: number;
  failures: number;
  timeouts: number;
  rejects: number;
  errorRate: number;
  openedAt?: number;
  nextAttempt?: number;
}
