/**
 * Circuit Breaker Tests
 */

import { CircuitBreaker } from '../circuit-breaker.manager';
import { CircuitState } from '../circuit-breaker.types';

const failing = (message: string) =>
  jest.fn(async (_location: string): Promise<string> => {
    throw new Error(message);
  });

describe('CircuitBreaker', () => {
  let breaker: CircuitBreaker<[string], string>;

  afterEach(() => {
    breaker.shutdown();
    jest.restoreAllMocks();
  });

  it('should pass results through and count successes', async () => {
    breaker = new CircuitBreaker(async (location: string) => `forecast for ${location}`, { name: 'Weather', timeout: false });

    await expect(breaker.execute('Indore')).resolves.toBe('forecast for Indore');
    expect(breaker.getStats()).toMatchObject({
      name: 'Weather',
      state: CircuitState.CLOSED,
      totalRequests: 1,
      successes: 1,
      failures: 0,
      errorRate: 0,
    });
  });

  it('should open after enough failures and reject without calling upstream', async () => {
    jest.spyOn(Date, 'now').mockReturnValue(1_000);
    const call = failing('upstream down');
    breaker = new CircuitBreaker(call, { name: 'Mandi', timeout: false, minimumRequests: 2, resetTimeout: 60_000 });

    await expect(breaker.execute('Indore')).rejects.toThrow('upstream down');
    await expect(breaker.execute('Indore')).rejects.toThrow('upstream down');

    expect(breaker.getState()).toBe(CircuitState.OPEN);
    await expect(breaker.execute('Indore')).rejects.toMatchObject({ code: 'EOPENBREAKER' });
    expect(call).toHaveBeenCalledTimes(2);
    expect(breaker.getStats()).toMatchObject({
      failures: 2,
      rejects: 1,
      errorRate: 100,
      openedAt: 1_000,
      nextAttempt: 61_000,
    });
  });

  it('should take an explicit zero minimum instead of the default', async () => {
    breaker = new CircuitBreaker(failing('down'), { name: 'Gemini', timeout: false, minimumRequests: 0 });

    await expect(breaker.execute('Indore')).rejects.toThrow('down');

    expect(breaker.getState()).toBe(CircuitState.OPEN);
  });

  it('should report closed when disabled', async () => {
    breaker = new CircuitBreaker(failing('down'), { name: 'Gemini', enabled: false, minimumRequests: 1 });

    await expect(breaker.execute('Indore')).rejects.toThrow('down');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });
});
