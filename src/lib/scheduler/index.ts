/**
 * Scheduler barrel export
 */

export { RefreshScheduler } from './refresh.scheduler';
export * from './scheduler.types';
