/**
 * Shared utilities barrel export
 */

export { withTimeout, TimeoutError } from './timeout';
export { formatDisplayDate, formatDisplayTimestamp, formatIsoDate, addDays } from './date';
export { capitalize, titleCase } from './text';
