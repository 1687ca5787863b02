/**
 * Validation barrel export
 */

export { queryBoolean, queryString, queryPositiveInt } from './request.schemas';
