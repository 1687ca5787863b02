/**
 * Shared request validation pieces for query strings and JSON bodies
 */

import { z } from 'zod';

const TRUE_VALUES = ['true', '1', 'yes'];
const FALSE_VALUES = ['false', '0', 'no'];

/**
 * "true"/"false"/"1"/"0"/"yes"/"no" query flag with a default
 */
export const queryBoolean = (defaultValue: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .refine((value) => TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value), {
      message: 'Expected true or false',
    })
    .transform((value) => TRUE_VALUES.includes(value))
    .optional()
    .transform((value) => value ?? defaultValue);

/**
 * Non-empty trimmed query string with a default
 */
export const queryString = (defaultValue: string) =>
  z
    .string()
    .trim()
    .min(1)
    .max(100)
    .optional()
    .transform((value) => value ?? defaultValue);

/**
 * Optional positive integer; the caller picks the default
 */
export const queryPositiveInt = (max: number) => z.coerce.number().int().positive().max(max).optional();
