/**
 * Schema validation for command-line values
 */

import { z } from 'zod';
import { PortSchema } from './config.schema';

/**
 * --port value: digits only, then range checked
 */
export const PortArgSchema = z.string()
  .regex(/^\d+$/, 'Port must be a number')
  .transform((value) => parseInt(value, 10))
  .pipe(PortSchema);

const HOST_REGEX = /^[^\s@-][^\s@]*$/;
const USER_REGEX = /^[^\s@-][^\s@]*$/;

/**
 * user@host (or bare host) split into its parts
 */
export const TargetArgSchema = z.string()
  .min(1, 'Target cannot be empty')
  .transform((value) => {
    const at = value.lastIndexOf('@');
    return at === -1
      ? { user: undefined, host: value }
      : { user: value.slice(0, at), host: value.slice(at + 1) };
  })
  .pipe(z.object({
    user: z.string()
      .regex(USER_REGEX, 'User must be non-empty, contain no whitespace or "@", and not start with "-"')
      .optional(),
    host: z.string()
      .regex(HOST_REGEX, 'Host must be non-empty, contain no whitespace, and not start with "-"'),
  }));
