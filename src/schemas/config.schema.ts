/**
 * Schema validation for ~/.config/authkey/config.yml
 * Uses Zod for runtime type checking and validation
 */

import { z } from 'zod';

export const PortSchema = z.number()
  .int('Port must be an integer')
  .min(1, 'Port must be between 1 and 65535')
  .max(65535, 'Port must be between 1 and 65535');

/**
 * Config file schema. Every field is optional; CLI flags take precedence.
 */
export const AuthkeyConfigSchema = z.object({
  port: PortSchema.optional().describe('Default SSH port'),

  public_key: z.string()
    .min(1, 'public_key cannot be empty')
    .optional()
    .describe('Default public key path (~ expands to the home directory)'),

  connect_timeout: z.number()
    .int()
    .min(1, 'connect_timeout must be at least 1 second')
    .max(120, 'connect_timeout must be 120 seconds or less')
    .optional()
    .describe('ConnectTimeout (seconds) for the connection test'),

  use_copy_id: z.boolean()
    .optional()
    .describe('Delegate to ssh-copy-id when it is installed'),
}).strict();

export type AuthkeyConfig = z.infer<typeof AuthkeyConfigSchema>;
