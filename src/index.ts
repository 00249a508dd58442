#!/usr/bin/env node

/**
 * authkey CLI - Main entry point
 * Registers a public key for passwordless SSH authentication on a remote host
 */

import { createProgram } from './program';
import { handleError } from './utils/errors';

createProgram()
  .parseAsync(process.argv)
  .catch(handleError);
